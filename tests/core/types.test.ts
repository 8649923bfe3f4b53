import { describe, it, expect } from 'vitest'
import { isPackageRecord, isSourceName, normalizeQuery, truncate } from '../../src/core/types.js'

describe('normalizeQuery', () => {
  it('trims, lower-cases and collapses inner whitespace', () => {
    expect(normalizeQuery('  Visual   Studio\tCode ')).toBe('visual studio code')
  })

  it('maps blank input to the empty string', () => {
    expect(normalizeQuery(' \t\n ')).toBe('')
  })
})

describe('isSourceName', () => {
  it('accepts known sources only', () => {
    expect(isSourceName('aur')).toBe(true)
    expect(isSourceName('brew')).toBe(false)
    expect(isSourceName(3)).toBe(false)
  })
})

describe('isPackageRecord', () => {
  it('accepts a well-formed record', () => {
    expect(isPackageRecord({ name: 'vim', description: 'editor', source: 'pacman' })).toBe(true)
  })

  it('rejects unknown sources and missing fields', () => {
    expect(isPackageRecord({ name: 'vim', description: 'editor', source: 'brew' })).toBe(false)
    expect(isPackageRecord({ name: 'vim', source: 'pacman' })).toBe(false)
    expect(isPackageRecord(null)).toBe(false)
  })
})

describe('truncate', () => {
  it('counts code points, not UTF-16 units', () => {
    expect(truncate('\u{1F680}\u{1F680}\u{1F680}', 2)).toBe('\u{1F680}\u{1F680}')
    expect(truncate('short', 10)).toBe('short')
  })
})
