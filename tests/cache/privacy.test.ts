import { describe, it, expect } from 'vitest'
import { MAX_CACHED_DESCRIPTION, isSensitiveQuery, sanitizeRecords } from '../../src/cache/privacy.js'

describe('isSensitiveQuery', () => {
  it('flags queries containing sensitive terms anywhere', () => {
    expect(isSensitiveQuery('Password Manager')).toBe(true)
    expect(isSensitiveQuery('keepassxc')).toBe(false)
    expect(isSensitiveQuery('keyboard layout')).toBe(true)
    expect(isSensitiveQuery('firefox')).toBe(false)
  })
})

describe('sanitizeRecords', () => {
  it('caps descriptions and drops records mentioning secrets', () => {
    const long = 'x'.repeat(MAX_CACHED_DESCRIPTION + 20)
    const out = sanitizeRecords([
      { name: 'a', description: long, source: 'aur' },
      { name: 'b', description: 'Stores your PASSWORD safely', source: 'aur' },
      { name: 'c', description: 'plain', source: 'snap' },
    ])
    expect(out).toEqual([
      { name: 'a', description: 'x'.repeat(MAX_CACHED_DESCRIPTION), source: 'aur' },
      { name: 'c', description: 'plain', source: 'snap' },
    ])
  })

  it('only inspects the kept part of the description', () => {
    const description = `${'y'.repeat(MAX_CACHED_DESCRIPTION)} secret`
    expect(sanitizeRecords([{ name: 'a', description, source: 'apt' }])).toHaveLength(1)
  })

  it('cuts descriptions on character boundaries', () => {
    const out = sanitizeRecords([{ name: 'a', description: 'ab\u{1F600}cd', source: 'flatpak' }], 3)
    expect(out[0]?.description).toBe('ab\u{1F600}')
  })
})
