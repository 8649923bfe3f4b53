import { describe, it, expect } from 'vitest'
import { deduplicate } from '../../src/core/dedupe.js'
import type { PackageRecord, SourceName } from '../../src/core/types.js'

function rec(name: string, source: SourceName, description = ''): PackageRecord {
  return { name, description, source }
}

describe('deduplicate', () => {
  it('prefers the native source over community and universal ones', () => {
    const out = deduplicate([rec('firefox', 'aur'), rec('firefox', 'flatpak'), rec('firefox', 'pacman')])
    expect(out).toEqual([rec('firefox', 'pacman')])
  })

  it('honours preferSource when present in the group', () => {
    const out = deduplicate([rec('firefox', 'pacman'), rec('firefox', 'aur')], 'aur')
    expect(out).toEqual([rec('firefox', 'aur')])
  })

  it('ignores preferSource when the group lacks it', () => {
    const out = deduplicate([rec('vlc', 'snap'), rec('vlc', 'apt')], 'aur')
    expect(out).toEqual([rec('vlc', 'apt')])
  })

  it('uses pacman before apt before dnf', () => {
    expect(deduplicate([rec('git', 'dnf'), rec('git', 'apt')])).toEqual([rec('git', 'apt')])
  })

  it('keeps the first record when no native source is present', () => {
    expect(deduplicate([rec('spotify', 'snap', 'a'), rec('spotify', 'flatpak', 'b')])).toEqual([
      rec('spotify', 'snap', 'a'),
    ])
  })

  it('treats names case-sensitively and keeps first-seen order', () => {
    const out = deduplicate([rec('b', 'aur'), rec('A', 'aur'), rec('a', 'aur'), rec('b', 'pacman')])
    expect(out.map((r) => `${r.name}/${r.source}`)).toEqual(['b/pacman', 'A/aur', 'a/aur'])
  })

  it('is idempotent', () => {
    const input = [rec('x', 'aur'), rec('x', 'pacman'), rec('y', 'snap'), rec('y', 'flatpak')]
    const once = deduplicate(input)
    expect(deduplicate(once)).toEqual(once)
  })
})
