import { describe, it, expect } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { applicableSources, currentPlatformFamily, platformFromOsRelease } from '../../src/core/platform.js'

describe('platformFromOsRelease', () => {
  it('maps ID directly', () => {
    expect(platformFromOsRelease('NAME="Arch Linux"\nID=arch\n')).toBe('arch')
    expect(platformFromOsRelease('ID=fedora\nVERSION_ID=40\n')).toBe('fedora')
  })

  it('falls back through ID_LIKE', () => {
    expect(platformFromOsRelease('ID=zorin\nID_LIKE="ubuntu debian"\n')).toBe('debian')
  })

  it('returns unknown for unlisted distributions', () => {
    expect(platformFromOsRelease('ID=gentoo\n')).toBe('unknown')
    expect(platformFromOsRelease('')).toBe('unknown')
  })
})

describe('currentPlatformFamily', () => {
  it('reads the given os-release file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'pkgscout-os-'))
    try {
      const file = join(dir, 'os-release')
      writeFileSync(file, 'ID="manjaro"\n')
      expect(currentPlatformFamily(file)).toBe('arch')
    } finally {
      rmSync(dir, { recursive: true })
    }
  })

  it('returns unknown when the file is missing', () => {
    expect(currentPlatformFamily('/nonexistent/os-release')).toBe('unknown')
  })
})

describe('applicableSources', () => {
  it('lists native sources before the universal stores', () => {
    expect(applicableSources('arch')).toEqual(['aur', 'pacman', 'flatpak', 'snap'])
    expect(applicableSources('debian')).toEqual(['apt', 'flatpak', 'snap'])
    expect(applicableSources('fedora')).toEqual(['dnf', 'flatpak', 'snap'])
    expect(applicableSources('unknown')).toEqual(['flatpak', 'snap'])
  })
})
