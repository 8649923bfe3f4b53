// src/core/platform.ts
import { readFileSync } from 'node:fs'
import { PLATFORM_SOURCES, UNIVERSAL_SOURCES } from './scoring.js'
import type { PlatformFamily, SourceName } from './types.js'

const DISTRO_FAMILIES: Record<string, PlatformFamily> = {
  arch: 'arch',
  manjaro: 'arch',
  endeavouros: 'arch',
  arco: 'arch',
  garuda: 'arch',
  ubuntu: 'debian',
  debian: 'debian',
  linuxmint: 'debian',
  pop: 'debian',
  elementary: 'debian',
  fedora: 'fedora',
  rhel: 'fedora',
  centos: 'fedora',
  rocky: 'fedora',
  alma: 'fedora',
}

/** Parse os-release(5) text: `ID` first, then each `ID_LIKE` entry. */
export function platformFromOsRelease(text: string): PlatformFamily {
  const fields = new Map<string, string>()
  for (const line of text.split('\n')) {
    const m = /^([A-Z_]+)=(.*)$/.exec(line.trim())
    if (m?.[1] && m[2] !== undefined) fields.set(m[1], m[2].replace(/^["']|["']$/g, '').toLowerCase())
  }

  const candidates = [fields.get('ID') ?? '', ...(fields.get('ID_LIKE') ?? '').split(/\s+/)]
  for (const id of candidates) {
    const family = DISTRO_FAMILIES[id]
    if (family) return family
  }
  return 'unknown'
}

export function currentPlatformFamily(osReleasePath = '/etc/os-release'): PlatformFamily {
  try {
    return platformFromOsRelease(readFileSync(osReleasePath, 'utf8'))
  } catch {
    return 'unknown'
  }
}

/** Native sources for the family followed by the universal app stores */
export function applicableSources(family: PlatformFamily): SourceName[] {
  return [...PLATFORM_SOURCES[family], ...UNIVERSAL_SOURCES]
}
