// src/core/scoring.ts
// Hand-tuned ranking heuristics. They bias ties between plausible candidates;
// nothing stronger should be read into the individual numbers.
import type { SourceName } from './types.js'

export interface ScoringPolicy {
  /** Description markers that exclude a candidate before scoring */
  junkTerms: readonly string[]
  boostTerms: readonly string[]
  lowPriorityTerms: readonly string[]
  exactNameBonus: number
  nameContainsBonus: number
  nameTokenPrefixBonus: number
  descriptionTokenPrefixBonus: number
  boostTermBonus: number
  lowPriorityPenalty: number
  /** Suffix used by prebuilt-binary packages, e.g. `brave-bin` */
  binarySuffix: string
  binarySuffixBonus: number
  sourceBonus: Readonly<Record<SourceName, number>>
}

export const DEFAULT_SCORING: ScoringPolicy = {
  junkTerms: ['icon', 'dummy', 'meta', 'symlink', 'wrap', 'material', 'launcher', 'unionfs'],
  boostTerms: ['editor', 'browser', 'ide', 'official', 'gui', 'android', 'studio', 'stable', 'canary', 'beta'],
  lowPriorityTerms: ['extension', 'plugin', 'helper', 'daemon', 'patch', 'theme'],
  exactNameBonus: 150,
  nameContainsBonus: 80,
  nameTokenPrefixBonus: 4,
  descriptionTokenPrefixBonus: 1,
  boostTermBonus: 3,
  lowPriorityPenalty: 10,
  binarySuffix: '-bin',
  binarySuffixBonus: 5,
  sourceBonus: {
    pacman: 40,
    apt: 40,
    dnf: 40,
    aur: 20,
    flatpak: 10,
    snap: 5,
  },
}

/** Which source wins a duplicate name when the caller states no preference */
export const NATIVE_SOURCE_PREFERENCE: readonly SourceName[] = ['pacman', 'apt', 'dnf']

/** Sources searched per platform family, before the universal stores */
export const PLATFORM_SOURCES = {
  arch: ['aur', 'pacman'],
  debian: ['apt'],
  fedora: ['dnf'],
  unknown: [],
} as const satisfies Record<string, readonly SourceName[]>

export const UNIVERSAL_SOURCES: readonly SourceName[] = ['flatpak', 'snap']

/** Completion-engine weights; separate from search ranking */
export const COMPLETION_SCORING = {
  aliasScore: 100,
  exactName: 100,
  namePrefix: 80,
  nameContains: 60,
  abbreviation: 70,
  descriptionContains: 20,
  nameWordPrefix: 10,
  descriptionWordPrefix: 5,
  frequencyPerUse: 2,
  frequencyCap: 20,
  recencyMax: 10,
  removeContextRecentBonus: 15,
  sourceBonus: {
    pacman: 10,
    aur: 8,
    flatpak: 6,
    apt: 5,
    dnf: 5,
    snap: 4,
  } satisfies Record<SourceName, number>,
} as const
