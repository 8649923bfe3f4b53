import { homedir } from 'node:os'
import { join } from 'node:path'
import { readFileSync } from 'node:fs'
import { ConfigError } from './errors.js'
import { packageRoot } from './paths.js'
import type { PlatformFamily, SourceName } from './types.js'

let envLoaded = false

/**
 * Copy `KEY=value` lines from an optional `.env` file into `target` without
 * overriding variables that are already set. A missing file is skipped.
 */
export function loadEnvFile(path = join(packageRoot(), '.env'), target: NodeJS.ProcessEnv = process.env): void {
  let content: string
  try {
    content = readFileSync(path, 'utf8')
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return
    throw new ConfigError(`cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`)
  }
  for (const line of content.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) continue
    const eq = trimmed.indexOf('=')
    if (eq === -1) continue
    const key = trimmed.slice(0, eq).trim()
    const val = trimmed.slice(eq + 1).trim().replace(/^["']|["']$/g, '')
    if (key && target[key] === undefined) target[key] = val
  }
}

/** Per-source query timeouts; dnf resolves metadata and is the slowest. */
export const SOURCE_TIMEOUTS_MS: Record<SourceName, number> = {
  aur: 15_000,
  pacman: 30_000,
  apt: 30_000,
  dnf: 45_000,
  flatpak: 30_000,
  snap: 30_000,
}

export interface CacheConfig {
  enabled: boolean
  path: string
  ttlSec: number
  maxEntries: number
  sweepIntervalSec: number
}

export interface CompletionConfig {
  frequencyPath: string
  maxRecent: number
  flushEvery: number
}

export interface Config {
  cache: CacheConfig
  completion: CompletionConfig
  metricsPath: string
  defaultLimit: number
  platform: PlatformFamily | undefined
  aurHelper: string
  sourceTimeouts: Record<SourceName, number>
  logLevel: string
  logFile: string | undefined
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // .env only ever feeds the real environment, once per process
  if (env === process.env && !envLoaded) {
    loadEnvFile()
    envLoaded = true
  }
  const cacheDir = env['PKGSCOUT_CACHE_DIR']
    || join(env['XDG_CACHE_HOME'] || join(homedir(), '.cache'), 'pkgscout')

  return {
    cache: {
      enabled: !['0', 'false', 'off', 'no'].includes((env['PKGSCOUT_CACHE'] ?? '').toLowerCase()),
      path: join(cacheDir, 'cache.db'),
      ttlSec: positiveInt(env, 'PKGSCOUT_CACHE_TTL', 24 * 60 * 60),
      maxEntries: positiveInt(env, 'PKGSCOUT_CACHE_MAX_ENTRIES', 1000),
      sweepIntervalSec: positiveInt(env, 'PKGSCOUT_CACHE_SWEEP_INTERVAL', 3600),
    },
    completion: {
      frequencyPath: join(cacheDir, 'frequency.json'),
      maxRecent: 50,
      flushEvery: 10,
    },
    metricsPath: join(cacheDir, 'metrics.db'),
    defaultLimit: positiveInt(env, 'PKGSCOUT_DEFAULT_LIMIT', 5),
    platform: platformOverride(env['PKGSCOUT_PLATFORM']),
    aurHelper: env['PKGSCOUT_AUR_HELPER'] || 'yay',
    sourceTimeouts: { ...SOURCE_TIMEOUTS_MS },
    logLevel: env['LOG_LEVEL'] ?? 'warn',
    logFile: env['LOG_FILE'] || undefined,
  }
}

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key]
  if (raw === undefined || raw === '') return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`)
  }
  return value
}

function platformOverride(raw: string | undefined): PlatformFamily | undefined {
  if (!raw) return undefined
  if (raw === 'arch' || raw === 'debian' || raw === 'fedora' || raw === 'unknown') return raw
  throw new ConfigError(`PKGSCOUT_PLATFORM must be one of arch, debian, fedora, unknown; got "${raw}"`)
}
