// src/core/engine-factory.ts
import { loadConfig, type Config } from './config.js'
import { SearchEngine } from './engine.js'
import { SqliteMetrics } from './metrics.js'
import { createLogger, type Logger } from './logger.js'
import { currentPlatformFamily } from './platform.js'
import { SqliteResultCache, type ResultCache } from '../cache/sqlite.js'
import { AurSource } from '../sources/aur.js'
import { PacmanSource } from '../sources/pacman.js'
import { AptSource } from '../sources/apt.js'
import { DnfSource } from '../sources/dnf.js'
import { FlatpakSource } from '../sources/flatpak.js'
import { SnapSource } from '../sources/snap.js'
import type { SourceAdapter } from '../sources/base.js'
import type { PlatformFamily, SourceName } from './types.js'

export interface Runtime {
  config: Config
  log: Logger
  engine: SearchEngine
  cache: ResultCache
  metrics: SqliteMetrics
  close(): void
}

export function buildSources(timeouts: Record<SourceName, number>): Record<SourceName, SourceAdapter> {
  return {
    aur: new AurSource(timeouts.aur),
    pacman: new PacmanSource(timeouts.pacman),
    apt: new AptSource(timeouts.apt),
    dnf: new DnfSource(timeouts.dnf),
    flatpak: new FlatpakSource(timeouts.flatpak),
    snap: new SnapSource(timeouts.snap),
  }
}

export function buildEngine(config: Config = loadConfig(), log?: Logger): Runtime {
  const logger = log ?? createLogger({ level: config.logLevel, file: config.logFile })
  const cache = new SqliteResultCache(config.cache, logger)
  const metrics = new SqliteMetrics(config.metricsPath, logger)

  let detected: PlatformFamily | undefined
  const platform = (): PlatformFamily => {
    detected ??= config.platform ?? currentPlatformFamily()
    return detected
  }

  const engine = new SearchEngine(
    buildSources(config.sourceTimeouts),
    cache,
    metrics,
    { platform, defaultLimit: config.defaultLimit },
    logger,
  )

  return {
    config,
    log: logger,
    engine,
    cache,
    metrics,
    close() {
      cache.close()
      metrics.close()
    },
  }
}
