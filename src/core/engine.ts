// src/core/engine.ts
import type { SourceAdapter } from '../sources/base.js'
import { failed } from '../sources/base.js'
import type { ResultCache } from '../cache/sqlite.js'
import type { MetricsSink, MetricRecord } from './metrics.js'
import type { Logger } from './logger.js'
import { SourceError, ValidationError, classifyError, errorMessage } from './errors.js'
import { applicableSources } from './platform.js'
import { deduplicate } from './dedupe.js'
import { scoreCandidates } from './rank.js'
import { DEFAULT_SCORING, type ScoringPolicy } from './scoring.js'
import { normalizeQuery } from './types.js'
import type {
  PackageRecord,
  PlatformFamily,
  SearchOptions,
  SearchResponse,
  SourceFailure,
  SourceName,
  SourceOutcome,
} from './types.js'

export interface SearchEngineOptions {
  platform: () => PlatformFamily
  defaultLimit: number
  scoring?: ScoringPolicy
}

interface SourceReport {
  source: SourceName
  records: PackageRecord[]
  cached: boolean
  failure?: SourceFailure
}

export const CANCELLED = 'cancelled'

export class SearchEngine {
  constructor(
    private readonly sources: Partial<Record<SourceName, SourceAdapter>>,
    private readonly cache: ResultCache,
    private readonly metrics: MetricsSink,
    private readonly opts: SearchEngineOptions,
    private readonly log: Logger,
  ) {}

  /** Sources that would be asked for the current platform, in merge order */
  activeSources(): SourceName[] {
    return applicableSources(this.opts.platform()).filter((name) => this.sources[name] !== undefined)
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResponse> {
    const normalized = normalizeQuery(query)
    if (!normalized) throw new ValidationError('Search query must not be empty')
    const limit = options.limit ?? this.opts.defaultLimit
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new ValidationError(`limit must be a positive integer, got ${limit}`)
    }

    const t0 = Date.now()
    const active = this.activeSources()
    this.log.info({ sources: active, limit }, 'search request')

    // Tasks never reject, and merging follows `active` order rather than arrival order
    const reports = await Promise.all(
      active.map((source) => this.querySource(source, query.trim(), options.useCache !== false, options.signal)),
    )

    const collected: PackageRecord[] = []
    const failedSources: SourceFailure[] = []
    const cachedSources: SourceName[] = []
    for (const report of reports) {
      collected.push(...report.records)
      if (report.failure) failedSources.push(report.failure)
      if (report.cached) cachedSources.push(report.source)
    }

    const unique = deduplicate(collected, options.preferSource)
    const results = scoreCandidates(normalized, unique, limit, this.opts.scoring ?? DEFAULT_SCORING)
    const elapsed_ms = Date.now() - t0
    this.log.info(
      { candidates: collected.length, results: results.length, failed: failedSources.length, elapsed_ms },
      'search complete',
    )

    return {
      query: normalized,
      results,
      total: results.length,
      candidates: collected.length,
      failedSources,
      cachedSources,
      elapsed_ms,
    }
  }

  private async querySource(
    source: SourceName,
    term: string,
    useCache: boolean,
    signal: AbortSignal | undefined,
  ): Promise<SourceReport> {
    const t0 = Date.now()

    if (useCache) {
      const hit = await this.cache.get(term, source).catch((err: unknown) => {
        this.log.warn({ source, err: errorMessage(err) }, 'cache lookup failed')
        return null
      })
      if (hit) {
        await this.recordMetric({ source, query: term, cacheHit: true, results: hit.length, elapsedMs: 0 })
        return { source, records: hit, cached: true }
      }
    }

    const adapter = this.sources[source]
    const outcome: SourceOutcome = adapter
      ? await this.invoke(adapter, term, signal)
      : failed('not-found', `${source} is not available`)
    const elapsedMs = Date.now() - t0

    if (outcome.status === 'failed') {
      this.log.warn({ source, kind: outcome.kind, error: outcome.message }, 'source failed')
      await this.recordMetric({ source, query: term, cacheHit: false, elapsedMs, failure: outcome.kind })
      return { source, records: [], cached: false, failure: { source, kind: outcome.kind, message: outcome.message } }
    }

    this.log.info({ source, count: outcome.records.length, elapsed_ms: elapsedMs }, 'source response')
    await this.recordMetric({ source, query: term, cacheHit: false, results: outcome.records.length, elapsedMs })
    if (useCache && outcome.records.length > 0) {
      await this.cache.set(term, source, outcome.records).catch((err: unknown) => {
        this.log.warn({ source, err: errorMessage(err) }, 'cache write failed')
        return false
      })
    }
    return { source, records: outcome.records, cached: false }
  }

  /**
   * Run one adapter under its own deadline and the caller's signal. Whichever
   * fires first aborts the adapter and settles the outcome as a timeout.
   */
  private async invoke(adapter: SourceAdapter, term: string, signal: AbortSignal | undefined): Promise<SourceOutcome> {
    if (signal?.aborted) return failed('timeout', CANCELLED)

    const controller = new AbortController()
    const timer = setTimeout(() => {
      controller.abort(new SourceError(adapter.name, 'timeout', `${adapter.name} did not respond within ${adapter.timeoutMs}ms`))
    }, adapter.timeoutMs)
    const cancel = (): void => controller.abort(new SourceError(adapter.name, 'timeout', CANCELLED))
    signal?.addEventListener('abort', cancel, { once: true })

    const interrupted = new Promise<SourceOutcome>((resolve) => {
      controller.signal.addEventListener(
        'abort',
        () => {
          const reason: unknown = controller.signal.reason
          resolve(reason instanceof SourceError ? failed(reason.kind, reason.message) : failed('timeout', CANCELLED))
        },
        { once: true },
      )
    })
    const running = adapter
      .query(term, controller.signal)
      .catch((err: unknown) => failed(classifyError(err), errorMessage(err)))

    try {
      return await Promise.race([running, interrupted])
    } finally {
      clearTimeout(timer)
      signal?.removeEventListener('abort', cancel)
    }
  }

  private async recordMetric(m: MetricRecord): Promise<void> {
    await this.metrics.record(m).catch((err: unknown) => {
      this.log.debug({ source: m.source, err: errorMessage(err) }, 'metrics write failed')
    })
  }
}
