// src/completion/frequency.ts
import { mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs'
import { randomBytes } from 'node:crypto'
import { dirname } from 'node:path'
import { z } from 'zod'
import { errorMessage } from '../core/errors.js'
import type { Logger } from '../core/logger.js'

const FrequencyFileSchema = z.object({
  version: z.literal(1),
  frequency: z.record(z.number().int().nonnegative()),
  recent: z.array(z.string()),
})

export type FrequencyFile = z.infer<typeof FrequencyFileSchema>

export interface FrequencyStoreOptions {
  /** Where usage data lives; omit to keep it in memory only */
  path?: string
  maxRecent: number
  flushEvery: number
}

/**
 * Usage counts and a most-recent-first list of package names, written to a
 * JSON file every `flushEvery` recorded usages and on `flush()`.
 */
export class FrequencyStore {
  private frequency = new Map<string, number>()
  private recent: string[] = []
  private pending = 0

  constructor(
    private readonly opts: FrequencyStoreOptions,
    private readonly log: Logger,
  ) {
    this.load()
  }

  count(name: string): number {
    return this.frequency.get(name) ?? 0
  }

  /** Position in the recency list, or -1 */
  recencyIndex(name: string): number {
    return this.recent.indexOf(name)
  }

  recentNames(): readonly string[] {
    return this.recent
  }

  record(name: string): void {
    this.frequency.set(name, this.count(name) + 1)
    this.recent = [name, ...this.recent.filter((n) => n !== name)].slice(0, this.opts.maxRecent)
    this.pending++
    if (this.pending >= this.opts.flushEvery) this.flush()
  }

  /** Returns false when the file could not be written; state stays in memory */
  flush(): boolean {
    this.pending = 0
    const path = this.opts.path
    if (!path) return true
    const data: FrequencyFile = {
      version: 1,
      frequency: Object.fromEntries(this.frequency),
      recent: this.recent,
    }
    const tmpPath = `${path}.${randomBytes(4).toString('hex')}.tmp`
    try {
      mkdirSync(dirname(path), { recursive: true })
      writeFileSync(tmpPath, JSON.stringify(data, null, 2))
      renameSync(tmpPath, path)
      return true
    } catch (err: unknown) {
      this.log.warn({ path, err: errorMessage(err) }, 'could not save completion usage data')
      return false
    }
  }

  private load(): void {
    const path = this.opts.path
    if (!path) return
    let raw: string
    try {
      raw = readFileSync(path, 'utf8')
    } catch (err: unknown) {
      this.log.debug({ path, err: errorMessage(err) }, 'no completion usage data yet')
      return
    }
    try {
      const parsed = FrequencyFileSchema.safeParse(JSON.parse(raw))
      if (!parsed.success) {
        this.log.warn({ path, issues: parsed.error.issues.length }, 'ignoring malformed completion usage data')
        return
      }
      this.frequency = new Map(Object.entries(parsed.data.frequency))
      this.recent = parsed.data.recent.slice(0, this.opts.maxRecent)
    } catch (err: unknown) {
      this.log.warn({ path, err: errorMessage(err) }, 'ignoring unreadable completion usage data')
    }
  }
}
