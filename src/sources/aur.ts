// src/sources/aur.ts
import got, { HTTPError, ParseError, RequestError, TimeoutError } from 'got'
import type { SourceAdapter } from './base.js'
import { failed, ok } from './base.js'
import { classifyError, errorMessage } from '../core/errors.js'
import type { PackageRecord, SourceName, SourceOutcome } from '../core/types.js'

export const AUR_BASE = 'https://aur.archlinux.org'

interface AurRpcResponse {
  type?: string
  error?: string
  results?: unknown
}

export class AurSource implements SourceAdapter {
  readonly name: SourceName = 'aur'

  constructor(
    readonly timeoutMs: number,
    private readonly baseUrl: string = AUR_BASE,
  ) {}

  async query(term: string, signal: AbortSignal): Promise<SourceOutcome> {
    let body: AurRpcResponse
    try {
      body = await got
        .get(`${this.baseUrl}/rpc/`, {
          searchParams: { v: 5, type: 'search', arg: term.trim() },
          retry: { limit: 0 },
          timeout: { request: this.timeoutMs },
          signal,
        })
        .json<AurRpcResponse>()
    } catch (err: unknown) {
      return toOutcome(err)
    }

    // The RPC reports its own errors (e.g. "Too many package results.") with HTTP 200
    if (body.type === 'error') return failed('generic', `AUR rejected the query: ${body.error ?? 'unknown error'}`)
    if (!Array.isArray(body.results)) return failed('generic', 'Unexpected response format from AUR')

    return ok(normalize(body.results))
  }
}

function normalize(results: unknown[]): PackageRecord[] {
  const records: PackageRecord[] = []
  for (const item of results) {
    if (item == null || typeof item !== 'object') continue
    const name = 'Name' in item ? item.Name : undefined
    const description = 'Description' in item ? item.Description : undefined
    if (typeof name !== 'string' || name === '') continue
    records.push({ name, description: typeof description === 'string' ? description : '', source: 'aur' })
  }
  return records
}

function toOutcome(err: unknown): SourceOutcome {
  if (err instanceof HTTPError) {
    const status = err.response.statusCode
    if (status === 429) return failed('network', 'AUR rate limit exceeded. Please wait before searching again.')
    if (status >= 500) return failed('network', 'AUR servers are experiencing issues. Try again later.')
    return failed('network', `AUR request failed with status ${status}`)
  }
  if (err instanceof TimeoutError) return failed('timeout', 'AUR search request timed out. Try again later.')
  if (err instanceof ParseError) return failed('generic', 'Invalid response from AUR')
  if (err instanceof RequestError) {
    const kind = classifyError(err)
    if (kind === 'timeout') return failed(kind, 'AUR search request timed out. Try again later.')
    if (kind === 'network' || kind === 'not-found') {
      return failed('network', 'Cannot connect to AUR servers. Check your internet connection.')
    }
    return failed(kind, `AUR search failed: ${err.message}`)
  }
  return failed(classifyError(err), `AUR search failed: ${errorMessage(err)}`)
}
