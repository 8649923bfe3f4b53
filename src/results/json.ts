// src/results/json.ts
import type { FormatterOptions, ResultFormatter } from './base.js'
import { installCommand } from '../core/install.js'
import { githubSearchUrl } from '../core/fallback.js'
import type { SearchResponse } from '../core/types.js'

export class JsonFormatter implements ResultFormatter {
  constructor(private readonly opts: FormatterOptions = {}) {}

  format(response: SearchResponse): string {
    return JSON.stringify(
      {
        ...response,
        results: response.results.map(({ record, score }) => ({
          ...record,
          score,
          install: installCommand(record, this.opts.aurHelper),
        })),
        ...(response.results.length === 0 ? { githubSearch: githubSearchUrl(response.query) } : {}),
      },
      null,
      2,
    )
  }
}
