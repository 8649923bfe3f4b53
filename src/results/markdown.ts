// src/results/markdown.ts
import type { FormatterOptions, ResultFormatter } from './base.js'
import { installCommand } from '../core/install.js'
import { githubSearchUrl } from '../core/fallback.js'
import { truncate, type SearchResponse } from '../core/types.js'

const MAX_DESCRIPTION = 60

export class MarkdownFormatter implements ResultFormatter {
  constructor(private readonly opts: FormatterOptions = {}) {}

  format(response: SearchResponse): string {
    const cached = response.cachedSources.length > 0 ? ` (cached: ${response.cachedSources.join(', ')})` : ''
    const lines: string[] = [
      `## Packages matching \`${response.query}\``,
      `> ${response.total} of ${response.candidates} candidate(s), ${response.elapsed_ms}ms${cached}`,
      '',
    ]

    if (response.results.length === 0) {
      lines.push('No packages found.', '', `Search GitHub instead: ${githubSearchUrl(response.query)}`)
    } else {
      lines.push('| # | Package | Source | Score | Install | Description |', '|---|---|---|---|---|---|')
      response.results.forEach(({ record, score }, i) => {
        const description = cell(truncate(record.description, MAX_DESCRIPTION))
        lines.push(
          `| ${i + 1} | ${cell(record.name)} | ${record.source} | ${score} | \`${installCommand(record, this.opts.aurHelper)}\` | ${description} |`,
        )
      })
    }

    if (response.failedSources.length > 0) {
      lines.push('', '### Unavailable sources', '')
      for (const f of response.failedSources) {
        lines.push(`- **${f.source}** (${f.kind}): ${f.message}`)
      }
    }

    return lines.join('\n')
  }
}

function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ')
}
