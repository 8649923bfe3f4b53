// src/sources/pacman.ts
import { CommandSource, outputLines, type CommandResult } from './command.js'
import { failed, ok } from './base.js'
import type { PackageRecord, SourceName, SourceOutcome } from '../core/types.js'

/**
 * `pacman -Ss` prints a header per package followed by an indented
 * description line:
 *
 *     extra/firefox 131.0-1
 *         Fast, Private & Safe Web Browser
 */
export function parsePacmanOutput(output: string): PackageRecord[] {
  const lines = outputLines(output)
  const records: PackageRecord[] = []
  let i = 0
  while (i < lines.length) {
    const line = lines[i] ?? ''
    const isHeader = !/^\s/.test(line) && line.includes('/')
    if (!isHeader) {
      i += 1
      continue
    }
    const qualified = line.split(/\s+/)[0] ?? ''
    const name = qualified.slice(qualified.indexOf('/') + 1)
    const next = lines[i + 1]
    const description = next !== undefined && /^\s/.test(next) ? next.trim() : undefined
    if (name) records.push({ name, description: description ?? '', source: 'pacman' })
    i += description === undefined ? 1 : 2
  }
  return records
}

export class PacmanSource extends CommandSource {
  readonly name: SourceName = 'pacman'
  protected readonly command = 'pacman'
  protected readonly notFoundHint = 'pacman command not found. Install pacman or run on an Arch-based system.'

  protected args(term: string): string[] {
    return ['-Ss', term]
  }

  protected interpret(result: CommandResult): SourceOutcome {
    if (result.exitCode === 0) return ok(parsePacmanOutput(result.stdout))
    // pacman exits 1 when nothing matched
    if (result.exitCode === 1 && result.stdout.trim() === '') return ok([])
    return failed('generic', `pacman search failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`)
  }
}
