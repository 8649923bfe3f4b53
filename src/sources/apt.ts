// src/sources/apt.ts
import { CommandSource, outputLines, type CommandResult } from './command.js'
import { failed, ok } from './base.js'
import type { PackageRecord, SourceName, SourceOutcome } from '../core/types.js'

/** `apt-cache search` prints one `name - description` line per package. */
export function parseAptOutput(output: string): PackageRecord[] {
  const records: PackageRecord[] = []
  for (const line of outputLines(output)) {
    const sep = line.indexOf(' - ')
    if (sep === -1) continue
    const name = line.slice(0, sep).trim()
    if (name) records.push({ name, description: line.slice(sep + 3).trim(), source: 'apt' })
  }
  return records
}

export class AptSource extends CommandSource {
  readonly name: SourceName = 'apt'
  protected readonly command = 'apt-cache'
  protected readonly notFoundHint = 'apt-cache command not found. Run on a Debian/Ubuntu-based system.'

  protected args(term: string): string[] {
    return ['search', term]
  }

  protected interpret(result: CommandResult): SourceOutcome {
    if (result.exitCode === 0) return ok(parseAptOutput(result.stdout))

    const stderr = result.stderr.trim()
    if (stderr.includes('Unable to locate package')) return ok([])
    if (stderr.includes('Could not open lock file')) {
      return failed('generic', 'Cannot access the APT cache; another package operation may be running.')
    }
    if (stderr.includes('Permission denied')) {
      return failed('permission', 'Permission denied reading the APT cache.')
    }
    return failed('generic', `APT search failed (${stderr || `exit code ${result.exitCode}`}). Try: sudo apt update`)
  }
}
