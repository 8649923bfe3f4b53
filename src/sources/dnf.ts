// src/sources/dnf.ts
import { CommandSource, outputLines, type CommandResult } from './command.js'
import { failed, ok } from './base.js'
import type { PackageRecord, SourceName, SourceOutcome } from '../core/types.js'

/**
 * `dnf search` prints metadata chatter, then section headers
 * (`==== Name Exactly Matched: firefox ====`) and `name.arch : summary` rows.
 */
export function parseDnfOutput(output: string): PackageRecord[] {
  const records: PackageRecord[] = []
  let inResults = false
  for (const raw of outputLines(output)) {
    const line = raw.trim()
    if (line.includes('====') || (line.includes('Name') && line.includes('Matched'))) {
      inResults = true
      continue
    }
    if (!inResults || line.startsWith('Last metadata')) continue

    const sep = line.indexOf(' : ')
    if (sep === -1) continue
    const nameArch = line.slice(0, sep).trim()
    const dot = nameArch.lastIndexOf('.')
    const name = dot > 0 ? nameArch.slice(0, dot) : nameArch
    records.push({ name, description: line.slice(sep + 3).trim(), source: 'dnf' })
  }
  return records
}

export class DnfSource extends CommandSource {
  readonly name: SourceName = 'dnf'
  protected readonly command = 'dnf'
  protected readonly notFoundHint = 'dnf command not found. Run on a Fedora/RHEL-based system.'

  protected args(term: string): string[] {
    return ['search', term]
  }

  protected interpret(result: CommandResult): SourceOutcome {
    if (result.exitCode === 0) return ok(parseDnfOutput(result.stdout))
    if (result.exitCode === 1) return ok([])

    const stderr = result.stderr.trim()
    if (stderr.includes('Permission denied')) {
      return failed('permission', 'Permission denied accessing DNF. Try: sudo dnf search')
    }
    if (stderr.includes('Cannot retrieve metalink')) {
      return failed('network', 'Cannot connect to DNF repositories. Check your internet connection.')
    }
    if (stderr.includes('Cache disabled')) {
      return failed('generic', 'DNF cache is disabled. Try: sudo dnf makecache')
    }
    return failed('generic', `dnf search failed: ${stderr || `exit code ${result.exitCode}`}`)
  }
}
