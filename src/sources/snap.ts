// src/sources/snap.ts
import { CommandSource, outputLines, type CommandResult } from './command.js'
import { failed, ok } from './base.js'
import type { PackageRecord, SourceName, SourceOutcome } from '../core/types.js'

const SUMMARY_MAX = 100

/**
 * `snap find` prints a header row, then
 * `Name  Version  Publisher  Notes  Summary` columns.
 */
export function parseSnapOutput(output: string): PackageRecord[] {
  const records: PackageRecord[] = []
  for (const line of outputLines(output)) {
    const parts = line.trim().split(/\s+/)
    const name = parts[0]
    if (!name || name === 'Name' || parts.length < 2) continue
    const summary = (parts.length >= 5 ? parts.slice(4) : parts.slice(1)).join(' ')
    const description = summary.length > SUMMARY_MAX ? `${summary.slice(0, SUMMARY_MAX)}...` : summary
    records.push({ name, description, source: 'snap' })
  }
  return records
}

export class SnapSource extends CommandSource {
  readonly name: SourceName = 'snap'
  protected readonly command = 'snap'
  protected readonly notFoundHint = 'snap command not found. Install snapd first.'

  protected args(term: string): string[] {
    return ['find', term]
  }

  protected interpret(result: CommandResult): SourceOutcome {
    if (result.exitCode === 0) return ok(parseSnapOutput(result.stdout))

    const stderr = result.stderr.trim()
    if (stderr.toLowerCase().includes('cannot communicate with server')) {
      return failed('network', 'Cannot connect to the Snap Store. Is snapd running? Try: sudo systemctl start snapd')
    }
    if (result.exitCode === 1) return ok([])
    return failed('generic', `snap find failed: ${stderr || `exit code ${result.exitCode}`}`)
  }
}
