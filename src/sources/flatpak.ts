// src/sources/flatpak.ts
import { CommandSource, outputLines, type CommandResult } from './command.js'
import { failed, ok } from './base.js'
import type { PackageRecord, SourceName, SourceOutcome } from '../core/types.js'

/**
 * `flatpak search` prints tab-separated columns:
 * Name, Description, Application ID, Version, Branch, Remotes.
 * Records are keyed by application id, which is what `flatpak install` takes.
 */
export function parseFlatpakOutput(output: string): PackageRecord[] {
  const records: PackageRecord[] = []
  for (const line of outputLines(output)) {
    const cols = line.split('\t').map((c) => c.trim())
    const [title, summary, appId] = cols
    if (!title || summary === undefined || !appId || appId === 'Application ID') continue
    records.push({ name: appId, description: summary ? `${title} - ${summary}` : title, source: 'flatpak' })
  }
  return records
}

export class FlatpakSource extends CommandSource {
  readonly name: SourceName = 'flatpak'
  protected readonly command = 'flatpak'
  protected readonly notFoundHint = 'flatpak command not found. Install flatpak first.'

  protected args(term: string): string[] {
    return ['search', term]
  }

  protected interpret(result: CommandResult): SourceOutcome {
    if (result.exitCode === 0) return ok(parseFlatpakOutput(result.stdout))
    if (result.exitCode === 1 && !result.stderr.includes('No remotes found')) return ok([])

    const stderr = result.stderr.trim()
    if (stderr.includes('No remotes found')) {
      return failed(
        'generic',
        'No Flatpak remotes configured. Run: flatpak remote-add --if-not-exists flathub https://flathub.org/repo/flathub.flatpakrepo',
      )
    }
    return failed('generic', `flatpak search failed: ${stderr || `exit code ${result.exitCode}`}`)
  }
}
