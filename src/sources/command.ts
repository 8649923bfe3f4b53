// src/sources/command.ts
import { execFile } from 'node:child_process'
import type { SourceAdapter } from './base.js'
import { failed } from './base.js'
import { classifyError, errorMessage } from '../core/errors.js'
import type { SourceName, SourceOutcome } from '../core/types.js'

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

export interface CommandOptions {
  signal: AbortSignal
  timeoutMs: number
}

/**
 * Runs a program without a shell. Resolves for any exit status; rejects only
 * when the program could not run to completion (missing binary, no
 * permission, killed by timeout or abort).
 */
export type CommandRunner = (
  command: string,
  args: string[],
  opts: CommandOptions,
) => Promise<CommandResult>

export const runCommand: CommandRunner = (command, args, { signal, timeoutMs }) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        signal,
        timeout: timeoutMs,
        maxBuffer: 16 * 1024 * 1024,
        encoding: 'utf8',
        // Parsers expect untranslated output
        env: { ...process.env, LC_ALL: 'C' },
      },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ exitCode: 0, stdout, stderr })
          return
        }
        if (typeof err.code === 'number') {
          resolve({ exitCode: err.code, stdout, stderr })
          return
        }
        if (err.killed && err.name !== 'AbortError') {
          reject(Object.assign(new Error(`${command} timed out after ${timeoutMs}ms`), { code: 'ETIMEDOUT' }))
          return
        }
        reject(err)
      },
    )
  })

/** Shared plumbing for sources backed by a local package-manager binary. */
export abstract class CommandSource implements SourceAdapter {
  abstract readonly name: SourceName
  protected abstract readonly command: string
  /** Shown when the binary is missing from PATH */
  protected abstract readonly notFoundHint: string

  constructor(
    readonly timeoutMs: number,
    private readonly run: CommandRunner = runCommand,
  ) {}

  protected abstract args(term: string): string[]
  protected abstract interpret(result: CommandResult): SourceOutcome

  async query(term: string, signal: AbortSignal): Promise<SourceOutcome> {
    try {
      const result = await this.run(this.command, this.args(term.trim()), { signal, timeoutMs: this.timeoutMs })
      return this.interpret(result)
    } catch (err: unknown) {
      const kind = classifyError(err)
      switch (kind) {
        case 'not-found':
          return failed(kind, this.notFoundHint)
        case 'permission':
          return failed(kind, `Permission denied running ${this.command}. Check your user permissions.`)
        case 'timeout':
          return failed(kind, `${this.command} did not answer within ${this.timeoutMs}ms`)
        default:
          return failed(kind, `${this.command} failed: ${errorMessage(err)}`)
      }
    }
  }
}

/** Non-empty, right-trimmed output lines */
export function outputLines(output: string): string[] {
  return output.split('\n').map((l) => l.trimEnd()).filter((l) => l.trim() !== '')
}
