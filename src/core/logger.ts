// src/core/logger.ts
import pino from 'pino'

export type Logger = pino.Logger

export interface LoggerOptions {
  level?: string
  file?: string
  name?: string
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? 'warn'
  const base = { name: opts.name ?? 'pkgscout' }

  if (opts.file) {
    return pino({ level, base }, pino.destination({ dest: opts.file, mkdir: true }))
  }

  // stderr only: stdout carries search results and completion output
  return pino({ level, base }, process.stderr)
}

export const silentLogger: Logger = pino({ level: 'silent' })
