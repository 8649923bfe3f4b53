// src/core/paths.ts
import { existsSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'

let cachedRoot: string | undefined

/**
 * Directory holding package.json. Works from src/ under vitest and from the
 * bundled dist/ output alike.
 */
export function packageRoot(): string {
  if (cachedRoot) return cachedRoot
  let dir = dirname(fileURLToPath(import.meta.url))
  for (;;) {
    if (existsSync(join(dir, 'package.json'))) break
    const parent = dirname(dir)
    if (parent === dir) break
    dir = parent
  }
  cachedRoot = dir
  return dir
}

export function dataFile(name: string): string {
  return join(packageRoot(), 'data', name)
}
