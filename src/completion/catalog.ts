// src/completion/catalog.ts
import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { dataFile } from '../core/paths.js'
import { SOURCE_NAMES } from '../core/types.js'
import type { CompletionEntry } from '../core/types.js'

const CatalogSchema = z.array(
  z.object({
    name: z.string().min(1),
    description: z.string(),
    source: z.enum(SOURCE_NAMES),
  }),
)

const AliasSchema = z.record(z.string().min(1))

export function loadCatalog(path = dataFile('catalog.json')): CompletionEntry[] {
  return CatalogSchema.parse(JSON.parse(readFileSync(path, 'utf8')))
}

/** Alias token → canonical package name; keys are lower-cased */
export function loadAliases(path = dataFile('aliases.json')): Map<string, string> {
  const raw = AliasSchema.parse(JSON.parse(readFileSync(path, 'utf8')))
  return new Map(Object.entries(raw).map(([alias, name]) => [alias.toLowerCase(), name]))
}
