// src/suggest/mapping.ts
import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { dataFile } from '../core/paths.js'

const PackageName = z.string().regex(/^\S+$/, 'package names cannot contain whitespace')

const PurposeMappingSchema = z
  .object({
    purposes: z.record(z.string().min(1), z.array(PackageName).min(1)),
    /** Phrase → purpose, tried in file order against the whole query */
    phrases: z.record(z.string().min(1), z.string()),
    synonyms: z.record(z.string().min(1), z.array(z.string().min(1))),
    stopWords: z.array(z.string().min(1)),
  })
  .superRefine((mapping, ctx) => {
    if (Object.keys(mapping.purposes).length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['purposes'], message: 'at least one purpose is required' })
    }
    for (const [phrase, purpose] of Object.entries(mapping.phrases)) {
      if (!(purpose in mapping.purposes)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['phrases', phrase],
          message: `"${purpose}" is not a known purpose`,
        })
      }
    }
  })

export type PurposeMapping = z.infer<typeof PurposeMappingSchema>

export function parsePurposeMapping(raw: unknown): PurposeMapping {
  return PurposeMappingSchema.parse(raw)
}

export function loadPurposeMapping(path = dataFile('purposes.json')): PurposeMapping {
  return parsePurposeMapping(JSON.parse(readFileSync(path, 'utf8')))
}
