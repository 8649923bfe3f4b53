// src/core/dedupe.ts
import { NATIVE_SOURCE_PREFERENCE } from './scoring.js'
import type { PackageRecord, SourceName } from './types.js'

/**
 * Collapse records sharing an exact (case-sensitive) name into one.
 *
 * A duplicated name keeps the `preferSource` record when there is one, then
 * the first native/distro record in {@link NATIVE_SOURCE_PREFERENCE} order,
 * then whichever record came first. Distinct names keep first-seen order.
 */
export function deduplicate(records: readonly PackageRecord[], preferSource?: SourceName): PackageRecord[] {
  const groups = new Map<string, PackageRecord[]>()
  for (const record of records) {
    const group = groups.get(record.name)
    if (group) group.push(record)
    else groups.set(record.name, [record])
  }

  const out: PackageRecord[] = []
  for (const group of groups.values()) {
    const chosen = group.length === 1 ? group[0] : pick(group, preferSource)
    if (chosen) out.push(chosen)
  }
  return out
}

function pick(group: PackageRecord[], preferSource: SourceName | undefined): PackageRecord | undefined {
  if (preferSource) {
    const preferred = group.find((r) => r.source === preferSource)
    if (preferred) return preferred
  }
  for (const source of NATIVE_SOURCE_PREFERENCE) {
    const native = group.find((r) => r.source === source)
    if (native) return native
  }
  return group[0]
}
