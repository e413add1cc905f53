/**
 * Tool restriction merging across a session's active skills.
 *
 * Restrictions are additive-allow: the merged allow-list is the union of
 * every non-empty list, so activating one more restricted skill widens
 * what is allowed rather than narrowing it. Skills with an empty list do
 * not participate. Callers wanting isolation must not rely on this alone.
 */

import type { ActivationRecord } from "./types.js"

/**
 * Merge tool restriction lists.
 *
 * Returns `undefined` (unrestricted) when no list is non-empty; otherwise
 * the de-duplicated union, sorted.
 */
export function mergeToolRestrictions(lists: ReadonlyArray<readonly string[]>): string[] | undefined {
  let merged: Set<string> | null = null

  for (const list of lists) {
    if (list.length === 0) continue
    if (merged === null) {
      merged = new Set<string>()
    }
    for (const tool of list) {
      merged.add(tool)
    }
  }

  return merged ? [...merged].sort() : undefined
}

/** Merge the restrictions carried by a set of activation records. */
export function mergeRecordRestrictions(records: Iterable<ActivationRecord>): string[] | undefined {
  const lists: string[][] = []
  for (const record of records) {
    lists.push(record.toolRestrictions)
  }
  return mergeToolRestrictions(lists)
}

/**
 * Whether `tool` may be called under a merged restriction. `undefined`
 * allows everything.
 */
export function isToolAllowed(restrictions: readonly string[] | undefined, tool: string): boolean {
  return restrictions === undefined || restrictions.includes(tool)
}
