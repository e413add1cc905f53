/**
 * Character budget for active skill content.
 *
 * Active skills are injected into the prompt most-recent first. A skill
 * either fits whole or is left out for this turn; instructions are never
 * truncated part-way.
 */

import { compareSlugs } from "./registry.js"
import { type ActivationRecord, DEFAULT_CONTENT_BUDGET } from "./types.js"

/**
 * Order records most recently active first, ties broken by slug.
 */
export function rankByRecency(records: readonly ActivationRecord[]): ActivationRecord[] {
  return [...records].sort(
    (a, b) => b.lastActiveTurn - a.lastActiveTurn || compareSlugs(a.slug, b.slug),
  )
}

/**
 * Select records whose snapshots fit within `budget` characters, in the
 * given order. A record longer than the remaining budget is skipped and
 * later (smaller) ones still get a chance.
 */
export function selectWithinBudget(
  records: readonly ActivationRecord[],
  budget: number = DEFAULT_CONTENT_BUDGET,
): ActivationRecord[] {
  const selected: ActivationRecord[] = []
  let remaining = budget

  for (const record of records) {
    const cost = record.contentSnapshot.length
    if (cost <= remaining) {
      selected.push(record)
      remaining -= cost
    }
  }

  return selected
}

/**
 * Format selected skills for context injection.
 */
export function formatActiveSkills(records: readonly ActivationRecord[]): string {
  if (records.length === 0) return ""

  const sections = records.map((r) => `### ${r.displayName}\n\n${r.contentSnapshot}`)
  return [
    "## Active Skills",
    "",
    "The following skills are loaded for this conversation. Follow their instructions.",
    "",
    sections.join("\n\n---\n\n"),
  ].join("\n")
}

/**
 * Rank, budget and format in one step. Formatting overhead is not charged
 * against the budget.
 */
export function assembleActiveContent(
  records: readonly ActivationRecord[],
  budget: number = DEFAULT_CONTENT_BUDGET,
): string {
  return formatActiveSkills(selectWithinBudget(rankByRecency(records), budget))
}
