/**
 * Trigger matching — literal, case-insensitive substring containment.
 */

import { compareSlugs } from "./registry.js"
import { MAX_TRIGGER_HINTS, type SkillDefinition, type TriggerHint } from "./types.js"

/** True when any trigger phrase occurs in `message`, ignoring case. */
export function matchesTrigger(triggers: readonly string[], message: string): boolean {
  const haystack = message.toLowerCase()
  for (const trigger of triggers) {
    const needle = trigger.toLowerCase()
    // An empty phrase would match every message
    if (needle && haystack.includes(needle)) return true
  }
  return false
}

/**
 * Rank matching skills for hinting: priority descending, then slug
 * ascending, truncated to `limit`.
 */
export function rankTriggerHints(
  candidates: readonly SkillDefinition[],
  message: string,
  limit: number = MAX_TRIGGER_HINTS,
): TriggerHint[] {
  return candidates
    .filter((def) => matchesTrigger(def.triggers, message))
    .sort((a, b) => b.priority - a.priority || compareSlugs(a.slug, b.slug))
    .slice(0, limit)
    .map((def) => ({ slug: def.slug, description: def.description }))
}

/**
 * Format hints for direct injection into the system prompt.
 */
export function formatTriggerHints(hints: readonly TriggerHint[]): string {
  if (hints.length === 0) return ""

  const lines = hints.map((h) => `- **${h.slug}** — ${h.description}`)
  return [
    "## Skill Hints",
    "",
    'These skills look relevant to the latest message. Load one with skill(name: "<slug>", action: "load") if it helps:',
    ...lines,
  ].join("\n")
}
