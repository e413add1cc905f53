/**
 * SKILL.md loader — parses frontmatter metadata and body content.
 *
 * SKILL.md format:
 * ```
 * ---
 * name: Meeting Prep
 * description: Prepares briefs before meetings
 * triggers:
 *   - meeting
 *   - agenda
 * tools: [calendar, notes]
 * priority: 5
 * maxTurns: 8
 * ---
 * # Full skill instructions here...
 * ```
 *
 * Uses a minimal frontmatter parser (no external YAML dependency) that
 * handles the subset skill documents need: scalars, inline arrays and
 * `- item` block lists. Nested maps are skipped.
 */

import { readFile } from "node:fs/promises"

import { SkillError } from "./errors.js"
import { type SkillFrontmatter, SkillFrontmatterSchema } from "./schemas.js"
import { slugify } from "./slug.js"
import type { SkillDefinition } from "./types.js"

// ---------------------------------------------------------------------------
// Frontmatter parsing
// ---------------------------------------------------------------------------

/** Regex to match YAML frontmatter delimited by --- */
const FRONTMATTER_RE = /^---[ \t]*\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n([\s\S]*))?$/

const INTEGER_RE = /^-?\d+$/

export type FrontmatterValue = string | number | boolean | string[] | null

/**
 * Parse a simple YAML-subset frontmatter block.
 * Handles: strings, integers, booleans, inline arrays `[a, b]`, and
 * block lists of `- item` lines under an empty key.
 */
export function parseFrontmatter(raw: string): Record<string, FrontmatterValue> {
  const result: Record<string, FrontmatterValue> = {}
  let listKey: string | null = null

  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith("#")) continue

    const indented = /^\s/.test(line)

    if (trimmed.startsWith("- ") || trimmed === "-") {
      if (listKey === null) continue
      const item = stripQuotes(trimmed.slice(1).trim())
      const current = result[listKey]
      if (Array.isArray(current)) {
        current.push(item)
      } else {
        result[listKey] = [item]
      }
      continue
    }

    // Children of a nested map
    if (indented) continue

    const colonIdx = trimmed.indexOf(":")
    if (colonIdx === -1) continue

    const key = trimmed.slice(0, colonIdx).trim()
    const value = trimmed.slice(colonIdx + 1).trim()
    if (!key) continue

    if (value === "") {
      result[key] = null
      listKey = key
    } else {
      result[key] = parseValue(value)
      listKey = null
    }
  }

  return result
}

function parseValue(value: string): FrontmatterValue {
  if (value === "true") return true
  if (value === "false") return false
  if (value === "null" || value === "~") return null
  if (INTEGER_RE.test(value)) return parseInt(value, 10)

  // Inline array: [item1, item2, item3]
  if (value.startsWith("[") && value.endsWith("]")) {
    const inner = value.slice(1, -1).trim()
    if (!inner) return []
    return inner
      .split(",")
      .map((s) => stripQuotes(s.trim()))
      .filter(Boolean)
  }

  return stripQuotes(value)
}

function stripQuotes(value: string): string {
  if (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'")))
  ) {
    return value.slice(1, -1)
  }
  return value
}

// ---------------------------------------------------------------------------
// SKILL.md documents
// ---------------------------------------------------------------------------

export interface SkillDocument extends SkillFrontmatter {
  /** Markdown body, trimmed. */
  body: string
}

/**
 * Parse and validate a SKILL.md document. Throws VALIDATION_FAILED on a
 * missing frontmatter block or invalid fields.
 */
export function parseSkillDocument(raw: string): SkillDocument {
  const match = FRONTMATTER_RE.exec(raw.replace(/^\uFEFF/, ""))
  if (!match) {
    throw SkillError.validation("SKILL.md must start with a --- frontmatter block closed by ---")
  }

  const parsed = SkillFrontmatterSchema.safeParse(parseFrontmatter(match[1] ?? ""))
  if (!parsed.success) {
    const reasons = parsed.error.issues.map((issue) => issue.message).join("; ")
    throw SkillError.validation(`Validation failed: ${reasons}`)
  }

  return { ...parsed.data, body: (match[2] ?? "").trim() }
}

/** Map a validated document onto a registry definition. */
export function toSkillDefinition(doc: SkillDocument, filePath?: string): SkillDefinition {
  const slug = slugify(doc.name)
  if (!slug) {
    throw SkillError.validation(`Could not derive a valid slug from the skill name "${doc.name}"`)
  }

  return {
    slug,
    displayName: doc.name,
    description: doc.description,
    body: doc.body,
    capability: null,
    triggers: doc.triggers,
    toolRestrictions: doc.tools,
    priority: doc.priority,
    ttlOverride: doc.maxTurns > 0 ? doc.maxTurns : undefined,
    filePath,
  }
}

/**
 * Load a SKILL.md file from disk as a registry definition.
 */
export async function loadSkillFile(filePath: string): Promise<SkillDefinition> {
  const raw = await readFile(filePath, "utf-8")
  return toSkillDefinition(parseSkillDocument(raw), filePath)
}
