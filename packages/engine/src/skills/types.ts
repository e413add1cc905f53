/**
 * Skill engine types.
 *
 * A skill is a named bundle of instructions, optionally backed by an
 * executable capability. Sessions activate skills into their prompt
 * context and the engine evicts them again after a number of idle turns.
 */

import type { SkillErrorCode } from "./errors.js"

// ---------------------------------------------------------------------------
// Invocation boundary
// ---------------------------------------------------------------------------

/** Request shape the host agent loop sends to the skill tool. */
export interface InvocationRequest {
  /** Skill slug. */
  name?: string
  /** "catalog", "help", "create", "update", "delete", "load", "unload", or skill-specific. */
  action?: string
  /** Skill-specific resource, passed through to the capability. */
  resource?: string
  /** Full SKILL.md document for create/update. */
  content?: string
  /** Skill-specific arguments, passed through to the capability. */
  payload?: Record<string, unknown>
}

export interface InvocationResult {
  content: string
  isError: boolean
  /** Set on engine-generated errors; capabilities may leave it out. */
  code?: SkillErrorCode
}

/**
 * Opaque executable behind an app-backed skill. The engine forwards the
 * request unchanged and never inspects the result.
 */
export interface Capability {
  execute(request: InvocationRequest): InvocationResult | Promise<InvocationResult>
}

// ---------------------------------------------------------------------------
// Registry entries
// ---------------------------------------------------------------------------

export interface SkillDefinition {
  /** Unique URL-safe identifier, e.g. "meeting-prep". */
  slug: string
  /** Human-readable name, e.g. "Meeting Prep". */
  displayName: string
  /** One-liner for the catalog and hints. */
  description: string
  /** Full instruction body. */
  body: string
  /** Present for app-backed skills, null for instruction-only ones. */
  capability: Capability | null
  /** Phrases whose case-insensitive presence in a user message signals relevance. */
  triggers: string[]
  /** Tools the skill allows. Empty = unrestricted. */
  toolRestrictions: string[]
  /** Higher wins when ranking trigger hints. */
  priority: number
  /** Idle turns before eviction. 0/absent = class default. */
  ttlOverride?: number
  /** SKILL.md this definition was loaded from, for storage-backed skills. */
  filePath?: string
}

// ---------------------------------------------------------------------------
// Session state
// ---------------------------------------------------------------------------

export interface ActivationRecord {
  slug: string
  lastActiveTurn: number
  /** Body at first activation; later registry edits are not reflected. */
  contentSnapshot: string
  displayName: string
  toolRestrictions: string[]
  /** Fixed when the record is created. */
  effectiveTtl: number
  /** True once activated through load/forceLoad. Never downgraded. */
  manual: boolean
}

export interface SessionState {
  /** Starts at 0; incremented exactly once per tick. */
  turnCounter: number
  activeSkills: Map<string, ActivationRecord>
}

export interface TriggerHint {
  slug: string
  description: string
}

export interface TickResult {
  /** Turn number after this tick. */
  turn: number
  /** Top-ranked inactive skills whose triggers matched. */
  hints: TriggerHint[]
  /** Markdown rendering of `hints`; empty when there are none. */
  hintBlock: string
  /** Slugs evicted by this tick (and not re-created by a rematch). */
  evicted: string[]
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Idle-turn TTL for skills activated by invocation or trigger. */
export const DEFAULT_INVOKED_TTL = 4

/** Idle-turn TTL for skills activated by an explicit load. */
export const DEFAULT_MANUAL_TTL = 6

/** Maximum combined characters of active skill content per prompt. */
export const DEFAULT_CONTENT_BUDGET = 16_000

/** Maximum trigger hints returned per tick. */
export const MAX_TRIGGER_HINTS = 3
