/**
 * Session Tracker — per-session skill activation state.
 *
 * Each session has a monotonic turn counter and a map of active skills.
 * Skills become active through invocation, trigger rematch or an explicit
 * load; they fall out again after `effectiveTtl` idle turns, on unload, or
 * when the session is cleared.
 *
 * Every operation here is synchronous and runs to completion, so a
 * session's state is never observed half-updated. Internal helpers take the
 * already-resolved SessionState; only the public methods look it up.
 */

import { assembleActiveContent } from "./budget.js"
import { renderSkillBody } from "./catalog.js"
import { mergeRecordRestrictions } from "./constraints.js"
import { SkillError } from "./errors.js"
import type { SkillRegistry } from "./registry.js"
import { formatTriggerHints, matchesTrigger, rankTriggerHints } from "./triggers.js"
import {
  type ActivationRecord,
  DEFAULT_CONTENT_BUDGET,
  DEFAULT_INVOKED_TTL,
  DEFAULT_MANUAL_TTL,
  MAX_TRIGGER_HINTS,
  type SessionState,
  type SkillDefinition,
  type TickResult,
} from "./types.js"
import { quietLogger, type TracingLogger } from "../tracing/logger.js"
import { addSpanEvent, LoadoutAttributes } from "../tracing/spans.js"

export interface SessionTrackerOptions {
  /** Character budget for `activeContent`. */
  contentBudget?: number
  /** TTL for invoked/triggered activations. */
  invokedTtl?: number
  /** TTL for manual loads. */
  manualTtl?: number
  /** Maximum hints returned per tick. */
  hintLimit?: number
  logger?: TracingLogger
}

export class SessionTracker {
  private readonly sessions = new Map<string, SessionState>()
  private readonly registry: SkillRegistry
  private readonly contentBudget: number
  private readonly invokedTtl: number
  private readonly manualTtl: number
  private readonly hintLimit: number
  private readonly logger: TracingLogger

  constructor(registry: SkillRegistry, options: SessionTrackerOptions = {}) {
    this.registry = registry
    this.contentBudget = options.contentBudget ?? DEFAULT_CONTENT_BUDGET
    this.invokedTtl = options.invokedTtl ?? DEFAULT_INVOKED_TTL
    this.manualTtl = options.manualTtl ?? DEFAULT_MANUAL_TTL
    this.hintLimit = options.hintLimit ?? MAX_TRIGGER_HINTS
    this.logger = options.logger ?? quietLogger()
  }

  // ──────────────────────────────────────────────────
  // Activation
  // ──────────────────────────────────────────────────

  /**
   * Record (or refresh) an activation at the session's current turn.
   * Returns false when the skill is not registered, e.g. it was
   * uninstalled mid-session.
   */
  recordActivation(sessionKey: string, slug: string, manual: boolean): boolean {
    const definition = this.registry.get(slug)
    if (!definition) return false

    this.activate(this.stateFor(sessionKey), definition, manual)
    return true
  }

  /**
   * Activate a skill on behalf of the model. Returns the body with a
   * confirmation line. Throws NOT_FOUND for unknown slugs.
   */
  load(sessionKey: string, slug: string): string {
    const definition = this.registry.get(slug)
    if (!definition) {
      throw SkillError.notFound(
        `Skill "${slug}" not found. Use skill(action: "catalog") to see available skills.`,
      )
    }

    this.activate(this.stateFor(sessionKey), definition, true)
    return `Skill "${definition.displayName}" loaded for this conversation. Follow the instructions below:\n\n${renderSkillBody(definition)}`
  }

  /**
   * Activate a skill on behalf of the system (e.g. onboarding). Returns
   * whether the skill was registered and is now active.
   */
  forceLoad(sessionKey: string, slug: string): boolean {
    if (!sessionKey) return false
    const definition = this.registry.get(slug)
    if (!definition) return false

    this.activate(this.stateFor(sessionKey), definition, true)
    return true
  }

  /** Deactivate a skill. Returns whether a record was removed. */
  unload(sessionKey: string, slug: string): boolean {
    const state = this.sessions.get(sessionKey)
    if (!state) return false
    return state.activeSkills.delete(slug)
  }

  /** Drop the turn counter and every activation for a session. */
  clearSession(sessionKey: string): void {
    this.sessions.delete(sessionKey)
  }

  // ──────────────────────────────────────────────────
  // Turn advance
  // ──────────────────────────────────────────────────

  /**
   * Advance the session by one user message.
   *
   * Phases, in order:
   * 1. increment the turn counter
   * 2. expire records idle for more than their TTL
   * 3. refresh surviving records whose triggers match `message`; records
   *    expired in step 2 that match come back as fresh non-manual records
   * 4. rank matching inactive skills as hints
   */
  tick(sessionKey: string, message: string): TickResult {
    const state = this.stateFor(sessionKey)
    state.turnCounter++
    const turn = state.turnCounter

    const expired: ActivationRecord[] = []
    for (const [slug, record] of state.activeSkills) {
      if (turn - record.lastActiveTurn > record.effectiveTtl) {
        state.activeSkills.delete(slug)
        expired.push(record)
      }
    }

    for (const record of state.activeSkills.values()) {
      const definition = this.registry.get(record.slug)
      if (definition && matchesTrigger(definition.triggers, message)) {
        record.lastActiveTurn = turn
      }
    }

    const evicted: string[] = []
    for (const record of expired) {
      const definition = this.registry.get(record.slug)
      if (definition && matchesTrigger(definition.triggers, message)) {
        this.activate(state, definition, false)
      } else {
        evicted.push(record.slug)
      }
    }

    const inactive = this.registry.list().filter((def) => !state.activeSkills.has(def.slug))
    const hints = rankTriggerHints(inactive, message, this.hintLimit)

    if (evicted.length > 0) {
      this.logger.debug("skills evicted", { sessionKey, turn, evicted })
      addSpanEvent("loadout.skills.evicted", { [LoadoutAttributes.SKILL_SLUG]: evicted })
    }

    return { turn, hints, hintBlock: formatTriggerHints(hints), evicted }
  }

  // ──────────────────────────────────────────────────
  // Reads
  // ──────────────────────────────────────────────────

  /** Budget-capped markdown block of active skill content. */
  activeContent(sessionKey: string): string {
    const state = this.sessions.get(sessionKey)
    if (!state || state.activeSkills.size === 0) return ""
    return assembleActiveContent([...state.activeSkills.values()], this.contentBudget)
  }

  /** Union of active tool restrictions; `undefined` means unrestricted. */
  activeToolRestrictions(sessionKey: string): string[] | undefined {
    const state = this.sessions.get(sessionKey)
    if (!state) return undefined
    return mergeRecordRestrictions(state.activeSkills.values())
  }

  /** Current turn counter (0 for an unknown session). */
  currentTurn(sessionKey: string): number {
    return this.sessions.get(sessionKey)?.turnCounter ?? 0
  }

  /** Copies of the session's activation records. */
  activeRecords(sessionKey: string): ActivationRecord[] {
    const state = this.sessions.get(sessionKey)
    if (!state) return []
    return [...state.activeSkills.values()].map((r) => ({
      ...r,
      toolRestrictions: [...r.toolRestrictions],
    }))
  }

  isActive(sessionKey: string, slug: string): boolean {
    return this.sessions.get(sessionKey)?.activeSkills.has(slug) ?? false
  }

  /** Number of sessions with live state. */
  get sessionCount(): number {
    return this.sessions.size
  }

  // ──────────────────────────────────────────────────
  // Internals (state already resolved)
  // ──────────────────────────────────────────────────

  private stateFor(sessionKey: string): SessionState {
    const existing = this.sessions.get(sessionKey)
    if (existing) return existing

    const created: SessionState = { turnCounter: 0, activeSkills: new Map() }
    this.sessions.set(sessionKey, created)
    return created
  }

  private activate(state: SessionState, definition: SkillDefinition, manual: boolean): void {
    const existing = state.activeSkills.get(definition.slug)
    if (existing) {
      existing.lastActiveTurn = state.turnCounter
      if (manual) existing.manual = true
      return
    }

    const override = definition.ttlOverride ?? 0
    state.activeSkills.set(definition.slug, {
      slug: definition.slug,
      lastActiveTurn: state.turnCounter,
      contentSnapshot: renderSkillBody(definition),
      displayName: definition.displayName,
      toolRestrictions: [...definition.toolRestrictions],
      effectiveTtl: override > 0 ? override : manual ? this.manualTtl : this.invokedTtl,
      manual,
    })
  }
}
