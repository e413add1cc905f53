/**
 * SkillTool — the single "skill" tool the host exposes to the model.
 *
 * Every installed skill, app-backed or instruction-only, is reached
 * through this one entry point. It dispatches lifecycle and session
 * actions, records invocations in the session tracker, and forwards
 * skill-specific actions to capabilities.
 */

import { formatCatalog, renderSkillBody } from "./catalog.js"
import { SkillError, toErrorResult } from "./errors.js"
import type { SkillRegistry } from "./registry.js"
import { SkillSchemaCache, type SkillToolSchema } from "./schema.js"
import type { SessionTracker } from "./session-tracker.js"
import type { SkillStore } from "./store.js"
import type { SkillSync, SkillSyncResult } from "./sync.js"
import type { InvocationRequest, InvocationResult, TickResult } from "./types.js"
import { quietLogger, type TracingLogger } from "../tracing/logger.js"
import { LoadoutAttributes, setSpanAttributes, withSpan, withSpanSync } from "../tracing/spans.js"

export const SKILL_TOOL_NAME = "skill"

export interface SkillToolOptions {
  /** Durable storage for create/update/delete. Lifecycle actions are disabled without it. */
  store?: SkillStore
  /** Re-synced after every lifecycle write so the catalog reflects it immediately. */
  sync?: SkillSync
  logger?: TracingLogger
}

const NO_SESSION: InvocationResult = {
  content: "No session context available.",
  isError: true,
}

function ok(content: string): InvocationResult {
  return { content, isError: false }
}

function notFound(name: string): InvocationResult {
  return toErrorResult(
    SkillError.notFound(`Skill "${name}" not found. Use skill(action: "catalog") to see available skills.`),
  )
}

function missingName(action: string): InvocationResult {
  return toErrorResult(SkillError.validation(`Name is required for ${action}.`))
}

export class SkillTool {
  readonly name = SKILL_TOOL_NAME

  private readonly registry: SkillRegistry
  private readonly tracker: SessionTracker
  private readonly store: SkillStore | undefined
  private readonly sync: SkillSync | undefined
  private readonly cache: SkillSchemaCache
  private readonly logger: TracingLogger

  constructor(registry: SkillRegistry, tracker: SessionTracker, options: SkillToolOptions = {}) {
    this.registry = registry
    this.tracker = tracker
    this.store = options.store
    this.sync = options.sync
    this.cache = new SkillSchemaCache(registry)
    this.logger = options.logger ?? quietLogger()
  }

  // ──────────────────────────────────────────────────
  // Tool surface
  // ──────────────────────────────────────────────────

  description(): string {
    return this.cache.description()
  }

  schema(): SkillToolSchema {
    return this.cache.schema()
  }

  catalog(): string {
    return formatCatalog(this.registry.list())
  }

  /**
   * Handle one tool call from the model. Never throws: every failure is
   * returned as an error result.
   */
  async invoke(sessionKey: string, request: InvocationRequest): Promise<InvocationResult> {
    const name = request.name ?? ""
    const action = request.action ?? ""

    return withSpan(
      "loadout.skill.invoke",
      {
        [LoadoutAttributes.SESSION_KEY]: sessionKey,
        [LoadoutAttributes.SKILL_SLUG]: name,
        [LoadoutAttributes.SKILL_ACTION]: action,
      },
      async (span) => {
        const result = await this.dispatch(sessionKey, name, action, request)
        span.setAttribute(LoadoutAttributes.RESULT_IS_ERROR, result.isError)
        if (result.code) {
          span.setAttribute(LoadoutAttributes.ERROR_CODE, result.code)
        }
        return result
      },
    )
  }

  // ──────────────────────────────────────────────────
  // Session hooks for the host runner
  // ──────────────────────────────────────────────────

  /** Advance the session by one user message. */
  tick(sessionKey: string, message: string): TickResult {
    return withSpanSync(
      "loadout.skill.tick",
      { [LoadoutAttributes.SESSION_KEY]: sessionKey },
      (span) => {
        const result = this.tracker.tick(sessionKey, message)
        span.setAttributes({
          [LoadoutAttributes.TURN]: result.turn,
          [LoadoutAttributes.HINT_COUNT]: result.hints.length,
          [LoadoutAttributes.EVICTED_COUNT]: result.evicted.length,
          [LoadoutAttributes.ACTIVE_COUNT]: this.tracker.activeRecords(sessionKey).length,
        })
        return result
      },
    )
  }

  activeContent(sessionKey: string): string {
    return this.tracker.activeContent(sessionKey)
  }

  activeToolRestrictions(sessionKey: string): string[] | undefined {
    return this.tracker.activeToolRestrictions(sessionKey)
  }

  forceLoad(sessionKey: string, slug: string): boolean {
    const loaded = this.tracker.forceLoad(sessionKey, slug)
    this.logger.debug("skill force-loaded", { sessionKey, slug, loaded })
    return loaded
  }

  clearSession(sessionKey: string): void {
    this.tracker.clearSession(sessionKey)
  }

  // ──────────────────────────────────────────────────
  // Dispatch
  // ──────────────────────────────────────────────────

  private async dispatch(
    sessionKey: string,
    name: string,
    action: string,
    request: InvocationRequest,
  ): Promise<InvocationResult> {
    switch (action) {
      case "catalog":
        return ok(this.catalog())
      case "create":
        return this.createSkill(request.content ?? "")
      case "update":
        return this.updateSkill(name, request.content ?? "")
      case "delete":
        return this.deleteSkill(name)
      case "load":
        return this.loadSkill(sessionKey, name)
      case "unload":
        return this.unloadSkill(sessionKey, name)
    }

    if (!name) return ok(this.catalog())

    const definition = this.registry.get(name)
    if (!definition) return notFound(name)

    if (sessionKey) {
      this.tracker.recordActivation(sessionKey, definition.slug, false)
    }

    // Progressive disclosure: read the instructions before acting
    if (action === "" || action === "help") {
      if (definition.body) return ok(definition.body)
      return ok(`${renderSkillBody(definition)}\n\nNo detailed documentation available.`)
    }

    if (definition.capability === null) {
      return ok(
        `This is an orchestration skill. Follow the guidance below, calling other skills as directed.\n\n${renderSkillBody(definition)}`,
      )
    }

    try {
      return await definition.capability.execute(request)
    } catch (err) {
      this.logger.error("capability failed", { slug: definition.slug, action, error: String(err) })
      return toErrorResult(err, "CAPABILITY_FAILED")
    }
  }

  private loadSkill(sessionKey: string, name: string): InvocationResult {
    if (!name) return missingName("load")
    if (!sessionKey) return NO_SESSION

    setSpanAttributes({ [LoadoutAttributes.SKILL_MANUAL]: true })
    try {
      return ok(this.tracker.load(sessionKey, name))
    } catch (err) {
      return toErrorResult(err)
    }
  }

  private unloadSkill(sessionKey: string, name: string): InvocationResult {
    if (!name) return missingName("unload")
    if (!sessionKey) return NO_SESSION

    this.tracker.unload(sessionKey, name)
    return ok(`Skill "${name}" unloaded from this conversation.`)
  }

  // ──────────────────────────────────────────────────
  // Lifecycle
  // ──────────────────────────────────────────────────

  private async createSkill(content: string): Promise<InvocationResult> {
    try {
      const store = this.requireStore("Skill creation")
      const created = await store.create(content)
      const synced = await this.resync()

      if (synced?.disabled.includes(created.slug)) {
        return ok(
          `Skill "${created.displayName}" created but is disabled in skill settings. Enable "${created.slug}" to make it available.`,
        )
      }
      if (synced?.shadowed.includes(created.slug)) {
        return ok(
          `Skill "${created.displayName}" created but an app skill named "${created.slug}" takes precedence, so the new skill is not in the catalog.`,
        )
      }
      return ok(
        `Skill "${created.displayName}" created and available in catalog. Use skill(name: "${created.slug}", action: "load") to activate it for this conversation.`,
      )
    } catch (err) {
      return toErrorResult(err)
    }
  }

  private async updateSkill(name: string, content: string): Promise<InvocationResult> {
    if (!name) return missingName("update")
    try {
      const store = this.requireStore("Skill update")
      const updated = await store.update(name, content)
      await this.resync()
      return ok(
        `Skill "${updated.displayName}" updated. If it's loaded in this session, unload and reload it to pick up changes.`,
      )
    } catch (err) {
      return toErrorResult(err)
    }
  }

  private async deleteSkill(name: string): Promise<InvocationResult> {
    if (!name) return missingName("delete")
    try {
      const store = this.requireStore("Skill deletion")
      const slug = await store.delete(name)
      await this.resync()
      return ok(`Skill "${slug}" deleted. Sessions that have it active keep it until it expires.`)
    } catch (err) {
      return toErrorResult(err)
    }
  }

  private requireStore(feature: string): SkillStore {
    if (!this.store) {
      throw SkillError.unconfigured(`${feature} not available (no skills directory configured).`)
    }
    return this.store
  }

  private async resync(): Promise<SkillSyncResult | undefined> {
    if (!this.sync) return undefined
    return this.sync.reload()
  }
}
