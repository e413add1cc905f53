/**
 * SkillSync — keeps the registry in step with durable storage.
 *
 * A reload reads every document first and only then swaps the
 * storage-backed entries in one synchronous step, so readers never see a
 * partly synced registry. Capability-backed skills registered by the host
 * are left untouched. Reloads are serialized.
 */

import type { SkillRegistry } from "./registry.js"
import type { SkillSettingsStore } from "./settings.js"
import type { SkillLoadFailure, SkillStore } from "./store.js"
import { createSkillWatcher, type ManagedWatcher, type SkillWatcherConfig } from "./watcher.js"
import { quietLogger, type TracingLogger } from "../tracing/logger.js"
import { LoadoutAttributes, setSpanAttributes } from "../tracing/spans.js"

export interface SkillSyncOptions {
  registry: SkillRegistry
  store: SkillStore
  /** Disabled skills are not registered. */
  settings?: SkillSettingsStore
  logger?: TracingLogger
}

export interface SkillSyncResult {
  registered: string[]
  disabled: string[]
  /** Storage skills whose slug belongs to a capability-backed skill. */
  shadowed: string[]
  failures: SkillLoadFailure[]
}

export class SkillSync {
  private readonly registry: SkillRegistry
  private readonly store: SkillStore
  private readonly settings: SkillSettingsStore | undefined
  private readonly logger: TracingLogger
  private chain: Promise<unknown> = Promise.resolve()
  private watcher: ManagedWatcher | null = null

  constructor(options: SkillSyncOptions) {
    this.registry = options.registry
    this.store = options.store
    this.settings = options.settings
    this.logger = options.logger ?? quietLogger()

    this.settings?.onChange((slug, enabled) => {
      this.logger.info("skill toggled", { slug, enabled })
      this.reloadInBackground()
    })
  }

  /** Re-read storage and replace every instruction-only registry entry. */
  reload(): Promise<SkillSyncResult> {
    const next = this.chain.then(() => this.apply())
    this.chain = next.catch(() => undefined)
    return next
  }

  /** Start hot-reloading on SKILL.md changes under every store root. */
  async watch(config: Partial<SkillWatcherConfig> = {}): Promise<void> {
    if (this.watcher) return
    const watcher = createSkillWatcher(this.store.roots, () => this.reloadInBackground(), config)
    this.watcher = watcher
    await watcher.start()
    this.logger.debug("watching skill roots", { roots: this.store.roots })
  }

  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.stop()
      this.watcher = null
    }
    await this.chain
  }

  private reloadInBackground(): void {
    this.reload().catch((err: unknown) => {
      this.logger.error("skill reload failed", { error: String(err) })
    })
  }

  private async apply(): Promise<SkillSyncResult> {
    const { definitions, failures } = await this.store.loadAll()

    const result: SkillSyncResult = { registered: [], disabled: [], shadowed: [], failures }

    this.registry.unregisterAllWithoutCapability()
    for (const definition of definitions) {
      if (this.settings && !this.settings.isEnabled(definition.slug)) {
        result.disabled.push(definition.slug)
        continue
      }
      if (this.registry.has(definition.slug)) {
        result.shadowed.push(definition.slug)
        continue
      }
      this.registry.register(definition)
      result.registered.push(definition.slug)
    }

    setSpanAttributes({ [LoadoutAttributes.REGISTRY_SIZE]: this.registry.count() })
    this.logger.info("skills synced", {
      registered: result.registered.length,
      disabled: result.disabled.length,
      failed: failures.length,
      total: this.registry.count(),
    })
    return result
  }
}
