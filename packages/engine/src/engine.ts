/**
 * Wiring for a complete skill engine: registry, session tracker, storage,
 * settings, sync and the skill tool, built from one EngineConfig.
 *
 * Every instance is independent; nothing here is process-global.
 */

import type { EngineConfig } from "./config.js"
import { SkillRegistry } from "./skills/registry.js"
import { SessionTracker } from "./skills/session-tracker.js"
import { SkillSettingsStore } from "./skills/settings.js"
import { SkillTool } from "./skills/skill-tool.js"
import { SkillStore } from "./skills/store.js"
import { SkillSync, type SkillSyncResult } from "./skills/sync.js"
import { TracingLogger } from "./tracing/logger.js"

export interface SkillEngine {
  registry: SkillRegistry
  tracker: SessionTracker
  store: SkillStore
  settings: SkillSettingsStore
  sync: SkillSync
  tool: SkillTool
  logger: TracingLogger
  /** Load settings, sync the registry from storage and start watching (if enabled). */
  start(): Promise<SkillSyncResult>
  /** Stop watching and wait for any in-flight reload. */
  stop(): Promise<void>
}

export function createSkillEngine(config: EngineConfig, logger?: TracingLogger): SkillEngine {
  const log = logger ?? new TracingLogger({ level: config.logLevel, serviceName: config.tracing.serviceName })

  const registry = new SkillRegistry()
  const tracker = new SessionTracker(registry, {
    contentBudget: config.contentBudget,
    invokedTtl: config.invokedTtl,
    manualTtl: config.manualTtl,
    logger: log.child({ component: "tracker" }),
  })
  const store = new SkillStore({
    userDir: config.skillsDir,
    bundledDirs: config.bundledSkillsDirs,
    logger: log.child({ component: "store" }),
  })
  const settings = new SkillSettingsStore(config.dataDir, log.child({ component: "settings" }))
  const sync = new SkillSync({ registry, store, settings, logger: log.child({ component: "sync" }) })
  const tool = new SkillTool(registry, tracker, {
    store,
    sync,
    logger: log.child({ component: "tool" }),
  })

  return {
    registry,
    tracker,
    store,
    settings,
    sync,
    tool,
    logger: log,

    async start(): Promise<SkillSyncResult> {
      await settings.load()
      const result = await sync.reload()
      if (config.watch) {
        await sync.watch({ debounceMs: config.watchDebounceMs })
      }
      return result
    },

    async stop(): Promise<void> {
      await sync.stop()
    },
  }
}
