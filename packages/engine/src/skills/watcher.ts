import { basename } from "node:path"

import { watch, type FSWatcher } from "chokidar"

import { SKILL_FILE_NAME } from "./store.js"

export interface SkillWatcherConfig {
  /** Debounce interval in ms. Default: 300 */
  debounceMs: number
}

export const DEFAULT_SKILL_WATCHER_CONFIG: SkillWatcherConfig = {
  debounceMs: 300,
}

export interface ManagedWatcher {
  start(): Promise<void>
  stop(): Promise<void>
}

/**
 * Watch skill roots with chokidar and call `onChange` once per burst of
 * SKILL.md activity.
 *
 * - Only `{root}/{skill}/SKILL.md` files and removed skill directories count.
 * - Events are debounced on the trailing edge; a new event resets the timer.
 */
export function createSkillWatcher(
  roots: readonly string[],
  onChange: () => void,
  config: Partial<SkillWatcherConfig> = {},
): ManagedWatcher {
  const resolved: SkillWatcherConfig = { ...DEFAULT_SKILL_WATCHER_CONFIG, ...config }
  let watcher: FSWatcher | null = null
  let timer: ReturnType<typeof setTimeout> | null = null

  function schedule(): void {
    if (timer) clearTimeout(timer)
    timer = setTimeout(() => {
      timer = null
      onChange()
    }, resolved.debounceMs)
  }

  function handleFile(path: string): void {
    if (basename(path) === SKILL_FILE_NAME) schedule()
  }

  return {
    async start(): Promise<void> {
      if (watcher || roots.length === 0) return

      const created = watch([...roots], {
        ignoreInitial: true,
        persistent: true,
        depth: 1,
        ignored: ["**/*.swp", "**/*~", "**/.#*", "**/node_modules/**", "**/.git/**"],
      })
      watcher = created

      created.on("add", handleFile)
      created.on("change", handleFile)
      created.on("unlink", handleFile)
      created.on("unlinkDir", schedule)

      // Wait for chokidar to finish initial scan
      await new Promise<void>((res) => {
        created.on("ready", res)
      })
    },

    async stop(): Promise<void> {
      if (timer) {
        clearTimeout(timer)
        timer = null
      }

      if (watcher) {
        await watcher.close()
        watcher = null
      }
    },
  }
}
