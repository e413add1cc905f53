/**
 * Persisted enabled/disabled state per skill.
 *
 * Stored as `{ "disabledSkills": [...] }` in `skill-settings.json` under
 * the data directory. Skills are enabled unless listed. Without a data
 * directory the state lives in memory only.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"

import { SkillError } from "./errors.js"
import { SkillSettingsFileSchema } from "./schemas.js"
import { quietLogger, type TracingLogger } from "../tracing/logger.js"

export const SKILL_SETTINGS_FILE = "skill-settings.json"

export type SkillSettingsListener = (slug: string, enabled: boolean) => void

export class SkillSettingsStore {
  private readonly filePath: string | undefined
  private readonly logger: TracingLogger
  private readonly listeners: SkillSettingsListener[] = []
  private disabled = new Set<string>()

  constructor(dataDir?: string, logger?: TracingLogger) {
    this.filePath = dataDir ? join(dataDir, SKILL_SETTINGS_FILE) : undefined
    this.logger = logger ?? quietLogger()
  }

  /**
   * Read the settings file. A missing file means every skill is enabled;
   * a malformed one is logged and ignored.
   */
  async load(): Promise<void> {
    if (!this.filePath) return

    let raw: string
    try {
      raw = await readFile(this.filePath, "utf-8")
    } catch {
      this.disabled = new Set()
      return
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (err) {
      this.logger.warn("ignoring unreadable skill settings", { filePath: this.filePath, error: String(err) })
      return
    }

    const parsed = SkillSettingsFileSchema.safeParse(json)
    if (!parsed.success) {
      this.logger.warn("ignoring invalid skill settings", {
        filePath: this.filePath,
        error: parsed.error.message,
      })
      return
    }
    this.disabled = new Set(parsed.data.disabledSkills)
  }

  isEnabled(slug: string): boolean {
    return !this.disabled.has(slug)
  }

  /** Disabled slugs, sorted. */
  disabledSkills(): string[] {
    return [...this.disabled].sort()
  }

  /**
   * Set a skill's state. Listeners only fire when the state changed. The
   * in-memory state only changes once the file is written.
   */
  async setEnabled(slug: string, enabled: boolean): Promise<void> {
    if (this.isEnabled(slug) === enabled) return

    const next = new Set(this.disabled)
    if (enabled) {
      next.delete(slug)
    } else {
      next.add(slug)
    }
    await this.save(next)
    this.disabled = next
    this.emit(slug, enabled)
  }

  /** Flip a skill's state and return the new one. */
  async toggle(slug: string): Promise<boolean> {
    const enabled = !this.isEnabled(slug)
    await this.setEnabled(slug, enabled)
    return enabled
  }

  onChange(listener: SkillSettingsListener): void {
    this.listeners.push(listener)
  }

  private async save(disabled: ReadonlySet<string>): Promise<void> {
    if (!this.filePath) return
    try {
      await mkdir(dirname(this.filePath), { recursive: true })
      await writeFile(
        this.filePath,
        JSON.stringify({ disabledSkills: [...disabled].sort() }, null, 2),
        "utf-8",
      )
    } catch (err) {
      throw SkillError.io(`Failed to save skill settings: ${err instanceof Error ? err.message : String(err)}`)
    }
  }

  private emit(slug: string, enabled: boolean): void {
    for (const listener of this.listeners) {
      listener(slug, enabled)
    }
  }
}
