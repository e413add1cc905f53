/**
 * Skill Registry
 *
 * Catalog of known skills keyed by slug. Mutated at runtime by storage
 * re-syncs and by capability install/uninstall; read by every other
 * component. Listeners are told about every mutation so derived caches
 * (tool schema, description) can invalidate.
 */

import type { SkillDefinition } from "./types.js"

export type RegistryListener = () => void

export class SkillRegistry {
  private readonly entries = new Map<string, SkillDefinition>()
  private readonly listeners: RegistryListener[] = []

  /** Add or replace a skill. */
  register(definition: SkillDefinition): void {
    this.entries.set(definition.slug, definition)
    this.notify()
  }

  /** Remove a skill. No-op when absent. */
  unregister(slug: string): void {
    this.entries.delete(slug)
    this.notify()
  }

  /**
   * Remove every instruction-only skill, keeping capability-backed ones.
   * Used when re-syncing from storage without disturbing live app skills.
   */
  unregisterAllWithoutCapability(): void {
    for (const [slug, definition] of this.entries) {
      if (definition.capability === null) {
        this.entries.delete(slug)
      }
    }
    this.notify()
  }

  get(slug: string): SkillDefinition | undefined {
    return this.entries.get(slug)
  }

  has(slug: string): boolean {
    return this.entries.has(slug)
  }

  /** All skills, sorted by slug. */
  list(): SkillDefinition[] {
    return [...this.entries.values()].sort((a, b) => compareSlugs(a.slug, b.slug))
  }

  /** All slugs, sorted. */
  slugs(): string[] {
    return [...this.entries.keys()].sort(compareSlugs)
  }

  count(): number {
    return this.entries.size
  }

  /** Subscribe to mutations. Returns an unsubscribe function. */
  onChange(listener: RegistryListener): () => void {
    this.listeners.push(listener)
    return () => {
      const idx = this.listeners.indexOf(listener)
      if (idx !== -1) this.listeners.splice(idx, 1)
    }
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener()
    }
  }
}

/** Code-unit ordering, so results don't depend on the host locale. */
export function compareSlugs(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
