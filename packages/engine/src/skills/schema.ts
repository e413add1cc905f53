/**
 * LLM-facing schema and description for the skill tool.
 *
 * Both are pure functions of the registry contents. `SkillSchemaCache`
 * memoizes them behind a dirty flag that every registry mutation sets.
 */

import type { SkillRegistry } from "./registry.js"
import type { SkillDefinition } from "./types.js"

export const SKILL_ACTIONS = ["catalog", "help", "create", "update", "delete", "load", "unload"] as const

export type SkillAction = (typeof SKILL_ACTIONS)[number]

interface StringProperty {
  type: "string"
  description: string
  enum?: string[]
}

export interface SkillToolSchema {
  type: "object"
  properties: {
    name: StringProperty
    action: StringProperty
    resource: StringProperty
    content: StringProperty
  }
  additionalProperties: true
}

/** Build the tool input schema. `name` is an enum of slugs when any exist. */
export function buildSkillToolSchema(definitions: readonly SkillDefinition[]): SkillToolSchema {
  const name: StringProperty = {
    type: "string",
    description: "Skill name/slug (see list above)",
  }
  if (definitions.length > 0) {
    name.enum = definitions.map((d) => d.slug)
  }

  return {
    type: "object",
    properties: {
      name,
      action: {
        type: "string",
        description:
          "Action: catalog (list), help (show instructions), load (activate for session), unload (deactivate), create (new skill), update (modify), delete (remove), or skill-specific",
      },
      resource: {
        type: "string",
        description: "Resource type (skill-specific, e.g. events, email, contacts)",
      },
      content: {
        type: "string",
        description: "Full SKILL.md content with YAML frontmatter for create/update actions",
      },
    },
    additionalProperties: true,
  }
}

/** Build the tool description with one line per skill. */
export function buildSkillToolDescription(definitions: readonly SkillDefinition[]): string {
  const lines = [
    "Unified interface for skills and apps. Skills activate when invoked, when loaded, or when the user keeps mentioning their trigger phrases, and drop out after a few idle turns.",
    "LIFECYCLE: create → available in catalog. load → active in THIS session (injected into system prompt). unload → removed from session.",
    `Actions: ${SKILL_ACTIONS.join(", ")}, or skill-specific.`,
    "",
    "Available skills:",
    ...definitions.map((d) => `- ${d.slug} — ${d.description}`),
  ]
  return lines.join("\n") + "\n"
}

export class SkillSchemaCache {
  private readonly registry: SkillRegistry
  private dirty = true
  private cachedSchema: SkillToolSchema | null = null
  private cachedDescription = ""
  private rebuilds = 0

  constructor(registry: SkillRegistry) {
    this.registry = registry
    registry.onChange(() => {
      this.dirty = true
    })
  }

  schema(): SkillToolSchema {
    return this.ensureFresh().schema
  }

  description(): string {
    return this.ensureFresh().description
  }

  /** Number of rebuilds performed so far. */
  get rebuildCount(): number {
    return this.rebuilds
  }

  private ensureFresh(): { schema: SkillToolSchema; description: string } {
    if (this.dirty || this.cachedSchema === null) {
      const definitions = this.registry.list()
      this.cachedSchema = buildSkillToolSchema(definitions)
      this.cachedDescription = buildSkillToolDescription(definitions)
      this.dirty = false
      this.rebuilds++
    }
    return { schema: this.cachedSchema, description: this.cachedDescription }
  }
}
