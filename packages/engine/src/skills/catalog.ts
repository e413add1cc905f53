import type { SkillDefinition } from "./types.js"

/** Body of a skill, or a minimal stand-in built from its name and description. */
export function renderSkillBody(definition: SkillDefinition): string {
  if (definition.body) return definition.body
  return `# ${definition.displayName}\n\n${definition.description}`
}

/**
 * Human-readable catalog, split into capability-backed and
 * instruction-only skills. Expects `definitions` sorted by slug.
 */
export function formatCatalog(definitions: readonly SkillDefinition[]): string {
  if (definitions.length === 0) {
    return 'No skills installed. Use skill(action: "create", content: "...") to create one.'
  }

  const capabilitySkills = definitions.filter((d) => d.capability !== null)
  const instructionSkills = definitions.filter((d) => d.capability === null)

  const lines: string[] = ["# Available Skills", ""]

  if (capabilitySkills.length > 0) {
    lines.push("## Capability Skills")
    for (const d of capabilitySkills) {
      lines.push(`- **${d.slug}** — ${d.description}`)
    }
    lines.push("")
  }

  if (instructionSkills.length > 0) {
    lines.push("## Instruction Skills")
    for (const d of instructionSkills) {
      lines.push(`- **${d.slug}** — ${d.description}`)
    }
    lines.push("")
  }

  lines.push('Use `skill(name: "<name>", action: "load")` to activate a skill for this conversation.')
  lines.push('Use `skill(name: "<name>", action: "unload")` when done.')
  return lines.join("\n")
}
