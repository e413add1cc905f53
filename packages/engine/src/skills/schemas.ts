import { z } from "zod"

// ──────────────────────────────────────────────────
// SKILL.md frontmatter
// ──────────────────────────────────────────────────

/** Required text field. Bare numbers (`name: 2024`) are read as text; an empty value counts as missing. */
function requiredString(field: string) {
  return z.preprocess(
    (v) => (typeof v === "number" ? String(v) : v === null ? undefined : v),
    z
      .string({
        required_error: `${field} is required`,
        invalid_type_error: `${field} must be a string`,
      })
      .trim()
      .min(1, `${field} is required`),
  )
}

/** A list given as `[a, b]`, a `- a` block, or a comma-separated string. */
const StringListSchema = z
  .union([
    z.array(z.string()),
    z.string().transform((s) =>
      s
        .split(",")
        .map((t) => t.trim())
        .filter(Boolean),
    ),
  ])
  .nullish()
  .transform((v) => v ?? [])

export const SkillFrontmatterSchema = z.object({
  name: requiredString("name"),
  description: requiredString("description"),
  version: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((v) => (v === null || v === undefined || v === "" ? "1.0.0" : String(v))),
  triggers: StringListSchema,
  tools: StringListSchema,
  priority: z
    .number({ invalid_type_error: "priority must be an integer" })
    .int("priority must be an integer")
    .nullish()
    .transform((v) => v ?? 0),
  maxTurns: z
    .number({ invalid_type_error: "maxTurns must be a non-negative integer" })
    .int("maxTurns must be a non-negative integer")
    .nonnegative("maxTurns must be a non-negative integer")
    .nullish()
    .transform((v) => v ?? 0),
})

export type SkillFrontmatter = z.infer<typeof SkillFrontmatterSchema>

// ──────────────────────────────────────────────────
// Settings file
// ──────────────────────────────────────────────────

export const SkillSettingsFileSchema = z.object({
  disabledSkills: z.array(z.string()).default([]),
})

export type SkillSettingsFile = z.infer<typeof SkillSettingsFileSchema>
