/**
 * SkillStore — durable SKILL.md storage.
 *
 * Skills live one per directory under one or more roots:
 *   {root}/
 *     meeting-prep/SKILL.md
 *     code-review/SKILL.md
 *
 * Bundled roots are read-only. The user root is the only one that
 * create/update/delete touch; on a slug collision it wins over bundled
 * skills. Without a user root the lifecycle operations are disabled.
 */

import { mkdir, readdir, rm, stat, writeFile } from "node:fs/promises"
import { basename, dirname, join } from "node:path"

import { SkillError } from "./errors.js"
import { loadSkillFile, parseSkillDocument, toSkillDefinition } from "./loader.js"
import { slugify } from "./slug.js"
import type { SkillDefinition } from "./types.js"
import { quietLogger, type TracingLogger } from "../tracing/logger.js"

export const SKILL_FILE_NAME = "SKILL.md"

export interface SkillStoreOptions {
  /** Writable root for user-created skills. */
  userDir?: string
  /** Read-only roots shipped with the host, lowest precedence first. */
  bundledDirs?: string[]
  logger?: TracingLogger
}

export interface SkillLoadFailure {
  filePath: string
  error: string
}

export interface SkillLoadResult {
  definitions: SkillDefinition[]
  failures: SkillLoadFailure[]
}

export class SkillStore {
  private readonly userDir: string | undefined
  private readonly bundledDirs: string[]
  private readonly logger: TracingLogger

  constructor(options: SkillStoreOptions = {}) {
    this.userDir = options.userDir
    this.bundledDirs = options.bundledDirs ?? []
    this.logger = options.logger ?? quietLogger()
  }

  /** Every root, lowest precedence first. */
  get roots(): string[] {
    return this.userDir ? [...this.bundledDirs, this.userDir] : [...this.bundledDirs]
  }

  get isWritable(): boolean {
    return this.userDir !== undefined
  }

  /**
   * Read every SKILL.md under every root. Invalid documents are reported
   * in `failures` and left out; a missing root is treated as empty.
   */
  async loadAll(): Promise<SkillLoadResult> {
    const bySlug = new Map<string, SkillDefinition>()
    const failures: SkillLoadFailure[] = []

    for (const root of this.roots) {
      let entries: string[]
      try {
        entries = await readdir(root)
      } catch {
        this.logger.debug("skill root not readable", { root })
        continue
      }

      for (const entry of entries.sort()) {
        const filePath = join(root, entry, SKILL_FILE_NAME)
        if (!(await isFile(filePath))) continue

        try {
          const definition = await loadSkillFile(filePath)
          bySlug.set(definition.slug, definition)
        } catch (err) {
          const error = errorMessage(err)
          failures.push({ filePath, error })
          this.logger.warn("skipping invalid skill", { filePath, error })
        }
      }
    }

    return { definitions: [...bySlug.values()], failures }
  }

  /**
   * Write a new user skill. The document is validated before anything
   * touches disk; an existing skill with the same slug is rejected.
   */
  async create(content: string): Promise<SkillDefinition> {
    const userDir = this.requireUserDir("Skill creation")
    const definition = this.validate(content)

    const filePath = join(userDir, definition.slug, SKILL_FILE_NAME)
    if (await isFile(filePath)) {
      throw alreadyExists(definition.slug)
    }

    await this.write(filePath, content, { exclusive: true })
    this.logger.info("skill created", { slug: definition.slug })
    return { ...definition, filePath }
  }

  /** Overwrite an existing user skill with a full new document. */
  async update(name: string, content: string): Promise<SkillDefinition> {
    const userDir = this.requireUserDir("Skill update")
    const definition = this.validate(content)

    const slug = slugify(name)
    const filePath = join(userDir, slug, SKILL_FILE_NAME)
    if (!slug || !(await isFile(filePath))) {
      throw SkillError.notFound(
        `Skill "${slug || name}" not found in user skills. Only user-created skills can be updated.`,
      )
    }

    await this.write(filePath, content)
    this.logger.info("skill updated", { slug })
    return { ...definition, filePath }
  }

  /** Remove a user skill's directory. Returns the slug removed. */
  async delete(name: string): Promise<string> {
    const userDir = this.requireUserDir("Skill deletion")

    const slug = slugify(name)
    const skillDir = join(userDir, slug)
    if (!slug || !(await isFile(join(skillDir, SKILL_FILE_NAME)))) {
      throw SkillError.notFound(
        `Skill "${slug || name}" not found in user skills. Only user-created skills can be deleted.`,
      )
    }

    try {
      await rm(skillDir, { recursive: true, force: true })
    } catch (err) {
      throw SkillError.io(`Failed to delete skill: ${errorMessage(err)}`)
    }
    this.logger.info("skill deleted", { slug })
    return slug
  }

  private validate(content: string): SkillDefinition {
    if (!content.trim()) {
      throw SkillError.validation(
        "Content is required. Provide valid SKILL.md content with YAML frontmatter.",
      )
    }
    return toSkillDefinition(parseSkillDocument(content))
  }

  /**
   * With `exclusive`, an existing file fails the write, so a concurrent
   * create for the same slug loses with ALREADY_EXISTS.
   */
  private async write(filePath: string, content: string, { exclusive = false } = {}): Promise<void> {
    try {
      await mkdir(dirname(filePath), { recursive: true })
      await writeFile(filePath, content, { encoding: "utf-8", flag: exclusive ? "wx" : "w" })
    } catch (err) {
      if (exclusive && errorCode(err) === "EEXIST") {
        throw alreadyExists(basename(dirname(filePath)))
      }
      throw SkillError.io(`Failed to write ${SKILL_FILE_NAME}: ${errorMessage(err)}`)
    }
  }

  private requireUserDir(feature: string): string {
    if (!this.userDir) {
      throw SkillError.unconfigured(`${feature} not available (no skills directory configured).`)
    }
    return this.userDir
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch {
    return false
  }
}

function alreadyExists(slug: string): SkillError {
  return SkillError.alreadyExists(`Skill "${slug}" already exists. Use action: "update" to modify it.`)
}

function errorCode(err: unknown): unknown {
  return err instanceof Error && "code" in err ? err.code : undefined
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
