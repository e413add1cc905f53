/**
 * Configuration module — reads engine settings from environment variables.
 *
 * Everything has a default. Invalid enumerations throw.
 */

import { delimiter } from "node:path"

import { DEFAULT_CONTENT_BUDGET, DEFAULT_INVOKED_TTL, DEFAULT_MANUAL_TTL } from "./skills/types.js"
import type { TracingConfig } from "./tracing/index.js"
import { isLogLevel, type LogLevel } from "./tracing/logger.js"

export interface EngineConfig {
  /** Writable directory for user skills. Lifecycle CRUD is disabled without it. */
  skillsDir?: string
  /** Read-only skill roots shipped with the host, lowest precedence first. */
  bundledSkillsDirs: string[]
  /** Directory holding skill-settings.json. Settings are memory-only without it. */
  dataDir?: string
  /** Character budget for active skill content. */
  contentBudget: number
  /** Idle-turn TTL for invoked/triggered skills. */
  invokedTtl: number
  /** Idle-turn TTL for manually loaded skills. */
  manualTtl: number
  /** Hot-reload skills when SKILL.md files change. */
  watch: boolean
  /** Debounce for the skill watcher, in ms. */
  watchDebounceMs: number
  /** Minimum log level. */
  logLevel: LogLevel
  /** OpenTelemetry tracing configuration */
  tracing: TracingConfig
}

/**
 * Load configuration from environment variables.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const logLevel = env.LOG_LEVEL ?? "info"
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${logLevel}. Must be "debug", "info", "warn", or "error".`)
  }

  const exporterType = env.OTEL_EXPORTER_TYPE ?? "otlp"
  if (exporterType !== "otlp" && exporterType !== "console" && exporterType !== "none") {
    throw new Error(
      `Invalid OTEL_EXPORTER_TYPE: ${exporterType}. Must be "otlp", "console", or "none".`,
    )
  }

  return {
    skillsDir: env.LOADOUT_SKILLS_DIR || undefined,
    bundledSkillsDirs: parseList(env.LOADOUT_BUNDLED_SKILLS_DIR),
    dataDir: env.LOADOUT_DATA_DIR || undefined,
    contentBudget: parsePositiveIntOr(env.LOADOUT_CONTENT_BUDGET, DEFAULT_CONTENT_BUDGET),
    invokedTtl: parsePositiveIntOr(env.LOADOUT_INVOKED_TTL, DEFAULT_INVOKED_TTL),
    manualTtl: parsePositiveIntOr(env.LOADOUT_MANUAL_TTL, DEFAULT_MANUAL_TTL),
    watch: env.LOADOUT_WATCH !== "false",
    watchDebounceMs: parsePositiveIntOr(env.LOADOUT_WATCH_DEBOUNCE_MS, 300),
    logLevel,
    tracing: {
      enabled: env.OTEL_TRACING_ENABLED === "true",
      endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318",
      sampleRate: parseFloatOr(env.OTEL_SAMPLE_RATE, 1.0),
      serviceName: env.OTEL_SERVICE_NAME ?? "loadout-engine",
      exporterType,
    },
  }
}

function parseList(value: string | undefined): string[] {
  if (!value) return []
  return value
    .split(delimiter)
    .map((s) => s.trim())
    .filter(Boolean)
}

function parsePositiveIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed) || parsed <= 0) return fallback
  return parsed
}

function parseFloatOr(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = parseFloat(value)
  if (Number.isNaN(parsed)) return fallback
  return Math.max(0, Math.min(1, parsed))
}
