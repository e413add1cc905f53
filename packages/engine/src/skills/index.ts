export {
  assembleActiveContent,
  formatActiveSkills,
  rankByRecency,
  selectWithinBudget,
} from "./budget.js"
export { formatCatalog, renderSkillBody } from "./catalog.js"
export { isToolAllowed, mergeRecordRestrictions, mergeToolRestrictions } from "./constraints.js"
export { SkillError, toErrorResult } from "./errors.js"
export type { SkillErrorCode } from "./errors.js"
export { loadSkillFile, parseFrontmatter, parseSkillDocument, toSkillDefinition } from "./loader.js"
export type { FrontmatterValue, SkillDocument } from "./loader.js"
export { compareSlugs, SkillRegistry } from "./registry.js"
export type { RegistryListener } from "./registry.js"
export {
  buildSkillToolDescription,
  buildSkillToolSchema,
  SKILL_ACTIONS,
  SkillSchemaCache,
} from "./schema.js"
export type { SkillAction, SkillToolSchema } from "./schema.js"
export { SkillFrontmatterSchema, SkillSettingsFileSchema } from "./schemas.js"
export type { SkillFrontmatter, SkillSettingsFile } from "./schemas.js"
export { SessionTracker } from "./session-tracker.js"
export type { SessionTrackerOptions } from "./session-tracker.js"
export { SKILL_SETTINGS_FILE, SkillSettingsStore } from "./settings.js"
export type { SkillSettingsListener } from "./settings.js"
export { SKILL_TOOL_NAME, SkillTool } from "./skill-tool.js"
export type { SkillToolOptions } from "./skill-tool.js"
export { slugify } from "./slug.js"
export { SKILL_FILE_NAME, SkillStore } from "./store.js"
export type { SkillLoadFailure, SkillLoadResult, SkillStoreOptions } from "./store.js"
export { SkillSync } from "./sync.js"
export type { SkillSyncOptions, SkillSyncResult } from "./sync.js"
export { formatTriggerHints, matchesTrigger, rankTriggerHints } from "./triggers.js"
export {
  DEFAULT_CONTENT_BUDGET,
  DEFAULT_INVOKED_TTL,
  DEFAULT_MANUAL_TTL,
  MAX_TRIGGER_HINTS,
} from "./types.js"
export type {
  ActivationRecord,
  Capability,
  InvocationRequest,
  InvocationResult,
  SessionState,
  SkillDefinition,
  TickResult,
  TriggerHint,
} from "./types.js"
export { createSkillWatcher, DEFAULT_SKILL_WATCHER_CONFIG } from "./watcher.js"
export type { ManagedWatcher, SkillWatcherConfig } from "./watcher.js"
