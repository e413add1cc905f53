export { loadConfig } from "./config.js"
export type { EngineConfig } from "./config.js"
export { createSkillEngine } from "./engine.js"
export type { SkillEngine } from "./engine.js"
export * from "./skills/index.js"
export {
  DEFAULT_TRACING_CONFIG,
  initTracing,
  LoadoutAttributes,
  shutdownTracing,
  TracingLogger,
} from "./tracing/index.js"
export type { LogLevel, TracingConfig, TracingLoggerOptions } from "./tracing/index.js"
