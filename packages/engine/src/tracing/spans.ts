/**
 * Tracing span helpers — typed wrappers around the OpenTelemetry API.
 *
 * These keep instrumentation call-sites short and attribute naming
 * consistent across the engine.
 */

import { type Attributes, type Span, SpanStatusCode, trace } from "@opentelemetry/api"

// ──────────────────────────────────────────────────
// Semantic Attribute Constants
// ──────────────────────────────────────────────────

export const LoadoutAttributes = {
  SESSION_KEY: "loadout.session.key",
  SKILL_SLUG: "loadout.skill.slug",
  SKILL_ACTION: "loadout.skill.action",
  SKILL_MANUAL: "loadout.skill.manual",
  TURN: "loadout.session.turn",
  ACTIVE_COUNT: "loadout.session.active_count",
  EVICTED_COUNT: "loadout.session.evicted_count",
  HINT_COUNT: "loadout.session.hint_count",
  REGISTRY_SIZE: "loadout.registry.size",
  RESULT_IS_ERROR: "loadout.result.is_error",
  ERROR_CODE: "loadout.error.code",
} as const

// ──────────────────────────────────────────────────
// Tracer
// ──────────────────────────────────────────────────

const TRACER_NAME = "loadout"

function getTracer() {
  return trace.getTracer(TRACER_NAME)
}

function recordFailure(span: Span, err: unknown): void {
  span.setStatus({ code: SpanStatusCode.ERROR, message: String(err) })
  if (err instanceof Error) {
    span.recordException(err)
  }
}

/**
 * Execute an async function inside a new span.
 *
 * On success the span ends with OK status; on error it records the
 * exception and sets ERROR status before re-throwing.
 *
 * ```ts
 * const result = await withSpan("loadout.skill.invoke", { [LoadoutAttributes.SKILL_SLUG]: slug }, async (span) => {
 *   // ... instrumented work
 * })
 * ```
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  return getTracer().startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span)
      span.setStatus({ code: SpanStatusCode.OK })
      return result
    } catch (err) {
      recordFailure(span, err)
      throw err
    } finally {
      span.end()
    }
  })
}

/** Synchronous counterpart of {@link withSpan} for run-to-completion work. */
export function withSpanSync<T>(name: string, attributes: Attributes, fn: (span: Span) => T): T {
  return getTracer().startActiveSpan(name, { attributes }, (span) => {
    try {
      const result = fn(span)
      span.setStatus({ code: SpanStatusCode.OK })
      return result
    } catch (err) {
      recordFailure(span, err)
      throw err
    } finally {
      span.end()
    }
  })
}

/** Add attributes to the current active span. */
export function setSpanAttributes(attributes: Attributes): void {
  const span = trace.getActiveSpan()
  if (span) {
    span.setAttributes(attributes)
  }
}

/** Record an event (log-style annotation) on the current active span. */
export function addSpanEvent(name: string, attributes?: Attributes): void {
  const span = trace.getActiveSpan()
  if (span) {
    span.addEvent(name, attributes)
  }
}
