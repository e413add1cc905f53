import type { InvocationResult } from "./types.js"

export type SkillErrorCode =
  | "NOT_FOUND"
  | "VALIDATION_FAILED"
  | "ALREADY_EXISTS"
  | "UNCONFIGURED"
  | "IO_ERROR"
  | "CAPABILITY_FAILED"

export class SkillError extends Error {
  readonly code: SkillErrorCode

  constructor(code: SkillErrorCode, message: string) {
    super(message)
    this.name = "SkillError"
    this.code = code
  }

  static notFound(message: string): SkillError {
    return new SkillError("NOT_FOUND", message)
  }

  static validation(message: string): SkillError {
    return new SkillError("VALIDATION_FAILED", message)
  }

  static alreadyExists(message: string): SkillError {
    return new SkillError("ALREADY_EXISTS", message)
  }

  static unconfigured(message: string): SkillError {
    return new SkillError("UNCONFIGURED", message)
  }

  static io(message: string): SkillError {
    return new SkillError("IO_ERROR", message)
  }
}

/** Convert any thrown value into an error result for the host. */
export function toErrorResult(err: unknown, fallback: SkillErrorCode = "IO_ERROR"): InvocationResult {
  if (err instanceof SkillError) {
    return { content: err.message, isError: true, code: err.code }
  }
  const message = err instanceof Error ? err.message : String(err)
  return { content: message, isError: true, code: fallback }
}
