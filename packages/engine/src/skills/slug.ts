const INVALID_SLUG_CHARS = /[^a-z0-9-]/g

/**
 * Convert a skill name into a URL-safe slug.
 *
 * "Meeting Prep" → "meeting-prep", "code_review v2!" → "code-review-v2".
 */
export function slugify(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[ _]/g, "-")
    .replace(INVALID_SLUG_CHARS, "")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "")
}
