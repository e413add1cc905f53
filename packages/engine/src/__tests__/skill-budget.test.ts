import { describe, expect, it } from "vitest"

import {
  assembleActiveContent,
  formatActiveSkills,
  rankByRecency,
  selectWithinBudget,
} from "../skills/budget.js"
import type { ActivationRecord } from "../skills/types.js"

function makeRecord(slug: string, lastActiveTurn: number, contentSnapshot: string): ActivationRecord {
  return {
    slug,
    lastActiveTurn,
    contentSnapshot,
    displayName: slug.toUpperCase(),
    toolRestrictions: [],
    effectiveTtl: 4,
    manual: false,
  }
}

// ---------------------------------------------------------------------------
// rankByRecency
// ---------------------------------------------------------------------------

describe("rankByRecency", () => {
  it("orders most recently active first", () => {
    const ranked = rankByRecency([makeRecord("a", 1, "x"), makeRecord("b", 3, "x"), makeRecord("c", 2, "x")])
    expect(ranked.map((r) => r.slug)).toEqual(["b", "c", "a"])
  })

  it("breaks ties by slug", () => {
    const ranked = rankByRecency([makeRecord("zeta", 2, "x"), makeRecord("alpha", 2, "x")])
    expect(ranked.map((r) => r.slug)).toEqual(["alpha", "zeta"])
  })

  it("does not mutate the input", () => {
    const input = [makeRecord("a", 1, "x"), makeRecord("b", 2, "x")]
    rankByRecency(input)
    expect(input.map((r) => r.slug)).toEqual(["a", "b"])
  })
})

// ---------------------------------------------------------------------------
// selectWithinBudget
// ---------------------------------------------------------------------------

describe("selectWithinBudget", () => {
  it("keeps everything that fits", () => {
    const selected = selectWithinBudget([makeRecord("a", 2, "12345"), makeRecord("b", 1, "12345")], 10)
    expect(selected.map((r) => r.slug)).toEqual(["a", "b"])
  })

  it("skips a record that does not fit whole", () => {
    const selected = selectWithinBudget(
      [makeRecord("big", 2, "x".repeat(10_001)), makeRecord("medium", 1, "y".repeat(9_000))],
      16_000,
    )
    expect(selected.map((r) => r.slug)).toEqual(["big"])
  })

  it("lets a smaller later record use the remaining budget", () => {
    const selected = selectWithinBudget(
      [makeRecord("a", 3, "x".repeat(6)), makeRecord("b", 2, "x".repeat(8)), makeRecord("c", 1, "x".repeat(4))],
      10,
    )
    expect(selected.map((r) => r.slug)).toEqual(["a", "c"])
  })

  it("includes a record exactly equal to the remaining budget", () => {
    expect(selectWithinBudget([makeRecord("a", 1, "x".repeat(10))], 10)).toHaveLength(1)
  })

  it("returns nothing for an empty input", () => {
    expect(selectWithinBudget([], 100)).toEqual([])
  })
})

// ---------------------------------------------------------------------------
// formatting
// ---------------------------------------------------------------------------

describe("formatActiveSkills", () => {
  it("returns an empty string for no records", () => {
    expect(formatActiveSkills([])).toBe("")
  })

  it("renders sections separated by rules", () => {
    const out = formatActiveSkills([makeRecord("a", 2, "Do A."), makeRecord("b", 1, "Do B.")])
    expect(out).toBe(
      [
        "## Active Skills",
        "",
        "The following skills are loaded for this conversation. Follow their instructions.",
        "",
        "### A\n\nDo A.\n\n---\n\n### B\n\nDo B.",
      ].join("\n"),
    )
  })
})

describe("assembleActiveContent", () => {
  it("ranks, budgets and formats", () => {
    const out = assembleActiveContent(
      [makeRecord("old", 1, "Old body."), makeRecord("new", 5, "New body."), makeRecord("huge", 4, "z".repeat(50))],
      20,
    )
    expect(out).toBe(
      [
        "## Active Skills",
        "",
        "The following skills are loaded for this conversation. Follow their instructions.",
        "",
        "### NEW\n\nNew body.\n\n---\n\n### OLD\n\nOld body.",
      ].join("\n"),
    )
  })
})
