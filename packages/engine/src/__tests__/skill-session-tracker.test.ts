import { describe, expect, it } from "vitest"

import { SkillError } from "../skills/errors.js"
import { SkillRegistry } from "../skills/registry.js"
import { SessionTracker } from "../skills/session-tracker.js"
import type { SkillDefinition } from "../skills/types.js"

function makeSkill(slug: string, overrides: Partial<SkillDefinition> = {}): SkillDefinition {
  return {
    slug,
    displayName: slug,
    description: `${slug} description`,
    body: `${slug} body`,
    capability: null,
    triggers: [],
    toolRestrictions: [],
    priority: 0,
    ...overrides,
  }
}

function setup(...skills: SkillDefinition[]): { registry: SkillRegistry; tracker: SessionTracker } {
  const registry = new SkillRegistry()
  for (const skill of skills) registry.register(skill)
  return { registry, tracker: new SessionTracker(registry) }
}

function tickMany(tracker: SessionTracker, session: string, count: number, message = "hello"): void {
  for (let i = 0; i < count; i++) tracker.tick(session, message)
}

// ---------------------------------------------------------------------------
// Turn counter
// ---------------------------------------------------------------------------

describe("SessionTracker turn counter", () => {
  it("starts at zero and increments once per tick", () => {
    const { tracker } = setup()
    expect(tracker.currentTurn("s1")).toBe(0)

    expect(tracker.tick("s1", "a").turn).toBe(1)
    expect(tracker.tick("s1", "b").turn).toBe(2)
    expect(tracker.currentTurn("s1")).toBe(2)
  })

  it("keeps sessions independent", () => {
    const { tracker } = setup()
    tickMany(tracker, "s1", 3)
    tracker.tick("s2", "x")

    expect(tracker.currentTurn("s1")).toBe(3)
    expect(tracker.currentTurn("s2")).toBe(1)
    expect(tracker.sessionCount).toBe(2)
  })

  it("resets after clearSession", () => {
    const { tracker } = setup(makeSkill("notes"))
    tickMany(tracker, "s1", 2)
    tracker.load("s1", "notes")

    tracker.clearSession("s1")

    expect(tracker.currentTurn("s1")).toBe(0)
    expect(tracker.isActive("s1", "notes")).toBe(false)
    expect(tracker.sessionCount).toBe(0)
  })
})

// ---------------------------------------------------------------------------
// Activation and eviction
// ---------------------------------------------------------------------------

describe("SessionTracker eviction", () => {
  it("evicts an invoked skill after four idle turns", () => {
    const { tracker } = setup(makeSkill("calendar", { triggers: ["meeting"] }))

    tracker.tick("s1", "hi")
    expect(tracker.recordActivation("s1", "calendar", false)).toBe(true)

    tickMany(tracker, "s1", 4)
    expect(tracker.currentTurn("s1")).toBe(5)
    expect(tracker.isActive("s1", "calendar")).toBe(true)

    const result = tracker.tick("s1", "hello")
    expect(result.turn).toBe(6)
    expect(result.evicted).toEqual(["calendar"])
    expect(tracker.isActive("s1", "calendar")).toBe(false)
  })

  it("keeps a manually loaded skill for six idle turns", () => {
    const { tracker } = setup(makeSkill("notes"))

    tracker.tick("s1", "hi")
    tracker.load("s1", "notes")

    tickMany(tracker, "s1", 6)
    expect(tracker.currentTurn("s1")).toBe(7)
    expect(tracker.isActive("s1", "notes")).toBe(true)

    expect(tracker.tick("s1", "hello").evicted).toEqual(["notes"])
  })

  it("uses a per-skill TTL override", () => {
    const { tracker } = setup(makeSkill("brief", { ttlOverride: 1 }))
    tracker.load("s1", "brief")

    tracker.tick("s1", "x")
    expect(tracker.isActive("s1", "brief")).toBe(true)
    expect(tracker.tick("s1", "x").evicted).toEqual(["brief"])
  })

  it("honours TTLs configured on the tracker", () => {
    const registry = new SkillRegistry()
    registry.register(makeSkill("notes"))
    const tracker = new SessionTracker(registry, { invokedTtl: 1, manualTtl: 2 })

    tracker.load("s1", "notes")
    expect(tracker.activeRecords("s1")).toMatchObject([{ slug: "notes", effectiveTtl: 2, manual: true }])
  })

  it("refreshes an active skill whose trigger matches", () => {
    const { tracker } = setup(makeSkill("calendar", { triggers: ["meeting"] }))
    tracker.recordActivation("s1", "calendar", false)

    tickMany(tracker, "s1", 3)
    tracker.tick("s1", "Move the Meeting to 3pm")
    tickMany(tracker, "s1", 4)

    expect(tracker.currentTurn("s1")).toBe(8)
    expect(tracker.isActive("s1", "calendar")).toBe(true)
    expect(tracker.tick("s1", "ok").evicted).toEqual(["calendar"])
  })

  it("re-creates an expiring skill as a fresh invoked record when its trigger matches", () => {
    const { tracker } = setup(makeSkill("notes", { triggers: ["note"] }))
    tracker.load("s1", "notes")

    tickMany(tracker, "s1", 6)
    const result = tracker.tick("s1", "add a note")

    expect(result.turn).toBe(7)
    expect(result.evicted).toEqual([])
    expect(tracker.activeRecords("s1")).toMatchObject([
      { slug: "notes", lastActiveTurn: 7, effectiveTtl: 4, manual: false },
    ])
  })

  it("upgrades an invoked record to manual without changing its TTL", () => {
    const { tracker } = setup(makeSkill("notes"))
    tracker.recordActivation("s1", "notes", false)
    tracker.tick("s1", "x")
    tracker.load("s1", "notes")

    expect(tracker.activeRecords("s1")).toMatchObject([
      { slug: "notes", lastActiveTurn: 1, effectiveTtl: 4, manual: true },
    ])
  })

  it("does not downgrade a manual record on invocation", () => {
    const { tracker } = setup(makeSkill("notes"))
    tracker.load("s1", "notes")
    tracker.recordActivation("s1", "notes", false)

    expect(tracker.activeRecords("s1")).toMatchObject([{ manual: true }])
  })

  it("keeps a record for a skill removed from the registry until it expires", () => {
    const { registry, tracker } = setup(makeSkill("notes", { triggers: ["note"] }))
    tracker.recordActivation("s1", "notes", false)
    registry.unregister("notes")

    tickMany(tracker, "s1", 4, "note")
    expect(tracker.isActive("s1", "notes")).toBe(true)
    expect(tracker.tick("s1", "note").evicted).toEqual(["notes"])
  })

  it("snapshots content at first activation", () => {
    const { registry, tracker } = setup(makeSkill("notes", { body: "v1" }))
    tracker.load("s1", "notes")
    registry.register(makeSkill("notes", { body: "v2" }))
    tracker.load("s1", "notes")

    expect(tracker.activeRecords("s1")).toMatchObject([{ contentSnapshot: "v1" }])
  })
})

// ---------------------------------------------------------------------------
// load / forceLoad / unload / recordActivation
// ---------------------------------------------------------------------------

describe("SessionTracker load", () => {
  it("returns a confirmation followed by the body", () => {
    const { tracker } = setup(makeSkill("notes", { displayName: "Notes", body: "Write it down." }))

    expect(tracker.load("s1", "notes")).toBe(
      'Skill "Notes" loaded for this conversation. Follow the instructions below:\n\nWrite it down.',
    )
  })

  it("throws NOT_FOUND for an unknown skill", () => {
    const { tracker } = setup()

    expect(() => tracker.load("s1", "ghost")).toThrow(SkillError)
    expect(() => tracker.load("s1", "ghost")).toThrow(
      'Skill "ghost" not found. Use skill(action: "catalog") to see available skills.',
    )
    expect(tracker.isActive("s1", "ghost")).toBe(false)
  })

  it("records the current turn", () => {
    const { tracker } = setup(makeSkill("notes"))
    tickMany(tracker, "s1", 3)
    tracker.load("s1", "notes")

    expect(tracker.activeRecords("s1")).toMatchObject([{ lastActiveTurn: 3 }])
  })
})

describe("SessionTracker forceLoad", () => {
  it("activates a registered skill as manual", () => {
    const { tracker } = setup(makeSkill("onboarding"))

    expect(tracker.forceLoad("s1", "onboarding")).toBe(true)
    expect(tracker.activeRecords("s1")).toMatchObject([{ slug: "onboarding", manual: true, effectiveTtl: 6 }])
  })

  it("returns false for an unknown skill or an empty session key", () => {
    const { tracker } = setup(makeSkill("onboarding"))

    expect(tracker.forceLoad("s1", "ghost")).toBe(false)
    expect(tracker.forceLoad("", "onboarding")).toBe(false)
    expect(tracker.sessionCount).toBe(0)
  })
})

describe("SessionTracker unload", () => {
  it("removes an active record", () => {
    const { tracker } = setup(makeSkill("notes"))
    tracker.load("s1", "notes")

    expect(tracker.unload("s1", "notes")).toBe(true)
    expect(tracker.isActive("s1", "notes")).toBe(false)
  })

  it("returns false when nothing was active", () => {
    const { tracker } = setup(makeSkill("notes"))
    expect(tracker.unload("s1", "notes")).toBe(false)
  })
})

describe("SessionTracker recordActivation", () => {
  it("returns false for an unregistered skill", () => {
    const { tracker } = setup()
    expect(tracker.recordActivation("s1", "ghost", false)).toBe(false)
    expect(tracker.activeRecords("s1")).toEqual([])
  })

  it("returns copies of records", () => {
    const { tracker } = setup(makeSkill("notes", { toolRestrictions: ["read"] }))
    tracker.recordActivation("s1", "notes", false)

    const [copy] = tracker.activeRecords("s1")
    copy?.toolRestrictions.push("shell")

    expect(tracker.activeToolRestrictions("s1")).toEqual(["read"])
  })
})

// ---------------------------------------------------------------------------
// Hints
// ---------------------------------------------------------------------------

describe("SessionTracker hints", () => {
  it("hints inactive skills whose triggers match", () => {
    const { tracker } = setup(
      makeSkill("calendar", { triggers: ["meeting"], priority: 2, description: "Manage events" }),
      makeSkill("notes", { triggers: ["meeting"], description: "Take notes" }),
    )

    const result = tracker.tick("s1", "Prep for the meeting")

    expect(result.hints).toEqual([
      { slug: "calendar", description: "Manage events" },
      { slug: "notes", description: "Take notes" },
    ])
    expect(result.hintBlock).toContain("- **calendar** — Manage events\n- **notes** — Take notes")
  })

  it("does not hint a skill that is already active", () => {
    const { tracker } = setup(makeSkill("calendar", { triggers: ["meeting"] }))
    tracker.recordActivation("s1", "calendar", false)

    const result = tracker.tick("s1", "meeting")
    expect(result.hints).toEqual([])
    expect(result.hintBlock).toBe("")
  })

  it("does not hint a skill re-created in the same tick", () => {
    const { tracker } = setup(makeSkill("calendar", { triggers: ["meeting"] }))
    tracker.recordActivation("s1", "calendar", false)
    tickMany(tracker, "s1", 4)

    expect(tracker.tick("s1", "meeting").hints).toEqual([])
  })

  it("never auto-activates on a trigger match", () => {
    const { tracker } = setup(makeSkill("calendar", { triggers: ["meeting"] }))
    tracker.tick("s1", "meeting")
    expect(tracker.isActive("s1", "calendar")).toBe(false)
  })

  it("respects a custom hint limit", () => {
    const registry = new SkillRegistry()
    for (const slug of ["a", "b", "c"]) registry.register(makeSkill(slug, { triggers: ["go"] }))
    const tracker = new SessionTracker(registry, { hintLimit: 2 })

    expect(tracker.tick("s1", "go").hints.map((h) => h.slug)).toEqual(["a", "b"])
  })
})

// ---------------------------------------------------------------------------
// Active content and restrictions
// ---------------------------------------------------------------------------

describe("SessionTracker activeContent", () => {
  it("returns an empty string when nothing is active", () => {
    const { tracker } = setup()
    expect(tracker.activeContent("s1")).toBe("")
  })

  it("orders by recency and skips a skill that would exceed the budget", () => {
    const { tracker } = setup(
      makeSkill("big", { displayName: "Big", body: "x".repeat(10_001) }),
      makeSkill("medium", { displayName: "Medium", body: "y".repeat(9_000) }),
    )
    tracker.load("s1", "medium")
    tracker.tick("s1", "next")
    tracker.load("s1", "big")

    const content = tracker.activeContent("s1")
    expect(content).toContain("### Big")
    expect(content).not.toContain("### Medium")
  })

  it("includes the placeholder body for skills without instructions", () => {
    const { tracker } = setup(makeSkill("empty", { displayName: "Empty", body: "" }))
    tracker.load("s1", "empty")

    expect(tracker.activeContent("s1").endsWith("### Empty\n\n# Empty\n\nempty description")).toBe(true)
  })
})

describe("SessionTracker activeToolRestrictions", () => {
  it("is undefined for an unknown session", () => {
    const { tracker } = setup()
    expect(tracker.activeToolRestrictions("s1")).toBeUndefined()
  })

  it("is undefined when no active skill restricts tools", () => {
    const { tracker } = setup(makeSkill("notes"))
    tracker.load("s1", "notes")
    expect(tracker.activeToolRestrictions("s1")).toBeUndefined()
  })

  it("is the union of active restrictions", () => {
    const { tracker } = setup(
      makeSkill("research", { toolRestrictions: ["web_search", "read"] }),
      makeSkill("calendar", { toolRestrictions: ["calendar", "read"] }),
      makeSkill("notes"),
    )
    tracker.load("s1", "research")
    tracker.load("s1", "calendar")
    tracker.load("s1", "notes")

    expect(tracker.activeToolRestrictions("s1")).toEqual(["calendar", "read", "web_search"])
  })
})
