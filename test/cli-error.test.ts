/**
 * CLI Error Handling Tests
 */
import { describe, expect, it } from "@effect/vitest"
import { Cause, Exit, FiberId } from "effect"
import { describeError, INTERRUPTED_EXIT_CODE, teardown } from "../src/cli/error.ts"
import { SourceNotFoundError } from "../src/errors.ts"

const exitCodeFor = (exit: Exit.Exit<unknown, unknown>) => {
  const codes: Array<number> = []
  teardown(exit, (code) => codes.push(code))
  return codes
}

describe("teardown", () => {
  it("exits 130 when the run was interrupted", () => {
    expect(exitCodeFor(Exit.interrupt(FiberId.make(1, 0)))).toEqual([INTERRUPTED_EXIT_CODE])
    expect(INTERRUPTED_EXIT_CODE).toBe(130)
  })

  it("exits 1 on an unhandled failure", () => {
    expect(exitCodeFor(Exit.fail("boom"))).toEqual([1])
    expect(exitCodeFor(Exit.failCause(Cause.die(new Error("defect"))))).toEqual([1])
  })

  it("exits 0 on success", () => {
    expect(exitCodeFor(Exit.void)).toEqual([0])
  })
})

describe("describeError", () => {
  it("uses a tagged error's message", () => {
    expect(describeError(new SourceNotFoundError({ path: "nope.c", supported: ["c"] }))).toBe("File not found: nope.c")
  })

  it("falls back to the text of anything else", () => {
    expect(describeError(new Error("plain"))).toBe("plain")
    expect(describeError(42)).toBe("42")
  })
})
