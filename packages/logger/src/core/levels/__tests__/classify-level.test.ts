import { MemoryDiagnostics } from "../../../adapters/diagnostics/memory-diagnostics"
import { classifyLevel, DEFAULT_LEVEL } from "../classify-level"

describe("classifyLevel", () => {
  it.each([
    ["debug", "DEBUG"],
    ["Info", "INFO"],
    ["warn", "WARNING"],
    ["WARNING", "WARNING"],
    ["Warning123", "WARNING"],
    ["error", "ERROR"],
    ["critical", "CRITICAL"],
  ] as const)("maps %j to %s", (input, expected) => {
    expect(classifyLevel(input)).toBe(expected)
  })

  it("probes in order, so the first matching name wins", () => {
    expect(classifyLevel("debug_info")).toBe("DEBUG")
    expect(classifyLevel("error-critical")).toBe("ERROR")
  })

  it("falls back to INFO and warns when nothing matches", () => {
    const diagnostics = new MemoryDiagnostics()

    expect(classifyLevel("nonsense", { diagnostics })).toBe(DEFAULT_LEVEL)
    expect(diagnostics.entries).toEqual([
      {
        level: "warn",
        message: "Couldn't parse inputted loglevel, using default INFO",
        meta: { input: "NONSENSE" },
      },
    ])
  })

  it("uses the given fallback", () => {
    expect(classifyLevel(42, { fallback: "ERROR" })).toBe("ERROR")
  })

  it("stringifies non-string input", () => {
    expect(classifyLevel({ toString: () => "crit-ical" })).toBe("INFO")
    expect(classifyLevel({ toString: () => "critical" })).toBe("CRITICAL")
  })

  it("does not warn for a recognised level", () => {
    const diagnostics = new MemoryDiagnostics()
    classifyLevel("error", { diagnostics })

    expect(diagnostics.entries).toHaveLength(0)
  })
})
