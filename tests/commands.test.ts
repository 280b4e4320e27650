import { describe, expect, it } from "vitest";
import { parseArgs, parseInsights, parseLimit, parseSatisfaction, requireFlag } from "../src/commands.js";

describe("commands", () => {
  it("parses flags", () => {
    const parsed = parseArgs(["run", "--source", "Notes", "--insights", "a; b"]);
    expect(parsed.command).toBe("run");
    expect(parsed.flags["--source"]).toBe("Notes");
    expect(parsed.flags["--insights"]).toBe("a; b");
  });

  it("records bare flags", () => {
    const parsed = parseArgs(["feedback", "--regenerate", "--session", "s-1"]);
    expect("--regenerate" in parsed.flags).toBe(true);
    expect(parsed.flags["--regenerate"]).toBeUndefined();
    expect(parsed.flags["--session"]).toBe("s-1");
  });

  it("requires flags", () => {
    expect(() => requireFlag({}, "--session")).toThrow("Missing required --session");
  });

  it("splits insights on semicolons", () => {
    expect(parseInsights("first; second ;; third")).toEqual(["first", "second", "third"]);
    expect(parseInsights(undefined)).toEqual([]);
  });

  it("validates satisfaction", () => {
    expect(parseSatisfaction("4")).toBe(4);
    expect(parseSatisfaction(undefined)).toBeUndefined();
    expect(() => parseSatisfaction("9")).toThrow("Invalid satisfaction: 9");
  });

  it("validates limits", () => {
    expect(parseLimit("20")).toBe(20);
    expect(() => parseLimit("0")).toThrow("Invalid limit: 0");
  });
});
