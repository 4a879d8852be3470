import { describe, expect, it } from "vitest";
import { atsFlag, bandFlag, flagValue, termFlag } from "./args";

describe("flag parsing", () => {
  it("reads spaced and inline values", () => {
    expect(flagValue(["--company", "acme"], "--company")).toBe("acme");
    expect(flagValue(["--company=acme"], "--company")).toBe("acme");
    expect(flagValue([], "--company")).toBeNull();
  });

  it("validates ats and band", () => {
    expect(atsFlag(["--ats", "lever"])).toBe("lever");
    expect(() => atsFlag(["--ats", "workday"])).toThrow('Unknown ATS "workday"');
    expect(() => bandFlag(["--band", "3"])).toThrow("--band must be 0, 1 or 2, got 3");
  });

  it("maps --tech and --skill to term kinds", () => {
    expect(termFlag(["--tech", "NodeJS"])).toEqual({ kind: "tech_stack", term: "NodeJS" });
    expect(termFlag(["--skill=mentoring"])).toEqual({ kind: "skills", term: "mentoring" });
  });

  it("needs exactly one term flag", () => {
    expect(() => termFlag([])).toThrow("Pass exactly one of --tech or --skill");
    expect(() => termFlag(["--tech", "go", "--skill", "sql"])).toThrow(
      "Pass exactly one of --tech or --skill",
    );
  });
});
