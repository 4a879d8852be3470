import { describe, expect, it } from "vitest";
import {
  classifyRemotePolicy,
  normalizeLabel,
  normalizePainPoints,
  normalizeRemotePolicy,
  normalizeSalaryRange,
  normalizeTerms,
  parseExperienceYears,
  parseSalary,
} from "./normalizer";

describe("remote policy", () => {
  it("reads remote keywords", () => {
    expect(classifyRemotePolicy("fully distributed team")).toBe("remote");
    expect(classifyRemotePolicy("Work from home")).toBe("remote");
  });

  it("treats remote plus an office requirement as hybrid", () => {
    expect(classifyRemotePolicy("Remote, in office two days a week")).toBe("hybrid");
    expect(classifyRemotePolicy("Hybrid")).toBe("hybrid");
  });

  it("reads onsite wording and defaults to unspecified", () => {
    expect(classifyRemotePolicy("On-site in Austin")).toBe("onsite");
    expect(classifyRemotePolicy("Austin, TX")).toBe("unspecified");
    expect(classifyRemotePolicy(null, undefined, "")).toBe("unspecified");
  });

  it("falls back to the location when the model value says nothing", () => {
    expect(normalizeRemotePolicy("Onsite", "Remote - US")).toBe("onsite");
    expect(normalizeRemotePolicy("Unknown", "Remote - US")).toBe("remote");
    expect(normalizeRemotePolicy(null, null)).toBe("unspecified");
  });
});

describe("salaries", () => {
  it("parses shorthand and formatted figures", () => {
    expect(parseSalary("$150k")).toBe(150_000);
    expect(parseSalary("150,000")).toBe(150_000);
    expect(parseSalary("1.2M")).toBe(1_200_000);
    expect(parseSalary(120_000.4)).toBe(120_000);
  });

  it("rejects negative and unreadable values", () => {
    expect(parseSalary(-5)).toBeNull();
    expect(parseSalary("-5000")).toBeNull();
    expect(parseSalary("competitive")).toBeNull();
    expect(parseSalary(null)).toBeNull();
  });

  it("swaps an inverted range", () => {
    expect(normalizeSalaryRange(200_000, "150k")).toEqual({
      salaryMin: 150_000,
      salaryMax: 200_000,
    });
    expect(normalizeSalaryRange(-1, 100_000)).toEqual({
      salaryMin: null,
      salaryMax: 100_000,
    });
  });
});

describe("parseExperienceYears", () => {
  it("takes the first number", () => {
    expect(parseExperienceYears("5+ years")).toBe(5);
    expect(parseExperienceYears(3.6)).toBe(4);
    expect(parseExperienceYears("none")).toBeNull();
  });
});

describe("labels and term lists", () => {
  it("blanks placeholder labels", () => {
    expect(normalizeLabel("  Engineering ")).toBe("Engineering");
    expect(normalizeLabel("Unknown")).toBeNull();
    expect(normalizeLabel("N/A")).toBeNull();
    expect(normalizeLabel(null)).toBeNull();
  });

  it("maps, deduplicates and sorts terms", () => {
    const mappings = { "node.js": "nodejs", node: "nodejs", k8s: "kubernetes", "react.js": "react" };
    expect(
      normalizeTerms(["Node.js", "node", "K8s", " React.js ", "react", ""], mappings),
    ).toEqual(["kubernetes", "nodejs", "react"]);
  });

  it("ignores inherited object keys when mapping", () => {
    expect(normalizeTerms(["constructor"], {})).toEqual(["constructor"]);
  });

  it("keeps the first spelling of duplicate pain points", () => {
    expect(
      normalizePainPoints([" Scale billing ", "scale billing", "Reduce churn", ""]),
    ).toEqual(["Scale billing", "Reduce churn"]);
  });
});
