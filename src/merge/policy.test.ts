import { describe, it, expect } from "vitest";
import { validateMergePolicy } from "./policy.js";
import { PolicyError } from "../catalog/errors.js";

function policyIssues(input: unknown): string[] {
  try {
    validateMergePolicy(input);
  } catch (err) {
    if (err instanceof PolicyError) return err.issues;
    throw err;
  }
  throw new Error("expected the policy to be rejected");
}

describe("validateMergePolicy", () => {
  it("should fill in defaults", () => {
    expect(validateMergePolicy({ locale: "de" })).toEqual({
      locale: "de",
      onObsolete: "delete",
      fuzzyMatching: true,
      fuzzyThreshold: 0.8,
      storePreviousMessageOnFuzzyMatch: false,
      pluralFormsHeader: "derive-from-locale",
    });
  });

  it("should accept the threshold bounds", () => {
    expect(validateMergePolicy({ locale: "de", fuzzyThreshold: 0 }).fuzzyThreshold).toBe(0);
    expect(validateMergePolicy({ locale: "de", fuzzyThreshold: 1 }).fuzzyThreshold).toBe(1);
  });

  it("should reject a threshold out of range instead of clamping it", () => {
    expect(policyIssues({ locale: "de", fuzzyThreshold: 1.5 })).toEqual([
      "fuzzyThreshold: fuzzyThreshold must be between 0 and 1",
    ]);
    expect(policyIssues({ locale: "de", fuzzyThreshold: -0.1 })).toEqual([
      "fuzzyThreshold: fuzzyThreshold must be between 0 and 1",
    ]);
  });

  it("should reject a threshold that is not a number", () => {
    const issues = policyIssues({ locale: "de", fuzzyThreshold: Number("abc") });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^fuzzyThreshold: /);
  });

  it("should reject an unknown obsolete policy", () => {
    const issues = policyIssues({ locale: "de", onObsolete: "keep" });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^onObsolete: /);
  });

  it("should reject a Plural-Forms override without nplurals", () => {
    expect(policyIssues({ locale: "de", pluralFormsHeader: "plural=0;" })).toEqual([
      "pluralFormsHeader: pluralFormsHeader must be 'derive-from-locale' or contain nplurals=N",
    ]);
  });

  it("should report every problem at once", () => {
    const issues = policyIssues({ fuzzyThreshold: 2, onObsolete: "keep" });

    expect(issues).toHaveLength(3);
  });

  it("should throw a PolicyError with a readable message", () => {
    expect(() => validateMergePolicy({ locale: "de", fuzzyThreshold: 3 })).toThrow(
      "invalid merge policy: fuzzyThreshold: fuzzyThreshold must be between 0 and 1"
    );
  });
});
