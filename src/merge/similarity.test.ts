import { describe, it, expect } from "vitest";
import { jaroSimilarity } from "./similarity.js";

describe("jaroSimilarity", () => {
  it("should score identical strings 1", () => {
    expect(jaroSimilarity("abc", "abc")).toBe(1);
    expect(jaroSimilarity("", "")).toBe(1);
  });

  it("should score an empty string against text 0", () => {
    expect(jaroSimilarity("abc", "")).toBe(0);
    expect(jaroSimilarity("", "abc")).toBe(0);
  });

  it("should score strings with nothing in common 0", () => {
    expect(jaroSimilarity("foo", "bar")).toBe(0);
  });

  it("should score a one-character extension", () => {
    expect(jaroSimilarity("Hello World", "Hello Worlds")).toBeCloseTo(0.9722, 4);
  });

  it("should count transpositions", () => {
    expect(jaroSimilarity("MARTHA", "MARHTA")).toBeCloseTo(0.9444, 4);
    expect(jaroSimilarity("DIXON", "DICKSONX")).toBeCloseTo(0.7667, 4);
  });

  it("should be symmetric", () => {
    expect(jaroSimilarity("Open file", "Open files now")).toBe(
      jaroSimilarity("Open files now", "Open file")
    );
  });

  it("should be case-sensitive", () => {
    expect(jaroSimilarity("abc", "ABC")).toBe(0);
  });
});
