import { describe, it, expect } from "vitest";
import { toToolError, toolResponse } from "./tool-output.js";
import { CatalogSyntaxError, PolicyError } from "../catalog/index.js";

describe("Tool output", () => {
  it("should map catalog errors to codes", () => {
    expect(toToolError(new CatalogSyntaxError(3, "syntax error before: msgid", "de.po"))).toEqual({
      success: false,
      error: { code: "SYNTAX_ERROR", message: "de.po:3: syntax error before: msgid" },
    });
    expect(toToolError(new PolicyError(["locale: Required"]))).toEqual({
      success: false,
      error: { code: "INVALID_POLICY", message: "invalid merge policy: locale: Required" },
    });
  });

  it("should rethrow errors it does not know", () => {
    const err = new TypeError("boom");

    expect(() => toToolError(err)).toThrow(err);
  });

  it("should wrap output as JSON text content", () => {
    expect(toolResponse({ success: true })).toEqual({
      content: [{ type: "text", text: '{\n  "success": true\n}' }],
    });
  });
});
