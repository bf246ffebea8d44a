import { describe, it, expect } from "vitest";
import { scan } from "./scanner.js";
import { CatalogLexError } from "./errors.js";

function scanOk(text: string) {
  const result = scan(text);
  if (!result.success) {
    throw new Error(`expected scan to succeed: ${result.error.message}`);
  }
  return result.tokens;
}

function scanError(text: string): CatalogLexError {
  const result = scan(text);
  if (result.success) {
    throw new Error("expected scan to fail");
  }
  return result.error;
}

describe("Scanner", () => {
  describe("tokens", () => {
    it("should scan keywords and strings with their lines", () => {
      const tokens = scanOk('msgid "hello"\nmsgstr "ciao"\n');

      expect(tokens).toEqual([
        { kind: "keyword", keyword: "msgid", line: 1, obsolete: false },
        { kind: "string", value: "hello", line: 1, obsolete: false },
        { kind: "keyword", keyword: "msgstr", line: 2, obsolete: false },
        { kind: "string", value: "ciao", line: 2, obsolete: false },
      ]);
    });

    it("should scan plural msgstr markers", () => {
      const tokens = scanOk('msgstr[0] "bar"\nmsgstr[12] "baz"');

      expect(tokens[0]).toEqual({ kind: "plural_msgstr", index: 0, line: 1, obsolete: false });
      expect(tokens[2]).toEqual({ kind: "plural_msgstr", index: 12, line: 2, obsolete: false });
    });

    it("should keep comments raw with their sigil", () => {
      const tokens = scanOk("# translator\n#. extracted  \n#: lib/a.ts:1\n#, fuzzy\n");

      expect(tokens).toEqual([
        { kind: "comment", text: "# translator", line: 1 },
        { kind: "comment", text: "#. extracted", line: 2 },
        { kind: "comment", text: "#: lib/a.ts:1", line: 3 },
        { kind: "comment", text: "#, fuzzy", line: 4 },
      ]);
    });

    it("should mark tokens on #~ lines as obsolete", () => {
      const tokens = scanOk('#~ msgid "old"\nmsgstr "new"');

      expect(tokens).toEqual([
        { kind: "keyword", keyword: "msgid", line: 1, obsolete: true },
        { kind: "string", value: "old", line: 1, obsolete: true },
        { kind: "keyword", keyword: "msgstr", line: 2, obsolete: false },
        { kind: "string", value: "new", line: 2, obsolete: false },
      ]);
    });

    it("should decode supported escape codes", () => {
      const tokens = scanOk('msgid "a\\nb\\tc\\"d\\\\e"');

      expect(tokens[1]).toEqual({
        kind: "string",
        value: 'a\nb\tc"d\\e',
        line: 1,
        obsolete: false,
      });
    });

    it("should ignore blank lines, indentation and CRLF", () => {
      const tokens = scanOk('\n\n   msgid\t"x"\r\n');

      expect(tokens).toEqual([
        { kind: "keyword", keyword: "msgid", line: 3, obsolete: false },
        { kind: "string", value: "x", line: 3, obsolete: false },
      ]);
    });

    it("should return no tokens for empty input", () => {
      expect(scanOk("")).toEqual([]);
    });
  });

  describe("errors", () => {
    it("should reject a keyword fused to its string", () => {
      const error = scanError('msgid"foo"');

      expect(error.line).toBe(1);
      expect(error.reason).toBe("no space after 'msgid'");
    });

    it("should reject a fused plural msgstr", () => {
      expect(scanError('msgstr[1]"x"').reason).toBe("no space after 'msgstr[1]'");
    });

    it("should reject an unsupported escape code at its line", () => {
      const error = scanError('msgid "ok"\nmsgstr "bad \\r"');

      expect(error.line).toBe(2);
      expect(error.reason).toBe("unsupported escape code '\\r'");
      expect(error.message).toBe("2: unsupported escape code '\\r'");
    });

    it("should reject a string broken across lines", () => {
      const error = scanError('msgid "foo\nbar"');

      expect(error.line).toBe(1);
      expect(error.reason).toBe("newline in string");
    });

    it("should report a missing terminator at the opening line", () => {
      const error = scanError('msgid "a"\nmsgstr "unterminated');

      expect(error.line).toBe(2);
      expect(error.reason).toBe("missing terminator '\"'");
    });

    it("should reject unknown keywords", () => {
      expect(scanError('msgfoo "x"').reason).toBe("unknown keyword 'msgfoo'");
    });

    it("should reject an invalid plural index", () => {
      expect(scanError('msgstr[x] "y"').reason).toBe("invalid plural form index");
    });

    it("should reject stray characters", () => {
      const error = scanError('msgid "a"\n  = "b"');

      expect(error.line).toBe(2);
      expect(error.reason).toBe("unexpected character '='");
    });
  });
});
