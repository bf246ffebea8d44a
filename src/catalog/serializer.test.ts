import { describe, it, expect } from "vitest";
import { serialize, escapePoString, wrapReferences } from "./serializer.js";
import { parseCatalog } from "./parser.js";
import type { Catalog, Entry, Reference, SingularEntry } from "./types.js";

const CANONICAL = [
  "# German translations",
  'msgid ""',
  'msgstr ""',
  '"Language: de\\n"',
  '"Plural-Forms: nplurals=2; plural=(n != 1);\\n"',
  "",
  "# Translator note",
  "#. Shown on the home page",
  "#: lib/home.ts:12 lib/home.ts:40",
  "#, c-format, fuzzy",
  '#| msgid "Welcome, %{name}"',
  'msgctxt "home"',
  'msgid "Welcome back, %{name}"',
  'msgstr "Willkommen zurück, %{name}"',
  "",
  'msgid "One file"',
  'msgid_plural "%{count} files"',
  'msgstr[0] "Eine Datei"',
  'msgstr[1] "%{count} Dateien"',
  "",
  'msgid ""',
  '"Line one\\n"',
  '"Line two"',
  'msgstr ""',
  '"Zeile eins\\n"',
  '"Zeile zwei"',
  "",
  '#~ msgid "Removed"',
  '#~ msgstr "Entfernt"',
  "",
].join("\n");

function parseOk(text: string): Catalog {
  const result = parseCatalog(text);
  if (!result.success) throw result.error;
  return result.catalog;
}

/** Entries without their source lines */
function withoutLines(catalog: Catalog): Array<Omit<Entry, "line">> {
  return catalog.entries.map(({ line: _line, ...rest }) => rest);
}

function singular(
  msgid: string,
  msgstr: string,
  extra: Partial<Omit<SingularEntry, "kind">> = {}
): SingularEntry {
  return {
    kind: "singular",
    msgctxt: null,
    msgid: [msgid],
    msgstr: [msgstr],
    comments: [],
    extractedComments: [],
    references: [],
    flags: [],
    obsolete: false,
    previous: null,
    line: 0,
    ...extra,
  };
}

describe("Serializer", () => {
  it("should reproduce canonical text exactly", () => {
    expect(serialize(parseOk(CANONICAL))).toBe(CANONICAL);
  });

  it("should round-trip through the parser", () => {
    const catalog = parseOk(CANONICAL);
    const reparsed = parseOk(serialize(catalog));

    expect(reparsed.headers).toEqual(catalog.headers);
    expect(reparsed.topComments).toEqual(catalog.topComments);
    expect(withoutLines(reparsed)).toEqual(withoutLines(catalog));
  });

  it("should serialize an empty catalog as empty text", () => {
    expect(serialize({ topComments: [], headers: {}, entries: [] })).toBe("");
  });

  it("should omit the header entry when there are no headers", () => {
    const text = serialize({ topComments: [], headers: {}, entries: [singular("hello", "ciao")] });

    expect(text).toBe('msgid "hello"\nmsgstr "ciao"\n');
  });

  it("should write flags sorted and translator comments with their sigil", () => {
    const entry = singular("a", "b", {
      comments: ["", "# tool note", "plain"],
      flags: ["no-wrap", "fuzzy"],
    });

    expect(serialize({ topComments: [], headers: {}, entries: [entry] })).toBe(
      '#\n## tool note\n# plain\n#, fuzzy, no-wrap\nmsgid "a"\nmsgstr "b"\n'
    );
  });

  it("should prefix obsolete plural entries with #~", () => {
    const entry: Entry = {
      kind: "plural",
      msgctxt: null,
      msgid: ["day"],
      msgidPlural: ["days"],
      msgstr: { 0: ["Tag"], 1: ["Tage"] },
      comments: [],
      extractedComments: [],
      references: [],
      flags: [],
      obsolete: true,
      previous: null,
      line: 0,
    };

    expect(serialize({ topComments: [], headers: {}, entries: [entry] })).toBe(
      '#~ msgid "day"\n#~ msgid_plural "days"\n#~ msgstr[0] "Tag"\n#~ msgstr[1] "Tage"\n'
    );
  });

  it("should write the previous message of an obsolete entry with #~|", () => {
    const text = '#~| msgid "went"\n#~ msgid "gone"\n#~ msgstr "weg"\n';

    expect(serialize(parseOk(text))).toBe(text);
  });

  describe("escapePoString", () => {
    it("should escape quotes, backslashes, newlines and tabs", () => {
      expect(escapePoString('a"b\\c\nd\te')).toBe('a\\"b\\\\c\\nd\\te');
    });
  });

  describe("wrapReferences", () => {
    it("should pack references greedily within 80 columns", () => {
      const references: Reference[] = [10, 11, 12, 13, 14, 15].map((line) => ({
        path: "src/ui/menu.ts",
        line,
      }));

      expect(wrapReferences(references)).toEqual([
        "#: src/ui/menu.ts:10 src/ui/menu.ts:11 src/ui/menu.ts:12 src/ui/menu.ts:13",
        "#: src/ui/menu.ts:14 src/ui/menu.ts:15",
      ]);
    });

    it("should give an overlong reference its own line", () => {
      const long = "a/".repeat(45) + "file.ts";

      expect(
        wrapReferences([
          { path: "x.ts", line: 1 },
          { path: long, line: 2 },
        ])
      ).toEqual(["#: x.ts:1", `#: ${long}:2`]);
    });

    it("should end a line after a reference without a line number", () => {
      expect(
        wrapReferences([
          { path: "lib/a.ts", line: 1 },
          { path: "README", line: null },
          { path: "lib/b.ts", line: 3 },
          { path: "NOTES", line: null },
        ])
      ).toEqual(["#: lib/a.ts:1 README", "#: lib/b.ts:3 NOTES"]);
    });

    it("should keep references without line numbers apart through a round trip", () => {
      const first = parseOk('#: README\n#: lib/a.ts:3\nmsgid "a"\nmsgstr ""\n');
      const second = parseOk(serialize(first));

      expect(first.entries[0].references).toEqual([
        { path: "README", line: null },
        { path: "lib/a.ts", line: 3 },
      ]);
      expect(second.entries[0].references).toEqual(first.entries[0].references);
    });

    it("should return no lines for no references", () => {
      expect(wrapReferences([])).toEqual([]);
    });
  });
});
