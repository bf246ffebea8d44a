/**
 * Types shared by the scanner, parser, serializer and merge engine.
 *
 * Strings read from a catalog are kept as the list of quoted fragments they were
 * written as ("fragments"), so a serialized catalog keeps its original line breaks.
 * Join them with `joinFragments` when the text itself is needed.
 */

export type Keyword = "msgid" | "msgid_plural" | "msgctxt" | "msgstr";

export type Token =
  | {
      readonly kind: "keyword";
      readonly keyword: Keyword;
      readonly line: number;
      readonly obsolete: boolean;
    }
  | {
      /** `msgstr[n]` */
      readonly kind: "plural_msgstr";
      readonly index: number;
      readonly line: number;
      readonly obsolete: boolean;
    }
  | {
      readonly kind: "string";
      readonly value: string;
      readonly line: number;
      readonly obsolete: boolean;
    }
  | {
      /** Raw comment text, sigil included (e.g. `#: lib/app.ts:12`) */
      readonly kind: "comment";
      readonly text: string;
      readonly line: number;
    };

/**
 * A source location listed on a `#:` line.
 * `line` is null for references written without a line number.
 */
export interface Reference {
  path: string;
  line: number | null;
}

/** Snapshot of the message an entry had before a fuzzy match replaced it (`#|` lines) */
export interface PreviousMessage {
  msgctxt: string[] | null;
  msgid: string[];
  msgidPlural: string[] | null;
}

interface EntryBase {
  msgctxt: string[] | null;
  msgid: string[];
  /** Translator comments, without the leading `#` and its following space */
  comments: string[];
  /** `#.` comments, without the sigil */
  extractedComments: string[];
  references: Reference[];
  /** Deduplicated and sorted */
  flags: string[];
  obsolete: boolean;
  previous: PreviousMessage | null;
  /** Line of the msgid keyword; 0 for entries built in memory */
  line: number;
}

export interface SingularEntry extends EntryBase {
  kind: "singular";
  msgstr: string[];
}

export interface PluralEntry extends EntryBase {
  kind: "plural";
  msgidPlural: string[];
  /** Plural form index -> fragments. Indices may be sparse. */
  msgstr: Record<number, string[]>;
}

export type Entry = SingularEntry | PluralEntry;

export interface Catalog {
  /** Raw comment lines (sigil included) written above the header entry */
  topComments: string[];
  headers: Record<string, string>;
  entries: Entry[];
}

export function joinFragments(fragments: readonly string[]): string {
  return fragments.join("");
}

/**
 * Key used for uniqueness and matching: msgctxt (or its absence) plus msgid.
 * msgid_plural is deliberately not part of it.
 */
export function entryKey(entry: Pick<Entry, "msgctxt" | "msgid">): string {
  return JSON.stringify([
    entry.msgctxt === null ? null : joinFragments(entry.msgctxt),
    joinFragments(entry.msgid),
  ]);
}

/** Sorted plural form indices of a plural msgstr block */
export function pluralIndices(msgstr: Record<number, string[]>): number[] {
  return Object.keys(msgstr)
    .map(Number)
    .sort((a, b) => a - b);
}

export function emptyCatalog(): Catalog {
  return { topComments: [], headers: {}, entries: [] };
}

export function hasFlag(entry: Entry, flag: string): boolean {
  return entry.flags.includes(flag);
}

/**
 * Normalize a list of flags: deduplicated and sorted
 */
export function normalizeFlags(flags: Iterable<string>): string[] {
  return [...new Set(flags)].sort();
}
