/**
 * Comment classification for PO entries
 *
 * The scanner keeps comment lines raw; the parser classifies each one once by
 * its sigil and later stages switch on the resulting `kind`:
 * - `#`  translator comment
 * - `#.` extracted comment
 * - `#:` source references
 * - `#,` flags
 * - `#|` previous message, written `#~|` on obsolete entries
 */

import type { Reference } from "./types.js";

export type ClassifiedComment =
  | { kind: "translator"; text: string }
  | { kind: "extracted"; text: string }
  | { kind: "reference"; references: Reference[] }
  | { kind: "flag"; flags: string[] }
  | { kind: "previous"; text: string; line: number };

export function classifyComment(raw: string, line: number): ClassifiedComment {
  switch (raw.slice(0, 2)) {
    case "#:":
      return { kind: "reference", references: parseReferences(raw.slice(2)) };
    case "#.":
      return { kind: "extracted", text: stripOneSpace(raw.slice(2)) };
    case "#,":
      return { kind: "flag", flags: parseFlags(raw.slice(2)) };
    case "#|":
      return { kind: "previous", text: raw.slice(2), line };
    case "#~":
      if (raw[2] === "|") {
        return { kind: "previous", text: raw.slice(3), line };
      }
      return { kind: "translator", text: stripOneSpace(raw.slice(1)) };
    default:
      return { kind: "translator", text: stripOneSpace(raw.slice(1)) };
  }
}

/**
 * Parse the body of a `#:` line
 *
 * A reference ends at the last `:<digits>` group before whitespace or the end of
 * the line, so paths may contain colons and spaces. Trailing words without a
 * line number become references with a null line.
 *
 * @example parseReferences(" lib/a.ts:12 C:\\src\\b.ts:3") // [{lib/a.ts, 12}, {C:\src\b.ts, 3}]
 */
export function parseReferences(text: string): Reference[] {
  const references: Reference[] = [];
  const pattern = /(\S.*?):(\d+)(?=\s|$)/g;
  let rest = 0;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    references.push({ path: match[1], line: Number(match[2]) });
    rest = match.index + match[0].length;
  }

  for (const path of text.slice(rest).split(/\s+/)) {
    if (path !== "") {
      references.push({ path, line: null });
    }
  }

  return references;
}

/**
 * Parse the body of a `#,` line: comma separated, each piece split again on
 * whitespace, blank pieces dropped
 */
export function parseFlags(text: string): string[] {
  return text
    .split(",")
    .flatMap((piece) => piece.trim().split(/\s+/))
    .filter((flag) => flag !== "");
}

export function formatReference(reference: Reference): string {
  return reference.line === null
    ? reference.path
    : `${reference.path}:${reference.line}`;
}

function stripOneSpace(text: string): string {
  return text.startsWith(" ") ? text.slice(1) : text;
}
