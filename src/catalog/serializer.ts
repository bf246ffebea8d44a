/**
 * PO catalog serializer
 *
 * Writes a Catalog back to canonical PO text. Parsing the output yields the
 * same catalog again, apart from `line` fields and how references are wrapped.
 */

import { formatReference } from "./comments.js";
import {
  pluralIndices,
  type Catalog,
  type Entry,
  type PreviousMessage,
  type Reference,
} from "./types.js";

/** Maximum width of a `#:` line, unless a single reference is longer */
export const REFERENCE_LINE_WIDTH = 80;

/**
 * Escape a string for use inside a quoted PO literal
 */
export function escapePoString(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\t/g, "\\t");
}

/**
 * Serialize a catalog to PO text
 */
export function serialize(catalog: Catalog): string {
  const blocks: string[] = [];
  const headerKeys = Object.keys(catalog.headers);

  if (headerKeys.length > 0 || catalog.topComments.length > 0) {
    const lines = [...catalog.topComments, 'msgid ""', 'msgstr ""'];
    for (const key of headerKeys) {
      lines.push(quote(`${key}: ${catalog.headers[key]}\n`));
    }
    blocks.push(lines.join("\n"));
  }

  for (const entry of catalog.entries) {
    blocks.push(serializeEntry(entry).join("\n"));
  }

  return blocks.length === 0 ? "" : blocks.join("\n\n") + "\n";
}

function serializeEntry(entry: Entry): string[] {
  const lines: string[] = [];

  for (const comment of entry.comments) {
    lines.push(formatTranslatorComment(comment));
  }
  for (const comment of entry.extractedComments) {
    lines.push(comment === "" ? "#." : `#. ${comment}`);
  }
  lines.push(...wrapReferences(entry.references));
  if (entry.flags.length > 0) {
    lines.push(`#, ${[...entry.flags].sort().join(", ")}`);
  }
  if (entry.previous !== null) {
    lines.push(...serializePrevious(entry.previous, entry.obsolete ? "#~|" : "#|"));
  }

  const body: string[] = [];
  if (entry.msgctxt !== null) {
    body.push(...keywordBlock("msgctxt", entry.msgctxt));
  }
  body.push(...keywordBlock("msgid", entry.msgid));

  if (entry.kind === "singular") {
    body.push(...keywordBlock("msgstr", entry.msgstr));
  } else {
    body.push(...keywordBlock("msgid_plural", entry.msgidPlural));
    for (const index of pluralIndices(entry.msgstr)) {
      body.push(...keywordBlock(`msgstr[${index}]`, entry.msgstr[index]));
    }
  }

  if (entry.obsolete) {
    lines.push(...body.map((line) => `#~ ${line}`));
  } else {
    lines.push(...body);
  }

  return lines;
}

/**
 * `keyword "first"` followed by one `"fragment"` line per remaining fragment
 */
function keywordBlock(keyword: string, fragments: readonly string[]): string[] {
  if (fragments.length === 0) {
    return [`${keyword} ""`];
  }
  const [first, ...rest] = fragments;
  return [`${keyword} ${quote(first)}`, ...rest.map(quote)];
}

function serializePrevious(previous: PreviousMessage, sigil: string): string[] {
  const lines: string[] = [];
  if (previous.msgctxt !== null) {
    lines.push(...keywordBlock("msgctxt", previous.msgctxt));
  }
  lines.push(...keywordBlock("msgid", previous.msgid));
  if (previous.msgidPlural !== null) {
    lines.push(...keywordBlock("msgid_plural", previous.msgidPlural));
  }
  return lines.map((line) => `${sigil} ${line}`);
}

function formatTranslatorComment(text: string): string {
  if (text === "") return "#";
  // `##` tool comments keep their doubled sigil
  if (text.startsWith("#")) return `#${text}`;
  return `# ${text}`;
}

/**
 * Greedily pack references onto as few `#:` lines as possible without
 * exceeding REFERENCE_LINE_WIDTH columns, keeping their order.
 * A reference without a line number ends its line, since a following
 * reference would read back as part of its path.
 */
export function wrapReferences(references: readonly Reference[]): string[] {
  const lines: string[] = [];
  let current = "";

  for (const reference of references) {
    const formatted = formatReference(reference);
    if (current === "") {
      current = `#: ${formatted}`;
    } else if (current.length + 1 + formatted.length <= REFERENCE_LINE_WIDTH) {
      current += ` ${formatted}`;
    } else {
      lines.push(current);
      current = `#: ${formatted}`;
    }

    if (reference.line === null) {
      lines.push(current);
      current = "";
    }
  }

  if (current !== "") {
    lines.push(current);
  }
  return lines;
}

function quote(value: string): string {
  return `"${escapePoString(value)}"`;
}
