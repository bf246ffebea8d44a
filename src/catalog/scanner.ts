/**
 * PO catalog scanner
 *
 * Turns catalog text into tokens in a single forward pass:
 * - Keywords: msgid, msgid_plural, msgctxt, msgstr and msgstr[n]
 * - Quoted strings with \n, \t, \\ and \" escapes
 * - Comment lines, kept raw so the parser can classify them by sigil
 * - `#~ ` prefixes, which mark the rest of the line as part of an obsolete entry
 */

import { CatalogLexError } from "./errors.js";
import type { Keyword, Token } from "./types.js";

export type ScanResult =
  | { success: true; tokens: Token[] }
  | { success: false; error: CatalogLexError };

/**
 * Scan catalog text into tokens
 *
 * @param text Raw catalog content
 * @param firstLine Line number of the first line of `text`
 */
export function scan(text: string, firstLine = 1): ScanResult {
  try {
    return { success: true, tokens: tokenize(text, firstLine) };
  } catch (error) {
    if (error instanceof CatalogLexError) {
      return { success: false, error };
    }
    throw error;
  }
}

function tokenize(text: string, firstLine: number): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let line = firstLine;
  // Set by a `#~` prefix, cleared at the end of its line
  let obsolete = false;

  while (pos < text.length) {
    const char = text[pos];

    if (char === "\n") {
      line++;
      obsolete = false;
      pos++;
      continue;
    }

    if (char === " " || char === "\t" || char === "\r") {
      pos++;
      continue;
    }

    if (char === "#") {
      if (text[pos + 1] === "~" && isWhitespaceOrEnd(text, pos + 2)) {
        obsolete = true;
        pos += 2;
        continue;
      }

      const end = findLineEnd(text, pos);
      tokens.push({ kind: "comment", text: text.slice(pos, end).trimEnd(), line });
      pos = end;
      continue;
    }

    if (char === '"') {
      const { value, end } = readString(text, pos + 1, line);
      tokens.push({ kind: "string", value, line, obsolete });
      pos = end;
      continue;
    }

    if (isWordChar(char)) {
      let end = pos;
      while (end < text.length && isWordChar(text[end])) {
        end++;
      }
      const word = text.slice(pos, end);

      if (!isKeyword(word)) {
        throw new CatalogLexError(line, `unknown keyword '${word}'`);
      }

      if (word === "msgstr" && text[end] === "[") {
        const close = text.indexOf("]", end);
        const digits = close === -1 ? "" : text.slice(end + 1, close);
        if (!/^\d+$/.test(digits)) {
          throw new CatalogLexError(line, "invalid plural form index");
        }
        if (!isWhitespace(text[close + 1])) {
          throw new CatalogLexError(line, `no space after 'msgstr[${digits}]'`);
        }
        tokens.push({
          kind: "plural_msgstr",
          index: Number(digits),
          line,
          obsolete,
        });
        pos = close + 1;
        continue;
      }

      if (!isWhitespace(text[end])) {
        throw new CatalogLexError(line, `no space after '${word}'`);
      }

      tokens.push({ kind: "keyword", keyword: word, line, obsolete });
      pos = end;
      continue;
    }

    throw new CatalogLexError(line, `unexpected character '${char}'`);
  }

  return tokens;
}

/**
 * Read a quoted string whose opening quote sits just before `start`
 *
 * @returns Decoded value and the position after the closing quote
 */
function readString(
  text: string,
  start: number,
  line: number
): { value: string; end: number } {
  let pos = start;
  let value = "";

  while (pos < text.length) {
    const char = text[pos];

    if (char === '"') {
      return { value, end: pos + 1 };
    }

    if (char === "\n") {
      throw new CatalogLexError(line, "newline in string");
    }

    if (char === "\\") {
      const escaped = text[pos + 1];
      if (escaped === undefined) break;

      switch (escaped) {
        case "n":
          value += "\n";
          break;
        case "t":
          value += "\t";
          break;
        case '"':
        case "\\":
          value += escaped;
          break;
        case "\n":
          throw new CatalogLexError(line, "newline in string");
        default:
          throw new CatalogLexError(line, `unsupported escape code '\\${escaped}'`);
      }
      pos += 2;
      continue;
    }

    value += char;
    pos++;
  }

  throw new CatalogLexError(line, `missing terminator '"'`);
}

function isKeyword(word: string): word is Keyword {
  return (
    word === "msgid" ||
    word === "msgid_plural" ||
    word === "msgctxt" ||
    word === "msgstr"
  );
}

function findLineEnd(text: string, pos: number): number {
  const end = text.indexOf("\n", pos);
  return end === -1 ? text.length : end;
}

function isWordChar(char: string): boolean {
  return /[A-Za-z_]/.test(char);
}

function isWhitespace(char: string | undefined): boolean {
  return char === " " || char === "\t" || char === "\r" || char === "\n";
}

function isWhitespaceOrEnd(text: string, pos: number): boolean {
  return pos >= text.length || isWhitespace(text[pos]);
}
