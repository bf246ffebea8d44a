/**
 * PO catalog parser
 *
 * Turns the scanner's tokens into a Catalog:
 *
 *   entry  := comment* (msgctxt string+)? msgid string+ plural? msgstr-block
 *   plural := msgid_plural string+            (forces the indexed msgstr form)
 *   msgstr-block := msgstr string+ | (msgstr[n] string+)+
 *
 * A leading entry with an empty msgid and no msgctxt is the header. Any error
 * aborts the whole parse; no partial catalog is ever returned.
 */

import { classifyComment } from "./comments.js";
import {
  CatalogLexError,
  CatalogSyntaxError,
  DuplicateKeyError,
  type CatalogError,
} from "./errors.js";
import { scan } from "./scanner.js";
import {
  entryKey,
  joinFragments,
  normalizeFlags,
  type Catalog,
  type Entry,
  type Keyword,
  type PreviousMessage,
  type Reference,
  type Token,
} from "./types.js";

export type ParseError = CatalogLexError | CatalogSyntaxError | DuplicateKeyError;

export type ParseResult =
  | { success: true; catalog: Catalog }
  | { success: false; error: ParseError };

/** Keywords, strings and indices of one message, before comments are attached */
interface RawMessage {
  msgctxt: string[] | null;
  msgid: string[];
  msgidPlural: string[] | null;
  singularMsgstr: string[];
  pluralMsgstr: Record<number, string[]>;
  line: number;
  obsolete: boolean;
}

type CommentToken = Extract<Token, { kind: "comment" }>;

/**
 * Cursor over a token list. Failing on an unexpected token reports
 * `syntax error before: <token>` at that token's line; failing at the end of
 * the list reports the last consumed line.
 */
class TokenCursor {
  private pos = 0;
  private lastLine = 1;

  constructor(private readonly tokens: readonly Token[]) {
    if (tokens.length > 0) {
      this.lastLine = tokens[0].line;
    }
  }

  get done(): boolean {
    return this.pos >= this.tokens.length;
  }

  peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  next(): Token {
    const token = this.tokens[this.pos];
    if (token === undefined) {
      return this.fail();
    }
    this.pos++;
    this.lastLine = token.line;
    return token;
  }

  peekKeyword(keyword: Keyword): boolean {
    const token = this.peek();
    return token?.kind === "keyword" && token.keyword === keyword;
  }

  expectKeyword(keyword: Keyword): Token {
    if (!this.peekKeyword(keyword)) {
      return this.fail();
    }
    return this.next();
  }

  /** One or more consecutive string tokens */
  readStrings(): string[] {
    const strings: string[] = [];
    let token = this.peek();
    while (token?.kind === "string") {
      strings.push(token.value);
      this.next();
      token = this.peek();
    }
    if (strings.length === 0) {
      return this.fail();
    }
    return strings;
  }

  readComments(): CommentToken[] {
    const comments: CommentToken[] = [];
    let token = this.peek();
    while (token?.kind === "comment") {
      comments.push(token);
      this.next();
      token = this.peek();
    }
    return comments;
  }

  fail(): never {
    const token = this.peek();
    if (token === undefined) {
      throw new CatalogSyntaxError(this.lastLine, "syntax error before: end of input");
    }
    throw new CatalogSyntaxError(token.line, `syntax error before: ${describeToken(token)}`);
  }
}

/**
 * Parse scanned tokens into a catalog
 */
export function parse(tokens: readonly Token[]): ParseResult {
  try {
    return { success: true, catalog: parseTokens(tokens) };
  } catch (error) {
    if (
      error instanceof CatalogSyntaxError ||
      error instanceof CatalogLexError ||
      error instanceof DuplicateKeyError
    ) {
      return { success: false, error };
    }
    throw error;
  }
}

/**
 * Scan and parse catalog text
 */
export function parseCatalog(text: string): ParseResult {
  const scanned = scan(text);
  if (!scanned.success) {
    return scanned;
  }
  return parse(scanned.tokens);
}

/**
 * Scan and parse catalog text, throwing on error
 *
 * @param file Path added to the error message when given
 * @throws CatalogError
 */
export function parseCatalogOrThrow(text: string, file?: string): Catalog {
  const result = parseCatalog(text);
  if (!result.success) {
    const error: CatalogError = result.error;
    throw file === undefined ? error : error.withFile(file);
  }
  return result.catalog;
}

function parseTokens(tokens: readonly Token[]): Catalog {
  const cursor = new TokenCursor(tokens);
  const catalog: Catalog = { topComments: [], headers: {}, entries: [] };
  const declared = new Map<string, Entry>();
  let first = true;

  while (!cursor.done) {
    const comments = cursor.readComments();

    if (cursor.done) {
      // A catalog made only of comments keeps them as top-of-file comments
      if (first) {
        catalog.topComments = comments.map((c) => c.text);
        break;
      }
      cursor.fail();
    }

    const message = readMessage(cursor);

    if (first && isHeader(message)) {
      catalog.topComments = comments.map((c) => c.text);
      catalog.headers = parseHeaders(joinFragments(message.singularMsgstr));
      first = false;
      continue;
    }
    first = false;

    const entry = buildEntry(message, comments);

    if (!entry.obsolete) {
      const key = entryKey(entry);
      const original = declared.get(key);
      if (original !== undefined) {
        throw new DuplicateKeyError(
          entry.line,
          original.line,
          joinFragments(entry.msgid),
          entry.kind === "plural" ? joinFragments(entry.msgidPlural) : null
        );
      }
      declared.set(key, entry);
    }

    catalog.entries.push(entry);
  }

  return catalog;
}

function readMessage(cursor: TokenCursor): RawMessage {
  let msgctxt: string[] | null = null;
  if (cursor.peekKeyword("msgctxt")) {
    cursor.next();
    msgctxt = cursor.readStrings();
  }

  const msgidToken = cursor.expectKeyword("msgid");
  const msgid = cursor.readStrings();
  const obsolete = msgidToken.kind === "keyword" && msgidToken.obsolete;

  if (!cursor.peekKeyword("msgid_plural")) {
    cursor.expectKeyword("msgstr");
    return {
      msgctxt,
      msgid,
      msgidPlural: null,
      singularMsgstr: cursor.readStrings(),
      pluralMsgstr: {},
      line: msgidToken.line,
      obsolete,
    };
  }

  cursor.next();
  const msgidPlural = cursor.readStrings();
  const pluralMsgstr: Record<number, string[]> = {};

  do {
    const token = cursor.peek();
    if (token?.kind !== "plural_msgstr") {
      return cursor.fail();
    }
    if (token.index in pluralMsgstr) {
      throw new CatalogSyntaxError(token.line, `duplicate plural form msgstr[${token.index}]`);
    }
    cursor.next();
    pluralMsgstr[token.index] = cursor.readStrings();
  } while (cursor.peek()?.kind === "plural_msgstr");

  return {
    msgctxt,
    msgid,
    msgidPlural,
    singularMsgstr: [],
    pluralMsgstr,
    line: msgidToken.line,
    obsolete,
  };
}

function isHeader(message: RawMessage): boolean {
  return (
    !message.obsolete &&
    message.msgidPlural === null &&
    message.msgctxt === null &&
    joinFragments(message.msgid) === ""
  );
}

function buildEntry(message: RawMessage, commentTokens: CommentToken[]): Entry {
  const comments: string[] = [];
  const extractedComments: string[] = [];
  const references: Reference[] = [];
  const flags: string[] = [];
  const previousLines: Array<{ text: string; line: number }> = [];

  for (const token of commentTokens) {
    const comment = classifyComment(token.text, token.line);
    switch (comment.kind) {
      case "translator":
        comments.push(comment.text);
        break;
      case "extracted":
        extractedComments.push(comment.text);
        break;
      case "reference":
        references.push(...comment.references);
        break;
      case "flag":
        flags.push(...comment.flags);
        break;
      case "previous":
        previousLines.push({ text: comment.text, line: comment.line });
        break;
    }
  }

  const base = {
    msgctxt: message.msgctxt,
    msgid: message.msgid,
    comments,
    extractedComments,
    references,
    flags: normalizeFlags(flags),
    obsolete: message.obsolete,
    previous: previousLines.length > 0 ? parsePrevious(previousLines) : null,
    line: message.line,
  };

  if (message.msgidPlural === null) {
    return { ...base, kind: "singular", msgstr: message.singularMsgstr };
  }
  return {
    ...base,
    kind: "plural",
    msgidPlural: message.msgidPlural,
    msgstr: message.pluralMsgstr,
  };
}

/**
 * Parse the `#|` lines of one comment block as `msgctxt? msgid msgid_plural?`
 */
function parsePrevious(lines: Array<{ text: string; line: number }>): PreviousMessage {
  const scanned = scan(lines.map((l) => l.text).join("\n"), lines[0].line);
  if (!scanned.success) {
    throw scanned.error;
  }

  const cursor = new TokenCursor(scanned.tokens);
  let msgctxt: string[] | null = null;
  if (cursor.peekKeyword("msgctxt")) {
    cursor.next();
    msgctxt = cursor.readStrings();
  }

  cursor.expectKeyword("msgid");
  const msgid = cursor.readStrings();

  let msgidPlural: string[] | null = null;
  if (cursor.peekKeyword("msgid_plural")) {
    cursor.next();
    msgidPlural = cursor.readStrings();
  }

  if (!cursor.done) {
    cursor.fail();
  }

  return { msgctxt, msgid, msgidPlural };
}

/**
 * Fold the header msgstr (`Key: value\n` lines) into a record
 */
export function parseHeaders(text: string): Record<string, string> {
  const headers: Record<string, string> = {};

  for (const line of text.split("\n")) {
    if (line.trim() === "") continue;

    const colon = line.indexOf(":");
    if (colon === -1) {
      headers[line.trim()] = "";
    } else {
      headers[line.slice(0, colon).trim()] = line.slice(colon + 1).trim();
    }
  }

  return headers;
}

function describeToken(token: Token): string {
  switch (token.kind) {
    case "keyword":
      return token.keyword;
    case "plural_msgstr":
      return `msgstr[${token.index}]`;
    case "string":
      return JSON.stringify(token.value);
    case "comment":
      return token.text;
  }
}
