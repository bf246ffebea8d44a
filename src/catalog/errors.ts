/**
 * Error types raised while reading catalogs, validating merge policies and
 * rendering messages.
 */

/**
 * Base class for errors that point at a line of catalog text.
 * The message reads `<line>: <reason>`, or `<file>:<line>: <reason>` once
 * a caller has attached the file path with `withFile`.
 */
export abstract class CatalogError extends Error {
  readonly line: number;
  readonly reason: string;
  readonly file: string | null;

  protected constructor(line: number, reason: string, file: string | null) {
    super(file === null ? `${line}: ${reason}` : `${file}:${line}: ${reason}`);
    this.line = line;
    this.reason = reason;
    this.file = file;
  }

  abstract withFile(file: string): CatalogError;
}

/** Unterminated string, illegal escape, missing space after a keyword, embedded newline */
export class CatalogLexError extends CatalogError {
  constructor(line: number, reason: string, file: string | null = null) {
    super(line, reason, file);
    this.name = "CatalogLexError";
  }

  withFile(file: string): CatalogLexError {
    return new CatalogLexError(this.line, this.reason, file);
  }
}

/** Unexpected token, misplaced msgctxt or comment, missing msgstr */
export class CatalogSyntaxError extends CatalogError {
  constructor(line: number, reason: string, file: string | null = null) {
    super(line, reason, file);
    this.name = "CatalogSyntaxError";
  }

  withFile(file: string): CatalogSyntaxError {
    return new CatalogSyntaxError(this.line, this.reason, file);
  }
}

export class DuplicateKeyError extends CatalogError {
  readonly originalLine: number;
  readonly msgid: string;
  readonly msgidPlural: string | null;

  constructor(
    line: number,
    originalLine: number,
    msgid: string,
    msgidPlural: string | null,
    file: string | null = null
  ) {
    const pluralPart =
      msgidPlural === null ? "" : ` and msgid_plural: '${msgidPlural}'`;
    super(
      line,
      `found duplicate on line ${originalLine} for msgid: '${msgid}'${pluralPart}`,
      file
    );
    this.name = "DuplicateKeyError";
    this.originalLine = originalLine;
    this.msgid = msgid;
    this.msgidPlural = msgidPlural;
  }

  withFile(file: string): DuplicateKeyError {
    return new DuplicateKeyError(
      this.line,
      this.originalLine,
      this.msgid,
      this.msgidPlural,
      file
    );
  }
}

/**
 * A message referenced placeholders that were not bound.
 * `partial` is the message with every bound placeholder substituted and the
 * missing ones left as written.
 */
export class RenderError extends Error {
  readonly missingKeys: Set<string>;
  readonly partial: string;

  constructor(missingKeys: Set<string>, partial: string) {
    super(`missing interpolation keys: ${[...missingKeys].join(", ")}`);
    this.name = "RenderError";
    this.missingKeys = missingKeys;
    this.partial = partial;
  }
}

/** An invalid merge configuration, reported before any merging happens */
export class PolicyError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid merge policy: ${issues.join("; ")}`);
    this.name = "PolicyError";
    this.issues = issues;
  }
}

/** A plural entry lacks the form that its locale selects for a count */
export class PluralFormError extends Error {
  readonly form: number;
  readonly locale: string;
  readonly msgid: string;

  constructor(form: number, locale: string, msgid: string) {
    super(
      `plural form ${form} is required for locale '${locale}' but is missing for msgid '${msgid}'`
    );
    this.name = "PluralFormError";
    this.form = form;
    this.locale = locale;
    this.msgid = msgid;
  }
}
