/**
 * Catalog module
 *
 * Scanner, parser and serializer for PO/POT catalogs.
 */

export { scan, type ScanResult } from "./scanner.js";
export {
  parse,
  parseCatalog,
  parseCatalogOrThrow,
  parseHeaders,
  type ParseError,
  type ParseResult,
} from "./parser.js";
export {
  serialize,
  escapePoString,
  wrapReferences,
  REFERENCE_LINE_WIDTH,
} from "./serializer.js";
export {
  classifyComment,
  parseReferences,
  parseFlags,
  formatReference,
  type ClassifiedComment,
} from "./comments.js";
export {
  CatalogError,
  CatalogLexError,
  CatalogSyntaxError,
  DuplicateKeyError,
  RenderError,
  PolicyError,
  PluralFormError,
} from "./errors.js";
export {
  emptyCatalog,
  entryKey,
  hasFlag,
  joinFragments,
  normalizeFlags,
  pluralIndices,
  type Catalog,
  type Entry,
  type Keyword,
  type PluralEntry,
  type PreviousMessage,
  type Reference,
  type SingularEntry,
  type Token,
} from "./types.js";
