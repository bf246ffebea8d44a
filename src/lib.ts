/**
 * Library entry point
 *
 * Pure catalog tooling: no file access, no logging. The MCP server in
 * server.ts is one caller of these functions.
 */

export * from "./catalog/index.js";
export * from "./merge/index.js";
export {
  placeholders,
  render,
  segments,
  type Bindings,
  type RenderResult,
  type Segment,
} from "./interpolation/index.js";
export {
  assertPluralCount,
  defaultPluralRules,
  formCount,
  formIndex,
  fromLocaleFunctions,
  parseNplurals,
  pluralFormsHeader,
  resolvePluralRule,
  type LocalePluralFunctions,
  type PluralRuleSource,
  type ResolvedPluralRule,
} from "./plural/index.js";
export { buildPluralTable, type PluralFamily, type PluralTable } from "./plural/rules.js";
export {
  DEFAULT_DOMAIN,
  TranslationStore,
  type LookupResult,
  type TranslatePluralRequest,
  type TranslateRequest,
  type TranslationStoreOptions,
} from "./lookup/translation-store.js";
