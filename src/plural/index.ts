/**
 * Plural rule evaluation
 *
 * A PluralRuleSource answers two questions for a locale: how many plural forms
 * exist, and which form a given count belongs to. Sources resolve a locale once
 * with `init` and are then queried with the resolved state.
 *
 * The default source is table-driven (see rules.ts). Locales are looked up as
 * written (`pt_BR`), then by language (`en_US` -> `en`), and finally fall back
 * to the two-form "n != 1" rule.
 */

import { getPluralTable, type PluralFamily } from "./rules.js";

export interface PluralRuleSource<State> {
  /** Resolve a locale descriptor into the state queried below */
  init(locale: string): State;
  formCount(state: State): number;
  formIndex(state: State, count: number): number;
  /** Value for the catalog's Plural-Forms header */
  pluralFormsHeader?(state: State): string;
}

export interface ResolvedPluralRule {
  locale: string;
  family: PluralFamily;
}

/**
 * Functions for a rule source that needs no initialization step
 */
export interface LocalePluralFunctions {
  formCount(locale: string): number;
  formIndex(locale: string, count: number): number;
  pluralFormsHeader?(locale: string): string;
}

/**
 * Check that a count can be pluralized
 * @throws RangeError for negative or non-integer counts
 */
export function assertPluralCount(count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Plural count must be a non-negative integer, got ${count}`);
  }
}

export function resolvePluralRule(locale: string): ResolvedPluralRule {
  const table = getPluralTable();
  const family =
    table.byLocale.get(locale) ??
    table.byLocale.get(languageOf(locale)) ??
    table.fallback;
  return { locale, family };
}

export const defaultPluralRules: PluralRuleSource<ResolvedPluralRule> = {
  init: resolvePluralRule,
  formCount: (rule) => rule.family.forms,
  formIndex: (rule, count) => {
    assertPluralCount(count);
    return rule.family.select(count);
  },
  pluralFormsHeader: (rule) =>
    `nplurals=${rule.family.forms}; plural=${rule.family.expression};`,
};

/**
 * Number of plural forms of a locale under the default rules
 */
export function formCount(locale: string): number {
  return defaultPluralRules.formCount(resolvePluralRule(locale));
}

/**
 * Plural form of `count` in a locale under the default rules
 * @throws RangeError for negative or non-integer counts
 */
export function formIndex(locale: string, count: number): number {
  return defaultPluralRules.formIndex(resolvePluralRule(locale), count);
}

/**
 * Plural-Forms header value of a locale under the default rules,
 * e.g. `nplurals=2; plural=(n != 1);`
 */
export function pluralFormsHeader(locale: string): string {
  return headerFor(defaultPluralRules, resolvePluralRule(locale));
}

/**
 * Wrap per-locale functions as a rule source; the locale itself is the state
 */
export function fromLocaleFunctions(
  functions: LocalePluralFunctions
): PluralRuleSource<string> {
  const source: PluralRuleSource<string> = {
    init: (locale) => locale,
    formCount: (locale) => functions.formCount(locale),
    formIndex: (locale, count) => {
      assertPluralCount(count);
      return functions.formIndex(locale, count);
    },
  };
  const header = functions.pluralFormsHeader;
  if (header !== undefined) {
    source.pluralFormsHeader = (locale) => header(locale);
  }
  return source;
}

/**
 * Read `nplurals=N` out of a Plural-Forms header value
 * @returns The form count, or null if the value carries none
 */
export function parseNplurals(header: string): number | null {
  const match = /nplurals\s*=\s*(\d+)/.exec(header);
  if (!match) return null;
  const forms = Number(match[1]);
  return forms > 0 ? forms : null;
}

/**
 * Header text for a resolved rule: the source's own, or just its form count
 */
export function headerFor<State>(source: PluralRuleSource<State>, state: State): string {
  return source.pluralFormsHeader
    ? source.pluralFormsHeader(state)
    : `nplurals=${source.formCount(state)};`;
}

function languageOf(locale: string): string {
  return locale.split(/[_\-@.]/)[0];
}
