/**
 * Plural rule table
 *
 * Rule families (form count, GNU `plural=` expression and member locales) are
 * data in data/plural-rules.json; the selector for each family lives here.
 * Every selector takes a non-negative integer and returns a form index in
 * [0, forms).
 */

import { readFileSync } from "fs";
import { z } from "zod";

export type PluralSelector = (n: number) => number;

const slavic: PluralSelector = (n) => {
  if (n % 10 === 1 && n % 100 !== 11) return 0;
  if (n % 10 >= 2 && n % 10 <= 4 && (n % 100 < 10 || n % 100 >= 20)) return 1;
  return 2;
};

const westSlavic: PluralSelector = (n) => {
  if (n === 1) return 0;
  if (n % 10 >= 2 && n % 10 <= 4 && (n % 100 < 10 || n % 100 >= 20)) return 1;
  return 2;
};

export const PLURAL_SELECTORS: Readonly<Record<string, PluralSelector>> = {
  one_form: () => 0,
  two_forms_1: (n) => (n === 1 ? 0 : 1),
  two_forms_2: (n) => (n === 0 || n === 1 ? 0 : 1),
  three_forms_slavic: slavic,
  three_forms_slavic_alt: (n) => (n === 1 ? 0 : n >= 2 && n <= 4 ? 1 : 2),
  arabic: (n) => {
    if (n <= 2) return n;
    if (n % 100 >= 3 && n % 100 <= 10) return 3;
    if (n % 100 >= 11) return 4;
    return 5;
  },
  kashubian: westSlavic,
  welsh: (n) => {
    if (n === 1) return 0;
    if (n === 2) return 1;
    return n !== 8 && n !== 11 ? 2 : 3;
  },
  irish: (n) => {
    if (n === 1) return 0;
    if (n === 2) return 1;
    if (n >= 3 && n <= 6) return 2;
    if (n >= 7 && n <= 10) return 3;
    return 4;
  },
  scottish_gaelic: (n) => {
    if (n === 1 || n === 11) return 0;
    if (n === 2 || n === 12) return 1;
    return n > 2 && n < 20 ? 2 : 3;
  },
  icelandic: (n) => (n % 10 === 1 && n % 100 !== 11 ? 0 : 1),
  javanese: (n) => (n === 0 ? 0 : 1),
  cornish: (n) => (n >= 1 && n <= 3 ? n - 1 : 3),
  lithuanian: (n) => {
    if (n % 10 === 1 && n % 100 !== 11) return 0;
    if (n % 10 >= 2 && (n % 100 < 10 || n % 100 >= 20)) return 1;
    return 2;
  },
  latvian: (n) => {
    if (n % 10 === 1 && n % 100 !== 11) return 0;
    return n !== 0 ? 1 : 2;
  },
  macedonian: (n) => (n % 10 === 1 ? 0 : n % 10 === 2 ? 1 : 2),
  mandinka: (n) => (n <= 1 ? n : 2),
  maltese: (n) => {
    if (n === 1) return 0;
    if (n === 0 || (n % 100 > 1 && n % 100 < 11)) return 1;
    if (n % 100 > 10 && n % 100 < 20) return 2;
    return 3;
  },
  polish: westSlavic,
  romanian: (n) => {
    if (n === 1) return 0;
    return n === 0 || (n % 100 > 0 && n % 100 < 20) ? 1 : 2;
  },
  slovenian: (n) => {
    const rem = n % 100;
    return rem >= 1 && rem <= 3 ? rem : 0;
  },
};

const PluralFamilySchema = z.object({
  forms: z.number().int().min(1),
  expression: z.string().min(1),
  locales: z.array(z.string().min(1)),
});

const PluralTableSchema = z.object({
  default: z.string(),
  families: z.record(z.string(), PluralFamilySchema),
});

export interface PluralFamily {
  name: string;
  forms: number;
  expression: string;
  select: PluralSelector;
}

export interface PluralTable {
  byLocale: ReadonlyMap<string, PluralFamily>;
  fallback: PluralFamily;
}

const TABLE_URL = new URL("../../data/plural-rules.json", import.meta.url);

let cachedTable: PluralTable | null = null;

/**
 * Build a lookup table from raw rule data
 * @throws Error if the data is malformed or names a family with no selector
 */
export function buildPluralTable(data: unknown): PluralTable {
  const parsed = PluralTableSchema.parse(data);
  const byLocale = new Map<string, PluralFamily>();
  let fallback: PluralFamily | null = null;

  for (const [name, family] of Object.entries(parsed.families)) {
    const select = PLURAL_SELECTORS[name];
    if (select === undefined) {
      throw new Error(`No plural selector for rule family '${name}'`);
    }

    const resolved: PluralFamily = {
      name,
      forms: family.forms,
      expression: family.expression,
      select,
    };
    for (const locale of family.locales) {
      byLocale.set(locale, resolved);
    }
    if (name === parsed.default) {
      fallback = resolved;
    }
  }

  if (fallback === null) {
    throw new Error(`Default plural rule family '${parsed.default}' is not defined`);
  }

  return { byLocale, fallback };
}

/**
 * The table shipped in data/plural-rules.json, loaded once
 */
export function getPluralTable(): PluralTable {
  if (cachedTable === null) {
    cachedTable = buildPluralTable(JSON.parse(readFileSync(TABLE_URL, "utf-8")));
  }
  return cachedTable;
}
