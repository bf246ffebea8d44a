/**
 * Runtime translation lookup over loaded catalogs
 *
 * Entries are indexed by (locale, domain, msgctxt, msgid). A lookup that finds
 * no usable translation falls back to the source text, so callers always get a
 * rendered string unless interpolation or plural selection fails.
 */

import type { Catalog, Entry } from "../catalog/types.js";
import { hasFlag, joinFragments } from "../catalog/types.js";
import { PluralFormError, type RenderError } from "../catalog/errors.js";
import { render, type Bindings } from "../interpolation/index.js";
import {
  defaultPluralRules,
  type PluralRuleSource,
  type ResolvedPluralRule,
} from "../plural/index.js";

export const DEFAULT_DOMAIN = "default";

export interface TranslationStoreOptions<State> {
  pluralRules?: PluralRuleSource<State>;
  /** Treat entries flagged fuzzy as untranslated */
  skipFuzzy?: boolean;
}

export interface TranslateRequest {
  locale: string;
  domain?: string;
  msgctxt?: string | null;
  msgid: string;
  bindings?: Bindings;
}

export interface TranslatePluralRequest extends TranslateRequest {
  msgidPlural: string;
  count: number;
}

export type LookupResult =
  | {
      success: true;
      value: string;
      /** false when the value was rendered from the untranslated source text */
      found: boolean;
    }
  | { success: false; error: RenderError | PluralFormError };

type FormIndexFn = (locale: string, count: number) => number;

export class TranslationStore<State = ResolvedPluralRule> {
  private readonly entries = new Map<string, Entry>();
  private readonly formIndex: FormIndexFn;
  private readonly skipFuzzy: boolean;

  constructor(options: TranslationStoreOptions<State> = {}) {
    this.formIndex =
      options.pluralRules === undefined
        ? cachedFormIndex(defaultPluralRules)
        : cachedFormIndex(options.pluralRules);
    this.skipFuzzy = options.skipFuzzy ?? false;
  }

  /**
   * Index the active entries of a catalog. Later catalogs replace entries
   * with the same key.
   */
  addCatalog(locale: string, domain: string, catalog: Catalog): void {
    for (const entry of catalog.entries) {
      if (entry.obsolete) continue;
      const msgctxt = entry.msgctxt === null ? null : joinFragments(entry.msgctxt);
      this.entries.set(lookupKey(locale, domain, msgctxt, joinFragments(entry.msgid)), entry);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  translate(request: TranslateRequest): LookupResult {
    const entry = this.find(request);
    const bindings = request.bindings ?? {};

    if (entry === null || entry.kind !== "singular") {
      return rendered(request.msgid, bindings, false);
    }
    const msgstr = joinFragments(entry.msgstr);
    if (msgstr === "") {
      return rendered(request.msgid, bindings, false);
    }
    return rendered(msgstr, bindings, true);
  }

  /**
   * Plural lookup. `count` is bound for interpolation as `%{count}`.
   * @throws RangeError for negative or non-integer counts
   */
  translatePlural(request: TranslatePluralRequest): LookupResult {
    const form = this.formIndex(request.locale, request.count);
    const bindings: Bindings = { ...request.bindings, count: request.count };
    const fallback = request.count === 1 ? request.msgid : request.msgidPlural;

    const entry = this.find(request);
    if (entry === null || entry.kind !== "plural") {
      return rendered(fallback, bindings, false);
    }

    const forms = Object.values(entry.msgstr).map(joinFragments);
    if (forms.length === 0 || forms.some((text) => text === "")) {
      return rendered(fallback, bindings, false);
    }

    const selected = entry.msgstr[form];
    if (selected === undefined) {
      return {
        success: false,
        error: new PluralFormError(form, request.locale, request.msgid),
      };
    }
    return rendered(joinFragments(selected), bindings, true);
  }

  private find(request: TranslateRequest): Entry | null {
    const key = lookupKey(
      request.locale,
      request.domain ?? DEFAULT_DOMAIN,
      request.msgctxt ?? null,
      request.msgid
    );
    const entry = this.entries.get(key);
    if (entry === undefined) return null;
    if (this.skipFuzzy && hasFlag(entry, "fuzzy")) return null;
    return entry;
  }
}

function lookupKey(
  locale: string,
  domain: string,
  msgctxt: string | null,
  msgid: string
): string {
  return JSON.stringify([locale, domain, msgctxt, msgid]);
}

function rendered(template: string, bindings: Bindings, found: boolean): LookupResult {
  const result = render(template, bindings);
  return result.success
    ? { success: true, value: result.value, found }
    : { success: false, error: result.error };
}

/**
 * Form selection with the rule source initialized once per locale
 */
function cachedFormIndex<State>(source: PluralRuleSource<State>): FormIndexFn {
  const resolved = new Map<string, { state: State }>();
  return (locale, count) => {
    let cached = resolved.get(locale);
    if (cached === undefined) {
      cached = { state: source.init(locale) };
      resolved.set(locale, cached);
    }
    return source.formIndex(cached.state, count);
  };
}
