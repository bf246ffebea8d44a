/**
 * Catalog merge engine
 *
 * Brings a translated catalog up to date with a freshly extracted template.
 * Every template entry is matched against the old catalog in two passes:
 *
 * 1. exact: same msgctxt and msgid. Obsolete old entries are revived this way.
 * 2. fuzzy: Jaro similarity of the msgids against active old entries that no
 *    exact match claimed. The best score at or above the threshold wins; ties
 *    go to the old entry declared first.
 *
 * Template entries with no match are added untranslated. Old entries nothing
 * matched are marked obsolete or dropped according to the policy.
 */

import type {
  Catalog,
  Entry,
  PluralEntry,
  PreviousMessage,
  SingularEntry,
} from "../catalog/types.js";
import { entryKey, joinFragments, normalizeFlags } from "../catalog/types.js";
import { PolicyError } from "../catalog/errors.js";
import {
  defaultPluralRules,
  headerFor,
  parseNplurals,
  type PluralRuleSource,
} from "../plural/index.js";
import {
  DERIVE_FROM_LOCALE,
  validateMergePolicy,
  type MergePolicy,
  type MergePolicyInput,
} from "./policy.js";
import { jaroSimilarity } from "./similarity.js";

export interface ChangeSummary {
  /** Template entries with no counterpart in the old catalog */
  new: number;
  /** Old entries dropped under the delete policy */
  removed: number;
  /** Template entries matched exactly */
  unchanged: number;
  /** Template entries matched by similarity and flagged fuzzy */
  fuzzy: number;
  /** Active old entries newly marked obsolete */
  obsolete: number;
}

export interface MergeResult {
  catalog: Catalog;
  summary: ChangeSummary;
}

interface PluralForms {
  count: number;
  header: string;
}

/**
 * Merge an old catalog with a new template
 *
 * Neither input is modified; the merged catalog shares no arrays with them.
 *
 * @param old - Existing translated catalog (use `emptyCatalog()` for a new locale)
 * @param template - Freshly extracted template
 * @param policy - Validated here; defaults are filled in
 * @param pluralRules - Rule source used to derive Plural-Forms and pad plural msgstr
 * @throws PolicyError if the policy is invalid
 */
export function merge<State>(
  old: Catalog,
  template: Catalog,
  policy: MergePolicyInput,
  pluralRules?: PluralRuleSource<State>
): MergeResult {
  const validated = validateMergePolicy(policy);
  const forms =
    pluralRules === undefined
      ? resolvePluralForms(defaultPluralRules, validated)
      : resolvePluralForms(pluralRules, validated);

  const summary: ChangeSummary = { new: 0, removed: 0, unchanged: 0, fuzzy: 0, obsolete: 0 };
  const consumed = new Set<Entry>();
  const exactMatches = findExactMatches(old, template, consumed);
  const candidates = old.entries.filter((entry) => !entry.obsolete && !consumed.has(entry));

  const entries: Entry[] = [];
  for (const entry of template.entries) {
    if (entry.obsolete) continue;

    const exact = exactMatches.get(entry);
    if (exact !== undefined) {
      entries.push(mergeExact(exact, entry, forms.count));
      summary.unchanged++;
      continue;
    }

    const similar = validated.fuzzyMatching
      ? findFuzzyMatch(entry, candidates, consumed, validated.fuzzyThreshold)
      : null;
    if (similar !== null) {
      consumed.add(similar);
      entries.push(
        mergeFuzzy(similar, entry, forms.count, validated.storePreviousMessageOnFuzzyMatch)
      );
      summary.fuzzy++;
      continue;
    }

    entries.push(freshEntry(entry, forms.count));
    summary.new++;
  }

  for (const entry of old.entries) {
    if (consumed.has(entry)) continue;

    if (validated.onObsolete === "delete") {
      summary.removed++;
      continue;
    }
    // Entries that were already obsolete are carried over without counting
    if (!entry.obsolete) summary.obsolete++;
    entries.push({ ...cloneEntry(entry), obsolete: true });
  }

  return {
    catalog: {
      topComments: mergeTopComments(old, template),
      headers: mergeHeaders(old, validated.locale, forms.header),
      entries,
    },
    summary,
  };
}

function resolvePluralForms<State>(
  source: PluralRuleSource<State>,
  policy: MergePolicy
): PluralForms {
  if (policy.pluralFormsHeader !== DERIVE_FROM_LOCALE) {
    const count = parseNplurals(policy.pluralFormsHeader);
    if (count === null) {
      throw new PolicyError([`pluralFormsHeader: no nplurals=N in '${policy.pluralFormsHeader}'`]);
    }
    return { count, header: policy.pluralFormsHeader };
  }

  const state = source.init(policy.locale);
  return { count: source.formCount(state), header: headerFor(source, state) };
}

/**
 * Pair each template entry with the old entry of the same key.
 * An active old entry is preferred over an obsolete one.
 */
function findExactMatches(
  old: Catalog,
  template: Catalog,
  consumed: Set<Entry>
): Map<Entry, Entry> {
  const active = new Map<string, Entry>();
  const obsolete = new Map<string, Entry>();
  for (const entry of old.entries) {
    const index = entry.obsolete ? obsolete : active;
    const key = entryKey(entry);
    if (!index.has(key)) index.set(key, entry);
  }

  const matches = new Map<Entry, Entry>();
  for (const entry of template.entries) {
    if (entry.obsolete) continue;
    const key = entryKey(entry);
    const match = active.get(key) ?? obsolete.get(key);
    if (match !== undefined && !consumed.has(match)) {
      matches.set(entry, match);
      consumed.add(match);
    }
  }
  return matches;
}

function findFuzzyMatch(
  entry: Entry,
  candidates: readonly Entry[],
  consumed: ReadonlySet<Entry>,
  threshold: number
): Entry | null {
  const msgid = joinFragments(entry.msgid);
  let best: Entry | null = null;
  let bestScore = -1;

  for (const candidate of candidates) {
    if (consumed.has(candidate)) continue;
    const score = jaroSimilarity(joinFragments(candidate.msgid), msgid);
    if (score >= threshold && score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
}

function mergeExact(old: Entry, template: Entry, pluralForms: number): Entry {
  return withShape(template, old, pluralForms, {
    comments: [...old.comments],
    flags: template.flags.filter((flag) => flag !== "fuzzy"),
    previous: null,
  });
}

function mergeFuzzy(
  old: Entry,
  template: Entry,
  pluralForms: number,
  storePrevious: boolean
): Entry {
  return withShape(template, old, pluralForms, {
    comments: [...old.comments],
    flags: normalizeFlags([...template.flags, "fuzzy"]),
    previous: storePrevious ? previousOf(old) : null,
  });
}

function freshEntry(template: Entry, pluralForms: number): Entry {
  const base = {
    ...templateFields(template),
    comments: template.comments.filter((comment) => !comment.startsWith("#")),
    flags: [...template.flags],
    previous: null,
  };
  if (template.kind === "plural") {
    return {
      ...base,
      kind: "plural",
      msgidPlural: [...template.msgidPlural],
      msgstr: emptyPluralMsgstr(pluralForms),
    };
  }
  return { ...base, kind: "singular", msgstr: [""] };
}

interface CarriedFields {
  comments: string[];
  flags: string[];
  previous: PreviousMessage | null;
}

/**
 * Entry with the template's message and the old entry's translation,
 * converted between singular and plural as the template requires
 */
function withShape(
  template: Entry,
  old: Entry,
  pluralForms: number,
  carried: CarriedFields
): Entry {
  const base = { ...templateFields(template), ...carried };

  if (template.kind === "plural") {
    const plural: PluralEntry = {
      ...base,
      kind: "plural",
      msgidPlural: [...template.msgidPlural],
      msgstr: pluralMsgstrOf(old, pluralForms),
    };
    return plural;
  }

  const singular: SingularEntry = {
    ...base,
    kind: "singular",
    msgstr: singularMsgstrOf(old),
  };
  return singular;
}

function templateFields(template: Entry) {
  return {
    msgctxt: template.msgctxt === null ? null : [...template.msgctxt],
    msgid: [...template.msgid],
    extractedComments: [...template.extractedComments],
    references: template.references.map((reference) => ({ ...reference })),
    obsolete: false,
    line: template.line,
  };
}

function singularMsgstrOf(old: Entry): string[] {
  if (old.kind === "singular") return [...old.msgstr];
  const first = old.msgstr[0];
  return first === undefined ? [""] : [...first];
}

/**
 * Plural msgstr from an old entry, with every form below `pluralForms` present.
 * A singular translation fills each form.
 */
function pluralMsgstrOf(old: Entry, pluralForms: number): Record<number, string[]> {
  if (old.kind === "singular") {
    const msgstr: Record<number, string[]> = {};
    for (let i = 0; i < pluralForms; i++) msgstr[i] = [...old.msgstr];
    return msgstr;
  }

  const msgstr = cloneMsgstr(old.msgstr);
  for (let i = 0; i < pluralForms; i++) {
    if (msgstr[i] === undefined) msgstr[i] = [""];
  }
  return msgstr;
}

function cloneMsgstr(msgstr: Record<number, string[]>): Record<number, string[]> {
  const copy: Record<number, string[]> = {};
  for (const [index, fragments] of Object.entries(msgstr)) {
    copy[Number(index)] = [...fragments];
  }
  return copy;
}

function emptyPluralMsgstr(pluralForms: number): Record<number, string[]> {
  const msgstr: Record<number, string[]> = {};
  for (let i = 0; i < pluralForms; i++) msgstr[i] = [""];
  return msgstr;
}

function previousOf(entry: Entry): PreviousMessage {
  return {
    msgctxt: entry.msgctxt === null ? null : [...entry.msgctxt],
    msgid: [...entry.msgid],
    msgidPlural: entry.kind === "plural" ? [...entry.msgidPlural] : null,
  };
}

function cloneEntry(entry: Entry): Entry {
  const base = {
    msgctxt: entry.msgctxt === null ? null : [...entry.msgctxt],
    msgid: [...entry.msgid],
    comments: [...entry.comments],
    extractedComments: [...entry.extractedComments],
    references: entry.references.map((reference) => ({ ...reference })),
    flags: [...entry.flags],
    obsolete: entry.obsolete,
    previous: entry.previous === null ? null : clonePrevious(entry.previous),
    line: entry.line,
  };
  if (entry.kind === "plural") {
    return {
      ...base,
      kind: "plural",
      msgidPlural: [...entry.msgidPlural],
      msgstr: cloneMsgstr(entry.msgstr),
    };
  }
  return { ...base, kind: "singular", msgstr: [...entry.msgstr] };
}

function clonePrevious(previous: PreviousMessage): PreviousMessage {
  return {
    msgctxt: previous.msgctxt === null ? null : [...previous.msgctxt],
    msgid: [...previous.msgid],
    msgidPlural: previous.msgidPlural === null ? null : [...previous.msgidPlural],
  };
}

function mergeHeaders(
  old: Catalog,
  locale: string,
  pluralFormsHeader: string
): Record<string, string> {
  return {
    ...old.headers,
    Language: locale,
    "Plural-Forms": pluralFormsHeader,
  };
}

/** Written above the header of a catalog created from a template */
export const NEW_CATALOG_COMMENTS: readonly string[] = [
  '## "msgid"s in this file come from POT (.pot) files.',
  "##",
  '## Do not add, change, or remove "msgid"s manually here as',
  "## they're tied to the ones in the corresponding POT file",
  "## (with the same domain).",
  "##",
  "## Merge the POT file into this file again to update them.",
];

/**
 * The old catalog's top comments, or the template's without its `##` lines.
 * A catalog created from nothing also gets NEW_CATALOG_COMMENTS.
 */
function mergeTopComments(old: Catalog, template: Catalog): string[] {
  if (old.topComments.length > 0) return [...old.topComments];
  const fromTemplate = template.topComments.filter((comment) => !comment.startsWith("##"));
  return isEmpty(old) ? [...NEW_CATALOG_COMMENTS, ...fromTemplate] : fromTemplate;
}

function isEmpty(catalog: Catalog): boolean {
  return catalog.entries.length === 0 && Object.keys(catalog.headers).length === 0;
}
