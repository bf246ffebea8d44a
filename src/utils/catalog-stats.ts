/**
 * Translation progress counts for a catalog
 */

import { hasFlag, joinFragments, type Catalog, type Entry } from "../catalog/index.js";

export interface CatalogStats {
  /** Active (non-obsolete) entries */
  total: number;
  translated: number;
  untranslated: number;
  fuzzy: number;
  obsolete: number;
}

/**
 * Whether every msgstr (every plural form) of an entry is non-empty
 */
export function isTranslated(entry: Entry): boolean {
  if (entry.kind === "singular") {
    return joinFragments(entry.msgstr) !== "";
  }
  const forms = Object.values(entry.msgstr);
  return forms.length > 0 && forms.every((fragments) => joinFragments(fragments) !== "");
}

/**
 * Count entries by state. A fuzzy entry counts as fuzzy whatever its msgstr.
 */
export function getCatalogStats(catalog: Catalog): CatalogStats {
  const stats: CatalogStats = {
    total: 0,
    translated: 0,
    untranslated: 0,
    fuzzy: 0,
    obsolete: 0,
  };

  for (const entry of catalog.entries) {
    if (entry.obsolete) {
      stats.obsolete++;
      continue;
    }
    stats.total++;
    if (hasFlag(entry, "fuzzy")) {
      stats.fuzzy++;
    } else if (isTranslated(entry)) {
      stats.translated++;
    } else {
      stats.untranslated++;
    }
  }

  return stats;
}
