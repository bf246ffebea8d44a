/**
 * Environment variable configuration for the PO catalog MCP server
 */

/**
 * Merge policy defaults taken from the environment
 *
 * Values are passed through unclamped; the merge policy schema rejects bad
 * ones (a threshold that is not a number, an unknown obsolete policy).
 *
 * - PO_CATALOG_FUZZY_THRESHOLD: number in [0, 1]
 * - PO_CATALOG_ON_OBSOLETE: "delete" or "mark_as_obsolete"
 * - PO_CATALOG_STORE_PREVIOUS: "true"/"1" to record previous msgids on fuzzy matches
 */
export function getMergeDefaults(): Record<string, unknown> {
  const defaults: Record<string, unknown> = {};

  const threshold = process.env.PO_CATALOG_FUZZY_THRESHOLD;
  if (threshold) {
    defaults.fuzzyThreshold = Number(threshold);
  }

  const onObsolete = process.env.PO_CATALOG_ON_OBSOLETE;
  if (onObsolete) {
    defaults.onObsolete = onObsolete;
  }

  const storePrevious = process.env.PO_CATALOG_STORE_PREVIOUS;
  if (storePrevious) {
    defaults.storePreviousMessageOnFuzzyMatch = storePrevious === "true" || storePrevious === "1";
  }

  return defaults;
}
