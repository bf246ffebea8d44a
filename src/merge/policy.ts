/**
 * Merge policy schema and validation
 */

import { z } from "zod";
import { PolicyError } from "../catalog/errors.js";
import { parseNplurals } from "../plural/index.js";

export const DERIVE_FROM_LOCALE = "derive-from-locale";

export const onObsoleteSchema = z.enum(["mark_as_obsolete", "delete"]);

export type OnObsolete = z.infer<typeof onObsoleteSchema>;

export const fuzzyThresholdSchema = z
  .number()
  .min(0, { message: "fuzzyThreshold must be between 0 and 1" })
  .max(1, { message: "fuzzyThreshold must be between 0 and 1" });

export const MergePolicySchema = z.object({
  /** Target locale written to the Language header and used for plural rules */
  locale: z.string().min(1),
  onObsolete: onObsoleteSchema.default("delete"),
  /** When false, unmatched template entries are always added as new */
  fuzzyMatching: z.boolean().default(true),
  fuzzyThreshold: fuzzyThresholdSchema.default(0.8),
  storePreviousMessageOnFuzzyMatch: z.boolean().default(false),
  /** Plural-Forms header to write, or derive it from the locale's plural rules */
  pluralFormsHeader: z
    .string()
    .refine((value) => value === DERIVE_FROM_LOCALE || parseNplurals(value) !== null, {
      message: `pluralFormsHeader must be '${DERIVE_FROM_LOCALE}' or contain nplurals=N`,
    })
    .default(DERIVE_FROM_LOCALE),
});

export type MergePolicyInput = z.input<typeof MergePolicySchema>;
export type MergePolicy = z.output<typeof MergePolicySchema>;

/**
 * Validate a merge policy and fill in defaults
 * @throws PolicyError listing every problem found; values are never clamped
 */
export function validateMergePolicy(input: unknown): MergePolicy {
  const result = MergePolicySchema.safeParse(input);
  if (!result.success) {
    throw new PolicyError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}
