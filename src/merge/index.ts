export { merge, NEW_CATALOG_COMMENTS, type ChangeSummary, type MergeResult } from "./merger.js";
export {
  DERIVE_FROM_LOCALE,
  MergePolicySchema,
  validateMergePolicy,
  type MergePolicy,
  type MergePolicyInput,
  type OnObsolete,
} from "./policy.js";
export { jaroSimilarity } from "./similarity.js";
