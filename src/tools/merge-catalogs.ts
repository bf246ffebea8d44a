/**
 * merge_catalogs MCP Tool
 * Update a translated PO file against a freshly extracted POT template
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { merge, validateMergePolicy, type ChangeSummary } from "../merge/index.js";
import { getMergeDefaults } from "../config/env.js";
import {
  readCatalogFile,
  readCatalogFileIfExists,
  writeCatalogFile,
} from "../utils/catalog-files.js";
import { getSafeFilePath, localeSchema, projectPathSchema } from "../utils/validation.js";
import {
  toToolError,
  toolError,
  toolResponse,
  type ToolErrorOutput,
  type ToolResponse,
} from "../utils/tool-output.js";

// Input schema
export const MergeCatalogsSchema = z.object({
  po_path: z
    .string()
    .describe("Translated catalog to update, relative to the project root. Created if missing."),
  pot_path: z.string().describe("Template catalog, relative to the project root"),
  locale: localeSchema.describe("Target locale (e.g., 'de', 'pt_BR')"),
  on_obsolete: z
    .enum(["mark_as_obsolete", "delete"])
    .optional()
    .describe("What to do with entries no longer in the template. Default: delete"),
  fuzzy: z
    .boolean()
    .optional()
    .describe("Match changed messages to similar old ones and flag them fuzzy. Default: true"),
  // Range is checked by the merge policy so that bad values report INVALID_POLICY
  fuzzy_threshold: z
    .number()
    .optional()
    .describe("Minimum similarity (0 to 1) for a fuzzy match. Default: 0.8"),
  store_previous: z
    .boolean()
    .optional()
    .describe("Record the old msgid as '#|' comments on fuzzy matches"),
  plural_forms: z
    .string()
    .optional()
    .describe("Plural-Forms header to write instead of the one derived from the locale"),
  dry_run: z
    .boolean()
    .default(true)
    .describe("If true, only report the changes without writing. Default: true (safe mode)"),
  project_path: projectPathSchema,
});

export type MergeCatalogsInput = z.infer<typeof MergeCatalogsSchema>;

// Output types
interface MergeCatalogsSuccess {
  success: true;
  dry_run: boolean;
  po_path: string;
  created: boolean;
  summary: ChangeSummary;
  file_written: string | null;
  message: string;
}

export type MergeCatalogsOutput = MergeCatalogsSuccess | ToolErrorOutput;

/**
 * Policy input from environment defaults overridden by the tool arguments
 */
function policyInput(input: MergeCatalogsInput): Record<string, unknown> {
  const policy: Record<string, unknown> = { ...getMergeDefaults(), locale: input.locale };
  if (input.on_obsolete !== undefined) policy.onObsolete = input.on_obsolete;
  if (input.fuzzy !== undefined) policy.fuzzyMatching = input.fuzzy;
  if (input.fuzzy_threshold !== undefined) policy.fuzzyThreshold = input.fuzzy_threshold;
  if (input.store_previous !== undefined) {
    policy.storePreviousMessageOnFuzzyMatch = input.store_previous;
  }
  if (input.plural_forms !== undefined) policy.pluralFormsHeader = input.plural_forms;
  return policy;
}

export async function mergeCatalogsTool(input: MergeCatalogsInput): Promise<MergeCatalogsOutput> {
  const projectPath = input.project_path || process.cwd();

  const poPath = getSafeFilePath(input.po_path, projectPath);
  const potPath = getSafeFilePath(input.pot_path, projectPath);
  if (!poPath || !potPath) {
    const offending = poPath ? input.pot_path : input.po_path;
    return toolError("INVALID_PATH", `Path '${offending}' is outside the project directory`);
  }

  try {
    const policy = validateMergePolicy(policyInput(input));
    console.error(
      `[MERGE] ${input.pot_path} -> ${input.po_path} (locale ${policy.locale}, on_obsolete ${policy.onObsolete}, fuzzy ${policy.fuzzyMatching ? policy.fuzzyThreshold : "off"})`
    );

    const template = await readCatalogFile(potPath);
    const { catalog: old, exists } = await readCatalogFileIfExists(poPath);

    const { catalog, summary } = merge(old, template, policy);
    console.error(
      `[MERGE] ${summary.new} new, ${summary.unchanged} unchanged, ${summary.fuzzy} fuzzy, ${summary.obsolete} obsolete, ${summary.removed} removed`
    );

    let fileWritten: string | null = null;
    if (!input.dry_run) {
      await writeCatalogFile(poPath, catalog);
      fileWritten = poPath;
    }

    return {
      success: true,
      dry_run: input.dry_run,
      po_path: poPath,
      created: !exists,
      summary,
      file_written: fileWritten,
      message: input.dry_run
        ? `Dry run: ${summary.new} new, ${summary.fuzzy} fuzzy, ${summary.obsolete} obsolete, ${summary.removed} removed. Set dry_run=false to write ${input.po_path}.`
        : `Merged ${input.pot_path} into ${input.po_path}.`,
    };
  } catch (err) {
    return toToolError(err);
  }
}

/**
 * Register the merge_catalogs tool with the MCP server
 */
export function registerMergeCatalogs(server: McpServer): void {
  server.tool(
    "merge_catalogs",
    "Merge a POT template into a translated PO file: keep existing translations, fuzzy-match changed messages, add new ones and drop or mark obsolete ones. Dry run by default.",
    MergeCatalogsSchema.shape,
    async (args): Promise<ToolResponse> => {
      const input = MergeCatalogsSchema.parse(args);
      return toolResponse(await mergeCatalogsTool(input));
    }
  );
}
