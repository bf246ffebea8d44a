/**
 * get_catalog_status MCP Tool
 * Find PO files in a project and report translation progress for each
 */

import { z } from "zod";
import { glob } from "glob";
import { relative } from "path";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { readCatalogFile } from "../utils/catalog-files.js";
import { getCatalogStats, type CatalogStats } from "../utils/catalog-stats.js";
import { isPathWithinProject, projectPathSchema } from "../utils/validation.js";
import {
  toToolError,
  toolResponse,
  type ToolErrorOutput,
  type ToolResponse,
} from "../utils/tool-output.js";

export const DEFAULT_CATALOG_PATTERN = "**/*.po";

const IGNORED_DIRECTORIES = ["**/node_modules/**", "**/.git/**", "**/dist/**"];

// Input schema
export const GetCatalogStatusSchema = z.object({
  project_path: projectPathSchema,
  pattern: z
    .string()
    .default(DEFAULT_CATALOG_PATTERN)
    .describe("Glob pattern for catalog files, relative to the project root. Default: **/*.po"),
});

export type GetCatalogStatusInput = z.infer<typeof GetCatalogStatusSchema>;

// Output types
export type CatalogFileStatus =
  | ({
      path: string;
      language: string | null;
      /** Percentage of active entries that are translated and not fuzzy */
      progress: number;
    } & CatalogStats)
  | {
      path: string;
      error: ToolErrorOutput["error"];
    };

export interface GetCatalogStatusOutput {
  success: true;
  files: CatalogFileStatus[];
  totals: CatalogStats;
  message: string;
}

export async function getCatalogStatusTool(
  input: GetCatalogStatusInput
): Promise<GetCatalogStatusOutput> {
  const projectPath = input.project_path || process.cwd();

  const matches = await glob(input.pattern, {
    cwd: projectPath,
    absolute: true,
    nodir: true,
    ignore: IGNORED_DIRECTORIES,
  });
  // Patterns with `..` or absolute paths can reach outside the project
  const files = matches.filter((file) => isPathWithinProject(file, projectPath));
  if (files.length < matches.length) {
    console.error(
      `[CATALOG-FILES] Skipped ${matches.length - files.length} matches outside ${projectPath}`
    );
  }
  files.sort();

  const totals: CatalogStats = { total: 0, translated: 0, untranslated: 0, fuzzy: 0, obsolete: 0 };
  const statuses: CatalogFileStatus[] = [];
  let failed = 0;

  for (const file of files) {
    const path = relative(projectPath, file);
    try {
      const catalog = await readCatalogFile(file);
      const stats = getCatalogStats(catalog);
      statuses.push({
        path,
        language: catalog.headers["Language"] || null,
        progress: stats.total === 0 ? 100 : Math.round((stats.translated / stats.total) * 100),
        ...stats,
      });
      totals.total += stats.total;
      totals.translated += stats.translated;
      totals.untranslated += stats.untranslated;
      totals.fuzzy += stats.fuzzy;
      totals.obsolete += stats.obsolete;
    } catch (err) {
      // One broken catalog is reported without hiding the others
      statuses.push({ path, error: toToolError(err).error });
      failed++;
    }
  }

  const parsed = files.length - failed;
  return {
    success: true,
    files: statuses,
    totals,
    message:
      failed > 0
        ? `Found ${files.length} catalogs, ${failed} could not be parsed.`
        : `Found ${parsed} catalogs: ${totals.translated} translated, ${totals.untranslated} untranslated, ${totals.fuzzy} fuzzy.`,
  };
}

/**
 * Register the get_catalog_status tool with the MCP server
 */
export function registerGetCatalogStatus(server: McpServer): void {
  server.tool(
    "get_catalog_status",
    "Find gettext PO files in the project and report translated, untranslated, fuzzy and obsolete entry counts for each.",
    GetCatalogStatusSchema.shape,
    async (args): Promise<ToolResponse> => {
      const input = GetCatalogStatusSchema.parse(args);
      return toolResponse(await getCatalogStatusTool(input));
    }
  );
}
