/**
 * parse_catalog MCP Tool
 * Parse one PO/POT file and return its headers, progress counts and entries
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  formatReference,
  joinFragments,
  pluralIndices,
  type Entry,
} from "../catalog/index.js";
import { readCatalogFile } from "../utils/catalog-files.js";
import { getCatalogStats, type CatalogStats } from "../utils/catalog-stats.js";
import { getSafeFilePath, projectPathSchema } from "../utils/validation.js";
import {
  toToolError,
  toolError,
  toolResponse,
  type ToolErrorOutput,
  type ToolResponse,
} from "../utils/tool-output.js";

// Input schema
export const ParseCatalogSchema = z.object({
  file_path: z
    .string()
    .describe("Path of the .po or .pot file, relative to the project root"),
  project_path: projectPathSchema,
});

export type ParseCatalogInput = z.infer<typeof ParseCatalogSchema>;

// Output types
export interface EntrySummary {
  msgctxt: string | null;
  msgid: string;
  msgid_plural: string | null;
  /** A string for singular entries, form index -> text for plural ones */
  msgstr: string | Record<string, string>;
  flags: string[];
  references: string[];
  comments: string[];
  extracted_comments: string[];
  obsolete: boolean;
  line: number;
}

interface ParseCatalogSuccess {
  success: true;
  file: string;
  headers: Record<string, string>;
  stats: CatalogStats;
  entries: EntrySummary[];
}

export type ParseCatalogOutput = ParseCatalogSuccess | ToolErrorOutput;

export function summarizeEntry(entry: Entry): EntrySummary {
  let msgstr: string | Record<string, string>;
  if (entry.kind === "plural") {
    const forms: Record<string, string> = {};
    for (const index of pluralIndices(entry.msgstr)) {
      forms[String(index)] = joinFragments(entry.msgstr[index]);
    }
    msgstr = forms;
  } else {
    msgstr = joinFragments(entry.msgstr);
  }

  return {
    msgctxt: entry.msgctxt === null ? null : joinFragments(entry.msgctxt),
    msgid: joinFragments(entry.msgid),
    msgid_plural: entry.kind === "plural" ? joinFragments(entry.msgidPlural) : null,
    msgstr,
    flags: entry.flags,
    references: entry.references.map(formatReference),
    comments: entry.comments,
    extracted_comments: entry.extractedComments,
    obsolete: entry.obsolete,
    line: entry.line,
  };
}

export async function parseCatalogTool(input: ParseCatalogInput): Promise<ParseCatalogOutput> {
  const projectPath = input.project_path || process.cwd();
  const filePath = getSafeFilePath(input.file_path, projectPath);
  if (!filePath) {
    return toolError("INVALID_PATH", `Path '${input.file_path}' is outside the project directory`);
  }

  try {
    const catalog = await readCatalogFile(filePath);
    return {
      success: true,
      file: filePath,
      headers: catalog.headers,
      stats: getCatalogStats(catalog),
      entries: catalog.entries.map(summarizeEntry),
    };
  } catch (err) {
    return toToolError(err);
  }
}

/**
 * Register the parse_catalog tool with the MCP server
 */
export function registerParseCatalog(server: McpServer): void {
  server.tool(
    "parse_catalog",
    "Parse a gettext PO or POT file and return its headers, translation progress and entries. Syntax errors are reported with file and line.",
    ParseCatalogSchema.shape,
    async (args): Promise<ToolResponse> => {
      const input = ParseCatalogSchema.parse(args);
      return toolResponse(await parseCatalogTool(input));
    }
  );
}
