/**
 * translate_message MCP Tool
 * Look up a message in a PO file the way a running application would
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { TranslationStore, DEFAULT_DOMAIN, type LookupResult } from "../lookup/translation-store.js";
import { readCatalogFile } from "../utils/catalog-files.js";
import { getSafeFilePath, localeSchema, projectPathSchema } from "../utils/validation.js";
import {
  toToolError,
  toolError,
  toolResponse,
  type ToolErrorOutput,
  type ToolResponse,
} from "../utils/tool-output.js";

// Input schema
export const TranslateMessageSchema = z.object({
  file_path: z.string().describe("PO file to look up in, relative to the project root"),
  locale: localeSchema.describe("Locale of the catalog (selects the plural rule)"),
  msgid: z.string().describe("Source message"),
  msgctxt: z.string().optional().describe("Message context"),
  msgid_plural: z.string().optional().describe("Plural source message; requires count"),
  count: z.number().int().min(0).optional().describe("Count selecting the plural form"),
  bindings: z
    .record(z.string(), z.union([z.string(), z.number()]))
    .optional()
    .describe("Values for %{name} placeholders"),
  skip_fuzzy: z
    .boolean()
    .default(false)
    .describe("Treat fuzzy entries as untranslated"),
  project_path: projectPathSchema,
});

export type TranslateMessageInput = z.infer<typeof TranslateMessageSchema>;

// Output types
interface TranslateMessageSuccess {
  success: true;
  value: string;
  /** false when the source text was used because no translation exists */
  translated: boolean;
}

export type TranslateMessageOutput = TranslateMessageSuccess | ToolErrorOutput;

export async function translateMessageTool(
  input: TranslateMessageInput
): Promise<TranslateMessageOutput> {
  const projectPath = input.project_path || process.cwd();
  const filePath = getSafeFilePath(input.file_path, projectPath);
  if (!filePath) {
    return toolError("INVALID_PATH", `Path '${input.file_path}' is outside the project directory`);
  }

  try {
    const store = new TranslationStore({ skipFuzzy: input.skip_fuzzy });
    store.addCatalog(input.locale, DEFAULT_DOMAIN, await readCatalogFile(filePath));

    const request = {
      locale: input.locale,
      msgctxt: input.msgctxt ?? null,
      msgid: input.msgid,
      bindings: input.bindings,
    };

    let result: LookupResult;
    if (input.msgid_plural !== undefined) {
      if (input.count === undefined) {
        return toolError("INVALID_INPUT", "count is required when msgid_plural is given");
      }
      result = store.translatePlural({
        ...request,
        msgidPlural: input.msgid_plural,
        count: input.count,
      });
    } else {
      result = store.translate(request);
    }

    if (!result.success) {
      return toToolError(result.error);
    }
    return { success: true, value: result.value, translated: result.found };
  } catch (err) {
    return toToolError(err);
  }
}

/**
 * Register the translate_message tool with the MCP server
 */
export function registerTranslateMessage(server: McpServer): void {
  server.tool(
    "translate_message",
    "Translate one message with a PO file: plural form selection for the locale, %{name} interpolation, and fallback to the source text when untranslated.",
    TranslateMessageSchema.shape,
    async (args): Promise<ToolResponse> => {
      const input = TranslateMessageSchema.parse(args);
      return toolResponse(await translateMessageTool(input));
    }
  );
}
