/**
 * Shared output shapes for the MCP tools
 */

import {
  CatalogLexError,
  CatalogSyntaxError,
  DuplicateKeyError,
  PluralFormError,
  PolicyError,
  RenderError,
} from "../catalog/index.js";
import { isFileNotFound } from "./catalog-files.js";

export type ToolErrorCode =
  | "SYNTAX_ERROR"
  | "DUPLICATE_KEY"
  | "FILE_NOT_FOUND"
  | "INVALID_PATH"
  | "INVALID_INPUT"
  | "INVALID_POLICY"
  | "MISSING_BINDINGS"
  | "PLURAL_FORM_MISSING";

export interface ToolErrorOutput {
  success: false;
  error: {
    code: ToolErrorCode;
    message: string;
  };
}

export type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
};

export function toolError(code: ToolErrorCode, message: string): ToolErrorOutput {
  return { success: false, error: { code, message } };
}

/**
 * Map a known failure to a tool error
 * @throws the original error when it is not one the tools report
 */
export function toToolError(err: unknown): ToolErrorOutput {
  if (err instanceof DuplicateKeyError) {
    return toolError("DUPLICATE_KEY", err.message);
  }
  if (err instanceof CatalogLexError || err instanceof CatalogSyntaxError) {
    return toolError("SYNTAX_ERROR", err.message);
  }
  if (err instanceof PolicyError) {
    return toolError("INVALID_POLICY", err.message);
  }
  if (err instanceof RenderError) {
    return toolError("MISSING_BINDINGS", err.message);
  }
  if (err instanceof PluralFormError) {
    return toolError("PLURAL_FORM_MISSING", err.message);
  }
  if (isFileNotFound(err)) {
    return toolError("FILE_NOT_FOUND", err.message);
  }
  throw err;
}

/**
 * Wrap tool output as MCP text content
 */
export function toolResponse(output: object): ToolResponse {
  return {
    content: [{ type: "text", text: JSON.stringify(output, null, 2) }],
  };
}
