/**
 * Validation utilities for tool input
 */

import { z } from "zod";
import { resolve, relative, isAbsolute, sep } from "path";

/**
 * Locale identifier as used in PO headers and file names
 * Matches: en, pt_BR, pt-BR, es-419, sr_RS@latin, etc.
 */
export const LOCALE_PATTERN = /^[a-z]{2,3}([_-][A-Za-z0-9]{2,4})?(@[a-z]+)?$/;

/**
 * Zod schema for locale validation
 */
export const localeSchema = z.string().regex(LOCALE_PATTERN, {
  message: "Invalid locale. Expected format: 'en', 'pt_BR', 'pt-BR', 'sr_RS@latin', etc.",
});

export const projectPathSchema = z
  .string()
  .optional()
  .describe("Root path of the project. Defaults to current working directory.");

/**
 * Validate that a path is within the project directory
 * Prevents path traversal attacks
 */
export function isPathWithinProject(filePath: string, projectPath: string): boolean {
  const resolvedProject = resolve(projectPath);
  const resolvedFile = resolve(projectPath, filePath);
  const fromProject = relative(resolvedProject, resolvedFile);

  if (fromProject === "") return true;
  return !isAbsolute(fromProject) && fromProject.split(sep)[0] !== "..";
}

/**
 * Get a safe file path within the project directory
 * Returns null if path would escape project directory
 */
export function getSafeFilePath(relativePath: string, projectPath: string): string | null {
  if (!isPathWithinProject(relativePath, projectPath)) {
    return null;
  }
  return resolve(projectPath, relativePath);
}
