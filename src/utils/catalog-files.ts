/**
 * Catalog file access for the MCP tools
 *
 * The catalog core works on text only; this module reads and writes the files
 * and puts the file path into parse errors.
 */

import { readFile, writeFile, mkdir } from "fs/promises";
import { dirname } from "path";
import {
  parseCatalogOrThrow,
  serialize,
  emptyCatalog,
  type Catalog,
} from "../catalog/index.js";

/**
 * Read and parse a PO/POT file
 * @throws CatalogError labelled with the file path, or the fs error
 */
export async function readCatalogFile(filePath: string): Promise<Catalog> {
  console.error(`[CATALOG-FILES] Reading catalog: ${filePath}`);
  const text = await readFile(filePath, "utf-8");
  const catalog = parseCatalogOrThrow(text, filePath);
  console.error(`[CATALOG-FILES] Parsed ${catalog.entries.length} entries from ${filePath}`);
  return catalog;
}

/**
 * Read a catalog, or an empty one when the file does not exist yet
 */
export async function readCatalogFileIfExists(
  filePath: string
): Promise<{ catalog: Catalog; exists: boolean }> {
  try {
    return { catalog: await readCatalogFile(filePath), exists: true };
  } catch (err) {
    if (isFileNotFound(err)) {
      console.error(`[CATALOG-FILES] No catalog at ${filePath}, starting from an empty one`);
      return { catalog: emptyCatalog(), exists: false };
    }
    throw err;
  }
}

/**
 * Serialize a catalog and write it, creating parent directories
 */
export async function writeCatalogFile(filePath: string, catalog: Catalog): Promise<void> {
  console.error(`[CATALOG-FILES] Writing catalog: ${filePath}`);
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, serialize(catalog), "utf-8");
    console.error(`[CATALOG-FILES] Wrote ${catalog.entries.length} entries to ${filePath}`);
  } catch (err) {
    console.error(`[CATALOG-FILES] Error writing catalog: ${err}`);
    throw err;
  }
}

export function isFileNotFound(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
