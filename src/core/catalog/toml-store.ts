/**
 * TOML-backed catalog repository.
 *
 * Saving re-reads the current document, merges the engine's keys into it and
 * patches the text in place, so comments, layout and anything written by hand
 * survive. Only a brand-new file is serialized from scratch.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse, stringify } from "smol-toml";
import TOMLPatch from "toml-patch";
import { CatalogError, ErrorCode, errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { formatZodError } from "../../utils/validation.js";
import type { ICatalogRepository } from "./interfaces/ICatalogRepository.js";
import type { Catalog } from "./models.js";
import { compileNameFilters } from "./names.js";
import { renderLuauExport } from "./luau-export.js";
import {
  CatalogFileSchema,
  METADATA_KEYS,
  PRODUCT_KEYS,
  fileToCatalog,
  metadataToEntry,
  productToEntry,
} from "./schema.js";

const logger = createLogger("catalog");

type Table = Record<string, unknown>;

export class TomlCatalogStore implements ICatalogRepository {
  readonly location: string;

  constructor(filePath: string) {
    this.location = path.resolve(filePath);
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.location);
      return true;
    } catch {
      return false;
    }
  }

  async load(): Promise<Catalog> {
    const text = await this.readText();
    if (text === null) {
      throw new CatalogError(`Catalog not found: ${this.location}`, ErrorCode.CATALOG_NOT_FOUND, {
        filePath: this.location,
      });
    }

    const document = this.parseDocument(text);
    const result = CatalogFileSchema.safeParse(document);
    if (!result.success) {
      throw new CatalogError(
        `Invalid catalog: ${formatZodError(result.error).join("; ")}`,
        ErrorCode.CATALOG_INVALID,
        { filePath: this.location }
      );
    }

    try {
      const catalog = fileToCatalog(result.data, compileNameFilters);
      logger.debug(
        { gamepasses: catalog.gamepasses.size, products: catalog.products.size },
        "Loaded catalog"
      );
      return catalog;
    } catch (error) {
      throw new CatalogError(errorMessage(error), ErrorCode.CATALOG_INVALID, {
        filePath: this.location,
      });
    }
  }

  async save(catalog: Catalog): Promise<void> {
    const existingText = await this.readText();
    const existing: Table = existingText === null ? {} : this.parseDocument(existingText);

    const document: Table = {
      ...existing,
      metadata: mergeTable(existing.metadata, metadataToEntry(catalog.metadata), METADATA_KEYS),
    };
    setCollection(document, "gamepasses", existing.gamepasses, catalog.gamepasses);
    setCollection(document, "products", existing.products, catalog.products);

    const contents =
      existingText === null ? stringify(document) : this.patchDocument(existingText, document);
    await this.write(this.location, contents);
    logger.debug({ path: this.location }, "Saved catalog");
  }

  async export(catalog: Catalog): Promise<string | null> {
    const target = catalog.metadata.luauFile;
    if (!target) {
      return null;
    }

    const exportPath = path.resolve(path.dirname(this.location), target);
    try {
      await fs.mkdir(path.dirname(exportPath), { recursive: true });
      await fs.writeFile(exportPath, renderLuauExport(catalog), "utf-8");
    } catch (error) {
      throw new CatalogError(
        `Failed to write export file: ${errorMessage(error)}`,
        ErrorCode.EXPORT_WRITE_FAILED,
        { filePath: exportPath }
      );
    }
    logger.debug({ path: exportPath }, "Wrote export file");
    return exportPath;
  }

  private async readText(): Promise<string | null> {
    try {
      return await fs.readFile(this.location, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new CatalogError(
        `Failed to read catalog: ${errorMessage(error)}`,
        ErrorCode.CATALOG_PARSE_FAILED,
        { filePath: this.location }
      );
    }
  }

  private parseDocument(text: string): Table {
    try {
      return parse(text);
    } catch (error) {
      throw new CatalogError(
        `Malformed catalog: ${errorMessage(error)}`,
        ErrorCode.CATALOG_PARSE_FAILED,
        { filePath: this.location }
      );
    }
  }

  private patchDocument(existingText: string, document: Table): string {
    try {
      return TOMLPatch.patch(existingText, document);
    } catch (error) {
      throw new CatalogError(
        `Failed to update catalog: ${errorMessage(error)}`,
        ErrorCode.CATALOG_WRITE_FAILED,
        { filePath: this.location }
      );
    }
  }

  private async write(filePath: string, contents: string): Promise<void> {
    try {
      await fs.writeFile(filePath, contents, "utf-8");
    } catch (error) {
      throw new CatalogError(
        `Failed to write catalog: ${errorMessage(error)}`,
        ErrorCode.CATALOG_WRITE_FAILED,
        { filePath }
      );
    }
  }
}

function isTable(value: unknown): value is Table {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Overwrites the owned keys of a table, deleting the ones whose value is absent.
 */
function mergeTable(
  existing: unknown,
  values: Record<string, unknown>,
  ownedKeys: readonly string[]
): Table {
  const table: Table = isTable(existing) ? { ...existing } : {};
  for (const key of ownedKeys) {
    const value = values[key];
    if (value === undefined) {
      delete table[key];
    } else {
      table[key] = value;
    }
  }
  return table;
}

function mergeCollection(existing: unknown, products: Catalog["products"]): Table {
  const table: Table = isTable(existing) ? { ...existing } : {};
  for (const [key, product] of products) {
    table[key] = mergeTable(table[key], productToEntry(product), PRODUCT_KEYS);
  }
  return table;
}

/**
 * Writes a collection table unless it is empty and absent from the file.
 */
function setCollection(
  document: Table,
  name: "gamepasses" | "products",
  existing: unknown,
  products: Catalog["products"]
): void {
  if (existing === undefined && products.size === 0) {
    return;
  }
  document[name] = mergeCollection(existing, products);
}

function isNotFound(error: unknown): boolean {
  return isTable(error) && error.code === "ENOENT";
}
