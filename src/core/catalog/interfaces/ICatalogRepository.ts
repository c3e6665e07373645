/**
 * Catalog Repository Interface
 *
 * Storage boundary for the local catalog and its generated export script.
 */

import type { Catalog } from "../models.js";

export interface ICatalogRepository {
  /** Location of the catalog document, for messages */
  readonly location: string;

  exists(): Promise<boolean>;

  /**
   * Reads and validates the catalog.
   * @throws {CatalogError} when missing, unparsable or invalid
   */
  load(): Promise<Catalog>;

  /**
   * Writes the catalog, keeping content the engine does not own.
   */
  save(catalog: Catalog): Promise<void>;

  /**
   * Writes the generated export script.
   * @returns the written path, or null when no export file is configured
   */
  export(catalog: Catalog): Promise<string | null>;
}
