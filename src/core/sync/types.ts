/**
 * Shared types for the download and upload flows.
 */

import type { IProductApi } from "../api/interfaces/IProductApi.js";
import type { ICatalogRepository } from "../catalog/interfaces/ICatalogRepository.js";
import type { ProductKind } from "../catalog/models.js";
import type { ConfirmedChange } from "../reconciliation/models/diff.js";

export type SyncProgressEvent =
  | { type: "loading-catalog"; location: string }
  | { type: "fetching-remote"; universeId: number }
  | { type: "fetched-remote"; gamepasses: number; products: number }
  | { type: "creating"; total: number }
  | { type: "updating"; total: number }
  | { type: "saved"; location: string; exportPath: string | null };

export interface SyncDependencies {
  api: IProductApi;
  repository: ICatalogRepository;
  onProgress?: (event: SyncProgressEvent) => void;
}

export interface SyncRunOptions {
  /** Remote values win merges; every upload prompt is bypassed */
  overwrite: boolean;
}

// =============================================================================
// Download
// =============================================================================

export interface DownloadResult {
  added: Array<{ kind: ProductKind; key: string }>;
  matched: number;
  remoteTotal: number;
  exportPath: string | null;
}

// =============================================================================
// Upload
// =============================================================================

export interface CreatedProduct {
  kind: ProductKind;
  key: string;
  id: number;
}

export interface FailedCreation {
  kind: ProductKind;
  key: string;
  error: string;
}

/**
 * `none`: nothing to create. `skipped`: the operator declined the batch.
 */
export type CreationStatus = "none" | "skipped" | "completed";

export interface CreationResult {
  status: CreationStatus;
  created: CreatedProduct[];
  failed: FailedCreation[];
}

/**
 * `aborted`: the operator declined the final sync prompt; nothing was pushed.
 */
export type ModificationStatus = "up-to-date" | "aborted" | "nothing-selected" | "completed";

export interface ModificationResult {
  status: ModificationStatus;
  /** Diffs found before confirmation */
  pending: number;
  updated: ConfirmedChange[];
}

export interface UploadResult {
  creation: CreationResult;
  modification: ModificationResult;
}
