/**
 * Upload Orchestrator
 *
 * Pushes the local catalog to the platform in two phases:
 *
 * 1. Creation: products without a remote id are created after one batch
 *    confirmation. Each call is independent; a failed creation is logged and
 *    the product simply stays without an id.
 * 2. Modification: diffs against the remote state are confirmed, then
 *    updated one by one. The first failed update stops the queue.
 *
 * The catalog is saved and exported after each phase, including when an
 * update fails.
 */

import { createChildLogger, createLogger } from "../../utils/logger.js";
import { mapConcurrent } from "../../utils/async.js";
import { ErrorCode, SyncError, errorMessage } from "../errors.js";
import { toUpdateRequest } from "../api/mapping.js";
import {
  collectionFor,
  kindLabel,
  productCount,
  type Catalog,
  type Product,
  type ProductKind,
  type RemoteCatalog,
} from "../catalog/models.js";
import { applyDiscountPrefix } from "../catalog/product.js";
import { buildPendingUpdates, findCreationCandidates } from "../reconciliation/diff-engine.js";
import type { ConfirmedChange, CreationCandidate } from "../reconciliation/models/diff.js";
import type { IConfirmer } from "./interfaces/IConfirmer.js";
import type {
  CreatedProduct,
  CreationResult,
  FailedCreation,
  ModificationResult,
  SyncDependencies,
  SyncRunOptions,
  UploadResult,
} from "./types.js";

const logger = createLogger("uploader");

export const DEFAULT_CREATE_CONCURRENCY = 4;

export interface UploaderDependencies extends SyncDependencies {
  confirmer: IConfirmer;
  /** Creation calls in flight at once */
  createConcurrency?: number;
}

type CreationOutcome =
  | { ok: true; candidate: CreationCandidate; id: number }
  | { ok: false; candidate: CreationCandidate; error: string };

export class Uploader {
  private readonly createConcurrency: number;

  constructor(private readonly deps: UploaderDependencies) {
    this.createConcurrency = deps.createConcurrency ?? DEFAULT_CREATE_CONCURRENCY;
  }

  async upload(options: SyncRunOptions): Promise<UploadResult> {
    const { api, repository } = this.deps;

    this.deps.onProgress?.({ type: "loading-catalog", location: repository.location });
    const catalog = await repository.load();

    const universeId = catalog.metadata.universeId;
    this.deps.onProgress?.({ type: "fetching-remote", universeId });
    const remote = await api.fetchRemoteCatalog(universeId);
    this.deps.onProgress?.({
      type: "fetched-remote",
      gamepasses: remote.gamepasses.length,
      products: remote.products.length,
    });

    logger.info(
      {
        local: productCount(catalog),
        remote: remote.gamepasses.length + remote.products.length,
        overwrite: options.overwrite,
      },
      "Starting upload"
    );

    const creation = await this.createMissing(catalog, options);

    let modification: ModificationResult;
    try {
      modification = await this.updateModified(catalog, remote, options);
    } catch (error) {
      logger.error({ err: error }, "Modification phase failed, saving catalog before aborting");
      await this.persist(catalog);
      throw error;
    }
    await this.persist(catalog);

    return { creation, modification };
  }

  // ===========================================================================
  // Creation phase
  // ===========================================================================

  /**
   * Creates every product that has no remote id and writes the new ids back
   * into the catalog in candidate order.
   */
  async createMissing(catalog: Catalog, options: SyncRunOptions): Promise<CreationResult> {
    const phaseLogger = createChildLogger(logger, { phase: "create" });
    const candidates = findCreationCandidates(catalog);

    if (candidates.length === 0) {
      phaseLogger.debug("No products to create");
      return { status: "none", created: [], failed: [] };
    }

    if (!options.overwrite && !(await this.deps.confirmer.confirmCreation(candidates))) {
      phaseLogger.info({ count: candidates.length }, "Skipping creation of new products");
      return { status: "skipped", created: [], failed: [] };
    }

    this.deps.onProgress?.({ type: "creating", total: candidates.length });
    phaseLogger.info(
      { count: candidates.length, universeId: catalog.metadata.universeId },
      "Creating products"
    );

    const outcomes = await mapConcurrent(
      candidates,
      (candidate) => this.createOne(catalog, candidate),
      this.createConcurrency
    );

    const created: CreatedProduct[] = [];
    const failed: FailedCreation[] = [];
    for (const outcome of outcomes) {
      const { kind, key } = outcome.candidate;
      if (outcome.ok) {
        const product = collectionFor(catalog, kind).get(key);
        if (product) {
          product.id = outcome.id;
        }
        created.push({ kind, key, id: outcome.id });
      } else {
        failed.push({ kind, key, error: outcome.error });
      }
    }

    await this.persist(catalog);
    return { status: "completed", created, failed };
  }

  private async createOne(catalog: Catalog, candidate: CreationCandidate): Promise<CreationOutcome> {
    const { kind, key } = candidate;
    const product = collectionFor(catalog, kind).get(key);
    if (!product) {
      return { ok: false, candidate, error: "product no longer in catalog" };
    }

    const request = toUpdateRequest(applyDiscountPrefix(product, catalog.metadata.discountPrefix));
    try {
      const id = await this.deps.api.createProduct(kind, catalog.metadata.universeId, request);
      logger.info({ kind, key, id, name: request.name }, `Created ${kindLabel(kind)}`);
      return { ok: true, candidate, id };
    } catch (error) {
      logger.error({ err: error, kind, key }, `Failed to create ${kindLabel(kind)} '${key}'`);
      return { ok: false, candidate, error: errorMessage(error) };
    }
  }

  // ===========================================================================
  // Modification phase
  // ===========================================================================

  /**
   * Pushes confirmed diffs in order. Throws SyncError on the first failed update.
   */
  async updateModified(
    catalog: Catalog,
    remote: RemoteCatalog,
    options: SyncRunOptions
  ): Promise<ModificationResult> {
    const phaseLogger = createChildLogger(logger, { phase: "update" });
    const updates = buildPendingUpdates(catalog, remote);

    if (updates.length === 0) {
      phaseLogger.info("No differences between local and remote products");
      return { status: "up-to-date", pending: 0, updated: [] };
    }

    let selected: ConfirmedChange[];
    if (options.overwrite) {
      selected = updates.map(({ kind, diff }) => ({ kind, id: diff.id }));
    } else {
      selected = await this.deps.confirmer.selectChanges(updates);
      const apply = await this.deps.confirmer.confirm("Would you like to sync products?");
      if (!apply) {
        phaseLogger.info("Sync aborted by user");
        return { status: "aborted", pending: updates.length, updated: [] };
      }
    }

    const queue = updates
      .filter(({ kind, diff }) => selected.some((change) => change.kind === kind && change.id === diff.id))
      .map(({ kind, diff }) => ({ kind, id: diff.id }));

    if (queue.length === 0) {
      phaseLogger.info("No changes selected");
      return { status: "nothing-selected", pending: updates.length, updated: [] };
    }

    this.deps.onProgress?.({ type: "updating", total: queue.length });
    phaseLogger.info({ count: queue.length }, "Syncing products");

    const updated: ConfirmedChange[] = [];
    for (const change of queue) {
      await this.updateOne(catalog, change.kind, change.id, updated.length);
      updated.push(change);
    }

    phaseLogger.info({ count: updated.length }, "Finished syncing products");
    return { status: "completed", pending: updates.length, updated };
  }

  private async updateOne(
    catalog: Catalog,
    kind: ProductKind,
    id: number,
    completed: number
  ): Promise<void> {
    const product = findById(collectionFor(catalog, kind), id);
    if (!product) {
      throw new SyncError(
        `No local ${kindLabel(kind)} with id ${id}`,
        ErrorCode.SYNC_PRODUCT_NOT_FOUND,
        { kind, productId: id }
      );
    }

    const request = toUpdateRequest(applyDiscountPrefix(product, catalog.metadata.discountPrefix));
    try {
      await this.deps.api.updateProduct(kind, catalog.metadata.universeId, id, request);
    } catch (error) {
      throw new SyncError(
        `Failed to update ${kindLabel(kind)} '${product.name}' (id ${id}): ${errorMessage(error)}`,
        ErrorCode.SYNC_UPDATE_FAILED,
        { kind, productId: id, completed }
      );
    }
    logger.info({ kind, id, name: product.name }, `Synced ${kindLabel(kind)}`);
  }

  // ===========================================================================
  // Persistence
  // ===========================================================================

  private async persist(catalog: Catalog): Promise<void> {
    const { repository } = this.deps;
    await repository.save(catalog);
    const exportPath = await repository.export(catalog);
    this.deps.onProgress?.({ type: "saved", location: repository.location, exportPath });
  }
}

function findById(collection: Map<string, Product>, id: number): Product | undefined {
  for (const product of collection.values()) {
    if (product.id === id) return product;
  }
  return undefined;
}
