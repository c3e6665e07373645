/**
 * Downloader
 *
 * Pulls the platform's state into the local catalog, then saves and exports it.
 */

import { createLogger } from "../../utils/logger.js";
import { productCount } from "../catalog/models.js";
import { mergeRemoteCatalog } from "../reconciliation/merge-engine.js";
import type { DownloadResult, SyncDependencies, SyncRunOptions } from "./types.js";

const logger = createLogger("downloader");

export class Downloader {
  constructor(private readonly deps: SyncDependencies) {}

  async download(options: SyncRunOptions): Promise<DownloadResult> {
    const { api, repository } = this.deps;

    this.deps.onProgress?.({ type: "loading-catalog", location: repository.location });
    const local = await repository.load();

    const universeId = local.metadata.universeId;
    this.deps.onProgress?.({ type: "fetching-remote", universeId });
    const remote = await api.fetchRemoteCatalog(universeId);
    this.deps.onProgress?.({
      type: "fetched-remote",
      gamepasses: remote.gamepasses.length,
      products: remote.products.length,
    });

    const remoteTotal = remote.gamepasses.length + remote.products.length;
    logger.info(
      { local: productCount(local), remote: remoteTotal, overwrite: options.overwrite },
      "Merging remote products into catalog"
    );

    const { catalog, added, matched } = mergeRemoteCatalog(local, remote, {
      overwrite: options.overwrite,
    });

    await repository.save(catalog);
    const exportPath = await repository.export(catalog);
    this.deps.onProgress?.({ type: "saved", location: repository.location, exportPath });

    logger.info({ added: added.length, matched }, "Download complete");
    return { added, matched, remoteTotal, exportPath };
  }
}
