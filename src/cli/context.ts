/**
 * Wiring shared by the download and sync commands.
 */

import chalk from "chalk";
import type { Ora } from "ora";
import { loadConfig, type SyncConfig } from "../core/config.js";
import { ApiCredentials, RateLimitedTransport } from "../core/api/transport.js";
import { ProductApiClient } from "../core/api/client.js";
import { TomlCatalogStore } from "../core/catalog/toml-store.js";
import type { SyncDependencies, SyncProgressEvent } from "../core/sync/types.js";
import { getCatalogPath } from "../utils/index.js";

export const CLI_VERSION = "0.1.0";
export const USER_AGENT = `product-sync/${CLI_VERSION}`;

export interface GlobalOptions {
  overwrite?: boolean;
  yes?: boolean;
  catalog?: string;
  debug?: boolean;
}

export interface CommandContext {
  config: SyncConfig;
  deps: SyncDependencies;
}

export function catalogPath(options: GlobalOptions): string {
  return options.catalog ?? getCatalogPath();
}

export function createContext(options: GlobalOptions, spinner?: Ora): CommandContext {
  const config = loadConfig();
  const transport = new RateLimitedTransport({
    credentials: new ApiCredentials(config.apiKey),
    maxRetries: config.maxRateLimitRetries,
    userAgent: USER_AGENT,
  });

  return {
    config,
    deps: {
      api: new ProductApiClient({ transport, baseUrl: config.apiBaseUrl }),
      repository: new TomlCatalogStore(catalogPath(options)),
      onProgress: spinner ? (event) => reportProgress(spinner, event) : undefined,
    },
  };
}

/**
 * Drives the spinner from orchestrator events. The spinner is stopped once the
 * remote state is in, so confirmation prompts get a clean terminal.
 */
export function reportProgress(spinner: Ora, event: SyncProgressEvent): void {
  switch (event.type) {
    case "loading-catalog":
      spinner.start(`Loading ${event.location}...`);
      break;
    case "fetching-remote":
      spinner.text = `Fetching products for universe ${event.universeId}...`;
      break;
    case "fetched-remote":
      spinner.succeed(
        `Fetched ${event.gamepasses} game passes and ${event.products} developer products`
      );
      break;
    case "creating":
      spinner.start(`Creating ${event.total} products...`);
      break;
    case "updating":
      spinner.start(`Syncing ${event.total} products...`);
      break;
    case "saved":
      spinner.succeed(
        event.exportPath
          ? `Saved ${event.location} and ${chalk.dim(event.exportPath)}`
          : `Saved ${event.location}`
      );
      break;
  }
}
