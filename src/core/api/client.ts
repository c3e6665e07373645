/**
 * Open Cloud client for game passes and developer products.
 */

import type { z } from "zod";
import { ApiError, ErrorCode, errorMessage } from "../errors.js";
import type { ProductKind, RemoteCatalog } from "../catalog/models.js";
import { createLogger } from "../../utils/logger.js";
import { formatZodError } from "../../utils/validation.js";
import type { IProductApi } from "./interfaces/IProductApi.js";
import {
  developerProductToProduct,
  gamePassToProduct,
  toFormData,
  type ProductUpdateRequest,
} from "./mapping.js";
import { fetchAllPages, statusError, DEFAULT_PAGE_SIZE } from "./pagination.js";
import {
  DeveloperProductPageSchema,
  DeveloperProductSchema,
  GamePassPageSchema,
  GamePassSchema,
  type DeveloperProduct,
  type GamePass,
} from "./schemas.js";
import type { HttpTransport } from "./transport.js";
import { DEFAULT_API_BASE_URL } from "../config.js";

const logger = createLogger("api");

export interface ProductApiClientConfig {
  transport: HttpTransport;
  baseUrl?: string;
  pageSize?: number;
}

export class ProductApiClient implements IProductApi {
  private readonly transport: HttpTransport;
  private readonly baseUrl: string;
  private readonly pageSize: number;

  constructor(config: ProductApiClientConfig) {
    this.transport = config.transport;
    this.baseUrl = (config.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/$/, "");
    this.pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  // ===========================================================================
  // Listing
  // ===========================================================================

  async listGamePasses(universeId: number): Promise<GamePass[]> {
    return fetchAllPages(this.transport, {
      url: `${this.gamePassBase(universeId)}/creator`,
      schema: GamePassPageSchema,
      pageSize: this.pageSize,
    });
  }

  async listDeveloperProducts(universeId: number): Promise<DeveloperProduct[]> {
    return fetchAllPages(this.transport, {
      url: `${this.developerProductBase(universeId)}/creator`,
      schema: DeveloperProductPageSchema,
      pageSize: this.pageSize,
    });
  }

  async fetchRemoteCatalog(universeId: number): Promise<RemoteCatalog> {
    const gamepasses = await this.listGamePasses(universeId);
    const products = await this.listDeveloperProducts(universeId);

    logger.info(
      { universeId, gamepasses: gamepasses.length, products: products.length },
      "Fetched remote catalog"
    );

    return {
      gamepasses: gamepasses.map(gamePassToProduct),
      products: products.map(developerProductToProduct),
    };
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  async createGamePass(universeId: number, request: ProductUpdateRequest): Promise<GamePass> {
    const url = this.gamePassBase(universeId);
    const body = await this.submit("POST", url, request);
    return parseRecord(GamePassSchema, body, url);
  }

  async createDeveloperProduct(
    universeId: number,
    request: ProductUpdateRequest
  ): Promise<DeveloperProduct> {
    const url = this.developerProductBase(universeId);
    const body = await this.submit("POST", url, request);
    return parseRecord(DeveloperProductSchema, body, url);
  }

  async updateGamePass(
    universeId: number,
    gamePassId: number,
    request: ProductUpdateRequest
  ): Promise<void> {
    await this.submit("PATCH", `${this.gamePassBase(universeId)}/${gamePassId}`, request, false);
  }

  async updateDeveloperProduct(
    universeId: number,
    productId: number,
    request: ProductUpdateRequest
  ): Promise<void> {
    await this.submit("PATCH", `${this.developerProductBase(universeId)}/${productId}`, request, false);
  }

  async createProduct(
    kind: ProductKind,
    universeId: number,
    request: ProductUpdateRequest
  ): Promise<number> {
    if (kind === "gamepass") {
      return (await this.createGamePass(universeId, request)).gamePassId;
    }
    return (await this.createDeveloperProduct(universeId, request)).productId;
  }

  async updateProduct(
    kind: ProductKind,
    universeId: number,
    productId: number,
    request: ProductUpdateRequest
  ): Promise<void> {
    if (kind === "gamepass") {
      await this.updateGamePass(universeId, productId, request);
    } else {
      await this.updateDeveloperProduct(universeId, productId, request);
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private gamePassBase(universeId: number): string {
    return `${this.baseUrl}/game-passes/v1/universes/${universeId}/game-passes`;
  }

  private developerProductBase(universeId: number): string {
    return `${this.baseUrl}/developer-products/v2/universes/${universeId}/developer-products`;
  }

  /**
   * Sends a multipart request and returns the decoded JSON body when `readBody` is set.
   */
  private async submit(
    method: "POST" | "PATCH",
    url: string,
    request: ProductUpdateRequest,
    readBody = true
  ): Promise<unknown> {
    let response: Response;
    try {
      response = await this.transport.send(
        new Request(url, { method, body: toFormData(request) })
      );
    } catch (error) {
      throw new ApiError(`Request failed: ${errorMessage(error)}`, ErrorCode.API_NETWORK_ERROR, {
        url,
      });
    }

    if (!response.ok) {
      throw await statusError(response, url);
    }

    if (!readBody) {
      await response.body?.cancel();
      return undefined;
    }

    try {
      return await response.json();
    } catch (error) {
      throw new ApiError(
        `Invalid JSON response: ${errorMessage(error)}`,
        ErrorCode.API_INVALID_RESPONSE,
        { url, status: response.status }
      );
    }
  }
}

function parseRecord<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
  url: string
): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ApiError(
      `Unexpected response payload: ${formatZodError(result.error).join("; ")}`,
      ErrorCode.API_INVALID_RESPONSE,
      { url }
    );
  }
  return result.data;
}
