/**
 * Product API Interface
 *
 * Remote operations the sync engine needs from the platform.
 */

import type { ProductKind, RemoteCatalog } from "../../catalog/models.js";
import type { ProductUpdateRequest } from "../mapping.js";

export interface IProductApi {
  /**
   * Fetches every game pass and developer product of a universe.
   * @throws {ApiError} on the first failed page
   */
  fetchRemoteCatalog(universeId: number): Promise<RemoteCatalog>;

  /**
   * Creates a product and returns its new remote id.
   */
  createProduct(kind: ProductKind, universeId: number, request: ProductUpdateRequest): Promise<number>;

  updateProduct(
    kind: ProductKind,
    universeId: number,
    productId: number,
    request: ProductUpdateRequest
  ): Promise<void>;
}
