/**
 * Cursor pagination over the platform's list endpoints.
 */

import type { z } from "zod";
import { ApiError, ErrorCode, errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { formatZodError } from "../../utils/validation.js";
import type { HttpTransport } from "./transport.js";
import type { Page } from "./schemas.js";

const logger = createLogger("pagination");

export const DEFAULT_PAGE_SIZE = 100;

export interface PaginatedListing<T> {
  url: string;
  schema: z.ZodType<Page<T>, z.ZodTypeDef, unknown>;
  pageSize?: number;
}

/**
 * Walks every page of a listing and returns the items in server order.
 * Pages are requested one after another; the first failure aborts the walk.
 *
 * @throws {ApiError} on network failure, non-2xx status or a malformed page
 */
export async function fetchAllPages<T>(
  transport: HttpTransport,
  listing: PaginatedListing<T>
): Promise<T[]> {
  const pageSize = listing.pageSize ?? DEFAULT_PAGE_SIZE;
  const items: T[] = [];
  let cursor: string | null = null;
  let pages = 0;

  do {
    const url = new URL(listing.url);
    url.searchParams.set("pageSize", String(pageSize));
    if (cursor !== null) {
      url.searchParams.set("pageToken", cursor);
    }

    const body = await getJson(transport, url.toString());
    const result = listing.schema.safeParse(body);
    if (!result.success) {
      throw new ApiError(
        `Unexpected page payload: ${formatZodError(result.error).join("; ")}`,
        ErrorCode.API_INVALID_RESPONSE,
        { url: url.toString() }
      );
    }

    items.push(...result.data.items);
    cursor = result.data.nextPageToken;
    pages++;
  } while (cursor !== null);

  logger.debug({ url: listing.url, pages, items: items.length }, "Fetched listing");
  return items;
}

/**
 * GET a JSON document, mapping every failure to ApiError.
 */
export async function getJson(transport: HttpTransport, url: string): Promise<unknown> {
  let response: Response;
  try {
    response = await transport.send(new Request(url, { method: "GET" }));
  } catch (error) {
    throw new ApiError(`Request failed: ${errorMessage(error)}`, ErrorCode.API_NETWORK_ERROR, { url });
  }

  if (!response.ok) {
    throw await statusError(response, url);
  }

  try {
    return await response.json();
  } catch (error) {
    throw new ApiError(`Invalid JSON response: ${errorMessage(error)}`, ErrorCode.API_INVALID_RESPONSE, {
      url,
      status: response.status,
    });
  }
}

/**
 * Builds the ApiError for a non-2xx response, including the body text when readable.
 */
export async function statusError(response: Response, url: string): Promise<ApiError> {
  const detail = await response.text().catch(() => "");
  const code =
    response.status === 429 ? ErrorCode.API_RATE_LIMITED : ErrorCode.API_REQUEST_FAILED;
  const suffix = detail ? `: ${detail.slice(0, 200)}` : "";
  return new ApiError(`API error ${response.status}${suffix}`, code, {
    url,
    status: response.status,
  });
}
