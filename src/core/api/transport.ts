/**
 * Rate-Limited Transport
 *
 * Every outbound request passes through here: the API credential is attached,
 * and 429 responses are retried after the server-supplied wait. When the
 * retry budget runs out the last 429 is handed back; callers check status.
 */

import { createLogger } from "../../utils/logger.js";
import { sleep as defaultSleep } from "../../utils/async.js";

const logger = createLogger("transport");

export const API_KEY_HEADER = "x-api-key";
export const RATE_LIMIT_STATUS = 429;
export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_CUSHION_MS = 75;

export type FetchLike = (request: Request) => Promise<Response>;

/**
 * Settable credential cell, created at startup and shared by reference.
 */
export class ApiCredentials {
  private token: string | null;

  constructor(token?: string) {
    this.token = token ?? null;
  }

  get(): string | null {
    return this.token;
  }

  set(token: string): void {
    this.token = token;
  }
}

export interface TransportOptions {
  credentials?: ApiCredentials;
  /** Retries after the first attempt; the request is sent at most maxRetries + 1 times */
  maxRetries?: number;
  /** Added to every server-supplied wait */
  cushionMs?: number;
  userAgent?: string;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

export interface HttpTransport {
  send(request: Request): Promise<Response>;
}

export class RateLimitedTransport implements HttpTransport {
  private readonly credentials: ApiCredentials;
  private readonly maxRetries: number;
  private readonly cushionMs: number;
  private readonly userAgent?: string;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: TransportOptions = {}) {
    this.credentials = options.credentials ?? new ApiCredentials();
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.cushionMs = options.cushionMs ?? DEFAULT_CUSHION_MS;
    this.userAgent = options.userAgent;
    this.fetchImpl = options.fetch ?? ((request) => fetch(request));
    this.sleep = options.sleep ?? defaultSleep;
  }

  async send(request: Request): Promise<Response> {
    let current = this.authorize(request);

    for (let attempt = 0; ; attempt++) {
      // a body can only be read once, so keep a copy for the retry
      const retryCopy = current.bodyUsed ? null : current.clone();
      const response = await this.fetchImpl(current);

      if (response.status !== RATE_LIMIT_STATUS || attempt >= this.maxRetries) {
        return response;
      }

      if (!retryCopy) {
        logger.warn({ method: request.method, url: request.url }, "Rate limited, request cannot be resent");
        return response;
      }

      const waitSeconds = retryWaitSeconds(response.headers);
      logger.warn(
        { attempt: attempt + 1, waitSeconds, method: request.method, url: request.url },
        "Rate limited, retrying"
      );

      await response.body?.cancel();
      await this.sleep(waitSeconds * 1000 + this.cushionMs);
      current = retryCopy;
    }
  }

  private authorize(request: Request): Request {
    const token = this.credentials.get();
    if (!token && !this.userAgent) {
      return request;
    }

    const headers = new Headers(request.headers);
    if (token) headers.set(API_KEY_HEADER, token);
    if (this.userAgent) headers.set("user-agent", this.userAgent);
    return new Request(request, { headers });
  }
}

/**
 * Seconds to wait before retrying: `retry-after`, then `x-ratelimit-reset`, then 1.
 */
export function retryWaitSeconds(headers: Headers): number {
  return (
    parseSeconds(headers.get("retry-after")) ??
    parseSeconds(headers.get("x-ratelimit-reset")) ??
    1
  );
}

function parseSeconds(value: string | null): number | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}
