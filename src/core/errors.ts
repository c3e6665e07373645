/**
 * Error Classes for product-sync
 * Structured error handling with error codes
 */

import type { ProductKind } from "./catalog/models.js";

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Catalog errors (1xxx)
  CATALOG_NOT_FOUND = "E1000",
  CATALOG_ALREADY_EXISTS = "E1001",
  CATALOG_PARSE_FAILED = "E1002",
  CATALOG_INVALID = "E1003",
  CATALOG_WRITE_FAILED = "E1004",
  EXPORT_WRITE_FAILED = "E1005",

  // Remote API errors (2xxx)
  API_REQUEST_FAILED = "E2000",
  API_RATE_LIMITED = "E2001",
  API_INVALID_RESPONSE = "E2002",
  API_NETWORK_ERROR = "E2003",

  // Sync errors (3xxx)
  SYNC_UPDATE_FAILED = "E3001",
  SYNC_PRODUCT_NOT_FOUND = "E3002",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all product-sync errors
 */
export class ProductSyncError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ProductSyncError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Errors reading, validating or writing the local catalog
 */
export class CatalogError extends ProductSyncError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CATALOG_INVALID,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "CatalogError";
    this.filePath = context?.filePath;
  }

  override toString(): string {
    const location = this.filePath ? ` (${this.filePath})` : "";
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * Remote API errors. `status` is absent for network and decoding failures.
 */
export class ApiError extends ProductSyncError {
  public readonly status?: number;
  public readonly url?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.API_REQUEST_FAILED,
    context?: Record<string, unknown> & { status?: number; url?: string }
  ) {
    super(message, code, context);
    this.name = "ApiError";
    this.status = context?.status;
    this.url = context?.url;
  }
}

/**
 * Errors raised while pushing local changes to the platform
 */
export class SyncError extends ProductSyncError {
  public readonly kind?: ProductKind;
  public readonly productId?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SYNC_UPDATE_FAILED,
    context?: Record<string, unknown> & { kind?: ProductKind; productId?: number }
  ) {
    super(message, code, context);
    this.name = "SyncError";
    this.kind = context?.kind;
    this.productId = context?.productId;
  }
}

/**
 * Check if an error is a ProductSyncError
 */
export function isProductSyncError(error: unknown): error is ProductSyncError {
  return error instanceof ProductSyncError;
}

/**
 * Wrap an unknown error in a ProductSyncError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): ProductSyncError {
  if (isProductSyncError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new ProductSyncError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new ProductSyncError(
    typeof error === "string" ? error : defaultMessage,
    code
  );
}

/**
 * Best-effort message extraction for log lines and summaries
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : String(error);
}
