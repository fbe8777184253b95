/**
 * Error types
 *
 * Precondition violations fail fast with one of these. Upstream collaborator
 * failures are caught at their boundary and never surface as exceptions
 * from the analytics functions.
 */

export class MarketBalanceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MarketBalanceError';
  }
}

/**
 * A price sample contained a value that is not a positive finite number.
 */
export class InvalidPriceSampleError extends MarketBalanceError {
  readonly index: number;
  readonly value: unknown;

  constructor(index: number, value: unknown) {
    super(`Invalid price at index ${index}: ${String(value)} (expected a positive number)`);
    this.name = 'InvalidPriceSampleError';
    this.index = index;
    this.value = value;
  }
}

export class UnknownProductError extends MarketBalanceError {
  readonly productId: number;

  constructor(productId: number) {
    super(`Unknown product id ${productId}`);
    this.name = 'UnknownProductError';
    this.productId = productId;
  }
}

/**
 * A snapshot dated before the product's latest one.
 */
export class SnapshotOrderError extends MarketBalanceError {
  readonly productId: number;

  constructor(productId: number, recordedAt: Date, latestAt: Date) {
    super(
      `Snapshot for product ${productId} at ${recordedAt.toISOString()} is older than its latest (${latestAt.toISOString()})`,
    );
    this.name = 'SnapshotOrderError';
    this.productId = productId;
  }
}

export class ConfigError extends MarketBalanceError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Non-2xx response from a marketplace endpoint.
 */
export class MarketplaceApiError extends MarketBalanceError {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = 'MarketplaceApiError';
    this.statusCode = statusCode;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
