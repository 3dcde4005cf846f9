export class TimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export class DuplicateStockError extends Error {
  constructor(readonly productId: number) {
    super(`Inventory for product ${productId} already exists`);
    this.name = "DuplicateStockError";
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join(", ")}`);
    this.name = "ConfigError";
  }
}
