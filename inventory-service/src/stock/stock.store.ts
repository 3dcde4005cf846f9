export interface StockRecord {
  productId: number;
  quantity: number;
  updatedAt: Date;
}

export interface ReserveRequest {
  orderId: number;
  productId: number;
  quantity: number;
}

/** The decision recorded for an order the first time it is processed. */
export type ReserveDecision = "reserved" | "insufficient_stock" | "not_found";

export type ReserveResult =
  | { kind: "reserved"; remaining: number }
  | { kind: "insufficient_stock"; available: number }
  | { kind: "not_found" }
  | { kind: "duplicate"; previous: ReserveDecision };

/**
 * Durable stock levels shared by the HTTP API and the order consumer.
 *
 * `tryReserve` is the only mutation the consumer performs. Implementations
 * must decrement with a single conditional update (never read-then-write)
 * and record the decision for `orderId` in the same unit of work, so that a
 * redelivered order comes back as `duplicate` instead of decrementing twice.
 */
export interface StockStore {
  getQuantity(productId: number): Promise<number | null>;
  /**
   * Once `signal` aborts, the attempt must either roll back and reject, or
   * resolve with what it already committed.
   */
  tryReserve(
    request: ReserveRequest,
    signal?: AbortSignal
  ): Promise<ReserveResult>;
  /** @throws DuplicateStockError when the product already has a row */
  createStock(productId: number, quantity: number): Promise<void>;
  /** Resolves false when no row exists for the product. */
  updateStock(productId: number, quantity: number): Promise<boolean>;
  ping(): Promise<void>;
}
