import { DuplicateStockError } from "../../common/errors";
import { sleep } from "../../common/retry";
import type {
  ReserveDecision,
  ReserveRequest,
  ReserveResult,
  StockRecord,
  StockStore,
} from "../../stock/stock.store";

/**
 * In-process StockStore. Each call yields to the event loop once (the "round
 * trip") and then checks and mutates synchronously, which gives the same
 * atomicity as the conditional UPDATE in Postgres.
 */
export class InMemoryStockStore implements StockStore {
  readonly rows = new Map<number, StockRecord>();
  readonly decisions = new Map<number, ReserveDecision>();
  reserveCalls = 0;
  /** Number of upcoming tryReserve calls that throw a connection error. */
  failNext = 0;
  /** When set, tryReserve settles only by rejecting once its signal aborts. */
  hang = false;
  /** Delay before tryReserve decides. */
  latencyMs = 0;
  /** When set, a late tryReserve commits even though its signal aborted. */
  ignoresAbort = false;

  seed(productId: number, quantity: number): this {
    this.rows.set(productId, {
      productId,
      quantity,
      updatedAt: new Date(0),
    });
    return this;
  }

  quantityOf(productId: number): number | undefined {
    return this.rows.get(productId)?.quantity;
  }

  async getQuantity(productId: number): Promise<number | null> {
    await roundTrip();
    return this.rows.get(productId)?.quantity ?? null;
  }

  async tryReserve(
    { orderId, productId, quantity }: ReserveRequest,
    signal?: AbortSignal
  ): Promise<ReserveResult> {
    this.reserveCalls++;
    if (this.hang) {
      return new Promise<never>((_, reject) => {
        signal?.addEventListener("abort", () => reject(abandoned(orderId)), {
          once: true,
        });
      });
    }
    await roundTrip();
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error("Connection terminated unexpectedly");
    }
    if (this.latencyMs > 0) await sleep(this.latencyMs);
    if (signal?.aborted && !this.ignoresAbort) throw abandoned(orderId);

    const previous = this.decisions.get(orderId);
    if (previous) return { kind: "duplicate", previous };

    const row = this.rows.get(productId);
    let result: ReserveResult;
    if (!row) {
      result = { kind: "not_found" };
    } else if (row.quantity < quantity) {
      result = { kind: "insufficient_stock", available: row.quantity };
    } else {
      row.quantity -= quantity;
      row.updatedAt = new Date();
      result = { kind: "reserved", remaining: row.quantity };
    }

    this.decisions.set(orderId, result.kind);
    return result;
  }

  async createStock(productId: number, quantity: number): Promise<void> {
    await roundTrip();
    if (this.rows.has(productId)) throw new DuplicateStockError(productId);
    this.seed(productId, quantity);
  }

  async updateStock(productId: number, quantity: number): Promise<boolean> {
    await roundTrip();
    const row = this.rows.get(productId);
    if (!row) return false;
    row.quantity = quantity;
    row.updatedAt = new Date();
    return true;
  }

  async ping(): Promise<void> {
    await roundTrip();
  }
}

const abandoned = (orderId: number) =>
  new Error(`Reservation for order ${orderId} abandoned after its deadline`);

const roundTrip = () => new Promise<void>((resolve) => setImmediate(resolve));
