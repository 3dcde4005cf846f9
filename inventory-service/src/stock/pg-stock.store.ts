import { z } from "zod";
import { DuplicateStockError } from "../common/errors";
import type {
  ReserveDecision,
  ReserveRequest,
  ReserveResult,
  StockStore,
} from "./stock.store";

export interface SqlResult {
  rows: unknown[];
  rowCount: number | null;
}

export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<SqlResult>;
}

export interface SqlPoolClient extends SqlClient {
  release(): void;
}

/** The slice of `pg.Pool` the store needs. */
export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
}

const quantityRow = z.object({ quantity: z.coerce.number().int() });
const decisionRow = z.object({
  result: z.enum(["reserved", "insufficient_stock", "not_found"]),
});

const UNIQUE_VIOLATION = "23505";

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS inventories (
    product_id BIGINT PRIMARY KEY,
    quantity INTEGER NOT NULL CHECK (quantity >= 0),
    updated_at TIMESTAMP NOT NULL DEFAULT NOW()
  );

  CREATE TABLE IF NOT EXISTS processed_orders (
    order_id BIGINT PRIMARY KEY,
    product_id BIGINT NOT NULL,
    quantity INTEGER NOT NULL,
    result VARCHAR(32) NOT NULL,
    processed_at TIMESTAMP NOT NULL DEFAULT NOW()
  );
`;

export interface PgStockStoreOptions {
  /** Server-side limit on each statement inside a reservation. */
  statementTimeoutMs?: number;
}

export class PgStockStore implements StockStore {
  private readonly statementTimeoutMs: number;

  constructor(
    private readonly pool: SqlPool,
    options: PgStockStoreOptions = {}
  ) {
    this.statementTimeoutMs = options.statementTimeoutMs ?? 5000;
  }

  async migrate(): Promise<void> {
    await this.pool.query(SCHEMA_SQL);
  }

  async ping(): Promise<void> {
    await this.pool.query("SELECT 1");
  }

  async getQuantity(productId: number): Promise<number | null> {
    const result = await this.pool.query(
      "SELECT quantity FROM inventories WHERE product_id = $1",
      [productId]
    );
    if (result.rows.length === 0) return null;
    return quantityRow.parse(result.rows[0]).quantity;
  }

  async createStock(productId: number, quantity: number): Promise<void> {
    try {
      await this.pool.query(
        "INSERT INTO inventories (product_id, quantity, updated_at) VALUES ($1, $2, NOW())",
        [productId, quantity]
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateStockError(productId);
      }
      throw error;
    }
  }

  async updateStock(productId: number, quantity: number): Promise<boolean> {
    const result = await this.pool.query(
      "UPDATE inventories SET quantity = $1, updated_at = NOW() WHERE product_id = $2",
      [quantity, productId]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async tryReserve(
    { orderId, productId, quantity }: ReserveRequest,
    signal?: AbortSignal
  ): Promise<ReserveResult> {
    const client = await this.pool.connect();

    try {
      await client.query("BEGIN");
      await client.query("SELECT set_config('statement_timeout', $1, true)", [
        String(this.statementTimeoutMs),
      ]);

      const previous = await this.findDecision(client, orderId);
      if (previous) {
        await client.query("COMMIT");
        return { kind: "duplicate", previous };
      }

      // Check and decrement in one statement; a concurrent reservation for
      // the same row waits on the row lock and re-evaluates the condition.
      const updated = await client.query(
        `UPDATE inventories
            SET quantity = quantity - $1, updated_at = NOW()
          WHERE product_id = $2 AND quantity >= $1
          RETURNING quantity`,
        [quantity, productId]
      );

      let result: ReserveResult;
      if (updated.rows.length > 0) {
        result = {
          kind: "reserved",
          remaining: quantityRow.parse(updated.rows[0]).quantity,
        };
      } else {
        const current = await client.query(
          "SELECT quantity FROM inventories WHERE product_id = $1",
          [productId]
        );
        result =
          current.rows.length === 0
            ? { kind: "not_found" }
            : {
                kind: "insufficient_stock",
                available: quantityRow.parse(current.rows[0]).quantity,
              };
      }

      const claimed = await client.query(
        `INSERT INTO processed_orders (order_id, product_id, quantity, result)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (order_id) DO NOTHING
         RETURNING order_id`,
        [orderId, productId, quantity, result.kind]
      );

      if (claimed.rows.length === 0) {
        // Another delivery of this order committed first: undo our decrement.
        await client.query("ROLLBACK");
        const winner = await this.findDecision(this.pool, orderId);
        if (!winner) {
          throw new Error(
            `Order ${orderId} conflicted in processed_orders but no decision was found`
          );
        }
        return { kind: "duplicate", previous: winner };
      }

      // The caller stopped waiting: roll back rather than commit a decision
      // it will never report.
      if (signal?.aborted) {
        throw new Error(
          `Reservation for order ${orderId} abandoned after its deadline`
        );
      }

      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client
        .query("ROLLBACK")
        .catch((rollbackError: Error) =>
          console.error("[stock] Rollback failed:", rollbackError.message)
        );
      throw error;
    } finally {
      client.release();
    }
  }

  private async findDecision(
    client: SqlClient,
    orderId: number
  ): Promise<ReserveDecision | null> {
    const result = await client.query(
      "SELECT result FROM processed_orders WHERE order_id = $1",
      [orderId]
    );
    if (result.rows.length === 0) return null;
    return decisionRow.parse(result.rows[0]).result;
  }
}

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === UNIQUE_VIOLATION
  );
}
