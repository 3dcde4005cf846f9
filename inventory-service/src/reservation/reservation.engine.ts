import type { OrderCreatedEvent } from "../common/events/order.events";
import {
  OutcomeMessages,
  type InventoryOutcomeEvent,
} from "../common/events/inventory.events";
import { TimeoutError } from "../common/errors";
import {
  DEFAULT_RETRY_POLICY,
  retry,
  withTimeout,
  type RetryPolicy,
} from "../common/retry";
import type {
  ReserveDecision,
  ReserveRequest,
  ReserveResult,
  StockStore,
} from "../stock/stock.store";

export interface ReservationOutcome extends InventoryOutcomeEvent {
  /** True when the decision was recorded by an earlier delivery. */
  replayed: boolean;
}

export interface ReservationEngineOptions {
  storeTimeoutMs?: number;
  retryPolicy?: RetryPolicy;
}

const decisionOutcome: Record<
  ReserveDecision,
  Pick<InventoryOutcomeEvent, "status" | "message">
> = {
  reserved: { status: "RESERVED", message: OutcomeMessages.reserved },
  insufficient_stock: {
    status: "FAILED",
    message: OutcomeMessages.notEnoughStock,
  },
  not_found: { status: "FAILED", message: OutcomeMessages.productNotFound },
};

// inventories.quantity is a 32-bit INTEGER column.
const MAX_QUANTITY = 2_147_483_647;

const isPositiveInteger = (value: number) =>
  Number.isSafeInteger(value) && value > 0;

export class ReservationEngine {
  private readonly storeTimeoutMs: number;
  private readonly retryPolicy: RetryPolicy;

  constructor(
    private readonly store: StockStore,
    options: ReservationEngineOptions = {}
  ) {
    this.storeTimeoutMs = options.storeTimeoutMs ?? 5000;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  }

  async reserve(event: OrderCreatedEvent): Promise<ReservationOutcome> {
    const { orderId, productId, quantity } = event;

    if (
      !Number.isSafeInteger(orderId) ||
      !isPositiveInteger(productId) ||
      !isPositiveInteger(quantity) ||
      quantity > MAX_QUANTITY
    ) {
      console.warn(`Rejecting invalid OrderCreatedEvent for order ${orderId}`, {
        productId,
        quantity,
      });
      return this.outcome(orderId, "FAILED", OutcomeMessages.invalidEvent);
    }

    const attempt = await retry(
      () => this.attemptReserve({ orderId, productId, quantity }),
      this.retryPolicy,
      {
        onRetry: (error, failedAttempt, delayMs) =>
          console.warn(
            `Store error reserving order ${orderId}, retrying in ${delayMs}ms (attempt ${failedAttempt}/${this.retryPolicy.maxAttempts})`,
            { error: error.message }
          ),
      }
    );

    if (!attempt.ok) {
      console.error(
        `Giving up on order ${orderId} after ${attempt.attempts} store attempts`,
        { error: attempt.error.message }
      );
      return this.outcome(orderId, "FAILED", OutcomeMessages.transientError);
    }

    const result = attempt.value;
    switch (result.kind) {
      case "reserved":
        console.log(
          `Inventory reserved for order ${orderId}: ${quantity} of product ${productId}. Remaining: ${result.remaining}`
        );
        return this.fromDecision(orderId, "reserved", false);
      case "insufficient_stock":
        console.log(
          `Not enough stock for order ${orderId}: wanted ${quantity} of product ${productId}, have ${result.available}`
        );
        return this.fromDecision(orderId, "insufficient_stock", false);
      case "not_found":
        console.log(
          `Product ${productId} not found for order ${orderId}`
        );
        return this.fromDecision(orderId, "not_found", false);
      case "duplicate":
        console.log(
          `Order ${orderId} was already processed (${result.previous}), replaying its outcome`
        );
        return this.fromDecision(orderId, result.previous, true);
    }
  }

  /**
   * One store call under the deadline. On timeout the call is aborted and
   * awaited: if it still committed, that result is the decision for the
   * order and is returned instead of the timeout.
   */
  private async attemptReserve(request: ReserveRequest): Promise<ReserveResult> {
    const controller = new AbortController();
    const pending = this.store.tryReserve(request, controller.signal);

    try {
      return await withTimeout("tryReserve", this.storeTimeoutMs, () => pending);
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;
      controller.abort();

      const [late] = await Promise.allSettled([pending]);
      if (late.status === "rejected") throw error;
      console.warn(
        `tryReserve for order ${request.orderId} finished after its ${this.storeTimeoutMs}ms deadline`
      );
      return late.value;
    }
  }

  private fromDecision(
    orderId: number,
    decision: ReserveDecision,
    replayed: boolean
  ): ReservationOutcome {
    const { status, message } = decisionOutcome[decision];
    return { orderId, status, message, replayed };
  }

  private outcome(
    orderId: number,
    status: InventoryOutcomeEvent["status"],
    message: string
  ): ReservationOutcome {
    return { orderId, status, message, replayed: false };
  }
}
