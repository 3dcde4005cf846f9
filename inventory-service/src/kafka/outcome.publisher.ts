import type { Producer } from "kafkajs";
import {
  INVENTORY_FAILED_TOPIC,
  INVENTORY_RESERVED_TOPIC,
  type InventoryOutcomeEvent,
} from "../common/events/inventory.events";
import {
  DEFAULT_RETRY_POLICY,
  retry,
  withTimeout,
  type RetryPolicy,
} from "../common/retry";

export type OutcomeProducer = Pick<Producer, "send">;

export type PublishResult =
  | { ok: true; topic: string; attempts: number }
  | { ok: false; topic: string; attempts: number; error: Error };

export interface OutcomePublisherOptions {
  publishTimeoutMs?: number;
  retryPolicy?: RetryPolicy;
}

const topicFor = (outcome: InventoryOutcomeEvent): string =>
  outcome.status === "RESERVED"
    ? INVENTORY_RESERVED_TOPIC
    : INVENTORY_FAILED_TOPIC;

export class OutcomePublisher {
  private readonly publishTimeoutMs: number;
  private readonly retryPolicy: RetryPolicy;

  constructor(
    private readonly producer: OutcomeProducer,
    options: OutcomePublisherOptions = {}
  ) {
    this.publishTimeoutMs = options.publishTimeoutMs ?? 10000;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  }

  /** Never throws: a send that keeps failing is returned as `ok: false`. */
  async publish(
    outcome: InventoryOutcomeEvent,
    correlationId?: string
  ): Promise<PublishResult> {
    const topic = topicFor(outcome);
    const event: InventoryOutcomeEvent = {
      orderId: outcome.orderId,
      status: outcome.status,
      message: outcome.message,
    };
    const headers: Record<string, string> = {
      "event-type":
        outcome.status === "RESERVED" ? "InventoryReserved" : "InventoryFailed",
    };
    if (correlationId) headers.correlationId = correlationId;

    const attempt = await retry(
      () =>
        withTimeout(`publish to ${topic}`, this.publishTimeoutMs, () =>
          this.producer.send({
            topic,
            messages: [
              {
                key: String(outcome.orderId),
                value: JSON.stringify(event),
                headers,
              },
            ],
          })
        ),
      this.retryPolicy,
      {
        onRetry: (error, failedAttempt, delayMs) =>
          console.warn(
            `Publishing outcome for order ${outcome.orderId} failed, retrying in ${delayMs}ms (attempt ${failedAttempt}/${this.retryPolicy.maxAttempts})`,
            { topic, error: error.message }
          ),
      }
    );

    if (!attempt.ok) {
      return { ok: false, topic, attempts: attempt.attempts, error: attempt.error };
    }

    console.log(`Published ${event.status} outcome for order ${event.orderId}`, {
      topic,
    });
    return { ok: true, topic, attempts: attempt.attempts };
  }
}
