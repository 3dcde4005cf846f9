import type { Consumer, EachMessagePayload } from "kafkajs";
import {
  ORDERS_TOPIC,
  decodeOrderCreatedEvent,
} from "../common/events/order.events";
import {
  DEFAULT_RETRY_POLICY,
  backoffDelay,
  sleep,
  type RetryPolicy,
} from "../common/retry";
import type { ReservationEngine } from "../reservation/reservation.engine";
import type { OutcomePublisher } from "./outcome.publisher";

export type OrderConsumerClient = Pick<
  Consumer,
  "connect" | "subscribe" | "run" | "commitOffsets" | "stop" | "disconnect"
>;

export type OrderMessage = Pick<
  EachMessagePayload,
  "topic" | "partition" | "message"
>;

export type ConsumerState = "idle" | "processing" | "publishing";

export interface ConsumerMetrics {
  received: number;
  reserved: number;
  failed: number;
  replayed: number;
  malformed: number;
  publishFailures: number;
  consumerRestarts: number;
}

/**
 * Backoff for kafkajs `retry.restartOnFailure`. Consecutive failures grow the
 * delay up to `maxDelayMs`; any committed message resets the streak.
 */
export class RestartPolicy {
  private consecutiveFailures = 0;
  private totalRestarts = 0;

  constructor(
    private readonly policy: RetryPolicy = {
      ...DEFAULT_RETRY_POLICY,
      baseDelayMs: 1000,
    }
  ) {}

  get restarts(): number {
    return this.totalRestarts;
  }

  get streak(): number {
    return this.consecutiveFailures;
  }

  restartOnFailure = async (error: Error): Promise<boolean> => {
    this.consecutiveFailures++;
    this.totalRestarts++;
    const delay = backoffDelay(this.consecutiveFailures, this.policy);

    console.error(
      `Order consumer failed (${this.consecutiveFailures} in a row), restarting in ${delay}ms`,
      { error: error.message }
    );

    await sleep(delay);
    return true;
  };

  reset(): void {
    this.consecutiveFailures = 0;
  }
}

export interface OrderConsumerOptions {
  restartPolicy?: RestartPolicy;
  /** 0 disables the periodic metrics line. */
  metricsIntervalMs?: number;
}

export class OrderConsumer {
  private currentState: ConsumerState = "idle";
  private inFlight: Promise<void> | null = null;
  private reporter: NodeJS.Timeout | null = null;
  private readonly restartPolicy: RestartPolicy;
  private readonly metricsIntervalMs: number;
  private readonly counters: Omit<ConsumerMetrics, "consumerRestarts"> = {
    received: 0,
    reserved: 0,
    failed: 0,
    replayed: 0,
    malformed: 0,
    publishFailures: 0,
  };

  constructor(
    private readonly client: OrderConsumerClient,
    private readonly engine: ReservationEngine,
    private readonly publisher: OutcomePublisher,
    options: OrderConsumerOptions = {}
  ) {
    this.restartPolicy = options.restartPolicy ?? new RestartPolicy();
    this.metricsIntervalMs = options.metricsIntervalMs ?? 15000;
  }

  get state(): ConsumerState {
    return this.currentState;
  }

  metrics(): ConsumerMetrics {
    return {
      ...this.counters,
      consumerRestarts: this.restartPolicy.restarts,
    };
  }

  async start(): Promise<void> {
    await this.client.connect();
    await this.client.subscribe({ topic: ORDERS_TOPIC, fromBeginning: true });

    if (this.metricsIntervalMs > 0) {
      this.reporter = setInterval(
        () => console.log("Order consumer metrics", this.metrics()),
        this.metricsIntervalMs
      );
      this.reporter.unref();
    }

    // One message at a time, so a partition's events are handled in publish order.
    await this.client.run({
      autoCommit: false,
      partitionsConsumedConcurrently: 1,
      eachMessage: (payload) => this.handleMessage(payload),
    });

    console.log("Inventory service is consuming order events...");
  }

  async handleMessage(payload: OrderMessage): Promise<void> {
    const cycle = this.process(payload);
    this.inFlight = cycle;
    try {
      await cycle;
    } finally {
      this.inFlight = null;
    }
  }

  /** Stops fetching, lets the in-flight cycle finish, then disconnects. */
  async stop(): Promise<void> {
    if (this.reporter) {
      clearInterval(this.reporter);
      this.reporter = null;
    }

    await this.client.stop();
    if (this.inFlight) {
      await Promise.allSettled([this.inFlight]);
    }
    await this.client.disconnect();
    console.log("Order consumer stopped", this.metrics());
  }

  private async process({
    topic,
    partition,
    message,
  }: OrderMessage): Promise<void> {
    this.counters.received++;
    this.currentState = "processing";

    try {
      const decoded = decodeOrderCreatedEvent(message.value);
      if (!decoded.ok) {
        this.counters.malformed++;
        console.error(`Skipping malformed order event`, {
          partition,
          offset: message.offset,
          reason: decoded.reason,
          originalMessage: message.value?.toString(),
        });
        await this.commit(topic, partition, message.offset);
        return;
      }

      const event = decoded.event;
      console.log(`Received OrderCreatedEvent for order ${event.orderId}`, {
        productId: event.productId,
        quantity: event.quantity,
        partition,
        offset: message.offset,
      });

      const outcome = await this.engine.reserve(event);
      if (outcome.replayed) this.counters.replayed++;
      if (outcome.status === "RESERVED") this.counters.reserved++;
      else this.counters.failed++;

      this.currentState = "publishing";
      const correlationId = message.headers?.correlationId?.toString();
      const published = await this.publisher.publish(outcome, correlationId);

      if (!published.ok) {
        this.counters.publishFailures++;
        console.error(
          `[ALERT] Could not publish outcome for order ${event.orderId} after ${published.attempts} attempts; offset ${message.offset} left uncommitted`,
          { topic: published.topic, error: published.error.message }
        );
        throw new Error(
          `Outcome for order ${event.orderId} was not published: ${published.error.message}`
        );
      }

      await this.commit(topic, partition, message.offset);
    } finally {
      this.currentState = "idle";
    }
  }

  private async commit(
    topic: string,
    partition: number,
    offset: string
  ): Promise<void> {
    await this.client.commitOffsets([
      { topic, partition, offset: (BigInt(offset) + 1n).toString() },
    ]);
    this.restartPolicy.reset();
  }
}
