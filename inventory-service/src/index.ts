import "dotenv/config";
import type { Server } from "node:http";
import { loadConfig } from "./config";
import { createPool } from "./db";
import { createApp } from "./http/app";
import { createKafkaClients } from "./kafka/client";
import { OrderConsumer, RestartPolicy } from "./kafka/order.consumer";
import { OutcomePublisher } from "./kafka/outcome.publisher";
import { ReservationEngine } from "./reservation/reservation.engine";
import { PgStockStore } from "./stock/pg-stock.store";

const run = async () => {
  const startedAt = Date.now();
  const config = loadConfig();

  const pool = createPool(config.databaseUrl, config.storeTimeoutMs);
  const store = new PgStockStore(pool, {
    statementTimeoutMs: config.storeTimeoutMs,
  });
  await store.ping();
  await store.migrate();
  console.log("Connected to PostgreSQL");

  const restartPolicy = new RestartPolicy();
  const { producer, consumer } = createKafkaClients(config.kafka, restartPolicy);
  await producer.connect();

  const engine = new ReservationEngine(store, {
    storeTimeoutMs: config.storeTimeoutMs,
    retryPolicy: config.retryPolicy,
  });
  const publisher = new OutcomePublisher(producer, {
    publishTimeoutMs: config.publishTimeoutMs,
    retryPolicy: config.retryPolicy,
  });
  const orderConsumer = new OrderConsumer(consumer, engine, publisher, {
    restartPolicy,
  });
  await orderConsumer.start();

  const app = createApp(store);
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.port, () => resolve(listening));
  });

  console.log(`Startup complete in ${Date.now() - startedAt}ms`);
  console.log(`inventory-service listening on port ${config.port}`);

  let isShuttingDown = false;
  const gracefulShutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    console.log(`${signal} received, shutting down inventory service...`);

    try {
      await new Promise<void>((resolve, reject) =>
        server.close((error) => (error ? reject(error) : resolve()))
      );
      await orderConsumer.stop();
      await producer.disconnect();
      await pool.end();
      process.exit(0);
    } catch (error) {
      console.error("Error during shutdown:", (error as Error).message);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
};

run().catch((e: Error) => {
  console.error("[inventory-service] Error:", e.message);
  process.exit(1);
});
