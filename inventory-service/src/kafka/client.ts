import { Kafka, logLevel, type Consumer, type Producer } from "kafkajs";
import type { ServiceConfig } from "../config";
import type { RestartPolicy } from "./order.consumer";

export interface KafkaClients {
  producer: Producer;
  consumer: Consumer;
}

export function createKafkaClients(
  config: ServiceConfig["kafka"],
  restartPolicy: RestartPolicy
): KafkaClients {
  const kafka = new Kafka({
    clientId: config.clientId,
    brokers: config.brokers,
    logLevel: logLevel.WARN,
    retry: {
      initialRetryTime: 100,
      retries: 8,
    },
  });

  const producer = kafka.producer({
    idempotent: true,
    maxInFlightRequests: 1,
  });

  const consumer = kafka.consumer({
    groupId: config.groupId,
    sessionTimeout: 60000,
    heartbeatInterval: 3000,
    retry: {
      retries: 5,
      restartOnFailure: restartPolicy.restartOnFailure,
    },
  });

  consumer.on(consumer.events.CRASH, ({ payload }) => {
    console.error("Consumer crashed:", payload.error.message, {
      restart: payload.restart,
    });
  });

  producer.on(producer.events.DISCONNECT, () => {
    console.warn("Producer disconnected from Kafka cluster");
  });

  return { producer, consumer };
}
