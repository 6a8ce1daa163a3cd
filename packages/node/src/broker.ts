// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { amqpBroker } from "@entity-stream/amqp";
import {
  memoryBroker,
  type BrokerAdapter,
  type LoggerAdapter,
} from "@entity-stream/core";
import { kafkaBroker } from "@entity-stream/kafka";
import { redisBroker } from "@entity-stream/redis";
import type { BrokerConfig } from "./config";

export type ClosableBroker = BrokerAdapter & { close(): Promise<void> };

/**
 * Build the broker adapter selected by configuration. Nothing connects
 * until the first publish or subscribe.
 */
export function createBroker(
  config: BrokerConfig,
  logger?: LoggerAdapter,
): ClosableBroker {
  switch (config.kind) {
    case "kafka":
      return kafkaBroker({
        brokers: [`${config.host}:${config.port}`],
        clientId: config.namespace,
        namespace: config.namespace,
        logger,
      });
    case "rabbitmq":
      return amqpBroker({
        url: amqpUrl(config),
        namespace: config.namespace,
        logger,
      });
    case "redis":
      return redisBroker({
        url: `redis://${config.host}:${config.port}`,
        namespace: config.namespace,
        logger,
      });
    case "memory":
      return memoryBroker({ logger });
  }
}

export function amqpUrl(config: BrokerConfig): string {
  const user = encodeURIComponent(config.username);
  const password = encodeURIComponent(config.password);
  return `amqp://${user}:${password}@${config.host}:${config.port}/`;
}
