// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { BrokerAdapter, LoggerAdapter } from "@entity-stream/core";

/*
 * The slice of the kafkajs client the adapter uses. A `Kafka` instance from
 * kafkajs satisfies it; tests pass an in-process fake.
 */

export interface LogMessage {
  value: Buffer | null;
}

export interface LogMessagePayload {
  topic: string;
  partition: number;
  message: LogMessage;
}

export interface LogProducer {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  send(record: {
    topic: string;
    messages: Array<{ value: string }>;
  }): Promise<unknown>;
}

export interface LogConsumerCrash {
  payload: { error: Error; restart?: boolean };
}

export interface LogConsumer {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  subscribe(subscription: {
    topics: string[];
    fromBeginning: boolean;
  }): Promise<void>;
  run(config: {
    eachMessage: (payload: LogMessagePayload) => Promise<void>;
  }): Promise<void>;
  on(
    event: "consumer.crash",
    listener: (event: LogConsumerCrash) => void,
  ): unknown;
}

export interface LogAdmin {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  createTopics(options: {
    topics: Array<{
      topic: string;
      numPartitions: number;
      replicationFactor: number;
    }>;
  }): Promise<boolean>;
}

export interface KafkaClient {
  producer(): LogProducer;
  consumer(config: { groupId: string }): LogConsumer;
  admin(): LogAdmin;
}

export interface KafkaBrokerOptions {
  /** Bootstrap servers, e.g. ["localhost:9092"]. Ignored when `client` is set. */
  brokers?: string[];
  clientId?: string;
  /** Pre-built client; takes precedence over `brokers` */
  client?: KafkaClient;
  /**
   * Prefix for consumer groups (default: "entity-stream"). Each process
   * and topic gets its own group so every process sees every message.
   */
  namespace?: string;
  /** Distinguishes this process in consumer group ids (default: random) */
  instanceId?: string;
  logger?: LoggerAdapter;
}

export interface KafkaBroker extends BrokerAdapter {
  /** Consumer group used for a topic by this process */
  groupIdFor(topic: string): string;
  close(): Promise<void>;
}
