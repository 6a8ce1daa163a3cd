// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { Kafka, logLevel } from "kafkajs";
import {
  DisconnectedError,
  LOG_CONTEXT,
  PublishError,
  SubscribeError,
  TopicHandlers,
  decodePayload,
  encodePayload,
  generateId,
  isRetryableNetworkError,
  silentLogger,
  toError,
  type LoggerAdapter,
  type MessageHandler,
  type PublishResult,
  type SubscribeOptions,
  type SubscribeResult,
  type SubscriptionHandle,
} from "@entity-stream/core";
import type {
  KafkaBroker,
  KafkaBrokerOptions,
  KafkaClient,
  LogAdmin,
  LogConsumer,
  LogProducer,
} from "./types";

export const DEFAULT_NAMESPACE = "entity-stream";

/**
 * Broker adapter over a Kafka log.
 *
 * - **Topics**: created on first use with one partition and replication
 *   factor 1, so per-topic order is total
 * - **Consumers**: one per topic, in a consumer group private to this
 *   process, reading from the latest offset; every process sees every
 *   message published after it subscribed
 * - **Publish**: one send through a shared, lazily connected producer
 * - **Crashes**: a consumer crash is reported to the topic's handles;
 *   kafkajs restarts retriable crashes on its own, any other crash drops
 *   the consumer so the next subscribe starts a new one
 */
export class KafkaBrokerAdapter implements KafkaBroker {
  readonly name = "kafka";

  private readonly client: KafkaClient;
  private readonly logger: LoggerAdapter;
  private readonly handlers: TopicHandlers;
  private readonly namespace: string;
  private readonly instanceId: string;
  private readonly consumers = new Map<string, Promise<LogConsumer>>();
  private readonly running = new Map<string, LogConsumer>();
  private readonly knownTopics = new Map<string, Promise<void>>();
  private producer: Promise<LogProducer> | undefined;
  private admin: Promise<LogAdmin> | undefined;
  private closed = false;

  constructor(options: KafkaBrokerOptions = {}) {
    this.client =
      options.client ??
      new Kafka({
        clientId: options.clientId ?? DEFAULT_NAMESPACE,
        brokers: options.brokers ?? ["localhost:9092"],
        logLevel: logLevel.NOTHING,
      });
    this.namespace = options.namespace ?? DEFAULT_NAMESPACE;
    this.instanceId = options.instanceId ?? generateId("proc");
    this.logger = options.logger ?? silentLogger;
    this.handlers = new TopicHandlers(this.logger, this.name);
  }

  groupIdFor(topic: string): string {
    return `${this.namespace}-${this.instanceId}-${topic}`;
  }

  async publish(topic: string, payload: unknown): Promise<PublishResult> {
    if (this.closed) {
      return {
        ok: false,
        error: new PublishError("Cannot publish: broker is closed", {
          cause: new DisconnectedError("kafka broker closed", {
            retryable: false,
          }),
          topic,
        }),
      };
    }

    let wire: string;
    try {
      wire = encodePayload(topic, payload);
    } catch (error) {
      return {
        ok: false,
        error: new PublishError(toError(error).message, {
          cause: error,
          topic,
          retryable: false,
        }),
      };
    }

    try {
      await this.ensureTopic(topic);
      const producer = await this.connectProducer();
      await producer.send({ topic, messages: [{ value: wire }] });
      return { ok: true };
    } catch (error) {
      return {
        ok: false,
        error: new PublishError(
          `Failed to publish to "${topic}": ${toError(error).message}`,
          { cause: error, topic, retryable: isRetryableNetworkError(error) },
        ),
      };
    }
  }

  async subscribe(
    topic: string,
    handler: MessageHandler,
    subscribeOptions?: SubscribeOptions,
  ): Promise<SubscribeResult> {
    if (this.closed) {
      return {
        ok: false,
        error: new SubscribeError("Cannot subscribe: broker is closed", {
          topic,
        }),
      };
    }

    const { handle } = this.handlers.add(topic, handler, subscribeOptions);
    let consumer = this.consumers.get(topic);
    if (!consumer) {
      consumer = this.startConsumer(topic);
      this.consumers.set(topic, consumer);
    }

    try {
      await consumer;
      return { ok: true, handle };
    } catch (error) {
      if (this.consumers.get(topic) === consumer) this.consumers.delete(topic);
      this.handlers.remove(handle);
      return {
        ok: false,
        error: new SubscribeError(
          `Failed to subscribe to "${topic}": ${toError(error).message}`,
          { cause: error, topic, retryable: isRetryableNetworkError(error) },
        ),
      };
    }
  }

  async unsubscribe(handle: SubscriptionHandle): Promise<void> {
    const { last } = this.handlers.remove(handle);
    if (!last) return;

    const consumer = this.consumers.get(handle.topic);
    this.consumers.delete(handle.topic);
    this.running.delete(handle.topic);
    if (consumer) await this.stopConsumer(handle.topic, consumer);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.handlers.clear();

    const consumers = [...this.consumers.entries()];
    this.consumers.clear();
    this.running.clear();
    for (const [topic, consumer] of consumers) {
      await this.stopConsumer(topic, consumer);
    }

    for (const pending of [this.producer, this.admin]) {
      if (!pending) continue;
      try {
        const client = await pending;
        await client.disconnect();
      } catch (error) {
        this.logger.warn(LOG_CONTEXT.BROKER, "Kafka disconnect failed", {
          error: toError(error).message,
        });
      }
    }
    this.producer = undefined;
    this.admin = undefined;
  }

  private async startConsumer(topic: string): Promise<LogConsumer> {
    await this.ensureTopic(topic);

    const groupId = this.groupIdFor(topic);
    const consumer = this.client.consumer({ groupId });
    await consumer.connect();
    try {
      await consumer.subscribe({ topics: [topic], fromBeginning: false });
      consumer.on("consumer.crash", ({ payload }) => {
        this.handleCrash(topic, consumer, payload.error, payload.restart ?? false);
      });
      await consumer.run({
        eachMessage: async ({ message }) => {
          this.deliver(topic, message.value);
        },
      });
    } catch (error) {
      await consumer.disconnect().catch(() => undefined);
      throw error;
    }
    this.running.set(topic, consumer);

    this.logger.info(LOG_CONTEXT.BROKER, "Kafka consumer started", {
      topic,
      groupId,
    });
    return consumer;
  }

  private async stopConsumer(
    topic: string,
    pending: Promise<LogConsumer>,
  ): Promise<void> {
    try {
      const consumer = await pending;
      await consumer.disconnect();
    } catch (error) {
      this.logger.warn(LOG_CONTEXT.BROKER, "Kafka consumer stop failed", {
        topic,
        error: toError(error).message,
      });
    }
  }

  private deliver(topic: string, value: Buffer | null): void {
    if (value === null) return;
    let payload: unknown;
    try {
      payload = decodePayload(topic, value);
    } catch (error) {
      this.logger.error(LOG_CONTEXT.BROKER, "Dropped undecodable message", {
        topic,
        error: toError(error).message,
      });
      return;
    }
    this.handlers.dispatch(topic, payload);
  }

  private handleCrash(
    topic: string,
    consumer: LogConsumer,
    error: Error,
    restart: boolean,
  ): void {
    this.logger.error(LOG_CONTEXT.BROKER, "Kafka consumer crashed", {
      topic,
      restart,
      error: error.message,
    });
    if (!restart && this.running.get(topic) === consumer) {
      this.running.delete(topic);
      this.consumers.delete(topic);
      void this.stopConsumer(topic, Promise.resolve(consumer));
    }
    this.handlers.fail(
      topic,
      new SubscribeError(`Kafka consumer crashed: ${error.message}`, {
        cause: error,
        topic,
        retryable: restart,
      }),
    );
  }

  /**
   * Create the topic once per process. An existing topic is not an error.
   */
  private ensureTopic(topic: string): Promise<void> {
    let known = this.knownTopics.get(topic);
    if (!known) {
      known = this.createTopic(topic).catch((error: unknown) => {
        this.knownTopics.delete(topic);
        throw error;
      });
      this.knownTopics.set(topic, known);
    }
    return known;
  }

  private async createTopic(topic: string): Promise<void> {
    const admin = await this.connectAdmin();
    const created = await admin.createTopics({
      topics: [{ topic, numPartitions: 1, replicationFactor: 1 }],
    });
    if (created) {
      this.logger.info(LOG_CONTEXT.BROKER, "Created Kafka topic", { topic });
    }
  }

  private connectProducer(): Promise<LogProducer> {
    this.producer ??= connectOnce(this.client.producer(), () => {
      this.producer = undefined;
    });
    return this.producer;
  }

  private connectAdmin(): Promise<LogAdmin> {
    this.admin ??= connectOnce(this.client.admin(), () => {
      this.admin = undefined;
    });
    return this.admin;
  }
}

async function connectOnce<T extends { connect(): Promise<void> }>(
  client: T,
  onFailure: () => void,
): Promise<T> {
  try {
    await client.connect();
    return client;
  } catch (error) {
    onFailure();
    throw error;
  }
}

export function kafkaBroker(options?: KafkaBrokerOptions): KafkaBroker {
  return new KafkaBrokerAdapter(options);
}
