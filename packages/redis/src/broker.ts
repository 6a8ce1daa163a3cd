// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  ConfigurationError,
  DisconnectedError,
  LOG_CONTEXT,
  PublishError,
  SubscribeError,
  TopicHandlers,
  decodePayload,
  encodePayload,
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
import type { RedisBroker, RedisBrokerOptions, RedisClient } from "./types";

interface Clients {
  publisher: RedisClient;
  subscriber: RedisClient;
}

/**
 * Broker adapter over Redis pub/sub.
 *
 * - **Two connections**: Redis forbids PUBLISH on a subscribed connection,
 *   so the subscriber is a duplicate of the publisher
 * - **Lazy connect**: nothing is opened until the first publish or subscribe
 * - **Fail-fast publish**: a publish while Redis is unreachable fails
 *   immediately; nothing is buffered
 * - **Broadcast**: every process subscribed to a channel receives every
 *   message; per-channel FIFO only
 * - **Reconnects**: the redis client reconnects and restores channel
 *   subscriptions itself; handles stay registered throughout
 */
export class RedisBrokerAdapter implements RedisBroker {
  readonly name = "redis";
  readonly namespace: string;

  private readonly logger: LoggerAdapter;
  private readonly handlers: TopicHandlers;
  private readonly channels = new Map<string, Promise<void>>();
  /** Topics with a listener installed on the subscriber connection */
  private readonly listening = new Set<string>();
  private connecting: Promise<Clients> | undefined;
  private clients: Clients | undefined;
  private connected = false;
  private broken = false;
  private closed = false;

  constructor(private readonly options: RedisBrokerOptions = {}) {
    if (options.url && options.client) {
      throw new ConfigurationError(
        'Options "url" and "client" are mutually exclusive',
      );
    }
    this.namespace = normalizeNamespace(options.namespace);
    this.logger = options.logger ?? silentLogger;
    this.handlers = new TopicHandlers(this.logger, this.name);
  }

  isConnected(): boolean {
    return this.connected;
  }

  async publish(topic: string, payload: unknown): Promise<PublishResult> {
    if (this.closed) {
      return {
        ok: false,
        error: new PublishError("Cannot publish: broker is closed", {
          cause: new DisconnectedError("redis broker closed", {
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
      const { publisher } = await this.connect();
      await publisher.publish(this.channel(topic), wire);
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
    let ready = this.channels.get(topic);
    if (!ready) {
      ready = this.listen(topic);
      this.channels.set(topic, ready);
    }

    try {
      await ready;
      return { ok: true, handle };
    } catch (error) {
      if (this.channels.get(topic) === ready) this.channels.delete(topic);
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

    const { topic } = handle;
    const ready = this.channels.get(topic);
    this.channels.delete(topic);
    if (!ready) return;

    try {
      await ready;
      // Re-subscribed while we waited: keep the channel
      if (this.channels.has(topic) || !this.listening.has(topic)) return;
      const subscriber = this.clients?.subscriber;
      if (!subscriber) return;
      this.listening.delete(topic);
      await subscriber.unsubscribe(this.channel(topic));
    } catch (error) {
      this.logger.warn(LOG_CONTEXT.BROKER, "Redis unsubscribe failed", {
        topic,
        error: toError(error).message,
      });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.connected = false;
    this.handlers.clear();
    this.channels.clear();
    this.listening.clear();

    const clients = this.clients ?? (await this.connecting?.catch(() => undefined));
    this.clients = undefined;
    this.connecting = undefined;
    if (!clients) return;

    const quitting = [clients.subscriber];
    // A caller-supplied client stays open
    if (!this.options.client) quitting.push(clients.publisher);
    for (const client of quitting) {
      try {
        await client.quit();
      } catch (error) {
        this.logger.warn(LOG_CONTEXT.BROKER, "Redis quit failed", {
          error: toError(error).message,
        });
      }
    }
  }

  private channel(topic: string): string {
    return this.namespace ? `${this.namespace}:${topic}` : topic;
  }

  private async listen(topic: string): Promise<void> {
    const { subscriber } = await this.connect();
    if (this.listening.has(topic)) return;
    this.listening.add(topic);
    try {
      await subscriber.subscribe(this.channel(topic), (message) => {
        this.deliver(topic, message);
      });
    } catch (error) {
      this.listening.delete(topic);
      throw error;
    }
  }

  private deliver(topic: string, message: string): void {
    let payload: unknown;
    try {
      payload = decodePayload(topic, message);
    } catch (error) {
      this.logger.error(LOG_CONTEXT.BROKER, "Dropped undecodable message", {
        topic,
        error: toError(error).message,
      });
      return;
    }
    this.handlers.dispatch(topic, payload);
  }

  private connect(): Promise<Clients> {
    if (this.closed) {
      return Promise.reject(
        new DisconnectedError("redis broker closed", { retryable: false }),
      );
    }
    this.connecting ??= this.open().catch((error: unknown) => {
      this.connecting = undefined;
      throw error;
    });
    return this.connecting;
  }

  private async open(): Promise<Clients> {
    const publisher = this.options.client ?? (await this.createClientFromUrl());
    if (!publisher.isOpen) await publisher.connect();

    const subscriber = publisher.duplicate();
    subscriber.on("error", (error) => this.handleSubscriberError(error));
    subscriber.on("ready", () => {
      this.broken = false;
      this.connected = true;
    });
    if (!subscriber.isOpen) await subscriber.connect();

    publisher.on("error", (error) => {
      this.logger.error(LOG_CONTEXT.BROKER, "Redis publisher error", {
        error: error.message,
      });
    });

    this.clients = { publisher, subscriber };
    this.connected = true;
    this.logger.info(LOG_CONTEXT.BROKER, "Connected to Redis", {
      namespace: this.namespace || undefined,
    });
    return this.clients;
  }

  private async createClientFromUrl(): Promise<RedisClient> {
    const { createClient } = await import("redis");
    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    return createClient({
      url: this.options.url ?? "redis://localhost:6379",
    }) as any as RedisClient;
  }

  /**
   * Report a lost subscriber connection once per outage.
   */
  private handleSubscriberError(error: Error): void {
    this.connected = false;
    this.logger.error(LOG_CONTEXT.BROKER, "Redis subscriber error", {
      error: error.message,
    });
    if (this.broken || this.closed) return;
    this.broken = true;

    for (const topic of this.handlers.listTopics()) {
      this.handlers.fail(
        topic,
        new SubscribeError(`Redis subscription interrupted: ${error.message}`, {
          cause: error,
          topic,
          retryable: true,
        }),
      );
    }
  }
}

export function redisBroker(options?: RedisBrokerOptions): RedisBroker {
  return new RedisBrokerAdapter(options);
}

/**
 * Normalize a namespace: "app", "app:", " app : " → "app".
 *
 * @throws ConfigurationError for characters outside [A-Za-z0-9:_-]
 */
export function normalizeNamespace(ns?: string): string {
  if (!ns) return "";
  let normalized = ns.trim();
  while (normalized.length > 0 && /[:_\s]/.test(normalized.slice(-1))) {
    normalized = normalized.slice(0, -1);
  }
  if (normalized.length === 0) return "";

  if (!/^[A-Za-z0-9][A-Za-z0-9:_-]*$/.test(normalized)) {
    throw new ConfigurationError(
      `Invalid namespace "${ns}": must start with an alphanumeric and contain only alphanumerics, colons, underscores and hyphens`,
    );
  }
  return normalized;
}
