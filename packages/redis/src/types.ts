// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { BrokerAdapter, LoggerAdapter } from "@entity-stream/core";

/**
 * Redis client surface used by the adapter (duck-typed against redis v4+).
 */
export interface RedisClient {
  readonly isOpen: boolean;
  connect(): Promise<unknown>;
  quit(): Promise<unknown>;
  publish(channel: string, message: string): Promise<number>;
  subscribe(
    channel: string,
    listener: (message: string, channel: string) => void,
  ): Promise<void>;
  unsubscribe(channel: string): Promise<void>;
  duplicate(): RedisClient;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "ready", listener: () => void): unknown;
}

export interface RedisBrokerOptions {
  /**
   * Redis connection URL (default: "redis://localhost:6379").
   * Mutually exclusive with `client`.
   */
  url?: string;

  /**
   * Pre-configured client. The adapter duplicates it for the subscriber
   * connection and never quits it; you own its lifecycle.
   */
  client?: RedisClient;

  /**
   * Channel prefix: topics map to `{namespace}:{topic}` (default: no prefix)
   */
  namespace?: string;

  logger?: LoggerAdapter;
}

/**
 * Redis-backed broker with connection introspection.
 */
export interface RedisBroker extends BrokerAdapter {
  readonly namespace: string;
  isConnected(): boolean;
  close(): Promise<void>;
}
