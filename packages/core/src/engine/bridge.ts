// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type {
  BrokerAdapter,
  SubscribeResult,
} from "../broker/contract";
import {
  SubscribeError,
  toError,
  type BrokerError,
} from "../error/broker";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger";

interface BridgeEntry {
  /** Identity check: handlers of a released entry must stay silent */
  readonly token: object;
  readonly subscription: Promise<SubscribeResult>;
}

export interface BrokerBridgeOptions {
  broker: BrokerAdapter;
  logger: LoggerAdapter;
  onMessage: (topic: string, payload: unknown) => void;
  onFailure: (topic: string, error: BrokerError) => void;
}

export type EnsureResult = { ok: true } | { ok: false; error: SubscribeError };

/**
 * Keeps at most one broker subscription per topic with local subscribers.
 *
 * - ensure() is called for every local subscribe; concurrent calls for the
 *   same topic share one broker subscribe
 * - release() is called when the last local subscriber leaves; the broker
 *   subscription is dropped once its subscribe settles
 * - a failed subscribe leaves no entry, so the next ensure() retries
 * - a non-retryable failure of an established subscription releases it,
 *   so the next ensure() subscribes again
 */
export class BrokerBridge {
  private readonly entries = new Map<string, BridgeEntry>();
  private readonly releases = new Set<Promise<void>>();

  constructor(private readonly options: BrokerBridgeOptions) {}

  get size(): number {
    return this.entries.size;
  }

  has(topic: string): boolean {
    return this.entries.has(topic);
  }

  async ensure(topic: string): Promise<EnsureResult> {
    let entry = this.entries.get(topic);
    if (!entry) {
      entry = this.subscribe(topic);
      this.entries.set(topic, entry);
    }

    const result = await entry.subscription;
    if (result.ok) return { ok: true };

    if (this.entries.get(topic) === entry) this.entries.delete(topic);
    return { ok: false, error: result.error };
  }

  release(topic: string): void {
    const entry = this.entries.get(topic);
    if (!entry) return;
    this.entries.delete(topic);

    const pending = this.unsubscribe(topic, entry).finally(() => {
      this.releases.delete(pending);
    });
    this.releases.add(pending);
  }

  /**
   * Release every topic and wait for the broker unsubscribes to finish.
   */
  async close(): Promise<void> {
    for (const topic of [...this.entries.keys()]) this.release(topic);
    await Promise.allSettled([...this.releases]);
  }

  private subscribe(topic: string): BridgeEntry {
    const token = {};
    const isCurrent = (): boolean => this.entries.get(topic)?.token === token;

    const subscription = this.options.broker
      .subscribe(
        topic,
        (payload) => {
          if (isCurrent()) this.options.onMessage(topic, payload);
        },
        {
          onError: (error) => {
            if (!isCurrent()) return;
            if (!error.retryable) this.release(topic);
            this.options.onFailure(topic, error);
          },
        },
      )
      .catch(
        (error: unknown): SubscribeResult => ({
          ok: false,
          error: new SubscribeError(toError(error).message, {
            cause: error,
            topic,
          }),
        }),
      );

    return { token, subscription };
  }

  private async unsubscribe(topic: string, entry: BridgeEntry): Promise<void> {
    const result = await entry.subscription;
    if (!result.ok) return;
    try {
      await this.options.broker.unsubscribe(result.handle);
      this.options.logger.debug(LOG_CONTEXT.BROKER, "Released topic", {
        topic,
      });
    } catch (error) {
      this.options.logger.warn(LOG_CONTEXT.BROKER, "Broker unsubscribe failed", {
        topic,
        error: toError(error).message,
      });
    }
  }
}
