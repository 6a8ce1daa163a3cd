// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { TopicAuthorizer } from "../authorizer";
import type { BrokerAdapter } from "../broker/contract";
import { toError } from "../error/broker";
import type { StreamErrorCode } from "../error/codes";
import { StreamError } from "../error/error";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger";
import {
  connectEnvelope,
  errorEnvelope,
  publishedEnvelope,
  subscribedEnvelope,
  unsubscribedEnvelope,
} from "../protocol/envelopes";
import { parseInbound } from "../protocol/schema";
import type { Connection } from "../registry/connection";
import { RegistryError, type ConnectionRegistry } from "../registry/registry";
import type { InboundEnvelope, OutboundEnvelope } from "../types";
import type { BrokerBridge } from "./bridge";

export type SessionState = "CONNECTING" | "OPEN" | "CLOSED";

export interface SessionContext {
  registry: ConnectionRegistry;
  bridge: BrokerBridge;
  broker: BrokerAdapter;
  authorizer: TopicAuthorizer;
  logger: LoggerAdapter;
  onClosed?: (session: ProtocolSession) => void;
}

/** Close code used when registry state can no longer be trusted */
export const CLOSE_INTERNAL_ERROR = 1011;

/**
 * Protocol state machine for one connection.
 *
 * CONNECTING → OPEN on open(), OPEN → CLOSED on close or transport loss.
 * Frames are processed one at a time in arrival order; a frame's reply is
 * written before the next frame is looked at.
 */
export class ProtocolSession {
  private current: SessionState = "CONNECTING";
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly context: SessionContext,
    readonly connection: Connection,
  ) {}

  get id(): string {
    return this.connection.id;
  }

  get state(): SessionState {
    return this.current;
  }

  /**
   * Register the connection and greet the client.
   */
  open(): void {
    if (this.current !== "CONNECTING") return;
    this.context.registry.register(this.connection);
    this.current = "OPEN";

    const { principal } = this.connection;
    this.context.logger.info(LOG_CONTEXT.CONNECTION, "Connection opened", {
      connectionId: this.id,
      userId: principal.id,
    });
    this.reply(connectEnvelope(principal.username ?? principal.id));
  }

  /**
   * Queue one inbound text frame. Resolves once it has been handled.
   */
  receive(raw: string): Promise<void> {
    if (this.current !== "OPEN") return this.tail;
    this.tail = this.tail.then(() => this.process(raw));
    return this.tail;
  }

  /**
   * Resolves when every frame received so far has been handled.
   */
  idle(): Promise<void> {
    return this.tail;
  }

  /**
   * Server-initiated close.
   */
  close(code = 1000, reason = ""): void {
    if (this.current === "CLOSED") return;
    this.connection.close(code, reason);
    this.handleClose();
  }

  /**
   * The transport is gone: drop every subscription of this connection and
   * release broker subscriptions nobody else needs. Idempotent.
   */
  handleClose(): void {
    if (this.current === "CLOSED") return;
    const wasOpen = this.current === "OPEN";
    this.current = "CLOSED";
    this.connection.markClosed();

    if (wasOpen) {
      const emptied = this.context.registry.deregister(this.id);
      for (const topic of emptied) this.context.bridge.release(topic);
      this.context.logger.info(LOG_CONTEXT.CONNECTION, "Connection closed", {
        connectionId: this.id,
        releasedTopics: emptied.length,
      });
    }
    this.context.onClosed?.(this);
  }

  private async process(raw: string): Promise<void> {
    if (this.current !== "OPEN") return;

    const parsed = parseInbound(raw);
    if (!parsed.ok) {
      this.replyError(parsed.code, parsed.message, parsed.topic);
      return;
    }

    const { envelope } = parsed;
    try {
      switch (envelope.operation) {
        case "subscribe":
          await this.subscribe(envelope.topic);
          break;
        case "unsubscribe":
          this.unsubscribe(envelope.topic);
          break;
        case "publish":
          await this.publish(envelope);
          break;
      }
    } catch (error) {
      this.context.logger.error(LOG_CONTEXT.CONNECTION, "Frame handling failed", {
        connectionId: this.id,
        operation: envelope.operation,
        topic: envelope.topic,
        error: toError(error).message,
      });
      const { code, message } = StreamError.wrap(error).toJSON();
      this.replyError(code, message, envelope.topic);
      if (error instanceof RegistryError) {
        this.close(CLOSE_INTERNAL_ERROR, "Internal error");
      }
    }
  }

  private async subscribe(topic: string): Promise<void> {
    const { registry, bridge, authorizer, logger } = this.context;
    if (!authorizer.authorize(this.connection.principal, topic, "subscribe")) {
      this.replyError(
        "PERMISSION_DENIED",
        `No permission to subscribe to topic: ${topic}`,
        topic,
      );
      return;
    }

    registry.addSubscription(this.id, topic);
    const result = await bridge.ensure(topic);

    // Closed while the broker subscribe was in flight; handleClose cleaned up
    if (this.current !== "OPEN") return;

    if (!result.ok) {
      const { last } = registry.removeSubscription(this.id, topic);
      if (last) bridge.release(topic);
      logger.warn(LOG_CONTEXT.SUBSCRIPTION, "Broker subscribe failed", {
        connectionId: this.id,
        topic,
        error: result.error.message,
      });
      this.replyError(
        "SUBSCRIPTION_ERROR",
        `Failed to subscribe to topic: ${topic}`,
        topic,
      );
      return;
    }

    logger.debug(LOG_CONTEXT.SUBSCRIPTION, "Subscribed", {
      connectionId: this.id,
      topic,
    });
    this.reply(subscribedEnvelope(topic));
  }

  private unsubscribe(topic: string): void {
    const { last } = this.context.registry.removeSubscription(this.id, topic);
    if (last) this.context.bridge.release(topic);
    this.reply(unsubscribedEnvelope(topic));
  }

  private async publish(envelope: InboundEnvelope): Promise<void> {
    const { topic } = envelope;
    const { broker, authorizer, logger } = this.context;
    const { principal } = this.connection;

    if (!authorizer.authorize(principal, topic, "publish")) {
      this.replyError(
        "PERMISSION_DENIED",
        `No permission to publish to topic: ${topic}`,
        topic,
      );
      return;
    }

    const payload = {
      ...envelope.data,
      user_id: principal.id,
      username: principal.username ?? null,
    };
    const result = await broker.publish(topic, payload);

    if (!result.ok) {
      logger.warn(LOG_CONTEXT.PUBLISH, "Broker publish failed", {
        connectionId: this.id,
        topic,
        error: result.error.message,
        retryable: result.error.retryable,
      });
      this.replyError(
        "PUBLISH_FAILED",
        `Failed to publish to topic: ${topic}`,
        topic,
      );
      return;
    }
    this.reply(publishedEnvelope(topic));
  }

  private replyError(
    code: StreamErrorCode,
    message?: string,
    topic?: string,
  ): void {
    this.reply(errorEnvelope(code, message, topic));
  }

  private reply(envelope: OutboundEnvelope): void {
    if (!this.connection.isOpen) return;
    try {
      this.connection.send(envelope);
    } catch (error) {
      this.context.logger.warn(LOG_CONTEXT.CONNECTION, "Reply not delivered", {
        connectionId: this.id,
        operation: envelope.operation,
        error: toError(error).message,
      });
    }
  }
}
