// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  defaultTopicAuthorizer,
  type TopicAuthorizer,
} from "../authorizer";
import type { BrokerAdapter } from "../broker/contract";
import type { BrokerError } from "../error/broker";
import { LOG_CONTEXT, silentLogger, type LoggerAdapter } from "../logger";
import { errorEnvelope, messageEnvelope } from "../protocol/envelopes";
import { Connection, type OutboundOptions } from "../registry/connection";
import type { ConnectionTransport } from "../registry/outbound-queue";
import { ConnectionRegistry, type FanOutReport } from "../registry/registry";
import type { Principal } from "../types";
import { BrokerBridge } from "./bridge";
import { ProtocolSession, type SessionContext } from "./session";

export interface StreamGatewayOptions {
  broker: BrokerAdapter;
  authorizer?: TopicAuthorizer;
  logger?: LoggerAdapter;
  outbound?: OutboundOptions;
}

export interface GatewayStats {
  connections: number;
  topics: number;
  brokerSubscriptions: number;
  /** Outbound frames discarded by the drop-oldest policy, closed connections included */
  droppedFrames: number;
  broker: string;
}

/** WebSocket close code for "going away" */
export const CLOSE_GOING_AWAY = 1001;

/**
 * Connects authenticated transports to the broker.
 *
 * Owns the connection registry and the broker bridge; each accepted
 * transport gets a {@link ProtocolSession}. The broker itself belongs to
 * the caller and is not closed here.
 *
 * @example
 * ```typescript
 * const gateway = new StreamGateway({ broker: memoryBroker() });
 * const session = gateway.connect(transport, principal);
 * socket.on("message", (data) => session.receive(String(data)));
 * socket.on("close", () => session.handleClose());
 * ```
 */
export class StreamGateway {
  readonly registry: ConnectionRegistry;
  private readonly bridge: BrokerBridge;
  private readonly sessions = new Map<string, ProtocolSession>();
  private readonly context: SessionContext;
  private readonly logger: LoggerAdapter;
  private closing = false;
  private droppedByClosed = 0;

  constructor(private readonly options: StreamGatewayOptions) {
    this.logger = options.logger ?? silentLogger;
    this.registry = new ConnectionRegistry({ logger: this.logger });
    this.bridge = new BrokerBridge({
      broker: options.broker,
      logger: this.logger,
      onMessage: (topic, payload) => {
        this.fanOut(topic, payload);
      },
      onFailure: (topic, error) => this.handleBrokerFailure(topic, error),
    });
    this.context = {
      registry: this.registry,
      bridge: this.bridge,
      broker: options.broker,
      authorizer: options.authorizer ?? defaultTopicAuthorizer,
      logger: this.logger,
      onClosed: (session) => {
        this.droppedByClosed += session.connection.droppedFrames;
        this.sessions.delete(session.id);
      },
    };
  }

  /**
   * Accept an authenticated transport. The returned session is already
   * OPEN and has sent the connect envelope.
   */
  connect(transport: ConnectionTransport, principal: Principal): ProtocolSession {
    if (this.closing) {
      transport.close(CLOSE_GOING_AWAY, "Server shutting down");
      throw new Error("Gateway is closed");
    }

    let session: ProtocolSession | undefined;
    const connection = new Connection({
      principal,
      transport,
      outbound: this.options.outbound,
      logger: this.logger,
      onClose: () => session?.handleClose(),
    });
    session = new ProtocolSession(this.context, connection);
    this.sessions.set(session.id, session);
    session.open();
    return session;
  }

  /**
   * Deliver a broker payload to every local subscriber of a topic.
   */
  fanOut(topic: string, payload: unknown): FanOutReport {
    return this.registry.fanOut(topic, messageEnvelope(topic, payload));
  }

  stats(): GatewayStats {
    let droppedFrames = this.droppedByClosed;
    for (const session of this.sessions.values()) {
      droppedFrames += session.connection.droppedFrames;
    }
    return {
      connections: this.registry.size,
      topics: this.registry.topicCount,
      brokerSubscriptions: this.bridge.size,
      droppedFrames,
      broker: this.options.broker.name,
    };
  }

  /**
   * Close every session and release broker subscriptions.
   */
  async close(code = CLOSE_GOING_AWAY, reason = "Server shutting down"): Promise<void> {
    this.closing = true;
    for (const session of [...this.sessions.values()]) {
      session.close(code, reason);
    }
    await this.bridge.close();
    this.logger.info(LOG_CONTEXT.SERVER, "Gateway closed");
  }

  private handleBrokerFailure(topic: string, error: BrokerError): void {
    this.logger.error(LOG_CONTEXT.BROKER, "Broker subscription failed", {
      topic,
      error: error.message,
      retryable: error.retryable,
    });
    this.registry.fanOut(
      topic,
      errorEnvelope(
        "SUBSCRIPTION_ERROR",
        `Subscription to topic failed: ${topic}`,
        topic,
      ),
    );
  }
}
