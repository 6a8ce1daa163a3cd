// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { BrokerAdapter } from "../broker/contract";
import { toError } from "../error/broker";
import { LOG_CONTEXT, silentLogger, type LoggerAdapter } from "../logger";
import { entityTopic } from "../topics";
import type { EntityEvent, EntityEventType } from "../types";

export type EntityPublishOutcome =
  | { status: "published"; topic: string; event: EntityEvent }
  | { status: "skipped"; reason: "disabled" | "not-streamable" }
  | { status: "failed"; topic?: string; warning: string; error: Error };

/**
 * Hook invoked after an entity mutation has been committed.
 *
 * Never rejects: a streaming failure must not undo or fail the mutation
 * that triggered it, so failures come back as a `failed` outcome.
 */
export interface EntityMutationListener {
  onMutation(
    entityType: string,
    entityId: string | number,
    eventType: EntityEventType,
    snapshot: Readonly<Record<string, unknown>> | null,
  ): Promise<EntityPublishOutcome>;
}

export interface EntityEventPublisherOptions {
  broker: BrokerAdapter;
  logger?: LoggerAdapter;
  /** Entity types that produce events; all of them when omitted */
  isStreamable?: (entityType: string) => boolean;
  /** Milliseconds since epoch */
  now?: () => number;
}

/**
 * Turns committed mutations into {@link EntityEvent}s on
 * `entity.<type>.<id>` topics.
 */
export class EntityEventPublisher implements EntityMutationListener {
  private readonly logger: LoggerAdapter;
  private readonly now: () => number;

  constructor(private readonly options: EntityEventPublisherOptions) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  async onMutation(
    entityType: string,
    entityId: string | number,
    eventType: EntityEventType,
    snapshot: Readonly<Record<string, unknown>> | null,
  ): Promise<EntityPublishOutcome> {
    if (this.options.isStreamable && !this.options.isStreamable(entityType)) {
      return { status: "skipped", reason: "not-streamable" };
    }

    const id = String(entityId);
    let topic: string;
    try {
      topic = entityTopic(entityType, id);
    } catch (error) {
      return this.failed(toError(error), entityType, id);
    }

    const event: EntityEvent = {
      event_type: eventType,
      entity_type: entityType.toLowerCase(),
      entity_id: id,
      timestamp: this.now() / 1000,
      data: eventType === "deleted" || !snapshot ? null : { ...snapshot },
    };

    try {
      const result = await this.options.broker.publish(topic, event);
      if (!result.ok) return this.failed(result.error, entityType, id, topic);
    } catch (error) {
      return this.failed(toError(error), entityType, id, topic);
    }

    this.logger.debug(LOG_CONTEXT.ENTITY_EVENT, "Published entity event", {
      topic,
      eventType,
    });
    return { status: "published", topic, event };
  }

  private failed(
    error: Error,
    entityType: string,
    entityId: string,
    topic?: string,
  ): EntityPublishOutcome {
    const warning = `Failed to publish ${entityType} ${entityId} event: ${error.message}`;
    this.logger.warn(LOG_CONTEXT.ENTITY_EVENT, warning, { topic });
    return { status: "failed", topic, warning, error };
  }
}

/**
 * Listener used when streaming is turned off: every mutation is skipped.
 */
export const disabledEntityEventPublisher: EntityMutationListener = {
  async onMutation() {
    return { status: "skipped", reason: "disabled" };
  },
};
