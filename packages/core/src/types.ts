// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { StreamErrorCode } from "./error/codes";

/**
 * Authenticated identity attached to a connection.
 * Authentication happens before the gateway sees the connection.
 */
export interface Principal {
  /** Stable user id; compared against `user.<uid>.*` topics */
  readonly id: string;
  readonly username?: string;
  /** Granted privilege names, conventionally `<action>_<entity_type>` */
  readonly privileges: ReadonlySet<string>;
  /** Administrator capability: every topic operation is allowed */
  readonly isAdmin: boolean;
}

/**
 * Operations a client may request.
 */
export type ClientOperation = "subscribe" | "unsubscribe" | "publish";

/**
 * Operations the authorizer decides on.
 */
export type TopicOperation = "subscribe" | "publish";

/**
 * Operations that appear in outbound envelopes.
 */
export type ServerOperation =
  | "connect"
  | "subscribe"
  | "unsubscribe"
  | "publish"
  | "message"
  | "error";

/**
 * Validated inbound envelope.
 */
export interface InboundEnvelope {
  operation: ClientOperation;
  topic: string;
  data?: Record<string, unknown>;
  entity_type?: string;
  entity_id?: string;
}

/**
 * Outbound envelope written to a connection.
 * Field names follow the wire format.
 */
export interface OutboundEnvelope {
  status: "success" | "error";
  operation: ServerOperation;
  topic?: string;
  message?: string;
  error_code?: StreamErrorCode;
  data?: unknown;
}

export type EntityEventType = "created" | "updated" | "deleted";

/**
 * Canonical payload describing one committed entity mutation.
 */
export interface EntityEvent {
  event_type: EntityEventType;
  entity_type: string;
  entity_id: string;
  /** Seconds since epoch, fractional */
  timestamp: number;
  /** Public fields at the time of the event; null for deletes */
  data: Record<string, unknown> | null;
}

/**
 * Build a principal from plain values.
 */
export function createPrincipal(init: {
  id: string;
  username?: string;
  privileges?: Iterable<string>;
  isAdmin?: boolean;
}): Principal {
  return {
    id: init.id,
    username: init.username,
    privileges: new Set(init.privileges ?? []),
    isAdmin: init.isAdmin ?? false,
  };
}
