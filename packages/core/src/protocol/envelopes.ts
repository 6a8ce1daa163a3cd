// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { StreamErrorCode } from "../error/codes";
import { getErrorMetadata } from "../error/codes";
import type { OutboundEnvelope } from "../types";

export function connectEnvelope(displayName: string): OutboundEnvelope {
  return {
    status: "success",
    operation: "connect",
    message: `Connected to streaming service as ${displayName}`,
  };
}

export function subscribedEnvelope(topic: string): OutboundEnvelope {
  return {
    status: "success",
    operation: "subscribe",
    topic,
    message: `Subscribed to topic: ${topic}`,
  };
}

export function unsubscribedEnvelope(topic: string): OutboundEnvelope {
  return {
    status: "success",
    operation: "unsubscribe",
    topic,
    message: `Unsubscribed from topic: ${topic}`,
  };
}

export function publishedEnvelope(topic: string): OutboundEnvelope {
  return {
    status: "success",
    operation: "publish",
    topic,
    message: `Published to topic: ${topic}`,
  };
}

/**
 * Broker message forwarded to subscribers; `data` is the payload as published.
 */
export function messageEnvelope(topic: string, data: unknown): OutboundEnvelope {
  return { status: "success", operation: "message", topic, data };
}

export function errorEnvelope(
  code: StreamErrorCode,
  message?: string,
  topic?: string,
): OutboundEnvelope {
  const envelope: OutboundEnvelope = {
    status: "error",
    operation: "error",
    error_code: code,
    message: message ?? getErrorMetadata(code).message,
  };
  if (topic !== undefined) envelope.topic = topic;
  return envelope;
}
