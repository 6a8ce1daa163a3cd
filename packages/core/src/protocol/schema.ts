// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { z } from "zod";
import { STREAM_ERROR_CODES, type StreamErrorCode } from "../error/codes";
import type { ClientOperation, InboundEnvelope } from "../types";

export const CLIENT_OPERATIONS = [
  "subscribe",
  "unsubscribe",
  "publish",
] as const satisfies readonly ClientOperation[];

/**
 * Inbound shape: `{ operation, topic, data?, entity_type?, entity_id? }`.
 * `operation` is any string here so unknown operations can be told apart
 * from malformed envelopes.
 */
export const InboundEnvelopeSchema = z.object({
  operation: z.string({ required_error: "operation is required" }),
  topic: z
    .string({ required_error: "topic is required" })
    .min(1, "topic must not be empty"),
  data: z.record(z.string(), z.unknown()).nullish(),
  entity_type: z.string().nullish(),
  entity_id: z.union([z.string(), z.number()]).nullish(),
});

/**
 * Outbound shape, for clients and tests that read server frames.
 */
export const OutboundEnvelopeSchema = z.object({
  status: z.enum(["success", "error"]),
  operation: z.enum([
    "connect",
    "subscribe",
    "unsubscribe",
    "publish",
    "message",
    "error",
  ]),
  topic: z.string().optional(),
  message: z.string().optional(),
  error_code: z.enum(STREAM_ERROR_CODES).optional(),
  data: z.unknown().optional(),
});

export type InboundParseResult =
  | { ok: true; envelope: InboundEnvelope }
  | {
      ok: false;
      code: Extract<
        StreamErrorCode,
        "INVALID_JSON" | "VALIDATION_ERROR" | "INVALID_OPERATION"
      >;
      message: string;
      topic?: string;
    };

export function isClientOperation(value: string): value is ClientOperation {
  return CLIENT_OPERATIONS.some((operation) => operation === value);
}

/**
 * Parse and validate one inbound frame.
 *
 * - not JSON → INVALID_JSON
 * - JSON of the wrong shape → VALIDATION_ERROR
 * - well-formed but unknown operation → INVALID_OPERATION
 */
export function parseInbound(raw: string): InboundParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, code: "INVALID_JSON", message: "Invalid JSON format" };
  }

  const parsed = InboundEnvelopeSchema.safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      code: "VALIDATION_ERROR",
      message: formatIssues(parsed.error),
    };
  }

  const { operation, topic, data, entity_type, entity_id } = parsed.data;
  if (!isClientOperation(operation)) {
    return {
      ok: false,
      code: "INVALID_OPERATION",
      message: `Unknown operation: ${operation}`,
      topic,
    };
  }

  const envelope: InboundEnvelope = { operation, topic };
  if (data) envelope.data = data;
  if (entity_type) envelope.entity_type = entity_type;
  if (entity_id !== undefined && entity_id !== null) {
    envelope.entity_id = String(entity_id);
  }
  return { ok: true, envelope };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}
