/**
 * JSON wire codec shared by broker-backed adapters.
 * Every backend transmits payloads as UTF-8 JSON text.
 */

import { DeserializationError, SerializationError } from "../error/broker";

export function encodePayload(topic: string, payload: unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(payload);
  } catch (error) {
    throw new SerializationError(
      `Failed to serialize payload for topic "${topic}"`,
      { cause: error, topic },
    );
  }
  // JSON.stringify returns undefined for undefined, functions and symbols
  if (json === undefined) {
    throw new SerializationError(
      `Payload for topic "${topic}" is not JSON-serializable`,
      { topic },
    );
  }
  return json;
}

export function decodePayload(topic: string, raw: string | Buffer): unknown {
  const text = typeof raw === "string" ? raw : raw.toString("utf8");
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DeserializationError(
      `Failed to deserialize message on topic "${topic}"`,
      { cause: error, topic },
    );
  }
}
