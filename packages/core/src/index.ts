// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

// Types
export { createPrincipal } from "./types";
export type {
  ClientOperation,
  EntityEvent,
  EntityEventType,
  InboundEnvelope,
  OutboundEnvelope,
  Principal,
  ServerOperation,
  TopicOperation,
} from "./types";

// Errors
export {
  STREAM_ERROR_CODES,
  getErrorMetadata,
  isStreamErrorCode,
} from "./error/codes";
export type { StreamErrorCode, StreamErrorData } from "./error/codes";
export { StreamError } from "./error/error";
export {
  BrokerError,
  ConfigurationError,
  DeserializationError,
  DisconnectedError,
  PublishError,
  SerializationError,
  SubscribeError,
  isRetryableNetworkError,
  toError,
} from "./error/broker";
export type { BrokerErrorCode } from "./error/broker";

// Logging
export {
  DefaultLoggerAdapter,
  LOG_CONTEXT,
  createLogger,
  silentLogger,
} from "./logger";
export type { LogLevel, LoggerAdapter, LoggerOptions } from "./logger";

// Topics and authorization
export {
  MAX_TOPIC_LENGTH,
  TOPIC_SEPARATOR,
  entityTopic,
  entityTypeTopic,
  parseTopic,
} from "./topics";
export type { ParsedTopic } from "./topics";
export { authorize, defaultTopicAuthorizer, entityPrivilege } from "./authorizer";
export type { TopicAuthorizer } from "./authorizer";

// Broker contract and in-memory backend
export type {
  BrokerAdapter,
  MessageHandler,
  PublishResult,
  SubscribeOptions,
  SubscribeResult,
  SubscriptionHandle,
} from "./broker/contract";
export { TopicHandlers } from "./broker/handlers";
export { decodePayload, encodePayload } from "./broker/codec";
export { memoryBroker } from "./broker/memory";
export type { MemoryBroker, MemoryBrokerOptions } from "./broker/memory";

// Protocol
export {
  CLIENT_OPERATIONS,
  InboundEnvelopeSchema,
  OutboundEnvelopeSchema,
  isClientOperation,
  parseInbound,
} from "./protocol/schema";
export type { InboundParseResult } from "./protocol/schema";
export {
  connectEnvelope,
  errorEnvelope,
  messageEnvelope,
  publishedEnvelope,
  subscribedEnvelope,
  unsubscribedEnvelope,
} from "./protocol/envelopes";

// Registry
export {
  ConnectionClosedError,
  DEFAULT_MAX_QUEUED,
  OutboundOverflowError,
  OutboundQueue,
} from "./registry/outbound-queue";
export type {
  ConnectionTransport,
  OutboundQueueOptions,
  OverflowPolicy,
} from "./registry/outbound-queue";
export { CLOSE_OVERFLOW, Connection } from "./registry/connection";
export type { ConnectionInit, OutboundOptions } from "./registry/connection";
export { ConnectionRegistry, RegistryError } from "./registry/registry";
export type {
  FanOutFailure,
  FanOutReport,
  RegistryOptions,
} from "./registry/registry";

// Engine
export { BrokerBridge } from "./engine/bridge";
export type { BrokerBridgeOptions, EnsureResult } from "./engine/bridge";
export { CLOSE_INTERNAL_ERROR, ProtocolSession } from "./engine/session";
export type { SessionContext, SessionState } from "./engine/session";
export { CLOSE_GOING_AWAY, StreamGateway } from "./engine/gateway";
export type { GatewayStats, StreamGatewayOptions } from "./engine/gateway";

// Entity events
export {
  EntityEventPublisher,
  disabledEntityEventPublisher,
} from "./events/publisher";
export type {
  EntityEventPublisherOptions,
  EntityMutationListener,
  EntityPublishOutcome,
} from "./events/publisher";

// Utilities
export { generateConnectionId, generateId } from "./utils/ids";
