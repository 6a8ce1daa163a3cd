// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

export {
  AuthenticationError,
  createTokenVerifier,
  extractBearerToken,
} from "./auth";
export type { TokenVerifier, TokenVerifierOptions } from "./auth";
export { amqpUrl, createBroker } from "./broker";
export type { ClosableBroker } from "./broker";
export { ConfigError, DEFAULT_BROKER_PORTS, loadConfig } from "./config";
export type {
  BrokerConfig,
  BrokerKind,
  JwtAlgorithm,
  StreamingConfig,
} from "./config";
export { bindSocket, createUpgradeHandler } from "./handler";
export type { BindSocketOptions, UpgradeHandlerOptions } from "./handler";
export { Heartbeat } from "./heartbeat";
export {
  createEntityPublisher,
  createRequestHandler,
  createStreamingService,
} from "./serve";
export type { StreamingService, StreamingServiceOptions } from "./serve";
export { decodeFrame, wsTransport } from "./transport";
export { SOCKET_OPEN } from "./types";
export type { RawSocket, SocketLike, UpgradeRequest, UpgradeServer } from "./types";
