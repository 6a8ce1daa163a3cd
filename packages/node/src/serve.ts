// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import {
  EntityEventPublisher,
  LOG_CONTEXT,
  StreamGateway,
  disabledEntityEventPublisher,
  silentLogger,
  type EntityMutationListener,
  type GatewayStats,
  type LoggerAdapter,
  type TopicAuthorizer,
} from "@entity-stream/core";
import { WebSocketServer } from "ws";
import { createTokenVerifier, type TokenVerifier } from "./auth";
import { createBroker, type ClosableBroker } from "./broker";
import { ConfigError, type StreamingConfig } from "./config";
import { createUpgradeHandler } from "./handler";
import { Heartbeat } from "./heartbeat";

export interface StreamingServiceOptions {
  /** Overrides the configured backend */
  broker?: ClosableBroker;
  logger?: LoggerAdapter;
  /** Overrides JWT verification */
  verifyToken?: TokenVerifier;
  authorizer?: TopicAuthorizer;
  /** The persistence layer's per-entity streaming flag */
  isStreamable?: (entityType: string) => boolean;
}

export interface StreamingService {
  readonly server: Server;
  readonly gateway: StreamGateway;
  readonly broker: ClosableBroker;
  /** Entry point for the persistence layer */
  readonly publisher: EntityMutationListener;
  listen(): Promise<AddressInfo>;
  close(): Promise<void>;
}

/**
 * Minimal request/response shapes for plain HTTP requests.
 */
interface PlainRequest {
  url?: string;
  method?: string;
}

interface PlainResponse {
  writeHead(status: number, headers: Record<string, string>): unknown;
  end(body: string): unknown;
}

/**
 * Answer non-upgrade requests: gateway statistics on `/health`, 426 on the
 * streaming path, 404 elsewhere.
 */
export function createRequestHandler(
  path: string,
  stats: () => GatewayStats,
): (request: PlainRequest, response: PlainResponse) => void {
  return (request, response) => {
    const { pathname } = new URL(request.url ?? "/", "http://localhost");
    if (pathname === "/health" && request.method === "GET") {
      const body = JSON.stringify({ status: "ok", ...stats() });
      response.writeHead(200, { "Content-Type": "application/json" });
      response.end(body);
      return;
    }
    if (pathname === path) {
      response.writeHead(426, { "Content-Type": "text/plain", Upgrade: "websocket" });
      response.end("Upgrade Required");
      return;
    }
    response.writeHead(404, { "Content-Type": "text/plain" });
    response.end("Not Found");
  };
}

/**
 * Entity event publisher for the configuration: a no-op when streaming is
 * disabled.
 */
export function createEntityPublisher(
  config: StreamingConfig,
  broker: ClosableBroker,
  options: Pick<StreamingServiceOptions, "logger" | "isStreamable"> = {},
): EntityMutationListener {
  if (!config.enabled) return disabledEntityEventPublisher;
  return new EntityEventPublisher({
    broker,
    logger: options.logger,
    isStreamable: options.isStreamable,
  });
}

/**
 * Wire the HTTP server, WebSocket endpoint, gateway and broker together.
 * Nothing listens until `listen()`.
 */
export function createStreamingService(
  config: StreamingConfig,
  options: StreamingServiceOptions = {},
): StreamingService {
  const logger = options.logger ?? silentLogger;
  const verifyToken = options.verifyToken ?? defaultVerifier(config);
  const broker = options.broker ?? createBroker(config.broker, logger);

  const gateway = new StreamGateway({
    broker,
    authorizer: options.authorizer,
    logger,
    outbound: config.outbound,
  });
  const heartbeat = new Heartbeat(config.heartbeatMs, logger);
  const wss = new WebSocketServer({ noServer: true });
  const onUpgrade = createUpgradeHandler(wss, {
    gateway,
    verifyToken,
    path: config.server.path,
    logger,
    heartbeat,
  });

  const server = createServer(
    createRequestHandler(config.server.path, () => gateway.stats()),
  );
  server.on("upgrade", (request, socket, head) => {
    onUpgrade(request, socket, head).catch((error: unknown) => {
      logger.error(LOG_CONTEXT.SERVER, "Upgrade failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      socket.destroy();
    });
  });

  const publisher = createEntityPublisher(config, broker, {
    logger,
    isStreamable: options.isStreamable,
  });

  let closing: Promise<void> | undefined;

  return {
    server,
    gateway,
    broker,
    publisher,

    listen() {
      return new Promise<AddressInfo>((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.server.port, config.server.host, () => {
          server.off("error", reject);
          heartbeat.start();
          const address = server.address();
          if (address === null || typeof address === "string") {
            reject(new Error("Server is not listening on a TCP port"));
            return;
          }
          logger.info(LOG_CONTEXT.SERVER, "Streaming endpoint listening", {
            url: `ws://${address.address}:${address.port}${config.server.path}`,
            broker: broker.name,
          });
          resolve(address);
        });
      });
    },

    close() {
      closing ??= (async () => {
        heartbeat.stop();
        await gateway.close();
        await broker.close();
        wss.close();
        if (server.listening) {
          await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
          });
        }
        logger.info(LOG_CONTEXT.SERVER, "Streaming service stopped");
      })();
      return closing;
    },
  };
}

function defaultVerifier(config: StreamingConfig): TokenVerifier {
  const secret = config.auth.secret;
  if (!secret) {
    throw new ConfigError(["JWT_SECRET_KEY: Required to verify bearer tokens"]);
  }
  return createTokenVerifier({ secret, algorithm: config.auth.algorithm });
}
