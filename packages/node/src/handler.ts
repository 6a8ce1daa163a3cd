// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { STATUS_CODES } from "node:http";
import {
  LOG_CONTEXT,
  silentLogger,
  toError,
  type LoggerAdapter,
  type Principal,
  type ProtocolSession,
  type StreamGateway,
} from "@entity-stream/core";
import { AuthenticationError, extractBearerToken, type TokenVerifier } from "./auth";
import type { Heartbeat } from "./heartbeat";
import { decodeFrame, wsTransport } from "./transport";
import type { RawSocket, SocketLike, UpgradeRequest, UpgradeServer } from "./types";

export interface UpgradeHandlerOptions {
  gateway: StreamGateway;
  verifyToken: TokenVerifier;
  /** Endpoint path; upgrades elsewhere get 404 */
  path: string;
  logger?: LoggerAdapter;
  heartbeat?: Heartbeat;
}

export interface BindSocketOptions {
  logger?: LoggerAdapter;
  heartbeat?: Heartbeat;
}

/**
 * Create the HTTP `upgrade` listener for the streaming endpoint.
 *
 * Authentication happens here, before the upgrade: a request without a
 * valid bearer token is answered with 401 and never reaches the gateway.
 *
 * @example
 * ```typescript
 * const wss = new WebSocketServer({ noServer: true });
 * const onUpgrade = createUpgradeHandler(wss, { gateway, verifyToken, path: "/ws" });
 * server.on("upgrade", (req, socket, head) => void onUpgrade(req, socket, head));
 * ```
 */
export function createUpgradeHandler<
  Req extends UpgradeRequest,
  Sock extends RawSocket,
>(
  server: UpgradeServer<Req, Sock>,
  options: UpgradeHandlerOptions,
): (request: Req, socket: Sock, head: Buffer) => Promise<void> {
  const logger = options.logger ?? silentLogger;

  return async (request, socket, head) => {
    const { pathname } = new URL(request.url ?? "/", "http://localhost");
    if (pathname !== options.path) {
      rejectUpgrade(socket, 404);
      return;
    }

    const token = extractBearerToken(request);
    if (!token) {
      logger.info(LOG_CONTEXT.AUTH, "Upgrade rejected: missing bearer token");
      rejectUpgrade(socket, 401);
      return;
    }

    let principal: Principal;
    try {
      principal = await options.verifyToken(token);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        logger.info(LOG_CONTEXT.AUTH, `Upgrade rejected: ${error.message}`);
        rejectUpgrade(socket, 401);
        return;
      }
      logger.error(LOG_CONTEXT.AUTH, "Token verification failed", {
        error: toError(error).message,
      });
      rejectUpgrade(socket, 500);
      return;
    }

    server.handleUpgrade(request, socket, head, (ws) => {
      try {
        bindSocket(options.gateway, ws, principal, {
          logger,
          heartbeat: options.heartbeat,
        });
      } catch (error) {
        // The gateway is shutting down; it has already closed the socket
        logger.warn(LOG_CONTEXT.CONNECTION, "Connection refused", {
          error: toError(error).message,
        });
      }
    });
  };
}

/**
 * Attach an accepted socket to the gateway. Inbound frames feed the
 * session in order; the socket's close event runs session cleanup.
 */
export function bindSocket(
  gateway: StreamGateway,
  socket: SocketLike,
  principal: Principal,
  options: BindSocketOptions = {},
): ProtocolSession {
  const logger = options.logger ?? silentLogger;
  const session = gateway.connect(wsTransport(socket), principal);
  options.heartbeat?.track(socket);

  socket.on("message", (data) => {
    void session.receive(decodeFrame(data));
  });
  socket.on("close", () => session.handleClose());
  socket.on("error", (error) => {
    logger.warn(LOG_CONTEXT.CONNECTION, "Socket error", {
      connectionId: session.id,
      error: error.message,
    });
  });
  return session;
}

function rejectUpgrade(socket: RawSocket, status: number): void {
  const body = STATUS_CODES[status] ?? "Error";
  socket.write(
    `HTTP/1.1 ${status} ${body}\r\n` +
      "Connection: close\r\n" +
      "Content-Type: text/plain\r\n" +
      `Content-Length: ${Buffer.byteLength(body)}\r\n` +
      `\r\n${body}`,
  );
  socket.destroy();
}
