// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { IncomingHttpHeaders } from "node:http";
import type { RawData } from "ws";

/**
 * The part of a `ws` WebSocket the service uses.
 */
export interface SocketLike {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  ping(): void;
  terminate(): void;
  on(event: "message", listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: "close", listener: (code: number, reason: Buffer) => void): unknown;
  on(event: "pong", listener: () => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

/** Upgrade request as seen by the handler */
export interface UpgradeRequest {
  url?: string;
  headers: IncomingHttpHeaders;
}

/** Raw TCP socket of a rejected upgrade */
export interface RawSocket {
  write(chunk: string): unknown;
  destroy(): unknown;
}

/**
 * Completes an accepted upgrade. `WebSocketServer` from ws in `noServer`
 * mode satisfies it.
 */
export interface UpgradeServer<
  Req extends UpgradeRequest = UpgradeRequest,
  Sock extends RawSocket = RawSocket,
> {
  handleUpgrade(
    request: Req,
    socket: Sock,
    head: Buffer,
    callback: (socket: SocketLike) => void,
  ): void;
}

/** WebSocket readyState of an open socket */
export const SOCKET_OPEN = 1;
