// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { ConnectionTransport } from "@entity-stream/core";
import type { RawData } from "ws";
import { SOCKET_OPEN, type SocketLike } from "./types";

/**
 * Connection transport over a ws socket. A write settles once ws has
 * flushed the frame to the network, so the outbound queue keeps at most
 * one frame in the socket buffer.
 */
export function wsTransport(socket: SocketLike): ConnectionTransport {
  return {
    send(frame) {
      if (socket.readyState !== SOCKET_OPEN) {
        return Promise.reject(new Error("Socket is not open"));
      }
      return new Promise<void>((resolve, reject) => {
        socket.send(frame, (error) => (error ? reject(error) : resolve()));
      });
    },
    close(code, reason) {
      socket.close(code, reason);
    },
  };
}

export function decodeFrame(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}
