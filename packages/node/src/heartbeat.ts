// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LOG_CONTEXT, silentLogger, type LoggerAdapter } from "@entity-stream/core";
import type { SocketLike } from "./types";

/**
 * Pings tracked sockets every `intervalMs`. A socket that has not answered
 * the previous ping by the next tick is terminated; its close event then
 * runs the normal session cleanup.
 */
export class Heartbeat {
  private readonly alive = new Map<SocketLike, boolean>();
  private timer: ReturnType<typeof setInterval> | undefined;

  constructor(
    private readonly intervalMs: number,
    private readonly logger: LoggerAdapter = silentLogger,
  ) {}

  get size(): number {
    return this.alive.size;
  }

  track(socket: SocketLike): void {
    this.alive.set(socket, true);
    socket.on("pong", () => {
      if (this.alive.has(socket)) this.alive.set(socket, true);
    });
    socket.on("close", () => this.alive.delete(socket));
  }

  start(): void {
    if (this.timer || this.intervalMs <= 0) return;
    this.timer = setInterval(() => this.sweep(), this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
    this.alive.clear();
  }

  sweep(): void {
    for (const [socket, alive] of [...this.alive]) {
      if (!alive) {
        this.alive.delete(socket);
        this.logger.info(LOG_CONTEXT.CONNECTION, "Terminating unresponsive socket");
        socket.terminate();
        continue;
      }
      this.alive.set(socket, false);
      try {
        socket.ping();
      } catch (error) {
        this.logger.warn(LOG_CONTEXT.CONNECTION, "Ping failed", {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
