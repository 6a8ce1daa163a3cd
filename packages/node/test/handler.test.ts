import { EventEmitter } from "node:events";
import type { IncomingHttpHeaders } from "node:http";
import { describe, expect, it } from "vitest";
import {
  EntityEventPublisher,
  StreamGateway,
  memoryBroker,
  type OutboundEnvelope,
} from "@entity-stream/core";
import { settle, testPrincipal } from "@entity-stream/core/testing";
import {
  AuthenticationError,
  Heartbeat,
  bindSocket,
  createUpgradeHandler,
  type RawSocket,
  type SocketLike,
  type TokenVerifier,
  type UpgradeRequest,
  type UpgradeServer,
} from "@entity-stream/node";

class FakeSocket extends EventEmitter implements SocketLike {
  readyState = 1;
  readonly sent: string[] = [];
  closedWith: { code?: number; reason?: string } | undefined;
  pings = 0;
  terminated = false;

  send(data: string, cb?: (err?: Error) => void): void {
    this.sent.push(data);
    cb?.();
  }

  close(code?: number, reason?: string): void {
    if (this.readyState === 3) return;
    this.readyState = 3;
    this.closedWith = { code, reason };
    this.emit("close", code ?? 1005, Buffer.from(reason ?? ""));
  }

  ping(): void {
    this.pings += 1;
  }

  terminate(): void {
    if (this.readyState === 3) return;
    this.readyState = 3;
    this.terminated = true;
    this.emit("close", 1006, Buffer.alloc(0));
  }

  /** Simulate a text frame from the client */
  receive(frame: Record<string, unknown> | string): void {
    const text = typeof frame === "string" ? frame : JSON.stringify(frame);
    this.emit("message", Buffer.from(text), false);
  }

  frames(): OutboundEnvelope[] {
    return this.sent.map((frame): OutboundEnvelope => JSON.parse(frame));
  }
}

class FakeRawSocket implements RawSocket {
  written = "";
  destroyed = false;

  write(chunk: string): boolean {
    this.written += chunk;
    return true;
  }

  destroy(): void {
    this.destroyed = true;
  }
}

class FakeUpgradeServer implements UpgradeServer {
  readonly sockets: FakeSocket[] = [];

  handleUpgrade(
    _request: UpgradeRequest,
    _socket: RawSocket,
    _head: Buffer,
    callback: (socket: SocketLike) => void,
  ): void {
    const socket = new FakeSocket();
    this.sockets.push(socket);
    callback(socket);
  }
}

const verifyToken: TokenVerifier = async (token) => {
  if (token === "reader-token") {
    return testPrincipal({ id: "7", privileges: ["read_product"] });
  }
  if (token === "broken-token") throw new Error("key store offline");
  throw new AuthenticationError("Invalid token");
};

function setup() {
  const broker = memoryBroker();
  const gateway = new StreamGateway({ broker });
  const wss = new FakeUpgradeServer();
  const onUpgrade = createUpgradeHandler(wss, {
    gateway,
    verifyToken,
    path: "/ws",
  });

  const upgrade = async (url: string, headers: IncomingHttpHeaders = {}) => {
    const raw = new FakeRawSocket();
    await onUpgrade({ url, headers }, raw, Buffer.alloc(0));
    return raw;
  };

  return { broker, gateway, wss, upgrade };
}

describe("createUpgradeHandler", () => {
  it("answers 404 outside the streaming path", async () => {
    const { wss, upgrade } = setup();
    const raw = await upgrade("/other?token=reader-token");

    expect(raw.written.startsWith("HTTP/1.1 404 Not Found\r\n")).toBe(true);
    expect(raw.destroyed).toBe(true);
    expect(wss.sockets).toHaveLength(0);
  });

  it("answers 401 without a token", async () => {
    const { gateway, upgrade } = setup();
    const raw = await upgrade("/ws");

    expect(raw.written).toBe(
      "HTTP/1.1 401 Unauthorized\r\n" +
        "Connection: close\r\n" +
        "Content-Type: text/plain\r\n" +
        "Content-Length: 12\r\n" +
        "\r\nUnauthorized",
    );
    expect(gateway.stats().connections).toBe(0);
  });

  it("answers 401 for an invalid token", async () => {
    const { wss, upgrade } = setup();
    const raw = await upgrade("/ws", { authorization: "Bearer forged" });

    expect(raw.written.startsWith("HTTP/1.1 401 Unauthorized\r\n")).toBe(true);
    expect(wss.sockets).toHaveLength(0);
  });

  it("answers 500 when verification itself fails", async () => {
    const { upgrade } = setup();
    const raw = await upgrade("/ws?token=broken-token");

    expect(raw.written.startsWith("HTTP/1.1 500 Internal Server Error\r\n")).toBe(
      true,
    );
  });

  it("upgrades authenticated requests and greets the client", async () => {
    const { gateway, wss, upgrade } = setup();
    const raw = await upgrade("/ws?token=reader-token");
    await settle();

    expect(raw.written).toBe("");
    expect(wss.sockets).toHaveLength(1);
    expect(wss.sockets[0]?.frames()).toEqual([
      {
        status: "success",
        operation: "connect",
        message: "Connected to streaming service as alice",
      },
    ]);
    expect(gateway.stats().connections).toBe(1);
  });

  it("streams entity events end to end", async () => {
    const { broker, wss, upgrade } = setup();
    await upgrade("/ws", { authorization: "Bearer reader-token" });
    const socket = wss.sockets[0];
    if (!socket) throw new Error("no socket");

    socket.receive({ operation: "subscribe", topic: "entity.product.42" });
    await settle();

    const publisher = new EntityEventPublisher({
      broker,
      now: () => 1_700_000_000_000,
    });
    await publisher.onMutation("product", "42", "updated", { price: 9.99 });
    await settle();

    const frames = socket.frames();
    expect(frames[1]).toEqual({
      status: "success",
      operation: "subscribe",
      topic: "entity.product.42",
      message: "Subscribed to topic: entity.product.42",
    });
    expect(frames[2]).toEqual({
      status: "success",
      operation: "message",
      topic: "entity.product.42",
      data: {
        event_type: "updated",
        entity_type: "product",
        entity_id: "42",
        timestamp: 1_700_000_000,
        data: { price: 9.99 },
      },
    });
  });

  it("keeps the connection open after malformed JSON", async () => {
    const { wss, upgrade } = setup();
    await upgrade("/ws?token=reader-token");
    const socket = wss.sockets[0];
    if (!socket) throw new Error("no socket");

    socket.receive("{not json");
    socket.receive({ operation: "subscribe", topic: "entity.product.1" });
    await settle();

    const frames = socket.frames();
    expect(frames[1]?.error_code).toBe("INVALID_JSON");
    expect(frames[2]?.operation).toBe("subscribe");
    expect(socket.closedWith).toBeUndefined();
  });
});

describe("bindSocket", () => {
  it("cleans up subscriptions when the socket closes", async () => {
    const broker = memoryBroker();
    const gateway = new StreamGateway({ broker });
    const socket = new FakeSocket();
    bindSocket(gateway, socket, testPrincipal({ privileges: ["read_product"] }));

    socket.receive({ operation: "subscribe", topic: "entity.product.42" });
    await settle();
    expect(broker.hasTopic("entity.product.42")).toBe(true);

    socket.close(1000, "bye");
    await settle();

    expect(gateway.stats()).toMatchObject({ connections: 0, topics: 0 });
    expect(broker.hasTopic("entity.product.42")).toBe(false);
  });

  it("closes open sockets with 1001 on gateway shutdown", async () => {
    const gateway = new StreamGateway({ broker: memoryBroker() });
    const socket = new FakeSocket();
    bindSocket(gateway, socket, testPrincipal());

    await gateway.close();

    expect(socket.closedWith).toEqual({ code: 1001, reason: "Server shutting down" });
    expect(gateway.stats().connections).toBe(0);
  });

  it("lets the heartbeat terminate a silent socket", () => {
    const gateway = new StreamGateway({ broker: memoryBroker() });
    const heartbeat = new Heartbeat(1000);
    const socket = new FakeSocket();
    bindSocket(gateway, socket, testPrincipal(), { heartbeat });

    heartbeat.sweep();
    expect(socket.pings).toBe(1);
    heartbeat.sweep();

    expect(socket.terminated).toBe(true);
    expect(gateway.stats().connections).toBe(0);
    expect(heartbeat.size).toBe(0);
  });
});
