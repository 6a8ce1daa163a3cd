import { EventEmitter } from "node:events";
import { describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "@entity-stream/core";
import { settle } from "@entity-stream/core/testing";
import {
  normalizeNamespace,
  redisBroker,
  type RedisClient,
} from "@entity-stream/redis";

type Listener = (message: string, channel: string) => void;

/**
 * In-process stand-in for a Redis server: channels fan out to every
 * subscribed client, asynchronously.
 */
class FakeRedisServer {
  readonly clients: FakeRedisClient[] = [];
  readonly subscribeCalls: string[] = [];
  readonly unsubscribeCalls: string[] = [];
  readonly published: Array<{ channel: string; message: string }> = [];
  down = false;
  failSubscribe = false;

  createClient(): FakeRedisClient {
    const client = new FakeRedisClient(this);
    this.clients.push(client);
    return client;
  }

  publish(channel: string, message: string): number {
    this.published.push({ channel, message });
    let receivers = 0;
    for (const client of this.clients) {
      const listeners = client.channelListeners.get(channel);
      if (!listeners) continue;
      receivers++;
      queueMicrotask(() => {
        for (const listener of listeners) listener(message, channel);
      });
    }
    return receivers;
  }
}

class FakeRedisClient implements RedisClient {
  isOpen = false;
  quitCalls = 0;
  readonly channelListeners = new Map<string, Listener[]>();
  private readonly events = new EventEmitter();

  constructor(private readonly server: FakeRedisServer) {}

  async connect(): Promise<void> {
    if (this.server.down) {
      throw Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:6379"), {
        code: "ECONNREFUSED",
      });
    }
    this.isOpen = true;
    this.events.emit("ready");
  }

  async quit(): Promise<void> {
    this.quitCalls++;
    this.isOpen = false;
  }

  async publish(channel: string, message: string): Promise<number> {
    if (!this.isOpen) throw new Error("The client is closed");
    return this.server.publish(channel, message);
  }

  async subscribe(channel: string, listener: Listener): Promise<void> {
    if (this.server.failSubscribe) throw new Error("ERR subscribe refused");
    this.server.subscribeCalls.push(channel);
    const listeners = this.channelListeners.get(channel) ?? [];
    listeners.push(listener);
    this.channelListeners.set(channel, listeners);
  }

  async unsubscribe(channel: string): Promise<void> {
    this.server.unsubscribeCalls.push(channel);
    this.channelListeners.delete(channel);
  }

  duplicate(): FakeRedisClient {
    return this.server.createClient();
  }

  on(event: "error", listener: (error: Error) => void): this;
  on(event: "ready", listener: () => void): this;
  on(event: string, listener: (error: Error) => void): this {
    this.events.on(event, listener);
    return this;
  }

  emitError(error: Error): void {
    this.events.emit("error", error);
  }

  emitReady(): void {
    this.events.emit("ready");
  }

  /** Deliver raw text as if another process had published it */
  inject(channel: string, message: string): void {
    for (const listener of this.channelListeners.get(channel) ?? []) {
      listener(message, channel);
    }
  }
}

function setup(namespace?: string) {
  const server = new FakeRedisServer();
  const client = server.createClient();
  const broker = redisBroker({ client, namespace });
  return { server, client, broker };
}

describe("redisBroker", () => {
  it("connects lazily", async () => {
    const { server, client, broker } = setup();
    expect(client.isOpen).toBe(false);
    expect(server.clients).toHaveLength(1);

    await broker.publish("public.news", { n: 1 });

    expect(client.isOpen).toBe(true);
    expect(server.clients).toHaveLength(2);
    expect(broker.isConnected()).toBe(true);
  });

  it("broadcasts across adapters sharing a server", async () => {
    const server = new FakeRedisServer();
    const a = redisBroker({ client: server.createClient(), namespace: "app" });
    const b = redisBroker({ client: server.createClient(), namespace: "app" });
    const handler = vi.fn();
    await b.subscribe("entity.product.42", handler);

    const result = await a.publish("entity.product.42", { price: 9.99 });
    await settle();

    expect(result).toEqual({ ok: true });
    expect(server.published).toEqual([
      { channel: "app:entity.product.42", message: '{"price":9.99}' },
    ]);
    expect(handler).toHaveBeenCalledWith(
      { price: 9.99 },
      { topic: "entity.product.42" },
    );
  });

  it("keeps one channel subscription for many handles", async () => {
    const { server, broker } = setup();
    const first = await broker.subscribe("public.news", () => {});
    const second = await broker.subscribe("public.news", () => {});
    if (!first.ok || !second.ok) throw new Error("subscribe failed");

    expect(server.subscribeCalls).toEqual(["public.news"]);

    await broker.unsubscribe(first.handle);
    expect(server.unsubscribeCalls).toEqual([]);

    await broker.unsubscribe(second.handle);
    expect(server.unsubscribeCalls).toEqual(["public.news"]);
  });

  it("fails publish fast while Redis is unreachable", async () => {
    const { server, broker } = setup();
    server.down = true;

    const result = await broker.publish("public.news", {});

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("PUBLISH_FAILED");
      expect(result.error.retryable).toBe(true);
    }
    expect(server.published).toEqual([]);
  });

  it("reports unserializable payloads without connecting", async () => {
    const { client, broker } = setup();

    const result = await broker.publish("public.news", undefined);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.retryable).toBe(false);
    expect(client.isOpen).toBe(false);
  });

  it("rolls back a refused subscribe and retries on the next call", async () => {
    const { server, broker } = setup();
    server.failSubscribe = true;

    const failed = await broker.subscribe("public.news", () => {});
    expect(failed.ok).toBe(false);
    if (!failed.ok) expect(failed.error.code).toBe("SUBSCRIBE_FAILED");

    server.failSubscribe = false;
    const retried = await broker.subscribe("public.news", () => {});
    expect(retried.ok).toBe(true);
    expect(server.subscribeCalls).toEqual(["public.news"]);
  });

  it("drops messages that are not JSON", async () => {
    const { server, broker } = setup();
    const handler = vi.fn();
    await broker.subscribe("public.news", handler);
    const subscriber = server.clients[1];

    subscriber?.inject("public.news", "{broken");
    subscriber?.inject("public.news", '{"ok":true}');

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ ok: true }, { topic: "public.news" });
  });

  it("reports a lost subscriber connection once per outage", async () => {
    const { server, broker } = setup();
    const onError = vi.fn();
    await broker.subscribe("public.news", () => {}, { onError });
    const subscriber = server.clients[1];

    subscriber?.emitError(new Error("Socket closed unexpectedly"));
    subscriber?.emitError(new Error("Socket closed unexpectedly"));
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[0]).toMatchObject({
      code: "SUBSCRIBE_FAILED",
      topic: "public.news",
      retryable: true,
    });
    expect(broker.isConnected()).toBe(false);

    subscriber?.emitReady();
    subscriber?.emitError(new Error("Socket closed unexpectedly"));
    expect(onError).toHaveBeenCalledTimes(2);
  });

  it("quits its own connection but not the caller's client", async () => {
    const { server, client, broker } = setup();
    await broker.subscribe("public.news", () => {});

    await broker.close();

    expect(client.quitCalls).toBe(0);
    expect(server.clients[1]?.quitCalls).toBe(1);
    const result = await broker.publish("public.news", {});
    expect(result.ok).toBe(false);
  });

  it("validates options", () => {
    expect(normalizeNamespace(" app: ")).toBe("app");
    expect(normalizeNamespace(undefined)).toBe("");
    expect(() => redisBroker({ namespace: "bad ns" })).toThrow(
      ConfigurationError,
    );
    const server = new FakeRedisServer();
    expect(() =>
      redisBroker({ url: "redis://localhost:6379", client: server.createClient() }),
    ).toThrow(ConfigurationError);
  });
});
