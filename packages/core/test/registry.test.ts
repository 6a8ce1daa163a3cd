import { describe, expect, it } from "vitest";
import {
  Connection,
  ConnectionRegistry,
  RegistryError,
  messageEnvelope,
} from "@entity-stream/core";
import { TestTransport, testPrincipal } from "@entity-stream/core/testing";

function connect(registry: ConnectionRegistry, id: string) {
  const transport = new TestTransport();
  const connection = new Connection({
    id,
    principal: testPrincipal({ id }),
    transport,
  });
  registry.register(connection);
  return { connection, transport };
}

describe("ConnectionRegistry", () => {
  it("tracks subscriptions in both directions", () => {
    const registry = new ConnectionRegistry();
    connect(registry, "a");
    connect(registry, "b");

    expect(registry.addSubscription("a", "public.news")).toEqual({
      added: true,
      first: true,
    });
    expect(registry.addSubscription("b", "public.news")).toEqual({
      added: true,
      first: false,
    });
    expect(registry.addSubscription("a", "public.news")).toEqual({
      added: false,
      first: false,
    });

    expect(registry.subscribersOf("public.news").sort()).toEqual(["a", "b"]);
    expect(registry.topicsOf("a")).toEqual(["public.news"]);
  });

  it("reports the last subscriber leaving a topic", () => {
    const registry = new ConnectionRegistry();
    connect(registry, "a");
    connect(registry, "b");
    registry.addSubscription("a", "public.news");
    registry.addSubscription("b", "public.news");

    expect(registry.removeSubscription("a", "public.news")).toEqual({
      removed: true,
      last: false,
    });
    expect(registry.removeSubscription("b", "public.news")).toEqual({
      removed: true,
      last: true,
    });
    expect(registry.removeSubscription("b", "public.news")).toEqual({
      removed: false,
      last: false,
    });
    expect(registry.listTopics()).toEqual([]);
  });

  it("leaves no trace after subscribe, unsubscribe and deregister", () => {
    const registry = new ConnectionRegistry();
    connect(registry, "a");
    registry.addSubscription("a", "entity.product.42");
    registry.removeSubscription("a", "entity.product.42");

    expect(registry.subscriberCount("entity.product.42")).toBe(0);
    expect(registry.topicCount).toBe(0);

    expect(registry.deregister("a")).toEqual([]);
    expect(registry.size).toBe(0);
  });

  it("returns topics emptied by deregister", () => {
    const registry = new ConnectionRegistry();
    connect(registry, "a");
    connect(registry, "b");
    registry.addSubscription("a", "public.news");
    registry.addSubscription("a", "entity.product.42");
    registry.addSubscription("b", "public.news");

    expect(registry.deregister("a")).toEqual(["entity.product.42"]);
    expect(registry.deregister("a")).toEqual([]);
    expect(registry.subscribersOf("public.news")).toEqual(["b"]);
    expect(registry.has("a")).toBe(false);
  });

  it("rejects subscriptions for unknown connections", () => {
    const registry = new ConnectionRegistry();
    expect(() => registry.addSubscription("ghost", "public.news")).toThrow(
      RegistryError,
    );
  });

  it("rejects registering the same connection twice", () => {
    const registry = new ConnectionRegistry();
    const { connection } = connect(registry, "a");
    expect(() => registry.register(connection)).toThrow(RegistryError);
  });

  it("delivers to the remaining subscribers when one write fails", () => {
    const registry = new ConnectionRegistry();
    const peers = ["a", "b", "c", "d"].map((id) => connect(registry, id));
    for (const { connection } of peers) {
      registry.addSubscription(connection.id, "public.news");
    }
    peers[1]?.transport.failWrites();

    const report = registry.fanOut(
      "public.news",
      messageEnvelope("public.news", { n: 1 }),
    );

    expect(report.delivered).toBe(3);
    expect(report.failed.map((failure) => failure.connectionId)).toEqual(["b"]);
    for (const id of ["a", "c", "d"]) {
      const peer = peers.find(({ connection }) => connection.id === id);
      expect(peer?.transport.frames()).toEqual([
        {
          status: "success",
          operation: "message",
          topic: "public.news",
          data: { n: 1 },
        },
      ]);
    }
  });

  it("skips closed connections during fan-out", () => {
    const registry = new ConnectionRegistry();
    const { connection, transport } = connect(registry, "a");
    registry.addSubscription("a", "public.news");
    connection.markClosed();

    const report = registry.fanOut(
      "public.news",
      messageEnvelope("public.news", {}),
    );
    expect(report).toEqual({ topic: "public.news", delivered: 0, failed: [] });
    expect(transport.raw).toEqual([]);
  });
});
