import { describe, expect, it, vi } from "vitest";
import {
  EntityEventPublisher,
  createLogger,
  disabledEntityEventPublisher,
} from "@entity-stream/core";
import { recordingBroker } from "@entity-stream/core/testing";

const now = () => 1_700_000_000_500;

describe("EntityEventPublisher", () => {
  it("publishes one event per mutation on the entity topic", async () => {
    const broker = recordingBroker();
    const publisher = new EntityEventPublisher({ broker, now });

    const outcome = await publisher.onMutation("Product", 42, "created", {
      name: "Lamp",
    });

    const event = {
      event_type: "created",
      entity_type: "product",
      entity_id: "42",
      timestamp: 1_700_000_000.5,
      data: { name: "Lamp" },
    };
    expect(outcome).toEqual({
      status: "published",
      topic: "entity.product.42",
      event,
    });
    expect(broker.published).toEqual([
      { topic: "entity.product.42", payload: event },
    ]);
  });

  it("sends null data for deletes", async () => {
    const broker = recordingBroker();
    const publisher = new EntityEventPublisher({ broker, now });

    await publisher.onMutation("product", "42", "deleted", { name: "Lamp" });

    expect(broker.published[0]?.payload).toMatchObject({
      event_type: "deleted",
      data: null,
    });
  });

  it("skips entity types that are not streamable", async () => {
    const broker = recordingBroker();
    const publisher = new EntityEventPublisher({
      broker,
      isStreamable: (type) => type !== "AuditLog",
    });

    const outcome = await publisher.onMutation("AuditLog", "1", "created", {});

    expect(outcome).toEqual({ status: "skipped", reason: "not-streamable" });
    expect(broker.published).toEqual([]);
  });

  it("turns broker failures into a warning outcome", async () => {
    const broker = recordingBroker();
    broker.failPublish();
    const log = vi.fn();
    const publisher = new EntityEventPublisher({
      broker,
      logger: createLogger({ log }),
    });

    const outcome = await publisher.onMutation("product", "42", "updated", {});

    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") {
      expect(outcome.topic).toBe("entity.product.42");
      expect(outcome.warning).toBe(
        "Failed to publish product 42 event: Injected publish failure",
      );
    }
    expect(log).toHaveBeenCalledWith(
      "warn",
      "entity-event",
      "Failed to publish product 42 event: Injected publish failure",
      { topic: "entity.product.42" },
    );
  });

  it("resolves even when the broker throws", async () => {
    const publisher = new EntityEventPublisher({
      broker: {
        name: "broken",
        publish: () => Promise.reject(new Error("unreachable")),
        subscribe: () => Promise.reject(new Error("unreachable")),
        unsubscribe: async () => {},
      },
    });

    const outcome = await publisher.onMutation("product", "1", "updated", null);
    expect(outcome).toMatchObject({ status: "failed" });
  });

  it("reports entity types that cannot form a topic", async () => {
    const broker = recordingBroker();
    const publisher = new EntityEventPublisher({ broker });

    const outcome = await publisher.onMutation("a.b", "1", "created", {});

    expect(outcome.status).toBe("failed");
    expect(broker.published).toEqual([]);
  });

  it("skips everything when streaming is disabled", async () => {
    await expect(
      disabledEntityEventPublisher.onMutation("product", "1", "created", {}),
    ).resolves.toEqual({ status: "skipped", reason: "disabled" });
  });
});
