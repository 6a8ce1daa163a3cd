import { describe, expect, it } from "vitest";
import { authorize, entityPrivilege } from "@entity-stream/core";
import { testPrincipal } from "@entity-stream/core/testing";

describe("authorize", () => {
  const reader = testPrincipal({ id: "7", privileges: ["read_product"] });
  const writer = testPrincipal({ id: "8", privileges: ["update_product"] });
  const admin = testPrincipal({ id: "1", isAdmin: true });

  it.each([
    [reader, "entity.product.42", "subscribe", true],
    [reader, "entity.product", "subscribe", true],
    [reader, "entity.product.42", "publish", false],
    [reader, "entity.order.1", "subscribe", false],
    [writer, "entity.product.42", "publish", true],
    [writer, "entity.product.42", "subscribe", false],
    [reader, "user.7.notifications", "subscribe", true],
    [reader, "user.7.notifications", "publish", true],
    [reader, "user.8.notifications", "subscribe", false],
    [reader, "public.news", "subscribe", true],
    [reader, "public.news", "publish", false],
    [reader, "orders.42", "subscribe", false],
    [admin, "orders.42", "publish", true],
    [admin, "user.7.notifications", "subscribe", true],
    [admin, "public.news", "publish", true],
  ] as const)(
    "principal %# on %s (%s) → %s",
    (principal, topic, operation, expected) => {
      expect(authorize(principal, topic, operation)).toBe(expected);
    },
  );

  it("matches privileges against the lower-cased entity type", () => {
    const principal = testPrincipal({ privileges: ["read_product"] });
    expect(authorize(principal, "entity.Product.42", "subscribe")).toBe(true);
  });

  it("builds privilege names", () => {
    expect(entityPrivilege("Product", "subscribe")).toBe("read_product");
    expect(entityPrivilege("Product", "publish")).toBe("update_product");
  });
});
