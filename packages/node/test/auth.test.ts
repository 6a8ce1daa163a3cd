import { SignJWT } from "jose";
import { describe, expect, it } from "vitest";
import {
  AuthenticationError,
  createTokenVerifier,
  extractBearerToken,
} from "@entity-stream/node";

const SECRET = "test-secret";
const key = new TextEncoder().encode(SECRET);

function sign(
  claims: Record<string, unknown>,
  options: { expiresIn?: string; secret?: Uint8Array } = {},
): Promise<string> {
  return new SignJWT(claims)
    .setProtectedHeader({ alg: "HS256" })
    .setIssuedAt()
    .setExpirationTime(options.expiresIn ?? "5m")
    .sign(options.secret ?? key);
}

describe("createTokenVerifier", () => {
  const verify = createTokenVerifier({ secret: SECRET });

  it("maps access token claims to a principal", async () => {
    const token = await sign({
      sub: "user-7",
      username: "alice",
      privileges: ["read_product", "update_product"],
      type: "access",
    });

    const principal = await verify(token);

    expect(principal.id).toBe("user-7");
    expect(principal.username).toBe("alice");
    expect([...principal.privileges]).toEqual(["read_product", "update_product"]);
    expect(principal.isAdmin).toBe(false);
  });

  it("treats is_superuser as the administrator capability", async () => {
    const principal = await verify(await sign({ sub: "root", is_superuser: true }));
    expect(principal.isAdmin).toBe(true);
    expect(principal.privileges.size).toBe(0);
  });

  it("rejects refresh tokens", async () => {
    const token = await sign({ sub: "user-7", type: "refresh" });
    await expect(verify(token)).rejects.toThrow("Invalid token claims");
  });

  it("rejects tokens without a subject", async () => {
    await expect(verify(await sign({ username: "alice" }))).rejects.toBeInstanceOf(
      AuthenticationError,
    );
  });

  it("rejects expired tokens", async () => {
    const token = await new SignJWT({ sub: "user-7" })
      .setProtectedHeader({ alg: "HS256" })
      .setExpirationTime(Math.floor(Date.now() / 1000) - 60)
      .sign(key);
    await expect(verify(token)).rejects.toThrow("Token expired");
  });

  it("rejects tokens signed with another key", async () => {
    const token = await sign(
      { sub: "user-7" },
      { secret: new TextEncoder().encode("other-secret") },
    );
    await expect(verify(token)).rejects.toThrow("Invalid token");
  });

  it("rejects garbage", async () => {
    await expect(verify("not-a-jwt")).rejects.toBeInstanceOf(AuthenticationError);
  });
});

describe("extractBearerToken", () => {
  it("reads the Authorization header", () => {
    expect(
      extractBearerToken({ headers: { authorization: "Bearer abc.def.ghi" } }),
    ).toBe("abc.def.ghi");
    expect(
      extractBearerToken({ headers: { authorization: "bearer   xyz" } }),
    ).toBe("xyz");
  });

  it("ignores other schemes", () => {
    expect(
      extractBearerToken({ url: "/ws?token=q", headers: { authorization: "Basic Zm9v" } }),
    ).toBeUndefined();
  });

  it("falls back to the token query parameter", () => {
    expect(extractBearerToken({ url: "/ws?token=q1", headers: {} })).toBe("q1");
    expect(extractBearerToken({ url: "/ws?token=", headers: {} })).toBeUndefined();
    expect(extractBearerToken({ url: "/ws", headers: {} })).toBeUndefined();
  });
});
