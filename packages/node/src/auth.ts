// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { IncomingHttpHeaders } from "node:http";
import { createPrincipal, type Principal } from "@entity-stream/core";
import { errors, jwtVerify } from "jose";
import { z } from "zod";
import type { JwtAlgorithm } from "./config";

/**
 * Claims of an access token. Tokens without `type` are accepted; refresh
 * tokens are not.
 */
const AccessClaimsSchema = z.object({
  sub: z.string().min(1),
  username: z.string().optional(),
  privileges: z.array(z.string()).default([]),
  is_superuser: z.boolean().default(false),
  type: z.literal("access").optional(),
});

export class AuthenticationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthenticationError";
  }
}

export type TokenVerifier = (token: string) => Promise<Principal>;

export interface TokenVerifierOptions {
  secret: string;
  algorithm?: JwtAlgorithm;
}

/**
 * Verify HS-signed bearer tokens and turn their claims into a principal.
 *
 * @throws AuthenticationError for bad signatures, expired tokens and
 * malformed claims
 */
export function createTokenVerifier(options: TokenVerifierOptions): TokenVerifier {
  const key = new TextEncoder().encode(options.secret);
  const algorithms = [options.algorithm ?? "HS256"];

  return async (token) => {
    let payload: unknown;
    try {
      ({ payload } = await jwtVerify(token, key, { algorithms }));
    } catch (error) {
      if (error instanceof errors.JWTExpired) {
        throw new AuthenticationError("Token expired", { cause: error });
      }
      throw new AuthenticationError("Invalid token", { cause: error });
    }

    const claims = AccessClaimsSchema.safeParse(payload);
    if (!claims.success) {
      throw new AuthenticationError("Invalid token claims", {
        cause: claims.error,
      });
    }

    return createPrincipal({
      id: claims.data.sub,
      username: claims.data.username,
      privileges: claims.data.privileges,
      isAdmin: claims.data.is_superuser,
    });
  };
}

/**
 * Bearer token from the Authorization header, or from the `token` query
 * parameter for clients that cannot set headers.
 */
export function extractBearerToken(request: {
  url?: string;
  headers: IncomingHttpHeaders;
}): string | undefined {
  const header = request.headers.authorization;
  if (header) {
    const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
    return match?.[1];
  }

  const query = new URL(request.url ?? "/", "http://localhost").searchParams;
  return query.get("token") || undefined;
}
