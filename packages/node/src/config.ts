// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  DEFAULT_MAX_QUEUED,
  type LogLevel,
  type OverflowPolicy,
} from "@entity-stream/core";
import { z } from "zod";

export type BrokerKind = "kafka" | "rabbitmq" | "redis" | "memory";

export type JwtAlgorithm = "HS256" | "HS384" | "HS512";

export interface BrokerConfig {
  kind: BrokerKind;
  host: string;
  /** 0 for the memory broker */
  port: number;
  username: string;
  password: string;
  namespace: string;
}

export interface StreamingConfig {
  enabled: boolean;
  broker: BrokerConfig;
  server: { host: string; port: number; path: string };
  outbound: { maxQueued: number; policy: OverflowPolicy };
  /** 0 disables pings */
  heartbeatMs: number;
  auth: { secret: string | undefined; algorithm: JwtAlgorithm };
  logLevel: LogLevel;
}

export const DEFAULT_BROKER_PORTS: Record<BrokerKind, number> = {
  kafka: 9092,
  rabbitmq: 5672,
  redis: 6379,
  memory: 0,
};

const TRUE_VALUES = ["true", "1", "yes", "on"];
const FALSE_VALUES = ["false", "0", "no", "off"];

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value), {
    message: "Expected true or false",
  })
  .transform((value) => TRUE_VALUES.includes(value));

const port = z.coerce.number().int().min(1).max(65535);

const EnvSchema = z
  .object({
    ENABLE_STREAMING: flag.default("false"),
    STREAMING_BROKER: z.enum(["kafka", "rabbitmq", "redis", "memory"]).default("kafka"),
    STREAMING_BROKER_HOST: z.string().min(1).default("localhost"),
    STREAMING_BROKER_PORT: port.optional(),
    STREAMING_BROKER_USERNAME: z.string().default("guest"),
    STREAMING_BROKER_PASSWORD: z.string().default("guest"),
    STREAMING_NAMESPACE: z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, "Use letters, digits, '-' or '_'")
      .default("entity-stream"),
    STREAMING_HOST: z.string().min(1).default("0.0.0.0"),
    STREAMING_PORT: port.default(8080),
    STREAMING_PATH: z.string().startsWith("/").default("/ws"),
    STREAMING_MAX_QUEUED: z.coerce.number().int().min(1).default(DEFAULT_MAX_QUEUED),
    STREAMING_OVERFLOW_POLICY: z.enum(["drop-oldest", "disconnect"]).default("drop-oldest"),
    STREAMING_HEARTBEAT_MS: z.coerce.number().int().min(0).default(30_000),
    JWT_SECRET_KEY: z.string().optional(),
    JWT_ALGORITHM: z.enum(["HS256", "HS384", "HS512"]).default("HS256"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  })
  .superRefine((env, ctx) => {
    if (env.ENABLE_STREAMING && !env.JWT_SECRET_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["JWT_SECRET_KEY"],
        message: "Required when ENABLE_STREAMING is true",
      });
    }
  });

/**
 * Invalid environment. `issues` holds one line per offending variable.
 */
export class ConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid streaming configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Read the streaming configuration from environment variables.
 * Empty variables count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): StreamingConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") present[key] = value;
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      ),
    );
  }

  const values = parsed.data;
  const kind = values.STREAMING_BROKER;
  return {
    enabled: values.ENABLE_STREAMING,
    broker: {
      kind,
      host: values.STREAMING_BROKER_HOST,
      port: values.STREAMING_BROKER_PORT ?? DEFAULT_BROKER_PORTS[kind],
      username: values.STREAMING_BROKER_USERNAME,
      password: values.STREAMING_BROKER_PASSWORD,
      namespace: values.STREAMING_NAMESPACE,
    },
    server: {
      host: values.STREAMING_HOST,
      port: values.STREAMING_PORT,
      path: values.STREAMING_PATH,
    },
    outbound: {
      maxQueued: values.STREAMING_MAX_QUEUED,
      policy: values.STREAMING_OVERFLOW_POLICY,
    },
    heartbeatMs: values.STREAMING_HEARTBEAT_MS,
    auth: {
      secret: values.JWT_SECRET_KEY,
      algorithm: values.JWT_ALGORITHM,
    },
    logLevel: values.LOG_LEVEL,
  };
}
