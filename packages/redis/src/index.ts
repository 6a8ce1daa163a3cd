// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

export { RedisBrokerAdapter, normalizeNamespace, redisBroker } from "./broker";
export type { RedisBroker, RedisBrokerOptions, RedisClient } from "./types";
