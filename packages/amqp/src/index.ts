// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

export { AmqpBrokerAdapter, DEFAULT_AMQP_URL, amqpBroker } from "./broker";
export type {
  AmqpBroker,
  AmqpBrokerOptions,
  AmqpChannel,
  AmqpConnect,
  AmqpConnection,
  AmqpMessage,
} from "./types";
