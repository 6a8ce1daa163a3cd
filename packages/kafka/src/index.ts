// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

export { DEFAULT_NAMESPACE, KafkaBrokerAdapter, kafkaBroker } from "./broker";
export type {
  KafkaBroker,
  KafkaBrokerOptions,
  KafkaClient,
  LogAdmin,
  LogConsumer,
  LogConsumerCrash,
  LogMessage,
  LogMessagePayload,
  LogProducer,
} from "./types";
