// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { parseTopic } from "./topics";
import type { Principal, TopicOperation } from "./types";

/**
 * Decides whether a principal may subscribe or publish to a topic.
 * Implementations must be pure: no I/O, no state changes.
 */
export interface TopicAuthorizer {
  authorize(
    principal: Principal,
    topic: string,
    operation: TopicOperation,
  ): boolean;
}

const ENTITY_PRIVILEGE_ACTION: Record<TopicOperation, string> = {
  subscribe: "read",
  publish: "update",
};

/**
 * Privilege required for an entity topic operation, e.g. `read_product`.
 */
export function entityPrivilege(
  entityType: string,
  operation: TopicOperation,
): string {
  return `${ENTITY_PRIVILEGE_ACTION[operation]}_${entityType.toLowerCase()}`;
}

/**
 * Rules, first match wins:
 * 1. administrators may do anything
 * 2. `entity.<type>[.<id>]` needs `read_<type>` to subscribe, `update_<type>` to publish
 * 3. `user.<uid>.<suffix>` is open to the principal whose id is `<uid>`
 * 4. `public.<suffix>` is open for subscribe; nothing grants publish
 * 5. anything else is denied
 */
export function authorize(
  principal: Principal,
  topic: string,
  operation: TopicOperation,
): boolean {
  if (principal.isAdmin) return true;

  const parsed = parseTopic(topic);
  if (!parsed) return false;

  switch (parsed.kind) {
    case "entity":
      return principal.privileges.has(
        entityPrivilege(parsed.entityType, operation),
      );
    case "user":
      return principal.id === parsed.userId;
    case "public":
      return operation === "subscribe";
  }
}

export const defaultTopicAuthorizer: TopicAuthorizer = { authorize };
