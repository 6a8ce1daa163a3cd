/**
 * Topic grammar.
 *
 * - `entity.<entity_type>.<entity_id>`
 * - `entity.<entity_type>`
 * - `user.<user_id>.<suffix>`
 * - `public.<suffix>`
 *
 * Topics are plain strings; they exist as soon as something subscribes or
 * publishes to them. `entity_type` and `suffix` never contain dots.
 */

export type ParsedTopic =
  | { kind: "entity"; entityType: string; entityId?: string }
  | { kind: "user"; userId: string; suffix: string }
  | { kind: "public"; suffix: string };

export const TOPIC_SEPARATOR = ".";
export const MAX_TOPIC_LENGTH = 255;

/**
 * Parse a topic string. Returns undefined when it matches no shape.
 */
export function parseTopic(topic: string): ParsedTopic | undefined {
  if (topic.length === 0 || topic.length > MAX_TOPIC_LENGTH) return undefined;

  const segments = topic.split(TOPIC_SEPARATOR);
  if (segments.some((segment) => segment.length === 0)) return undefined;

  const [prefix, first, ...rest] = segments;

  switch (prefix) {
    case "entity": {
      if (first === undefined) return undefined;
      // Ids are opaque and may themselves contain dots
      return rest.length === 0
        ? { kind: "entity", entityType: first }
        : { kind: "entity", entityType: first, entityId: rest.join(".") };
    }
    case "user": {
      const [suffix] = rest;
      if (first === undefined || suffix === undefined || rest.length !== 1) {
        return undefined;
      }
      return { kind: "user", userId: first, suffix };
    }
    case "public": {
      if (first === undefined || rest.length !== 0) return undefined;
      return { kind: "public", suffix: first };
    }
    default:
      return undefined;
  }
}

/**
 * Topic for a single entity: `entity.<lower(type)>.<id>`.
 *
 * @throws TypeError when the type or id cannot form a valid topic
 */
export function entityTopic(entityType: string, entityId: string): string {
  assertSegment(entityType, "entity type");
  if (entityId.length === 0) {
    throw new TypeError("Entity id must not be empty");
  }
  return ["entity", entityType.toLowerCase(), entityId].join(TOPIC_SEPARATOR);
}

/**
 * Topic for every entity of a type: `entity.<lower(type)>`.
 */
export function entityTypeTopic(entityType: string): string {
  assertSegment(entityType, "entity type");
  return ["entity", entityType.toLowerCase()].join(TOPIC_SEPARATOR);
}

function assertSegment(value: string, label: string): void {
  if (value.length === 0 || value.includes(TOPIC_SEPARATOR)) {
    throw new TypeError(
      `Invalid ${label} "${value}": must be non-empty and contain no "${TOPIC_SEPARATOR}"`,
    );
  }
}
