/**
 * ID generation: connection ids and subscription handles.
 */

import { randomBytes } from "node:crypto";

export function generateId(prefix: string): string {
  return `${prefix}_${randomBytes(8).toString("hex")}`;
}

export function generateConnectionId(): string {
  return generateId("conn");
}
