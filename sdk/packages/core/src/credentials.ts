import type { RoomConfiguration } from "./types/room.js";
import { isPlainObject } from "./utils.js";

/** Fields of upload targets and webhooks that hold secrets */
export const SENSITIVE_FIELDS: readonly string[] = [
  "access_key",
  "secret",
  "session_token",
  "credentials",
  "account_key",
  "signing_key",
];

function collect(value: unknown, path: string, found: string[]): void {
  if (Array.isArray(value)) {
    value.forEach((item: unknown, index) =>
      collect(item, `${path}[${index}]`, found),
    );
    return;
  }
  if (!isPlainObject(value)) return;
  for (const [key, child] of Object.entries(value)) {
    const childPath = `${path}.${key}`;
    if (
      SENSITIVE_FIELDS.includes(key) &&
      typeof child === "string" &&
      child !== ""
    ) {
      found.push(childPath);
    } else {
      collect(child, childPath, found);
    }
  }
}

/**
 * Paths of credentials embedded in a room configuration, e.g.
 * `room_config.egress.room.file_outputs[0].s3.secret`.
 */
export function findSensitiveCredentials(
  roomConfig: RoomConfiguration,
): string[] {
  const found: string[] = [];
  collect(roomConfig, "room_config", found);
  return found;
}
