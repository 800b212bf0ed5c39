import fs from "node:fs";
import path from "node:path";

/**
 * Source name → identifiers of every article already processed.
 * Membership is what matters; order is insertion order.
 */
export type SeenState = Record<string, string[]>;

function isSeenState(value: unknown): value is SeenState {
  if (!value || typeof value !== "object" || Array.isArray(value)) return false;
  return Object.values(value).every(
    (ids) => Array.isArray(ids) && ids.every((id) => typeof id === "string")
  );
}

/**
 * Read the seen-state file. A missing file is a first run; an unreadable or
 * malformed one is discarded (with a warning) and the run starts from scratch.
 */
export function loadSeen(filePath: string): SeenState {
  if (!fs.existsSync(filePath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    console.warn(`[seen] ${filePath} is corrupted, starting with an empty state:`, err);
    return {};
  }

  if (!isSeenState(parsed)) {
    console.warn(`[seen] ${filePath} has an unexpected shape, starting with an empty state`);
    return {};
  }

  return parsed;
}

/**
 * Overwrite the seen-state file with the whole mapping.
 * No locking: two runs sharing the file will race.
 */
export function saveSeen(seen: SeenState, filePath: string): void {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(seen, null, 2) + "\n", "utf-8");
}

export function ensureSource(seen: SeenState, name: string): SeenState {
  if (!Object.prototype.hasOwnProperty.call(seen, name)) {
    seen[name] = [];
  }
  return seen;
}
