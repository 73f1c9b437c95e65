import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { defaultState, normalizeState, serializeState } from "./validation";
import type { HouseholdState, KeyValueStorage } from "../types";

export const STORAGE_KEY = "how2pay_state_v1";
export const DEFAULT_STATE_FILE = "how2pay_state.json";

/**
 * Storage that keeps every key in memory.
 */
export const createMemoryStorage = (initial: Record<string, string> = {}): KeyValueStorage & { clear(): void } => {
  let store: Record<string, string> = { ...initial };
  return {
    getItem: (key) => (key in store ? store[key] : null),
    setItem: (key, value) => {
      store[key] = value;
    },
    removeItem: (key) => {
      delete store[key];
    },
    clear: () => {
      store = {};
    },
  };
};

/**
 * Storage backed by a single JSON file holding one entry per key.
 */
export const createFileStorage = (path: string = DEFAULT_STATE_FILE): KeyValueStorage => {
  const readAll = (): Record<string, string> => {
    if (!existsSync(path)) return {};
    const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
    const entries: Record<string, string> = {};
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      for (const [key, value] of Object.entries(parsed)) {
        entries[key] = typeof value === "string" ? value : JSON.stringify(value);
      }
    }
    return entries;
  };

  const writeAll = (entries: Record<string, string>): void => {
    if (!Object.keys(entries).length) {
      rmSync(path, { force: true });
      return;
    }
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, JSON.stringify(entries, null, 2), "utf8");
  };

  return {
    getItem: (key) => readAll()[key] ?? null,
    setItem: (key, value) => writeAll({ ...readAll(), [key]: value }),
    removeItem: (key) => {
      const entries = readAll();
      delete entries[key];
      writeAll(entries);
    },
  };
};

/**
 * Load the persisted household. Unreadable data falls back to an empty household.
 */
export const loadState = (storage: KeyValueStorage): HouseholdState => {
  try {
    const raw = storage.getItem(STORAGE_KEY);
    if (!raw) return defaultState();
    return normalizeState(JSON.parse(raw), { strict: false });
  } catch (error) {
    console.warn(`Could not load saved household, starting empty: ${error instanceof Error ? error.message : String(error)}`);
    return defaultState();
  }
};

/**
 * Persist the household in its snake_case form.
 */
export const saveState = (state: HouseholdState, storage: KeyValueStorage): void => {
  storage.setItem(STORAGE_KEY, JSON.stringify(serializeState(state)));
};
