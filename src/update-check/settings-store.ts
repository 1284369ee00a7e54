import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import { z } from "zod";

import { isMissing } from "../utils/fs.js";
import { UpdateStateError } from "./errors.js";

export const LAST_CHECK_TIME_KEY = "LastCheckTime";
export const SKIP_THIS_VERSION_KEY = "SkipThisVersion";

/**
 * Key/value persistence used by the update checker.
 */
export interface UpdateSettingsStore {
  readValue(key: string): string | undefined;
  writeValue(key: string, value: string): void;
  readTimestamp(key: string): Date | undefined;
  writeTimestamp(key: string, date: Date): void;
  removeValue(key: string): void;
}

const stateSchema = z.record(z.union([z.string(), z.number()]));

type StateRecord = z.infer<typeof stateSchema>;

/**
 * Settings persisted as a flat JSON object. Timestamps are whole seconds
 * since the epoch.
 */
export function createFileSettingsStore(statePath: string): UpdateSettingsStore {
  const load = (): StateRecord => readStateFile(statePath);
  const update = (mutate: (state: StateRecord) => void): void => {
    const state = load();
    mutate(state);
    writeStateFile(statePath, state);
  };

  return {
    readValue(key) {
      const value = load()[key];
      return typeof value === "string" ? value : undefined;
    },

    writeValue(key, value) {
      update((state) => {
        state[key] = value;
      });
    },

    readTimestamp(key) {
      const value = load()[key];
      if (typeof value !== "number" || !Number.isFinite(value)) {
        return undefined;
      }
      return new Date(value * 1000);
    },

    writeTimestamp(key, date) {
      update((state) => {
        state[key] = Math.floor(date.getTime() / 1000);
      });
    },

    removeValue(key) {
      update((state) => {
        delete state[key];
      });
    },
  };
}

function readStateFile(statePath: string): StateRecord {
  let raw: string;
  try {
    raw = readFileSync(statePath, "utf-8");
  } catch (error) {
    if (isMissing(error)) {
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new UpdateStateError(statePath, "file is not valid JSON");
  }

  const result = stateSchema.safeParse(parsed);
  if (!result.success) {
    throw new UpdateStateError(
      statePath,
      "expected an object of string or number values",
    );
  }
  return { ...result.data };
}

function writeStateFile(statePath: string, state: StateRecord): void {
  mkdirSync(dirname(statePath), { recursive: true });
  writeFileSync(statePath, JSON.stringify(state, null, 2) + "\n", "utf-8");
}
