import { readFileSync } from "node:fs";

import { z } from "zod";

import { getCliAssetPath } from "./cli-root.js";

const packageJsonSchema = z.object({ version: z.string() });

let cachedVersion: string | undefined;

export function getCliVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  cachedVersion = readPackageVersion() ?? "unknown";
  return cachedVersion;
}

function readPackageVersion(): string | undefined {
  let raw: string;
  try {
    raw = readFileSync(getCliAssetPath("package.json"), "utf-8");
  } catch {
    // An unreadable package.json only affects `--version` output.
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }

  const result = packageJsonSchema.safeParse(parsed);
  const version = result.success ? result.data.version.trim() : "";
  return version || undefined;
}
