import { resolve } from "node:path";
import process from "node:process";

import { load, type YAMLException } from "js-yaml";

import { toErrorMessage } from "../../utils/errors.js";
import { isMissing, readUtf8File } from "../../utils/fs.js";
import { InvalidSettingsError } from "./errors.js";
import { type UpdaterSettings, updaterSettingsSchema } from "./types.js";

export const SETTINGS_CONFIG_FILENAME = "appcast.yaml" as const;

export interface LoadUpdaterSettingsOptions {
  root?: string;
  filePath?: string;
  readFile?: (path: string) => string;
}

export function loadUpdaterSettings(
  options: LoadUpdaterSettingsOptions = {},
): UpdaterSettings {
  const root = options.root ?? process.cwd();
  const filePath = options.filePath ?? resolve(root, SETTINGS_CONFIG_FILENAME);
  const readFile = options.readFile ?? defaultReadFile;

  let content: string;
  try {
    content = readFile(filePath);
  } catch (error) {
    if (isMissing(error) && options.filePath === undefined) {
      return {};
    }
    throw error;
  }

  const document = parseSettingsYaml(content, filePath);
  const result = updaterSettingsSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue?.message ? issue.message : "Invalid settings value";
    throw new InvalidSettingsError(filePath, detail);
  }

  const { feedUrl, currentVersion } = result.data;
  return {
    ...(feedUrl !== undefined ? { feedUrl } : {}),
    ...(currentVersion !== undefined
      ? { currentVersion: String(currentVersion) }
      : {}),
  };
}

function parseSettingsYaml(content: string, filePath: string): unknown {
  const source = content.trim();
  if (source.length === 0) {
    return {};
  }

  try {
    return load(source) ?? {};
  } catch (error) {
    const reason = isYamlException(error)
      ? error.reason
      : toErrorMessage(error);
    throw new InvalidSettingsError(
      filePath,
      reason.replace(/\s+/gu, " ").trim(),
    );
  }
}

function isYamlException(error: unknown): error is YAMLException {
  return error instanceof Error && error.name === "YAMLException";
}

function defaultReadFile(path: string): string {
  return readUtf8File(path, "utf8");
}
