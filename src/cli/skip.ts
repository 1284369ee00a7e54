import { Command } from "commander";

import {
  createFileSettingsStore,
  SKIP_THIS_VERSION_KEY,
} from "../update-check/settings-store.js";
import { resolveUpdateStatePath } from "../update-check/state-path.js";
import { MissingSkipVersionError, SkipArgumentsConflictError } from "./errors.js";
import { writeCommandOutput } from "./output.js";

export interface SkipCommandOptions {
  clear?: boolean;
  state?: string;
}

export function runSkipCommand(
  version: string | undefined,
  options: SkipCommandOptions = {},
): string {
  const store = createFileSettingsStore(
    options.state ?? resolveUpdateStatePath(),
  );

  if (options.clear) {
    if (version !== undefined) {
      throw new SkipArgumentsConflictError();
    }
    store.removeValue(SKIP_THIS_VERSION_KEY);
    return "Automatic checks will offer every version again.";
  }

  const trimmed = version?.trim();
  if (!trimmed) {
    throw new MissingSkipVersionError();
  }

  store.writeValue(SKIP_THIS_VERSION_KEY, trimmed);
  return `Automatic checks will no longer offer ${trimmed}.`;
}

export function createSkipCommand(): Command {
  return new Command("skip")
    .description("Stop automatic checks from offering a version")
    .argument("[version]", "Version to skip")
    .option("--clear", "Forget the skipped version")
    .option("--state <path>", "Path to the update-check state file")
    .allowExcessArguments(false)
    .action((version: string | undefined, options: SkipCommandOptions) => {
      writeCommandOutput({ body: runSkipCommand(version, options) });
    });
}
