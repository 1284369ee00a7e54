import { Command } from "commander";

import type { Appcast } from "../appcast/types.js";
import { loadUpdaterSettings } from "../configs/settings/loader.js";
import { renderCliError } from "../render/utils/errors.js";
import {
  renderNoUpdatesTranscript,
  renderUpdateAvailableTranscript,
} from "../render/transcripts/update-check.js";
import {
  runUpdateCheck,
  type UpdateCheckDeps,
  type UpdateCheckStatus,
} from "../update-check/checker.js";
import type { UpdateNotifier } from "../update-check/notifier.js";
import { createFileSettingsStore } from "../update-check/settings-store.js";
import { resolveUpdateStatePath } from "../update-check/state-path.js";
import { MissingCurrentVersionError, toCliError } from "./errors.js";
import { writeCommandOutput } from "./output.js";

export interface CheckCommandOptions {
  feedUrl?: string;
  currentVersion?: string;
  config?: string;
  state?: string;
  manual?: boolean;
}

export interface CheckCommandResult {
  status?: UpdateCheckStatus;
  body: string;
  exitCode: number;
}

export type CheckCommandDeps = Pick<UpdateCheckDeps, "download" | "now">;

/**
 * Notifier that renders each outcome as a CLI transcript.
 */
export class TranscriptNotifier implements UpdateNotifier {
  private rendered: string | undefined;

  get body(): string {
    return this.rendered ?? "";
  }

  updateAvailable(appcast: Appcast, currentVersion: string): void {
    this.rendered = renderUpdateAvailableTranscript(appcast, currentVersion);
  }

  noUpdates(currentVersion: string): void {
    this.rendered = renderNoUpdatesTranscript(currentVersion);
  }

  error(error: unknown): void {
    this.rendered = renderCliError(toCliError(error));
  }
}

export async function runCheckCommand(
  options: CheckCommandOptions = {},
  deps: CheckCommandDeps = {},
): Promise<CheckCommandResult> {
  const settings = loadUpdaterSettings({ filePath: options.config });
  const currentVersion = options.currentVersion ?? settings.currentVersion;
  if (!currentVersion) {
    throw new MissingCurrentVersionError();
  }

  const notifier = new TranscriptNotifier();
  try {
    const outcome = await runUpdateCheck(
      {
        feedUrl: options.feedUrl ?? settings.feedUrl,
        currentVersion,
        mode: options.manual ? "manual" : "automatic",
      },
      {
        ...deps,
        notifier,
        settings: createFileSettingsStore(
          options.state ?? resolveUpdateStatePath(),
        ),
      },
    );
    return { status: outcome.status, body: notifier.body, exitCode: 0 };
  } catch {
    // The notifier has already rendered the failure.
    return { body: notifier.body, exitCode: 1 };
  }
}

export function createCheckCommand(): Command {
  return new Command("check")
    .description("Check the appcast for a newer version")
    .option("--feed-url <url>", "Appcast URL (overrides appcast.yaml)")
    .option(
      "--current-version <version>",
      "Installed version (overrides appcast.yaml)",
    )
    .option("--config <path>", "Path to the settings file")
    .option("--state <path>", "Path to the update-check state file")
    .option("--manual", "Bypass caches and ignore skipped versions")
    .allowExcessArguments(false)
    .action(async (options: CheckCommandOptions) => {
      const result = await runCheckCommand(options);
      writeCommandOutput({ body: result.body, exitCode: result.exitCode });
    });
}
