import { AppcastReader } from "../appcast/parser.js";
import type { Appcast } from "../appcast/types.js";
import { compareVersions } from "../appcast/version.js";
import { type AppcastDownloader, downloadAppcast } from "./download.js";
import { AppcastUrlMissingError } from "./errors.js";
import type { UpdateNotifier } from "./notifier.js";
import {
  LAST_CHECK_TIME_KEY,
  SKIP_THIS_VERSION_KEY,
  type UpdateSettingsStore,
} from "./settings-store.js";

/**
 * Automatic checks honour "skip this version"; manual checks always go to
 * the server and always report what they find.
 */
export type UpdateCheckMode = "automatic" | "manual";

export interface UpdateCheckOptions {
  feedUrl?: string;
  currentVersion: string;
  mode: UpdateCheckMode;
}

export interface UpdateCheckDeps {
  settings: UpdateSettingsStore;
  notifier: UpdateNotifier;
  download?: AppcastDownloader;
  reader?: AppcastReader;
  now?: () => Date;
}

export type UpdateCheckStatus = "update-available" | "up-to-date" | "skipped";

export interface UpdateCheckOutcome {
  status: UpdateCheckStatus;
  appcast: Appcast;
}

export async function runUpdateCheck(
  options: UpdateCheckOptions,
  deps: UpdateCheckDeps,
): Promise<UpdateCheckOutcome> {
  const {
    settings,
    notifier,
    download = downloadAppcast,
    reader = new AppcastReader(),
    now = () => new Date(),
  } = deps;

  try {
    const feedUrl = options.feedUrl?.trim();
    if (!feedUrl) {
      throw new AppcastUrlMissingError();
    }

    const xml = await download(feedUrl, {
      bypassCache: options.mode === "manual",
    });
    const appcast = reader.load(xml);

    settings.writeTimestamp(LAST_CHECK_TIME_KEY, now());

    if (compareVersions(options.currentVersion, appcast.version) >= 0) {
      notifier.noUpdates(options.currentVersion);
      return { status: "up-to-date", appcast };
    }

    if (shouldSkipUpdate(options.mode, appcast, settings)) {
      notifier.noUpdates(options.currentVersion);
      return { status: "skipped", appcast };
    }

    notifier.updateAvailable(appcast, options.currentVersion);
    return { status: "update-available", appcast };
  } catch (error) {
    notifier.error(error);
    throw error;
  }
}

function shouldSkipUpdate(
  mode: UpdateCheckMode,
  appcast: Appcast,
  settings: UpdateSettingsStore,
): boolean {
  if (mode === "manual") {
    return false;
  }
  const toSkip = settings.readValue(SKIP_THIS_VERSION_KEY);
  return toSkip !== undefined && toSkip === appcast.version;
}
