import type { Appcast } from "../../appcast/types.js";
import { colorize } from "../../utils/colors.js";
import { renderTranscript } from "../utils/transcript.js";

export function formatAppcastVersion(appcast: Appcast): string {
  if (appcast.shortVersionString && appcast.shortVersionString !== appcast.version) {
    return `${appcast.shortVersionString} (${appcast.version})`;
  }
  return appcast.version;
}

export function renderUpdateAvailableTranscript(
  appcast: Appcast,
  currentVersion: string,
): string {
  const headline = colorize(
    `Update available: ${currentVersion} -> ${formatAppcastVersion(appcast)}`,
    "green",
  );
  const title = appcast.title.trim();

  return renderTranscript({
    sections: [title ? [headline, title] : [headline]],
    metadata: [
      { label: "Download", value: appcast.downloadUrl },
      { label: "Release notes", value: appcast.releaseNotesUrl.trim() },
    ],
    hint: "Run `appcast-updater skip <version>` to stop automatic checks from offering it.",
  });
}

export function renderNoUpdatesTranscript(currentVersion: string): string {
  return renderTranscript({
    sections: [[`No updates available: ${currentVersion} is up to date.`]],
  });
}
