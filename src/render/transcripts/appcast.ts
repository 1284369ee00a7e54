import type { Appcast } from "../../appcast/types.js";
import type { VersionOrdering } from "../../appcast/version.js";
import { renderTranscript } from "../utils/transcript.js";

export function renderAppcastTranscript(appcast: Appcast): string {
  const description = appcast.description.trim();

  return renderTranscript({
    sections: description ? [description.split(/\r?\n/u)] : [],
    metadata: [
      { label: "Title", value: appcast.title.trim() },
      { label: "Version", value: appcast.version },
      { label: "Short version", value: appcast.shortVersionString },
      { label: "Download", value: appcast.downloadUrl },
      { label: "Release notes", value: appcast.releaseNotesUrl.trim() },
    ],
    hint: appcast.version
      ? undefined
      : "No enclosure with a sparkle:version attribute was found.",
  });
}

export function renderComparisonTranscript(
  a: string,
  b: string,
  ordering: VersionOrdering,
): string {
  return `${a} ${orderingSymbol(ordering)} ${b}`;
}

function orderingSymbol(ordering: VersionOrdering): string {
  switch (ordering) {
    case -1:
      return "<";
    case 0:
      return "=";
    case 1:
      return ">";
  }
}
