import { Command } from "commander";

import { compareVersions } from "../appcast/version.js";
import { renderComparisonTranscript } from "../render/transcripts/appcast.js";
import { writeCommandOutput } from "./output.js";

export function runCompareCommand(a: string, b: string): string {
  return renderComparisonTranscript(a, b, compareVersions(a, b));
}

export function createCompareCommand(): Command {
  return new Command("compare")
    .description("Compare two version strings")
    .argument("<a>", "First version")
    .argument("<b>", "Second version")
    .allowExcessArguments(false)
    .action((a: string, b: string) => {
      writeCommandOutput({ body: runCompareCommand(a, b) });
    });
}
