import { readFile } from "node:fs/promises";

import { Command } from "commander";

import { parseAppcast } from "../appcast/parser.js";
import type { AppcastParseResult } from "../appcast/types.js";
import { renderAppcastTranscript } from "../render/transcripts/appcast.js";
import { writeCommandOutput } from "./output.js";

export interface ParseCommandOptions {
  previousVersion?: string;
}

export interface ParseCommandResult extends AppcastParseResult {
  body: string;
}

export async function runParseCommand(
  file: string,
  options: ParseCommandOptions = {},
): Promise<ParseCommandResult> {
  const xml = await readFile(file, "utf8");
  const result = parseAppcast(xml, { lastVersion: options.previousVersion });
  return { ...result, body: renderAppcastTranscript(result.appcast) };
}

export function createParseCommand(): Command {
  return new Command("parse")
    .description("Parse a local appcast file and print its newest release")
    .argument("<file>", "Path to the appcast XML")
    .option(
      "--previous-version <version>",
      "Only accept enclosures newer than this version",
    )
    .allowExcessArguments(false)
    .action(async (file: string, options: ParseCommandOptions) => {
      const result = await runParseCommand(file, options);
      writeCommandOutput({ body: result.body });
    });
}
