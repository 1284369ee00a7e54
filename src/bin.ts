#!/usr/bin/env node

import process from "node:process";

import { Command, CommanderError } from "commander";

import { createCheckCommand } from "./cli/check.js";
import { commanderAlreadyRendered } from "./cli/commander-utils.js";
import { createCompareCommand } from "./cli/compare.js";
import { CliError, toCliError } from "./cli/errors.js";
import { writeCommandOutput } from "./cli/output.js";
import { createParseCommand } from "./cli/parse.js";
import { createSkipCommand } from "./cli/skip.js";
import { renderCliError } from "./render/utils/errors.js";
import { toErrorMessage } from "./utils/errors.js";
import { getCliVersion } from "./utils/version.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("appcast-updater")
    .description("Check Sparkle appcasts for application updates")
    .version(getCliVersion(), "-v, --version", "print the CLI version")
    .exitOverride()
    .showHelpAfterError()
    .helpCommand(false);

  program.addCommand(createCheckCommand());
  program.addCommand(createParseCommand());
  program.addCommand(createCompareCommand());
  program.addCommand(createSkipCommand());

  return program;
}

export async function runCli(
  argv: readonly string[] = process.argv,
): Promise<void> {
  const program = createProgram();

  if (argv.length <= 2) {
    writeCommandOutput({ body: program.helpInformation() });
    return;
  }

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (commanderAlreadyRendered(error)) {
        process.exitCode = error.exitCode ?? 0;
        return;
      }

      writeCommandOutput({
        body: renderCliError(new CliError(toErrorMessage(error))),
        exitCode: error.exitCode ?? 1,
      });
      return;
    }

    writeCommandOutput({
      body: renderCliError(toCliError(error)),
      exitCode: 1,
    });
  }
}

if (require.main === module) {
  void runCli();
}
