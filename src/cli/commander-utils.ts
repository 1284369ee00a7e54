import type { CommanderError } from "commander";

// Codes for which Commander has already written help, the version or a
// usage error of its own.
const SELF_RENDERED_CODES: ReadonlySet<string> = new Set([
  "commander.excessArguments",
  "commander.help",
  "commander.helpDisplayed",
  "commander.missingArgument",
  "commander.optionMissingArgument",
  "commander.unknownCommand",
  "commander.unknownOption",
  "commander.version",
]);

export function commanderAlreadyRendered(error: CommanderError): boolean {
  const { code } = error;
  if (!code || !code.startsWith("commander.")) {
    return false;
  }
  return SELF_RENDERED_CODES.has(code) || error.message.startsWith("error:");
}
