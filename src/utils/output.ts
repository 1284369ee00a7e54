import { colorize } from "./colors.js";

/**
 * Pads command output with one blank line above and below.
 */
export function formatCliOutput(value: string): string {
  return `\n${value.trimEnd()}\n\n`;
}

export function formatErrorMessage(message: string): string {
  return `${colorize("Error:", "red")} ${message}`;
}
