import chalk from "chalk";

export type TerminalColor = "red" | "green";

export function colorize(text: string, color: TerminalColor): string {
  if (!text) {
    return text;
  }
  return color === "red" ? chalk.red(text) : chalk.green(text);
}
