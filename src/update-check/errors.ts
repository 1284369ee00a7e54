import { DisplayableError } from "../utils/errors.js";

export abstract class UpdateCheckError extends DisplayableError {}

export class AppcastUrlMissingError extends UpdateCheckError {
  constructor() {
    super("Appcast URL not specified.", {
      hintLines: [
        "Pass `--feed-url <url>` or set `feedUrl` in appcast.yaml.",
      ],
    });
    this.name = "AppcastUrlMissingError";
  }
}

export class AppcastDownloadError extends UpdateCheckError {
  constructor(
    public readonly url: string,
    detail: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(`Failed to download appcast from ${url}: ${detail}`, { cause });
    this.name = "AppcastDownloadError";
  }
}

export class UpdateStateError extends UpdateCheckError {
  constructor(
    public readonly statePath: string,
    detail: string,
  ) {
    super(`Invalid update state at ${statePath}: ${detail}`, {
      hintLines: ["Delete the file to reset update-check state."],
    });
    this.name = "UpdateStateError";
  }
}
