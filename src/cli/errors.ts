import { HintedError, toErrorMessage } from "../utils/errors.js";

export class CliError extends HintedError {
  constructor(
    headline: string,
    detailLines: readonly string[] = [],
    hintLines: readonly string[] = [],
  ) {
    super(headline, { detailLines, hintLines });
    this.name = "CliError";
  }
}

export class MissingCurrentVersionError extends CliError {
  constructor() {
    super("Installed version not specified.", [], [
      "Pass `--current-version <version>` or set `currentVersion` in appcast.yaml.",
    ]);
    this.name = "MissingCurrentVersionError";
  }
}

export class SkipArgumentsConflictError extends CliError {
  constructor() {
    super("Pass either a version or --clear, not both.");
    this.name = "SkipArgumentsConflictError";
  }
}

export class MissingSkipVersionError extends CliError {
  constructor() {
    super("Version to skip not specified.", [], [
      "Run `appcast-updater skip <version>` or `appcast-updater skip --clear`.",
    ]);
    this.name = "MissingSkipVersionError";
  }
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof HintedError) {
    return new CliError(error.headline, error.detailLines, error.hintLines);
  }

  return new CliError(toErrorMessage(error));
}
