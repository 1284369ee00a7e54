import { DisplayableError } from "../utils/errors.js";

export abstract class AppcastError extends DisplayableError {}

export class TokenizerCreationError extends AppcastError {
  constructor(cause: unknown) {
    super("Failed to create XML parser.", { cause });
    this.name = "TokenizerCreationError";
  }
}

export class MalformedAppcastError extends AppcastError {
  constructor(
    public readonly detail: string,
    public readonly line?: number,
    public readonly column?: number,
  ) {
    super(`XML parser error: ${detail}`, {
      detailLines:
        line !== undefined
          ? [`At line ${line}${column !== undefined ? `, column ${column}` : ""}.`]
          : [],
    });
    this.name = "MalformedAppcastError";
  }
}
