export interface HintedErrorOptions {
  readonly detailLines?: readonly string[];
  readonly hintLines?: readonly string[];
  readonly cause?: unknown;
}

/**
 * Error carrying extra lines for the CLI: details printed under the headline
 * and hints printed after a blank line.
 */
export class HintedError extends Error {
  public readonly headline: string;
  public readonly detailLines: readonly string[];
  public readonly hintLines: readonly string[];

  constructor(headline: string, options: HintedErrorOptions = {}) {
    const { cause, detailLines, hintLines } = options;
    super(headline, cause !== undefined ? { cause } : undefined);
    this.headline = headline;
    this.detailLines = detailLines ? Array.from(detailLines) : [];
    this.hintLines = hintLines ? Array.from(hintLines) : [];
  }
}

/**
 * Base for library errors whose message can be shown to users as is.
 */
export abstract class DisplayableError extends HintedError {}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
