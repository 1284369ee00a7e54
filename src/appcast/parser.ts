import { AppcastBuilder } from "./builder.js";
import { MalformedAppcastError, TokenizerCreationError } from "./errors.js";
import { createXmlTokenizer } from "./tokenizer.js";
import {
  type Appcast,
  type AppcastParseResult,
  createEmptyAppcast,
  type XmlTokenizer,
  type XmlTokenizerFactory,
} from "./types.js";

export interface ParseAppcastOptions {
  /** Version accepted by an earlier parse; enclosures must beat it. */
  lastVersion?: string;
  /** Caller-owned descriptor to fill in place. */
  target?: Appcast;
  createTokenizer?: XmlTokenizerFactory;
}

/**
 * Parses an appcast document. Throws MalformedAppcastError when the XML is
 * not well formed; no descriptor is returned in that case.
 */
export function parseAppcast(
  xml: string,
  options: ParseAppcastOptions = {},
): AppcastParseResult {
  const {
    lastVersion,
    target = createEmptyAppcast(),
    createTokenizer = createXmlTokenizer,
  } = options;

  const builder = new AppcastBuilder(target, lastVersion);

  let tokenizer: XmlTokenizer;
  try {
    tokenizer = createTokenizer(builder);
  } catch (error) {
    throw new TokenizerCreationError(error);
  }

  const status = tokenizer.parse(xml);
  if (!status.ok) {
    throw new MalformedAppcastError(status.message, status.line, status.column);
  }

  return { appcast: builder.appcast, lastVersion: builder.lastVersion };
}

/**
 * Threads the last accepted version through successive parses, so a later
 * feed only replaces the download fields with a strictly newer enclosure.
 * Not meant to be shared between concurrent callers.
 */
export class AppcastReader {
  private accepted: string | undefined;

  constructor(
    initialVersion?: string,
    private readonly createTokenizer?: XmlTokenizerFactory,
  ) {
    this.accepted = initialVersion;
  }

  get lastVersion(): string | undefined {
    return this.accepted;
  }

  load(xml: string, target: Appcast = createEmptyAppcast()): Appcast {
    const result = parseAppcast(xml, {
      lastVersion: this.accepted,
      target,
      createTokenizer: this.createTokenizer,
    });
    this.accepted = result.lastVersion;
    return result.appcast;
  }

  reset(): void {
    this.accepted = undefined;
  }
}
