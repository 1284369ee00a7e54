/**
 * Update descriptor assembled from an appcast. Every field starts empty and
 * stays empty when the feed does not provide it.
 */
export interface Appcast {
  downloadUrl: string;
  version: string;
  shortVersionString: string;
  title: string;
  description: string;
  releaseNotesUrl: string;
}

export function createEmptyAppcast(): Appcast {
  return {
    downloadUrl: "",
    version: "",
    shortVersionString: "",
    title: "",
    description: "",
    releaseNotesUrl: "",
  };
}

export type XmlAttributes = Readonly<Record<string, string>>;

/**
 * Push-style XML events. Names arrive namespace-qualified
 * (`<namespace URI>#<local name>`) when the prefix is bound.
 */
export interface XmlEventHandlers {
  onStartElement(name: string, attributes: XmlAttributes): void;
  onEndElement(name: string): void;
  onText(text: string): void;
}

export type XmlParseStatus =
  | { ok: true }
  | { ok: false; message: string; line?: number; column?: number };

export interface XmlTokenizer {
  parse(xml: string): XmlParseStatus;
}

export type XmlTokenizerFactory = (handlers: XmlEventHandlers) => XmlTokenizer;

export interface AppcastParseResult {
  appcast: Appcast;
  /** Version of the newest enclosure accepted so far, if any. */
  lastVersion?: string;
}
