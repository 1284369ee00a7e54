export { AppcastBuilder } from "./builder.js";
export {
  APPCAST_NODES,
  ENCLOSURE_ATTRIBUTES,
  NAMESPACE_SEPARATOR,
  SPARKLE_NAMESPACE,
} from "./constants.js";
export {
  AppcastError,
  MalformedAppcastError,
  TokenizerCreationError,
} from "./errors.js";
export { AppcastReader, parseAppcast } from "./parser.js";
export type { ParseAppcastOptions } from "./parser.js";
export { createXmlTokenizer } from "./tokenizer.js";
export { createEmptyAppcast } from "./types.js";
export type {
  Appcast,
  AppcastParseResult,
  XmlAttributes,
  XmlEventHandlers,
  XmlParseStatus,
  XmlTokenizer,
  XmlTokenizerFactory,
} from "./types.js";
export {
  compareVersions,
  isNewerVersion,
  splitVersionString,
} from "./version.js";
export type { VersionOrdering, VersionToken, VersionTokenKind } from "./version.js";
