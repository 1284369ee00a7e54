export const SPARKLE_NAMESPACE =
  "http://www.andymatuschak.org/xml-namespaces/sparkle" as const;

export const NAMESPACE_SEPARATOR = "#" as const;

export function qualifiedName(namespaceUri: string, localName: string): string {
  return `${namespaceUri}${NAMESPACE_SEPARATOR}${localName}`;
}

function sparkleName(localName: string): string {
  return qualifiedName(SPARKLE_NAMESPACE, localName);
}

export const APPCAST_NODES = {
  channel: "channel",
  item: "item",
  releaseNotesLink: sparkleName("releaseNotesLink"),
  title: "title",
  description: "description",
  enclosure: "enclosure",
} as const;

export const ENCLOSURE_ATTRIBUTES = {
  url: "url",
  version: sparkleName("version"),
  shortVersionString: sparkleName("shortVersionString"),
} as const;
