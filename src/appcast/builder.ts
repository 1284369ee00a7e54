import { APPCAST_NODES, ENCLOSURE_ATTRIBUTES } from "./constants.js";
import type { Appcast, XmlAttributes, XmlEventHandlers } from "./types.js";
import { isNewerVersion } from "./version.js";

type TextField = "releaseNotesUrl" | "title" | "description";

interface NestingDepths {
  channel: number;
  item: number;
  releaseNotes: number;
  title: number;
  description: number;
}

/**
 * Consumes XML events for one appcast and fills in the target descriptor.
 *
 * Text is collected only inside `channel > item > {releaseNotesLink, title,
 * description}`. Every item is visited; enclosures overwrite the download
 * fields only when they carry a newer `sparkle:version` than the last one
 * accepted.
 */
export class AppcastBuilder implements XmlEventHandlers {
  private readonly depth: NestingDepths = {
    channel: 0,
    item: 0,
    releaseNotes: 0,
    title: 0,
    description: 0,
  };

  private acceptedVersion: string | undefined;

  constructor(
    public readonly appcast: Appcast,
    lastVersion?: string,
  ) {
    this.acceptedVersion =
      lastVersion !== undefined && lastVersion.length > 0
        ? lastVersion
        : undefined;
  }

  get lastVersion(): string | undefined {
    return this.acceptedVersion;
  }

  onStartElement(name: string, attributes: XmlAttributes): void {
    const { depth } = this;

    if (name === APPCAST_NODES.channel) {
      depth.channel += 1;
      return;
    }

    if (depth.channel > 0 && name === APPCAST_NODES.item) {
      depth.item += 1;
      return;
    }

    if (depth.item === 0) {
      return;
    }

    switch (name) {
      case APPCAST_NODES.releaseNotesLink:
        depth.releaseNotes += 1;
        break;
      case APPCAST_NODES.title:
        depth.title += 1;
        break;
      case APPCAST_NODES.description:
        depth.description += 1;
        break;
      case APPCAST_NODES.enclosure:
        this.selectEnclosure(attributes);
        break;
    }
  }

  onEndElement(name: string): void {
    const { depth } = this;

    if (depth.item > 0) {
      switch (name) {
        case APPCAST_NODES.releaseNotesLink:
          depth.releaseNotes = decrement(depth.releaseNotes);
          return;
        case APPCAST_NODES.title:
          depth.title = decrement(depth.title);
          return;
        case APPCAST_NODES.description:
          depth.description = decrement(depth.description);
          return;
      }
    }

    if (depth.channel > 0 && name === APPCAST_NODES.item) {
      depth.item = decrement(depth.item);
      return;
    }

    if (name === APPCAST_NODES.channel) {
      depth.channel = decrement(depth.channel);
    }
  }

  onText(text: string): void {
    const field = this.activeTextField();
    if (field) {
      this.appcast[field] += text;
    }
  }

  private activeTextField(): TextField | undefined {
    const { depth } = this;
    if (depth.channel === 0 || depth.item === 0) {
      return undefined;
    }
    if (depth.releaseNotes > 0) {
      return "releaseNotesUrl";
    }
    if (depth.title > 0) {
      return "title";
    }
    if (depth.description > 0) {
      return "description";
    }
    return undefined;
  }

  private selectEnclosure(attributes: XmlAttributes): void {
    const candidateVersion = attributes[ENCLOSURE_ATTRIBUTES.version];

    if (this.acceptedVersion !== undefined) {
      if (
        candidateVersion === undefined ||
        !isNewerVersion(this.acceptedVersion, candidateVersion)
      ) {
        return;
      }
    }

    const url = attributes[ENCLOSURE_ATTRIBUTES.url];
    if (url !== undefined) {
      this.appcast.downloadUrl = url;
    }

    if (candidateVersion !== undefined) {
      this.appcast.version = candidateVersion;
      if (candidateVersion.length > 0) {
        this.acceptedVersion = candidateVersion;
      }
    }

    const shortVersion = attributes[ENCLOSURE_ATTRIBUTES.shortVersionString];
    if (shortVersion !== undefined) {
      this.appcast.shortVersionString = shortVersion;
    }
  }
}

function decrement(value: number): number {
  return value > 0 ? value - 1 : 0;
}
