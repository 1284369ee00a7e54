import { describe, expect, it } from "@jest/globals";

import {
  MalformedAppcastError,
  TokenizerCreationError,
} from "../../src/appcast/errors.js";
import { AppcastReader, parseAppcast } from "../../src/appcast/parser.js";
import {
  createEmptyAppcast,
  type XmlTokenizerFactory,
} from "../../src/appcast/types.js";
import {
  buildAppcast,
  enclosureAttributes,
} from "../support/fixtures/appcasts.js";
import { captureError } from "../support/errors.js";

const TWO_RELEASES = buildAppcast([
  {
    title: "Version 1.0",
    releaseNotesLink: "https://example.com/notes/1.0.html",
    enclosure: enclosureAttributes("https://example.com/app-1.0.zip", "1.0", "1.0"),
  },
  {
    title: "Version 2.0",
    enclosure: enclosureAttributes(
      "https://example.com/app-2.0.zip",
      "2.0",
      "2.0 final",
    ),
  },
]);

const RELEASE_1_5 = buildAppcast([
  {
    title: "Version 1.5",
    enclosure: enclosureAttributes("https://example.com/app-1.5.zip", "1.5"),
  },
]);

describe("parseAppcast", () => {
  it("selects the highest enclosure of the document", () => {
    const { appcast, lastVersion } = parseAppcast(TWO_RELEASES);

    expect(appcast).toEqual({
      downloadUrl: "https://example.com/app-2.0.zip",
      version: "2.0",
      shortVersionString: "2.0 final",
      title: "Version 1.0Version 2.0",
      description: "",
      releaseNotesUrl: "https://example.com/notes/1.0.html",
    });
    expect(lastVersion).toBe("2.0");
  });

  it("keeps a previously accepted higher version", () => {
    const first = parseAppcast(TWO_RELEASES);
    const second = parseAppcast(RELEASE_1_5, {
      lastVersion: first.lastVersion,
      target: first.appcast,
    });

    expect(second.appcast).toBe(first.appcast);
    expect(second.appcast.version).toBe("2.0");
    expect(second.appcast.downloadUrl).toBe("https://example.com/app-2.0.zip");
    expect(second.lastVersion).toBe("2.0");
  });

  it("decodes entities and CDATA in text content", () => {
    const xml = buildAppcast([
      {
        title: "Fixes &amp; tweaks",
        description: "<![CDATA[<ul><li>Faster sync</li></ul>]]>",
      },
    ]);

    const { appcast } = parseAppcast(xml);

    expect(appcast.title).toBe("Fixes & tweaks");
    expect(appcast.description).toBe("<ul><li>Faster sync</li></ul>");
  });

  it("decodes entities in enclosure attributes", () => {
    const xml = buildAppcast([
      {
        enclosure: enclosureAttributes(
          "https://example.com/download?app=demo&amp;v=3",
          "3",
        ),
      },
    ]);

    expect(parseAppcast(xml).appcast.downloadUrl).toBe(
      "https://example.com/download?app=demo&v=3",
    );
  });

  it("returns empty fields for a channel without items", () => {
    const xml = buildAppcast([]);

    const result = parseAppcast(xml);

    expect(result.appcast).toEqual(createEmptyAppcast());
    expect(result.lastVersion).toBeUndefined();
  });

  it("matches sparkle names by namespace rather than prefix", () => {
    const xml = [
      '<rss version="2.0" xmlns:upd="http://www.andymatuschak.org/xml-namespaces/sparkle">',
      "<channel><item>",
      '<enclosure url="https://example.com/app-4.zip" upd:version="4.0" upd:shortVersionString="4" />',
      "</item></channel>",
      "</rss>",
    ].join("");

    const { appcast } = parseAppcast(xml);

    expect(appcast.version).toBe("4.0");
    expect(appcast.shortVersionString).toBe("4");
  });

  it("does not match elements in a default namespace", () => {
    const xml = [
      '<feed xmlns="http://www.w3.org/2005/Atom">',
      '<channel><item><enclosure url="https://example.com/atom.zip" /></item></channel>',
      "</feed>",
    ].join("");

    expect(parseAppcast(xml).appcast).toEqual(createEmptyAppcast());
  });

  it("reports truncated documents as malformed", () => {
    const truncated = TWO_RELEASES.slice(0, TWO_RELEASES.indexOf("</channel>"));

    expect(() => parseAppcast(truncated)).toThrow(MalformedAppcastError);
    expect(() => parseAppcast(truncated)).toThrow(/^XML parser error: /u);
  });

  it("reports mismatched tags as malformed", () => {
    expect(() =>
      parseAppcast("<rss><channel><item></channel></item></rss>"),
    ).toThrow(MalformedAppcastError);
  });

  it("reports unbound prefixes as malformed", () => {
    const xml =
      '<rss><channel><item><enclosure url="https://example.com/a.zip" sparkle:version="1.0" /></item></channel></rss>';

    expect(() => parseAppcast(xml)).toThrow(
      'XML parser error: unbound prefix "sparkle"',
    );
  });

  it.each([
    [
      "an undefined entity",
      buildAppcast([{ title: "a&nbsp;b" }]),
      'XML parser error: undefined entity "&nbsp;"',
    ],
    [
      "a raw < in an attribute value",
      buildAppcast([{ enclosure: enclosureAttributes("a<b", "1.0") }]),
      'XML parser error: "<" not allowed in attribute value',
    ],
    [
      "a second top-level element",
      "<meta/>" + buildAppcast([]).slice(buildAppcast([]).indexOf("<rss")),
      "XML parser error: junk after document element",
    ],
    [
      "a null character reference",
      buildAppcast([{ title: "&#0;" }]),
      'XML parser error: invalid character reference "&#0;"',
    ],
  ])("rejects a feed with %s", (_label, xml, message) => {
    const error = captureError(() => parseAppcast(xml), MalformedAppcastError);

    expect(error.message).toBe(message);
    expect(error.line).toEqual(expect.any(Number));
  });

  it("leaves a caller-supplied descriptor untouched when parsing fails", () => {
    const xml = buildAppcast([
      {
        title: "Version 1.0",
        enclosure: enclosureAttributes("https://example.com/app-1.0.zip", "1.0"),
      },
      { title: "<bad:thing/>" },
    ]);
    const target = createEmptyAppcast();

    expect(() => parseAppcast(xml, { target })).toThrow(
      'XML parser error: unbound prefix "bad"',
    );
    expect(target).toEqual(createEmptyAppcast());
  });

  it("wraps tokenizer factory failures", () => {
    const failingFactory: XmlTokenizerFactory = () => {
      throw new Error("out of parsers");
    };

    const error = captureError(
      () => parseAppcast(TWO_RELEASES, { createTokenizer: failingFactory }),
      TokenizerCreationError,
    );

    expect(error.message).toBe("Failed to create XML parser.");
    expect(error.cause).toEqual(new Error("out of parsers"));
  });

  it("drives the state machine through an injected tokenizer", () => {
    const scripted: XmlTokenizerFactory = (handlers) => ({
      parse() {
        handlers.onStartElement("channel", {});
        handlers.onStartElement("item", {});
        handlers.onStartElement("description", {});
        handlers.onText("scripted");
        handlers.onEndElement("description");
        return { ok: true };
      },
    });

    const { appcast } = parseAppcast("ignored", { createTokenizer: scripted });

    expect(appcast.description).toBe("scripted");
  });

  it("surfaces a tokenizer failure with its position", () => {
    const failing: XmlTokenizerFactory = () => ({
      parse: () => ({ ok: false, message: "no element found", line: 3, column: 7 }),
    });

    const malformed = captureError(
      () => parseAppcast("<rss>", { createTokenizer: failing }),
      MalformedAppcastError,
    );

    expect(malformed.message).toBe("XML parser error: no element found");
    expect(malformed.line).toBe(3);
    expect(malformed.detailLines).toEqual(["At line 3, column 7."]);
  });
});

describe("AppcastReader", () => {
  it("carries the last accepted version into later parses", () => {
    const reader = new AppcastReader();
    const target = reader.load(TWO_RELEASES);

    reader.load(RELEASE_1_5, target);

    expect(target.version).toBe("2.0");
    expect(reader.lastVersion).toBe("2.0");
  });

  it("leaves a fresh descriptor empty when nothing newer arrives", () => {
    const reader = new AppcastReader("2.0");

    const appcast = reader.load(RELEASE_1_5);

    expect(appcast).toEqual(createEmptyAppcast());
  });

  it("accepts older releases again after a reset", () => {
    const reader = new AppcastReader();
    reader.load(TWO_RELEASES);
    reader.reset();

    const appcast = reader.load(RELEASE_1_5);

    expect(appcast.version).toBe("1.5");
    expect(reader.lastVersion).toBe("1.5");
  });
});
