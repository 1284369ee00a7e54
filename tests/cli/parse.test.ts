import { afterEach, beforeEach, describe, expect, it, jest } from "@jest/globals";
import { fs, vol } from "memfs";

import { MalformedAppcastError } from "../../src/appcast/errors.js";
import { runParseCommand } from "../../src/cli/parse.js";
import { captureRejection } from "../support/errors.js";
import {
  buildAppcast,
  enclosureAttributes,
} from "../support/fixtures/appcasts.js";

jest.mock("node:fs/promises", () => fs.promises);

const FEED_PATH = "/feeds/appcast.xml";

describe("runParseCommand", () => {
  beforeEach(() => {
    vol.reset();
    vol.fromJSON({
      [FEED_PATH]: buildAppcast([
        {
          title: "Version 1.5",
          description: "Faster sync",
          enclosure: enclosureAttributes(
            "https://updates.example.com/app-1.5.zip",
            "1.5",
            "1.5",
          ),
        },
      ]),
    });
  });

  afterEach(() => {
    vol.reset();
  });

  it("renders the newest release in the file", async () => {
    const result = await runParseCommand(FEED_PATH);

    expect(result.lastVersion).toBe("1.5");
    expect(result.body).toBe(
      [
        "Faster sync",
        "",
        "Title: Version 1.5",
        "Version: 1.5",
        "Short version: 1.5",
        "Download: https://updates.example.com/app-1.5.zip",
      ].join("\n"),
    );
  });

  it("skips releases that are not newer than the previous version", async () => {
    const result = await runParseCommand(FEED_PATH, { previousVersion: "2.0" });

    expect(result.appcast.version).toBe("");
    expect(result.lastVersion).toBe("2.0");
    expect(result.body).toBe(
      [
        "Faster sync",
        "",
        "Title: Version 1.5",
        "",
        "No enclosure with a sparkle:version attribute was found.",
      ].join("\n"),
    );
  });

  it("rejects a file that is not well-formed XML", async () => {
    vol.fromJSON({ "/feeds/broken.xml": "<rss><channel></rss>" });

    await captureRejection(
      () => runParseCommand("/feeds/broken.xml"),
      MalformedAppcastError,
    );
  });
});
