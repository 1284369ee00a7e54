import { describe, expect, it, jest } from "@jest/globals";

import { downloadAppcast } from "../../src/update-check/download.js";
import { AppcastDownloadError } from "../../src/update-check/errors.js";
import { captureRejection } from "../support/errors.js";

const FEED_URL = "https://updates.example.com/appcast.xml";

type FetchArgs = Parameters<typeof fetch>;

function createFetch(respond: () => Promise<Response>) {
  return jest.fn<(...args: FetchArgs) => Promise<Response>>(respond);
}

function headersOf(fetchImpl: ReturnType<typeof createFetch>): Headers {
  const init = fetchImpl.mock.calls[0]?.[1];
  return new Headers(init?.headers);
}

describe("downloadAppcast", () => {
  it("returns the response body", async () => {
    const fetchImpl = createFetch(() =>
      Promise.resolve(new Response("<rss/>", { status: 200 })),
    );

    await expect(downloadAppcast(FEED_URL, { fetchImpl })).resolves.toBe(
      "<rss/>",
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe(FEED_URL);
  });

  it("allows cached responses by default", async () => {
    const fetchImpl = createFetch(() => Promise.resolve(new Response("")));

    await downloadAppcast(FEED_URL, { fetchImpl });

    const headers = headersOf(fetchImpl);
    expect(headers.get("Cache-Control")).toBeNull();
    expect(headers.get("Pragma")).toBeNull();
    expect(headers.get("Accept")).toBe(
      "application/rss+xml, application/xml, text/xml, */*",
    );
  });

  it("asks caches to revalidate when bypassing them", async () => {
    const fetchImpl = createFetch(() => Promise.resolve(new Response("")));

    await downloadAppcast(FEED_URL, { fetchImpl, bypassCache: true });

    const headers = headersOf(fetchImpl);
    expect(headers.get("Cache-Control")).toBe("no-cache");
    expect(headers.get("Pragma")).toBe("no-cache");
  });

  it("fails on an unsuccessful status", async () => {
    const fetchImpl = createFetch(() =>
      Promise.resolve(new Response("missing", { status: 404 })),
    );

    const error = await captureRejection(
      () => downloadAppcast(FEED_URL, { fetchImpl }),
      AppcastDownloadError,
    );

    expect(error.message).toBe(
      `Failed to download appcast from ${FEED_URL}: HTTP 404`,
    );
    expect(error.status).toBe(404);
    expect(error.url).toBe(FEED_URL);
  });

  it("wraps network failures", async () => {
    const failure = new Error("getaddrinfo ENOTFOUND updates.example.com");
    const fetchImpl = createFetch(() => Promise.reject(failure));

    const error = await captureRejection(
      () => downloadAppcast(FEED_URL, { fetchImpl }),
      AppcastDownloadError,
    );

    expect(error.message).toBe(
      `Failed to download appcast from ${FEED_URL}: getaddrinfo ENOTFOUND updates.example.com`,
    );
    expect(error.status).toBeUndefined();
    expect(error.cause).toBe(failure);
  });

  it("aborts requests that exceed the timeout", async () => {
    const fetchImpl = jest.fn<(...args: FetchArgs) => Promise<Response>>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            reject(new Error("This operation was aborted"));
          });
        }),
    );

    const error = await captureRejection(
      () => downloadAppcast(FEED_URL, { fetchImpl, timeoutMs: 5 }),
      AppcastDownloadError,
    );

    expect(error.message).toBe(
      `Failed to download appcast from ${FEED_URL}: timed out after 5ms`,
    );
  });

  it("times out when the body stalls after the headers arrive", async () => {
    const fetchImpl = jest.fn<(...args: FetchArgs) => Promise<Response>>(
      (_input, init) =>
        Promise.resolve(
          new Response(
            new ReadableStream<Uint8Array>({
              start(stream) {
                init?.signal?.addEventListener("abort", () => {
                  stream.error(new Error("body aborted"));
                });
              },
            }),
          ),
        ),
    );

    const error = await captureRejection(
      () => downloadAppcast(FEED_URL, { fetchImpl, timeoutMs: 5 }),
      AppcastDownloadError,
    );

    expect(error.message).toBe(
      `Failed to download appcast from ${FEED_URL}: timed out after 5ms`,
    );
  });
});
