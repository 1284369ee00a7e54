import { toErrorMessage } from "../utils/errors.js";
import { AppcastDownloadError } from "./errors.js";

const DEFAULT_TIMEOUT_MS = 15_000;

export interface DownloadAppcastOptions {
  /** Ask every cache between us and the server to revalidate. */
  bypassCache?: boolean;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export type AppcastDownloader = (
  url: string,
  options: DownloadAppcastOptions,
) => Promise<string>;

export const downloadAppcast: AppcastDownloader = async (url, options) => {
  const {
    bypassCache = false,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    fetchImpl = fetch,
  } = options;

  const headers: Record<string, string> = {
    Accept: "application/rss+xml, application/xml, text/xml, */*",
  };
  if (bypassCache) {
    headers["Cache-Control"] = "no-cache";
    headers.Pragma = "no-cache";
  }

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  timer.unref();

  // Covers the response body as well as the headers.
  const guard = async <T>(step: () => Promise<T>): Promise<T> => {
    try {
      return await step();
    } catch (error) {
      throw new AppcastDownloadError(
        url,
        controller.signal.aborted
          ? `timed out after ${timeoutMs}ms`
          : toErrorMessage(error),
        undefined,
        error,
      );
    }
  };

  try {
    const response = await guard(() =>
      fetchImpl(url, { headers, signal: controller.signal }),
    );
    if (!response.ok) {
      throw new AppcastDownloadError(
        url,
        `HTTP ${response.status}`,
        response.status,
      );
    }
    return await guard(() => response.text());
  } finally {
    clearTimeout(timer);
  }
};
