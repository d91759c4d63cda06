import axios from "axios";

import { logger } from "../../logger";
import { MissingDataError } from "./ImagePigErrors";

const DOWNLOAD_ATTEMPTS = 10;
const DOWNLOAD_INTERVAL_MS = 1000;
const REQUEST_TIMEOUT_MS = 30000;
const USER_AGENT = "Mozilla/5.0"; // some storage hosts reject unidentified clients

export type DownloadAttempt =
  | { status: number; body: Buffer }
  | { error: unknown };

export type AttemptOutcome =
  | { type: "success"; body: Buffer }
  | { type: "retry" }
  | { type: "fatal"; reason: string };

export type FetchAttempt = (
  url: string,
  signal?: AbortSignal,
) => Promise<DownloadAttempt>;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ImageDownloaderOptions {
  attempts?: number;
  intervalMs?: number;
  timeoutMs?: number;
  fetchAttempt?: FetchAttempt;
  sleep?: Sleep;
}

export function classifyAttempt(attempt: DownloadAttempt): AttemptOutcome {
  if ("error" in attempt) {
    const reason =
      attempt.error instanceof Error
        ? attempt.error.message
        : String(attempt.error);
    return { type: "fatal", reason };
  }
  if (attempt.status >= 200 && attempt.status < 300) {
    return { type: "success", body: attempt.body };
  }
  if (attempt.status === 404) {
    return { type: "retry" };
  }
  return { type: "fatal", reason: `HTTP ${attempt.status}` };
}

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

function axiosFetchAttempt(timeoutMs: number): FetchAttempt {
  return async (url, signal) => {
    try {
      const response = await axios.get<ArrayBuffer>(url, {
        headers: { "User-Agent": USER_AGENT },
        responseType: "arraybuffer",
        timeout: timeoutMs,
        validateStatus: () => true,
        signal,
      });
      return { status: response.status, body: Buffer.from(response.data) };
    } catch (error) {
      // cancellation is not a failed attempt
      if (signal?.aborted) {
        throw signal.reason;
      }
      return { error };
    }
  };
}

/**
 * Fetches a freshly issued result URL. The object behind it can answer 404
 * for a short while after the API returns, so 404 is retried after a pause;
 * any other status or a transport error ends the download.
 */
export class ImageDownloader {
  private attempts: number;
  private intervalMs: number;
  private fetchAttempt: FetchAttempt;
  private sleep: Sleep;

  constructor(options: ImageDownloaderOptions = {}) {
    this.attempts =
      options.attempts !== undefined && options.attempts >= 1
        ? options.attempts
        : DOWNLOAD_ATTEMPTS;
    this.intervalMs = options.intervalMs ?? DOWNLOAD_INTERVAL_MS;
    this.fetchAttempt =
      options.fetchAttempt ??
      axiosFetchAttempt(options.timeoutMs ?? REQUEST_TIMEOUT_MS);
    this.sleep = options.sleep ?? sleep;
  }

  public async download(url: string, signal?: AbortSignal): Promise<Buffer> {
    for (let i = 0; i < this.attempts; i++) {
      const outcome = classifyAttempt(await this.fetchAttempt(url, signal));

      if (outcome.type === "success") {
        logger.debug(
          { url, attempt: i + 1, bytes: outcome.body.length },
          "Image downloaded",
        );
        return outcome.body;
      }

      if (outcome.type === "fatal") {
        logger.debug(
          { url, attempt: i + 1, reason: outcome.reason },
          "Image download failed",
        );
        throw new MissingDataError({
          url,
          attempts: i + 1,
          reason: outcome.reason,
        });
      }

      logger.debug({ url, attempt: i + 1 }, "Image not available yet");
      if (i + 1 < this.attempts) {
        await this.sleep(this.intervalMs, signal);
      }
    }

    throw new MissingDataError({ url, attempts: this.attempts });
  }
}
