import "dotenv/config";

export const defaultApiUrl = "https://api.imagepig.com";
const defaultTimeoutMs = 60000;
const defaultDownloadAttempts = 10;
const defaultDownloadIntervalMs = 1000;

function parseIntegerEnv(
  value: string | undefined,
  fallback: number,
  min: number,
): number {
  if (!value) {
    return fallback;
  }
  const parsed = parseInt(value);
  return Number.isNaN(parsed) || parsed < min ? fallback : parsed;
}

export class Config {
  public apiKey: string;
  public apiUrl: string = defaultApiUrl;
  public timeoutMs: number;
  public downloadAttempts: number;
  public downloadIntervalMs: number;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.apiKey = env.IMAGEPIG_API_KEY ?? "";

    if (env.IMAGEPIG_API_URL) {
      this.apiUrl = env.IMAGEPIG_API_URL.replace(/\/+$/, "");
    }

    this.timeoutMs = parseIntegerEnv(
      env.IMAGEPIG_TIMEOUT_MS,
      defaultTimeoutMs,
      1,
    );
    this.downloadAttempts = parseIntegerEnv(
      env.IMAGEPIG_DOWNLOAD_ATTEMPTS,
      defaultDownloadAttempts,
      1,
    );
    this.downloadIntervalMs = parseIntegerEnv(
      env.IMAGEPIG_DOWNLOAD_INTERVAL_MS,
      defaultDownloadIntervalMs,
      0,
    );
  }

  public ensureConfig() {
    if (!this.apiKey) {
      throw new Error(
        "IMAGEPIG_API_KEY environment variable is missing. Get your API key from https://imagepig.com",
      );
    }
  }
}
