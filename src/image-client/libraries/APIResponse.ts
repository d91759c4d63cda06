import fs from "fs-extra";
import { z } from "zod";

import { logger } from "../../logger";
import { decodeBase64 } from "./base64";
import { ImageDownloader } from "./ImageDownloader";
import {
  MissingDataError,
  UnexpectedResponseError,
} from "./ImagePigErrors";

const stringField = z.string();
const seedField = z.number().int().nonnegative();
const timestampField = z.string().datetime({ offset: true });

// Date.parse keeps only milliseconds; the full fraction is kept apart so
// sub-millisecond differences survive subtraction.
function splitTimestamp(timestamp: string): [number, number] {
  const fraction = /\.(\d+)/.exec(timestamp)?.[1];
  if (fraction === undefined) {
    return [Date.parse(timestamp), 0];
  }
  return [
    Date.parse(timestamp.replace(`.${fraction}`, "")),
    Number(`0.${fraction}`) * 1000,
  ];
}

export class APIResponse {
  constructor(
    private content: unknown,
    public status: number = 200,
    private downloader: ImageDownloader = new ImageDownloader(),
  ) {}

  /** Raw decoded body. */
  public get json(): unknown {
    return this.content;
  }

  private field<T>(key: string, schema: z.ZodType<T>): T | undefined {
    if (typeof this.content !== "object" || this.content === null) {
      return undefined;
    }
    const parsed = schema.safeParse(Reflect.get(this.content, key));
    return parsed.success ? parsed.data : undefined;
  }

  public url(): string | undefined {
    return this.field("image_url", stringField);
  }

  public seed(): number | undefined {
    return this.field("seed", seedField);
  }

  public mimeType(): string | undefined {
    return this.field("mime_type", stringField);
  }

  /**
   * Generation time in milliseconds, sub-millisecond digits kept as a
   * fraction; negative if the timestamps are reversed.
   */
  public duration(): number | undefined {
    const startedAt = this.field("started_at", timestampField);
    const completedAt = this.field("completed_at", timestampField);
    if (startedAt === undefined || completedAt === undefined) {
      return undefined;
    }
    const [startedMs, startedFraction] = splitTimestamp(startedAt);
    const [completedMs, completedFraction] = splitTimestamp(completedAt);
    return completedMs - startedMs + (completedFraction - startedFraction);
  }

  /**
   * Resolves the image bytes: inline `image_data` first, then a download of
   * `image_url`.
   */
  public async data(signal?: AbortSignal): Promise<Buffer> {
    const imageData = this.field("image_data", stringField);
    if (imageData !== undefined) {
      const decoded = decodeBase64(imageData);
      if (!decoded) {
        throw new UnexpectedResponseError({ field: "image_data" });
      }
      return decoded;
    }

    const url = this.url();
    if (url !== undefined) {
      return this.downloader.download(url, signal);
    }

    throw new MissingDataError();
  }

  public async save(filePath: string, signal?: AbortSignal): Promise<void> {
    const data = await this.data(signal);
    try {
      await fs.writeFile(filePath, data);
    } catch (error) {
      throw new UnexpectedResponseError({ filePath }, error);
    }
    logger.debug({ filePath, bytes: data.length }, "Image saved");
  }
}
