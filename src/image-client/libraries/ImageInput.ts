import type {
  ImageField,
  ImageInput,
  RequestParameters,
} from "../../types/image";
import { decodeBase64 } from "./base64";
import { InvalidInputError, InvalidUrlError } from "./ImagePigErrors";

export function imageFromUrl(url: string): ImageInput {
  return { kind: "url", url };
}

export function imageFromData(data: Uint8Array | string): ImageInput {
  return {
    kind: "data",
    data: typeof data === "string" ? Buffer.from(data, "utf8") : data,
  };
}

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes exactly one of `{field}_url` / `{field}_data` into `params`.
 */
export function prepareImage(
  image: ImageInput,
  field: ImageField,
  params: RequestParameters,
): void {
  switch (image.kind) {
    case "url": {
      if (!isAbsoluteUrl(image.url)) {
        throw new InvalidUrlError(image.url);
      }
      params[`${field}_url`] = image.url;
      return;
    }
    case "data": {
      const text = Buffer.from(image.data).toString("utf8");
      const decoded = decodeBase64(text);
      if (!decoded) {
        throw new InvalidInputError(undefined, { field });
      }
      params[`${field}_data`] = Array.from(decoded);
      return;
    }
    default: {
      const unhandled: never = image;
      throw new InvalidInputError(`Unsupported image input: ${unhandled}`);
    }
  }
}
