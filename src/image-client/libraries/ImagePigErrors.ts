export type ImagePigErrorCode =
  | "HTTP_ERROR"
  | "INVALID_URL"
  | "INVALID_INPUT"
  | "UNEXPECTED_RESPONSE"
  | "MISSING_DATA";

export class ImagePigError extends Error {
  constructor(
    message: string,
    public code: ImagePigErrorCode,
    public context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ImagePigError";
    Object.setPrototypeOf(this, ImagePigError.prototype);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Transport failure (connection, timeout, TLS) of the generation call.
 */
export class HttpError extends ImagePigError {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`HTTP request failed: ${reason}`, "HTTP_ERROR", undefined, {
      cause,
    });
    this.name = "HttpError";
    Object.setPrototypeOf(this, HttpError.prototype);
  }
}

export class InvalidUrlError extends ImagePigError {
  constructor(public url: string) {
    super(`Invalid URL: ${url}`, "INVALID_URL", { url });
    this.name = "InvalidUrlError";
    Object.setPrototypeOf(this, InvalidUrlError.prototype);
  }
}

export class InvalidInputError extends ImagePigError {
  constructor(
    message: string = "Cannot encode file to base64",
    context?: Record<string, unknown>,
  ) {
    super(message, "INVALID_INPUT", context);
    this.name = "InvalidInputError";
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}

export class UnexpectedResponseError extends ImagePigError {
  constructor(context?: Record<string, unknown>, cause?: unknown) {
    super("Unexpected response", "UNEXPECTED_RESPONSE", context, { cause });
    this.name = "UnexpectedResponseError";
    Object.setPrototypeOf(this, UnexpectedResponseError.prototype);
  }
}

export class MissingDataError extends ImagePigError {
  constructor(context?: Record<string, unknown>) {
    super("Unable to fetch image", "MISSING_DATA", context);
    this.name = "MissingDataError";
    Object.setPrototypeOf(this, MissingDataError.prototype);
  }
}
