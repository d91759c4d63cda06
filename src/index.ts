export { ImagePig } from "./image-client/ImagePig";
export { APIResponse } from "./image-client/libraries/APIResponse";
export {
  ImageDownloader,
  classifyAttempt,
} from "./image-client/libraries/ImageDownloader";
export type {
  AttemptOutcome,
  DownloadAttempt,
  FetchAttempt,
  ImageDownloaderOptions,
  Sleep,
} from "./image-client/libraries/ImageDownloader";
export { imageFromData, imageFromUrl } from "./image-client/libraries/ImageInput";
export {
  HttpError,
  ImagePigError,
  InvalidInputError,
  InvalidUrlError,
  MissingDataError,
  UnexpectedResponseError,
} from "./image-client/libraries/ImagePigErrors";
export type { ImagePigErrorCode } from "./image-client/libraries/ImagePigErrors";
export { Config } from "./config";
export { logger } from "./logger";
export { ProportionEnum, UpscalingFactorEnum } from "./types/image";
export type {
  ClientOptions,
  Endpoint,
  ImageField,
  ImageInput,
  OutpaintMargins,
  ParamValue,
  RequestParameters,
} from "./types/image";
