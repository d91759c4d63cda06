import axios, { type AxiosResponse } from "axios";

import { Config, defaultApiUrl } from "../config";
import { logger } from "../logger";
import type {
  ClientOptions,
  Endpoint,
  ImageInput,
  OutpaintMargins,
  ProportionEnum,
  RequestParameters,
  UpscalingFactorEnum,
} from "../types/image";
import { APIResponse } from "./libraries/APIResponse";
import { ImageDownloader } from "./libraries/ImageDownloader";
import { HttpError, UnexpectedResponseError } from "./libraries/ImagePigErrors";
import {
  buildCutoutParams,
  buildFaceswapParams,
  buildFluxParams,
  buildOutpaintParams,
  buildReplaceParams,
  buildTextParams,
  buildUpscaleParams,
} from "./libraries/RequestBuilder";

const REQUEST_TIMEOUT_MS = 60000;

export class ImagePig {
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly downloader: ImageDownloader;

  constructor(
    private readonly apiKey: string,
    options: ClientOptions = {},
  ) {
    this.apiUrl = (options.apiUrl ?? defaultApiUrl).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.downloader = new ImageDownloader({
      attempts: options.downloadAttempts,
      intervalMs: options.downloadIntervalMs,
      timeoutMs: this.timeoutMs,
    });
  }

  public static fromConfig(config: Config = new Config()): ImagePig {
    config.ensureConfig();
    return new ImagePig(config.apiKey, {
      apiUrl: config.apiUrl,
      timeoutMs: config.timeoutMs,
      downloadAttempts: config.downloadAttempts,
      downloadIntervalMs: config.downloadIntervalMs,
    });
  }

  /**
   * The status code is not checked: a JSON error body on a non-2xx response
   * is still returned as an APIResponse, with `status` set.
   */
  public async call(
    endpoint: Endpoint,
    params: RequestParameters,
  ): Promise<APIResponse> {
    const url = `${this.apiUrl}/${endpoint}`;

    logger.debug(
      { url, params: Object.keys(params) },
      "Calling ImagePig API",
    );

    let response: AxiosResponse<string>;
    try {
      response = await axios.post<string>(url, params, {
        headers: {
          "Api-Key": this.apiKey,
          "Content-Type": "application/json",
        },
        responseType: "text",
        timeout: this.timeoutMs,
        validateStatus: () => true,
      });
    } catch (error) {
      throw new HttpError(error);
    }

    let content: unknown;
    try {
      content = JSON.parse(response.data);
    } catch (error) {
      throw new UnexpectedResponseError(
        { url, status: response.status },
        error,
      );
    }

    if (response.status < 200 || response.status >= 300) {
      logger.warn(
        { url, status: response.status },
        "ImagePig API returned an error status",
      );
    }

    return new APIResponse(content, response.status, this.downloader);
  }

  public async default(
    prompt: string,
    negativePrompt?: string,
    extraParams?: RequestParameters,
  ): Promise<APIResponse> {
    return this.call("", buildTextParams(prompt, negativePrompt, extraParams));
  }

  public async xl(
    prompt: string,
    negativePrompt?: string,
    extraParams?: RequestParameters,
  ): Promise<APIResponse> {
    return this.call(
      "xl",
      buildTextParams(prompt, negativePrompt, extraParams),
    );
  }

  public async flux(
    prompt: string,
    proportion?: ProportionEnum,
    negativePrompt?: string,
    extraParams?: RequestParameters,
  ): Promise<APIResponse> {
    return this.call(
      "flux",
      buildFluxParams(prompt, proportion, negativePrompt, extraParams),
    );
  }

  public async faceswap(
    sourceImage: ImageInput,
    targetImage: ImageInput,
    extraParams?: RequestParameters,
  ): Promise<APIResponse> {
    return this.call(
      "faceswap",
      buildFaceswapParams(sourceImage, targetImage, extraParams),
    );
  }

  public async upscale(
    image: ImageInput,
    factor?: UpscalingFactorEnum,
    extraParams?: RequestParameters,
  ): Promise<APIResponse> {
    return this.call(
      "upscale",
      buildUpscaleParams(image, factor, extraParams),
    );
  }

  public async cutout(
    image: ImageInput,
    extraParams?: RequestParameters,
  ): Promise<APIResponse> {
    return this.call("cutout", buildCutoutParams(image, extraParams));
  }

  public async replace(
    image: ImageInput,
    selectPrompt: string,
    positivePrompt: string,
    negativePrompt?: string,
    extraParams?: RequestParameters,
  ): Promise<APIResponse> {
    return this.call(
      "replace",
      buildReplaceParams(
        image,
        selectPrompt,
        positivePrompt,
        negativePrompt,
        extraParams,
      ),
    );
  }

  public async outpaint(
    image: ImageInput,
    positivePrompt: string,
    negativePrompt?: string,
    margins?: OutpaintMargins,
    extraParams?: RequestParameters,
  ): Promise<APIResponse> {
    return this.call(
      "outpaint",
      buildOutpaintParams(
        image,
        positivePrompt,
        negativePrompt,
        margins,
        extraParams,
      ),
    );
  }
}
