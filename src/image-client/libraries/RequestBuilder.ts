import { z } from "zod";

import {
  ProportionEnum,
  UpscalingFactorEnum,
  type ImageField,
  type ImageInput,
  type OutpaintMargins,
  type RequestParameters,
} from "../../types/image";
import { prepareImage } from "./ImageInput";
import { InvalidInputError } from "./ImagePigErrors";

const proportionTokens: Record<ProportionEnum, string> = {
  [ProportionEnum.landscape]: "landscape",
  [ProportionEnum.portrait]: "portrait",
  [ProportionEnum.square]: "square",
  [ProportionEnum.wide]: "wide",
};

const upscalingFactorValues: Record<UpscalingFactorEnum, number> = {
  [UpscalingFactorEnum.two]: 2,
  [UpscalingFactorEnum.four]: 4,
  [UpscalingFactorEnum.eight]: 8,
};

const requiredPrompt = z.string().min(1);
const margin = z.number().int().nonnegative();

function requirePrompt(name: string, value: string): string {
  if (!requiredPrompt.safeParse(value).success) {
    throw new InvalidInputError(`${name} must be a non-empty string`, {
      param: name,
    });
  }
  return value;
}

function requireMargin(name: string, value: number | undefined): number {
  const parsed = margin.safeParse(value ?? 0);
  if (!parsed.success) {
    throw new InvalidInputError(`${name} must be a non-negative integer`, {
      param: name,
      value,
    });
  }
  return parsed.data;
}

const imageFields: ImageField[] = ["image", "source_image", "target_image"];

/**
 * Extra params go in first so that the builder's own keys always win. An
 * image field the builder filled keeps a single `_url` or `_data` key.
 */
function withExtras(
  extraParams: RequestParameters | undefined,
  managed: RequestParameters,
): RequestParameters {
  const extras: RequestParameters = { ...extraParams };
  for (const field of imageFields) {
    if (`${field}_url` in managed || `${field}_data` in managed) {
      delete extras[`${field}_url`];
      delete extras[`${field}_data`];
    }
  }
  return { ...extras, ...managed };
}

export function buildTextParams(
  prompt: string,
  negativePrompt?: string,
  extraParams?: RequestParameters,
): RequestParameters {
  return withExtras(extraParams, {
    positive_prompt: requirePrompt("positive_prompt", prompt),
    negative_prompt: negativePrompt ?? "",
  });
}

export function buildFluxParams(
  prompt: string,
  proportion: ProportionEnum = ProportionEnum.landscape,
  negativePrompt?: string,
  extraParams?: RequestParameters,
): RequestParameters {
  return withExtras(extraParams, {
    positive_prompt: requirePrompt("positive_prompt", prompt),
    negative_prompt: negativePrompt ?? "",
    proportion: proportionTokens[proportion],
  });
}

export function buildFaceswapParams(
  sourceImage: ImageInput,
  targetImage: ImageInput,
  extraParams?: RequestParameters,
): RequestParameters {
  const managed: RequestParameters = {};
  prepareImage(sourceImage, "source_image", managed);
  prepareImage(targetImage, "target_image", managed);
  return withExtras(extraParams, managed);
}

export function buildUpscaleParams(
  image: ImageInput,
  factor: UpscalingFactorEnum = UpscalingFactorEnum.two,
  extraParams?: RequestParameters,
): RequestParameters {
  const managed: RequestParameters = {};
  prepareImage(image, "image", managed);
  managed.upscaling_factor = upscalingFactorValues[factor];
  return withExtras(extraParams, managed);
}

export function buildCutoutParams(
  image: ImageInput,
  extraParams?: RequestParameters,
): RequestParameters {
  const managed: RequestParameters = {};
  prepareImage(image, "image", managed);
  return withExtras(extraParams, managed);
}

export function buildReplaceParams(
  image: ImageInput,
  selectPrompt: string,
  positivePrompt: string,
  negativePrompt?: string,
  extraParams?: RequestParameters,
): RequestParameters {
  const managed: RequestParameters = {};
  prepareImage(image, "image", managed);
  managed.select_prompt = requirePrompt("select_prompt", selectPrompt);
  managed.positive_prompt = requirePrompt("positive_prompt", positivePrompt);
  managed.negative_prompt = negativePrompt ?? "";
  return withExtras(extraParams, managed);
}

export function buildOutpaintParams(
  image: ImageInput,
  positivePrompt: string,
  negativePrompt?: string,
  margins: OutpaintMargins = {},
  extraParams?: RequestParameters,
): RequestParameters {
  const managed: RequestParameters = {};
  prepareImage(image, "image", managed);
  managed.positive_prompt = requirePrompt("positive_prompt", positivePrompt);
  managed.negative_prompt = negativePrompt ?? "";
  managed.top = requireMargin("top", margins.top);
  managed.right = requireMargin("right", margins.right);
  managed.bottom = requireMargin("bottom", margins.bottom);
  managed.left = requireMargin("left", margins.left);
  return withExtras(extraParams, managed);
}
