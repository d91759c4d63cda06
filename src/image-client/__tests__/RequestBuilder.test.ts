import { describe, it, expect } from "vitest";

import {
  buildCutoutParams,
  buildFaceswapParams,
  buildFluxParams,
  buildOutpaintParams,
  buildReplaceParams,
  buildTextParams,
  buildUpscaleParams,
} from "../libraries/RequestBuilder";
import {
  imageFromData,
  imageFromUrl,
  prepareImage,
} from "../libraries/ImageInput";
import {
  InvalidInputError,
  InvalidUrlError,
} from "../libraries/ImagePigErrors";
import {
  ProportionEnum,
  UpscalingFactorEnum,
  type RequestParameters,
} from "../../types/image";

const imageUrl = "https://example.com/jane.jpeg";
const helloBytes = [104, 101, 108, 108, 111];

describe("prepareImage", () => {
  it("sets only the _url key for a URL input", () => {
    const params: RequestParameters = {};
    prepareImage(imageFromUrl(imageUrl), "image", params);

    expect(params).toEqual({ image_url: imageUrl });
  });

  it("rejects strings that are not absolute URLs", () => {
    const params: RequestParameters = {};

    for (const value of ["not a url", "/relative/path.png", ""]) {
      expect(() => prepareImage(imageFromUrl(value), "image", params)).toThrow(
        InvalidUrlError,
      );
    }
    expect(params).toEqual({});
  });

  it("carries the offending string on InvalidUrlError", () => {
    try {
      prepareImage(imageFromUrl("jane.jpeg"), "image", {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidUrlError);
      expect((error as InvalidUrlError).url).toBe("jane.jpeg");
      expect((error as InvalidUrlError).message).toBe("Invalid URL: jane.jpeg");
    }
  });

  it("decodes base64 data into the _data key", () => {
    const params: RequestParameters = {};
    prepareImage(imageFromData("aGVsbG8="), "source_image", params);

    expect(params).toEqual({ source_image_data: helloBytes });
  });

  it("accepts base64 text given as bytes", () => {
    const params: RequestParameters = {};
    prepareImage(imageFromData(Buffer.from("aGVsbG8=")), "image", params);

    expect(params.image_data).toEqual(helloBytes);
    expect(params).not.toHaveProperty("image_url");
  });

  it("decodes image-sized data", () => {
    const image = Buffer.alloc(3 * 1024 * 1024);
    for (let i = 0; i < image.length; i++) {
      image[i] = i % 251;
    }
    const params: RequestParameters = {};
    prepareImage(imageFromData(image.toString("base64")), "image", params);

    const data = params.image_data;
    expect(Array.isArray(data)).toBe(true);
    expect(Array.isArray(data) && Buffer.from(data).equals(image)).toBe(true);
  });

  it("rejects image-sized data with a bad character", () => {
    const text = Buffer.alloc(3 * 1024 * 1024, 7).toString("base64");

    expect(() =>
      prepareImage(imageFromData(`${text.slice(0, -4)}$$$$`), "image", {}),
    ).toThrow(InvalidInputError);
  });

  it("rejects invalid base64 with InvalidInputError", () => {
    for (const value of ["not base64!", "aGVsbG8", "aGV$bG8=", "aGVsbG9="]) {
      expect(() => prepareImage(imageFromData(value), "image", {})).toThrow(
        InvalidInputError,
      );
    }
  });
});

describe("text prompt params", () => {
  it("always sends negative_prompt, empty when omitted", () => {
    expect(buildTextParams("pig")).toEqual({
      positive_prompt: "pig",
      negative_prompt: "",
    });
    expect(buildTextParams("pig", "blurry")).toEqual({
      positive_prompt: "pig",
      negative_prompt: "blurry",
    });
  });

  it("lets builder keys win over extra params", () => {
    const params = buildTextParams("pig", undefined, {
      positive_prompt: "cow",
      negative_prompt: "ignored",
      steps: 20,
    });

    expect(params).toEqual({
      positive_prompt: "pig",
      negative_prompt: "",
      steps: 20,
    });
  });

  it("requires a non-empty prompt", () => {
    expect(() => buildTextParams("")).toThrow(InvalidInputError);
    expect(() => buildTextParams("")).toThrow(
      "positive_prompt must be a non-empty string",
    );
  });

  it("defaults flux proportion to landscape", () => {
    expect(buildFluxParams("pig")).toEqual({
      positive_prompt: "pig",
      negative_prompt: "",
      proportion: "landscape",
    });
  });

  it("maps every proportion to its wire token", () => {
    expect(buildFluxParams("pig", ProportionEnum.portrait).proportion).toBe(
      "portrait",
    );
    expect(buildFluxParams("pig", ProportionEnum.square).proportion).toBe(
      "square",
    );
    expect(buildFluxParams("pig", ProportionEnum.wide).proportion).toBe("wide");
  });

  it("keeps flux proportion over an extra param", () => {
    const params = buildFluxParams("pig", ProportionEnum.wide, undefined, {
      proportion: "square",
    });

    expect(params.proportion).toBe("wide");
  });
});

describe("image params", () => {
  it("builds faceswap params from mixed inputs", () => {
    const params = buildFaceswapParams(
      imageFromUrl(imageUrl),
      imageFromData("aGVsbG8="),
    );

    expect(params).toEqual({
      source_image_url: imageUrl,
      target_image_data: helloBytes,
    });
  });

  it("defaults the upscaling factor to 2", () => {
    expect(buildUpscaleParams(imageFromUrl(imageUrl))).toEqual({
      image_url: imageUrl,
      upscaling_factor: 2,
    });
  });

  it("sends the numeric upscaling factor", () => {
    const image = imageFromUrl(imageUrl);

    expect(
      buildUpscaleParams(image, UpscalingFactorEnum.four).upscaling_factor,
    ).toBe(4);
    expect(
      buildUpscaleParams(image, UpscalingFactorEnum.eight).upscaling_factor,
    ).toBe(8);
  });

  it("never sends both _url and _data for one field", () => {
    const params = buildCutoutParams(imageFromUrl(imageUrl), {
      image_data: [1, 2, 3],
      format: "png",
    });

    expect(params).toEqual({ image_url: imageUrl, format: "png" });
  });

  it("keeps extra image keys for fields the endpoint does not use", () => {
    const params = buildCutoutParams(imageFromData("aGVsbG8="), {
      source_image_url: imageUrl,
    });

    expect(params).toEqual({
      source_image_url: imageUrl,
      image_data: helloBytes,
    });
  });

  it("builds replace params", () => {
    expect(
      buildReplaceParams(imageFromUrl(imageUrl), "woman", "robot"),
    ).toEqual({
      image_url: imageUrl,
      select_prompt: "woman",
      positive_prompt: "robot",
      negative_prompt: "",
    });
  });

  it("requires a select prompt for replace", () => {
    expect(() =>
      buildReplaceParams(imageFromUrl(imageUrl), "", "robot"),
    ).toThrow("select_prompt must be a non-empty string");
  });

  it("defaults outpaint margins to 0", () => {
    expect(
      buildOutpaintParams(imageFromUrl(imageUrl), "dress", undefined, {
        bottom: 500,
      }),
    ).toEqual({
      image_url: imageUrl,
      positive_prompt: "dress",
      negative_prompt: "",
      top: 0,
      right: 0,
      bottom: 500,
      left: 0,
    });
  });

  it("rejects negative or fractional margins", () => {
    const image = imageFromUrl(imageUrl);

    expect(() =>
      buildOutpaintParams(image, "dress", undefined, { top: -1 }),
    ).toThrow("top must be a non-negative integer");
    expect(() =>
      buildOutpaintParams(image, "dress", undefined, { left: 1.5 }),
    ).toThrow(InvalidInputError);
  });
});
