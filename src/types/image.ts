export type ParamValue = string | number | boolean | number[];

export type RequestParameters = Record<string, ParamValue>;

export type Endpoint =
  | ""
  | "xl"
  | "flux"
  | "faceswap"
  | "upscale"
  | "cutout"
  | "replace"
  | "outpaint";

export type ImageField = "image" | "source_image" | "target_image";

export type ImageInput =
  | { kind: "url"; url: string }
  | { kind: "data"; data: Uint8Array }; // base64 text as bytes

export enum ProportionEnum {
  landscape = "landscape",
  portrait = "portrait",
  square = "square",
  wide = "wide",
}

export enum UpscalingFactorEnum {
  two = "two",
  four = "four",
  eight = "eight",
}

export type OutpaintMargins = {
  top?: number;
  right?: number;
  bottom?: number;
  left?: number;
};

export type ClientOptions = {
  apiUrl?: string;
  timeoutMs?: number;
  downloadAttempts?: number;
  downloadIntervalMs?: number;
};
