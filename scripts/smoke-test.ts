#!/usr/bin/env tsx
/**
 * Runs every endpoint against the live API and saves the results to output/.
 *
 * Usage:
 *   IMAGEPIG_API_KEY=... npm run smoke
 */

import fs from "fs-extra";
import path from "path";

import { ImagePig } from "../src/image-client/ImagePig";
import type { APIResponse } from "../src/image-client/libraries/APIResponse";
import { imageFromUrl } from "../src/image-client/libraries/ImageInput";

const outputDir = path.join(process.cwd(), "output");
const jane = imageFromUrl("https://imagepig.com/static/jane.jpeg");
const monaLisa = imageFromUrl("https://imagepig.com/static/mona-lisa.jpeg");

function logSuccess(message: string) {
  console.log(`✅ ${message}`);
}

function logError(message: string, error: unknown) {
  console.error(`❌ ${message}`, error);
}

async function run(
  name: string,
  fileName: string,
  request: () => Promise<APIResponse>,
): Promise<boolean> {
  try {
    const response = await request();
    await response.save(path.join(outputDir, fileName));
    logSuccess(
      `${name}: saved ${fileName} (seed ${response.seed() ?? "-"}, ${response.duration() ?? "?"} ms)`,
    );
    return true;
  } catch (error) {
    logError(`${name} failed`, error);
    return false;
  }
}

async function main() {
  const imagepig = ImagePig.fromConfig();
  await fs.ensureDir(outputDir);

  const results = [
    await run("default", "pig1.jpeg", () => imagepig.default("pig")),
    await run("xl", "pig2.jpeg", () => imagepig.xl("pig")),
    await run("flux", "pig3.jpeg", () => imagepig.flux("pig")),
    await run("faceswap", "faceswap.jpeg", () =>
      imagepig.faceswap(jane, monaLisa),
    ),
    await run("upscale", "upscale.jpeg", () => imagepig.upscale(jane)),
    await run("cutout", "cutout.png", () => imagepig.cutout(jane)),
    await run("replace", "replace.jpeg", () =>
      imagepig.replace(jane, "woman", "robot"),
    ),
    await run("outpaint", "outpaint.jpeg", () =>
      imagepig.outpaint(jane, "dress", undefined, { bottom: 500 }),
    ),
  ];

  if (results.includes(false)) {
    process.exit(1);
  }
}

main().catch((error) => {
  logError("Smoke test crashed", error);
  process.exit(1);
});
