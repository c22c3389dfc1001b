import sharp from "sharp";
import type { ImageFormat, ImageSettings } from "./config";

export interface PreparedImage {
  data: Buffer;
  mimeType: string;
}

const MIME_TYPES: Record<ImageFormat, string> = {
  png: "image/png",
  jpeg: "image/jpeg",
  webp: "image/webp",
  tiff: "image/tiff",
};

export const DEFAULT_IMAGE_SETTINGS: ImageSettings = {
  maxDim: 3000,
  margins: [0, 0, 0, 0],
  contrastFactor: 1,
  outputFormat: "png",
};

/**
 * Prepare a page image for the generation service: fit the longest side
 * within maxDim, crop margins, adjust contrast, then re-encode.
 * Runs on sharp's worker threads, not the event loop.
 */
export async function preprocessImage(
  path: string,
  settings: Partial<ImageSettings> = {},
): Promise<PreparedImage> {
  const { maxDim, margins, contrastFactor, outputFormat } = { ...DEFAULT_IMAGE_SETTINGS, ...settings };

  const resized = await sharp(path)
    .rotate()
    .removeAlpha()
    .resize({ width: maxDim, height: maxDim, fit: "inside", withoutEnlargement: true })
    .toBuffer({ resolveWithObject: true });

  let pipeline = sharp(resized.data);

  const [left, top, right, bottom] = margins;
  if (left > 0 || top > 0 || right > 0 || bottom > 0) {
    const { width, height } = resized.info;
    const cropLeft = Math.min(left, width - 1);
    const cropTop = Math.min(top, height - 1);
    pipeline = pipeline.extract({
      left: cropLeft,
      top: cropTop,
      width: Math.max(width - cropLeft - right, 1),
      height: Math.max(height - cropTop - bottom, 1),
    });
  }

  if (contrastFactor !== 1) {
    // Stretch around mid-grey; factor < 1 flattens, > 1 sharpens
    pipeline = pipeline.linear(contrastFactor, 128 * (1 - contrastFactor));
  }

  const data = await pipeline.toFormat(outputFormat).toBuffer();
  return { data, mimeType: MIME_TYPES[outputFormat] };
}
