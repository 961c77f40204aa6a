import sharp from "sharp";

import type { Color } from "../../types/palette";
import { quantizePixels, type QuantizeOptions } from "./quantize";

export type ExtractOptions = QuantizeOptions & {
  /** longest edge, in pixels, the image is shrunk to before sampling */
  maxDimension?: number;
};

export const DEFAULT_MAX_DIMENSION = 400;

export class ImageDecodeError extends Error {
  readonly retryable = false;
  readonly source: string;

  constructor(source: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to decode image ${source}: ${reason}`, { cause });
    this.name = "ImageDecodeError";
    this.source = source;
  }
}

const describeSource = (source: string | Buffer): string =>
  typeof source === "string" ? source : `<buffer ${source.length} bytes>`;

/**
 * Decodes an image and returns its candidate colours, dominant colour first.
 */
export const extractCandidates = async (
  source: string | Buffer,
  options: ExtractOptions = {},
): Promise<Color[]> => {
  const maxDimension = options.maxDimension ?? DEFAULT_MAX_DIMENSION;
  if (!Number.isInteger(maxDimension) || maxDimension <= 0) {
    throw new Error("extract.maxDimension must be a positive integer");
  }

  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(source)
      .rotate()
      .resize({
        width: maxDimension,
        height: maxDimension,
        fit: "inside",
        withoutEnlargement: true,
      })
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (error) {
    throw new ImageDecodeError(describeSource(source), error);
  }

  return quantizePixels(
    { data: decoded.data, channels: decoded.info.channels },
    { colorCount: options.colorCount, quality: options.quality },
  );
};
