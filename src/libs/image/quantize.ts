/**
 * Colour quantization.
 *
 * Purpose:
 * - Reduce raw image pixels to an ordered list of representative colours.
 * - Order the result by population so the first colour is the dominant one.
 */

import { applyPalette, quantize, type GifPaletteColor } from "gifenc";

import type { Color } from "../../types/palette";

export type RawPixels = {
  data: Uint8Array;
  /** 3 for RGB, 4 for RGBA */
  channels: number;
};

export type QuantizeOptions = {
  colorCount?: number;
  /** sample every n-th pixel */
  quality?: number;
};

const MIN_ALPHA = 125;
const FORMAT = "rgb565";

export const DEFAULT_COLOR_COUNT = 50;
export const DEFAULT_QUALITY = 1;

// gifenc reads RGBA words, so samples are copied into a fresh, opaque buffer
const sampleOpaquePixels = ({ data, channels }: RawPixels, quality: number): Uint8Array => {
  if (channels !== 3 && channels !== 4) {
    throw new Error(`Unsupported channel count: ${channels}`);
  }

  const pixelCount = Math.floor(data.length / channels);
  const samples = new Uint8Array(Math.ceil(pixelCount / quality) * 4);
  let length = 0;
  for (let index = 0; index < pixelCount; index += quality) {
    const offset = index * channels;
    if (channels === 4 && (data[offset + 3] ?? 0) < MIN_ALPHA) {
      continue;
    }
    samples[length] = data[offset] ?? 0;
    samples[length + 1] = data[offset + 1] ?? 0;
    samples[length + 2] = data[offset + 2] ?? 0;
    samples[length + 3] = 255;
    length += 4;
  }

  return samples.slice(0, length);
};

const toColor = ([red, green, blue]: GifPaletteColor): Color => [red, green, blue];

/**
 * Quantizes to at most `colorCount` colours and orders them by how many
 * sampled pixels map to each one.
 */
export const quantizePixels = (pixels: RawPixels, options: QuantizeOptions = {}): Color[] => {
  const colorCount = options.colorCount ?? DEFAULT_COLOR_COUNT;
  const quality = options.quality ?? DEFAULT_QUALITY;
  if (!Number.isInteger(colorCount) || colorCount <= 0) {
    throw new Error("extract.colorCount must be a positive integer");
  }
  if (!Number.isInteger(quality) || quality <= 0) {
    throw new Error("extract.quality must be a positive integer");
  }

  const samples = sampleOpaquePixels(pixels, quality);
  if (samples.length === 0) {
    return [];
  }

  const palette = quantize(samples, colorCount, { format: FORMAT });
  const counts = new Array<number>(palette.length).fill(0);
  for (const index of applyPalette(samples, palette, FORMAT)) {
    counts[index] = (counts[index] ?? 0) + 1;
  }

  return palette
    .map((color, index) => ({ color: toColor(color), count: counts[index] ?? 0 }))
    .filter((entry) => entry.count > 0)
    .sort((a, b) => b.count - a.count)
    .map((entry) => entry.color);
};
