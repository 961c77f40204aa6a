import type { Color } from "../../types/palette";
import { InvalidColorError } from "./errors";

const MAX_DISTANCE = Math.sqrt(3 * 255 ** 2);
const HEX_PATTERN = /^#?([0-9a-fA-F]{6})$/;

const isChannel = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0 && value < 256;

export const isColor = (value: unknown): value is Color =>
  Array.isArray(value) && value.length === 3 && value.every(isChannel);

export function assertColor(value: unknown): asserts value is Color {
  if (!isColor(value)) {
    throw new InvalidColorError(value);
  }
}

export const brightness = (color: Color): number => color[0] + color[1] + color[2];

export const colorDistance = (a: Color, b: Color): number =>
  Math.sqrt((a[0] - b[0]) ** 2 + (a[1] - b[1]) ** 2 + (a[2] - b[2]) ** 2);

/**
 * Normalized Euclidean similarity in [0, 1]; 1 means identical.
 */
export const similarity = (a: Color, b: Color): number =>
  1 - colorDistance(a, b) / MAX_DISTANCE;

/**
 * How close two colours are in overall brightness, in [0, 1].
 */
export const backgroundSimilarity = (color: Color, anchor: Color): number =>
  1 - Math.abs(brightness(color) - brightness(anchor)) / 3 / 255;

export const rgbToHex = (color: Color, separator = ""): string => {
  assertColor(color);
  return color.map((channel) => channel.toString(16).padStart(2, "0")).join(separator);
};

export const parseHexColor = (value: string): Color => {
  const match = HEX_PATTERN.exec(value.trim());
  const hex = match?.[1];
  if (!hex) {
    throw new InvalidColorError(value, `Invalid hex colour: ${value}`);
  }

  return [
    Number.parseInt(hex.slice(0, 2), 16),
    Number.parseInt(hex.slice(2, 4), 16),
    Number.parseInt(hex.slice(4, 6), 16),
  ];
};
