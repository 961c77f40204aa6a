import {
  DEFAULT_INTENSITY,
  type CandidateSet,
  type Color,
  type PrepareOptions,
  type PreparedCandidates,
  type Tone,
} from "../../types/palette";
import { assertColor, brightness } from "./color";
import { InsufficientDistinctColorsError } from "./errors";

type BrightnessWindow = {
  lower: number;
  upper: number;
};

const meanChannel = (color: Color): number => brightness(color) / 3;

export const detectTone = (dominant: Color): Tone =>
  meanChannel(dominant) < 255 / 2 ? "dark" : "light";

export const brightnessWindow = (
  tone: Tone,
  intensity: number,
  dominant?: Color,
): BrightnessWindow => {
  const ratio = intensity / 100;

  if (dominant) {
    const background = meanChannel(dominant);
    return tone === "dark"
      ? { lower: background, upper: 255 * ratio }
      : { lower: 255 * (1 - ratio), upper: background };
  }

  return tone === "dark"
    ? { lower: 255 * (1 - ratio), upper: 255 }
    : { lower: 0, upper: 255 * ratio };
};

/**
 * Picks the theme tone and drops candidates outside the brightness window
 * allowed by the requested intensity. Without an explicit variant the
 * dominant (first) candidate decides the tone.
 */
export const prepareCandidates = (
  candidates: CandidateSet,
  options: PrepareOptions = {},
): PreparedCandidates => {
  const intensity = options.intensity ?? DEFAULT_INTENSITY;
  if (!Number.isInteger(intensity) || intensity < 0 || intensity > 100) {
    throw new Error("theme.intensity must be an integer in range 0..100");
  }
  candidates.forEach((candidate) => assertColor(candidate));

  const dominant = options.variant ? undefined : candidates[0];
  if (!options.variant && !dominant) {
    throw new InsufficientDistinctColorsError({
      found: 0,
      minimum: 1,
      message: "no candidate colours to detect a theme tone from",
    });
  }

  const tone = options.variant ?? (dominant ? detectTone(dominant) : "dark");
  const { lower, upper } = brightnessWindow(tone, intensity, dominant);

  return {
    tone,
    candidates: candidates.filter((color) => {
      const mean = meanChannel(color);
      return mean >= lower && mean <= upper;
    }),
  };
};
