import type { Color, Hue, MetricKind } from "../../types/palette";
import { brightness } from "./color";
import { InvalidHueSelectionError } from "./errors";

const CHANNEL_HUES = ["red", "green", "blue"] as const satisfies readonly Hue[];

const isHue = (value: string): value is Hue =>
  CHANNEL_HUES.some((hue) => hue === value);

/**
 * Scores how strongly the requested channels dominate the remaining ones:
 * the smallest (desired - undesired) difference over every channel pair.
 */
export const prominence = (color: Color, hues: readonly string[]): number => {
  if (!hues.every(isHue)) {
    throw new InvalidHueSelectionError(hues);
  }

  const desired: number[] = [];
  const undesired: number[] = [];
  CHANNEL_HUES.forEach((hue, index) => {
    const channel = color[index] ?? 0;
    if (hues.includes(hue)) {
      desired.push(channel);
    } else {
      undesired.push(channel);
    }
  });

  if (desired.length === 0 || undesired.length === 0) {
    throw new InvalidHueSelectionError(hues);
  }

  let score = Number.POSITIVE_INFINITY;
  for (const d of desired) {
    for (const u of undesired) {
      score = Math.min(score, d - u);
    }
  }
  return score;
};

export const METRICS: Readonly<Record<MetricKind, (color: Color) => number>> = {
  dark: (color) => -brightness(color),
  light: (color) => brightness(color),
  red: (color) => prominence(color, ["red"]),
  green: (color) => prominence(color, ["green"]),
  blue: (color) => prominence(color, ["blue"]),
  cyan: (color) => prominence(color, ["green", "blue"]),
  magenta: (color) => prominence(color, ["red", "blue"]),
  yellow: (color) => prominence(color, ["red", "green"]),
};

export const scoreColor = (metric: MetricKind, color: Color): number =>
  METRICS[metric](color);

/** Stable ascending sort by metric; the best colour ends up last. */
export const sortByMetric = (colors: readonly Color[], metric: MetricKind): Color[] => {
  const scored = colors.map((color) => ({ color, score: scoreColor(metric, color) }));
  scored.sort((a, b) => a.score - b.score);
  return scored.map((entry) => entry.color);
};
