import {
  DEFAULT_FILTER_OPTIONS,
  type AnchorMode,
  type CandidateSet,
  type BackgroundThresholdRule,
  type Color,
  type FilterOptions,
  type FilterResult,
  type PaletteWarning,
  type Tone,
} from "../../types/palette";
import { assertColor, backgroundSimilarity, brightness, similarity } from "./color";
import { InsufficientDistinctColorsError } from "./errors";

const ensurePositiveInteger = (value: number, keyPath: string) => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${keyPath} must be a positive integer`);
  }
};

const resolveFilterOptions = (options: FilterOptions): Required<FilterOptions> => {
  const resolved: Required<FilterOptions> = {
    targetCount: options.targetCount ?? DEFAULT_FILTER_OPTIONS.targetCount,
    maxIterations: options.maxIterations ?? DEFAULT_FILTER_OPTIONS.maxIterations,
    minimumCount: options.minimumCount ?? DEFAULT_FILTER_OPTIONS.minimumCount,
    anchor: options.anchor ?? DEFAULT_FILTER_OPTIONS.anchor,
    backgroundThreshold: options.backgroundThreshold ?? DEFAULT_FILTER_OPTIONS.backgroundThreshold,
  };

  ensurePositiveInteger(resolved.targetCount, "filter.targetCount");
  ensurePositiveInteger(resolved.maxIterations, "filter.maxIterations");
  ensurePositiveInteger(resolved.minimumCount, "filter.minimumCount");
  if (resolved.minimumCount > resolved.targetCount) {
    throw new Error("filter.minimumCount must be <= filter.targetCount");
  }

  return resolved;
};

export const backgroundThresholdFor = (
  threshold: number,
  rule: BackgroundThresholdRule,
): number =>
  rule === "quartic"
    ? threshold ** 4
    : Math.max(1 - (1 - threshold) * 2, threshold);

/**
 * Orders candidates so the colour closest to the theme's background comes
 * first. In dominant mode the first input colour stays in front instead.
 */
export const orderCandidates = (
  candidates: readonly Color[],
  tone: Tone,
  anchor: AnchorMode = "extreme",
): Color[] => {
  const direction = tone === "dark" ? 1 : -1;
  const byBrightness = (colors: readonly Color[]) =>
    [...colors].sort((a, b) => (brightness(a) - brightness(b)) * direction);

  if (anchor === "dominant") {
    const [dominant, ...rest] = candidates;
    return dominant ? [dominant, ...byBrightness(rest)] : [];
  }

  return byBrightness(candidates);
};

/**
 * Keeps the first colour as the anchor and every later colour that is neither
 * too similar to a kept colour nor too close to the anchor's brightness.
 */
export const filterBySimilarity = (
  colors: readonly Color[],
  threshold: number,
  rule: BackgroundThresholdRule = "quartic",
): Color[] => {
  const [anchor, ...rest] = colors;
  if (!anchor) {
    return [];
  }

  const chosen: Color[] = [anchor];
  const anchorThreshold = backgroundThresholdFor(threshold, rule);

  for (const color of rest) {
    if (
      chosen.some((choice) => similarity(color, choice) > threshold) ||
      backgroundSimilarity(color, anchor) > anchorThreshold
    ) {
      continue;
    }
    chosen.push(color);
  }

  return chosen;
};

const isCloserToTarget = (count: number, bestCount: number, target: number) => {
  const distance = Math.abs(count - target);
  const bestDistance = Math.abs(bestCount - target);
  return distance < bestDistance || (distance === bestDistance && count > bestCount);
};

/**
 * Binary-searches the similarity threshold until exactly `targetCount`
 * colours survive, or returns the closest set seen once the iterations run out.
 */
export const filterPalette = (
  candidates: CandidateSet,
  tone: Tone,
  options: FilterOptions = {},
): FilterResult => {
  const { targetCount, maxIterations, minimumCount, anchor, backgroundThreshold } =
    resolveFilterOptions(options);

  if (candidates.length === 0) {
    return { palette: [], warnings: [] };
  }
  candidates.forEach((candidate) => assertColor(candidate));

  const sorted = orderCandidates(candidates, tone, anchor);
  let left = 0;
  let right = 1;
  let best: Color[] = [];

  for (let iteration = 0; iteration < maxIterations; iteration += 1) {
    const middle = (left + right) / 2;
    const chosen = filterBySimilarity(sorted, middle, backgroundThreshold);
    const count = chosen.length;

    if (count === targetCount) {
      return { palette: chosen, warnings: [] };
    }

    if (best.length === 0 || isCloserToTarget(count, best.length, targetCount)) {
      best = chosen;
    }

    if (count < targetCount) {
      left = middle;
    } else {
      right = middle;
    }
  }

  const found = best.length;
  if (found < minimumCount) {
    throw new InsufficientDistinctColorsError({ found, minimum: minimumCount });
  }

  const warning: PaletteWarning =
    found < targetCount
      ? { kind: "degraded-palette", found, target: targetCount }
      : { kind: "overfull-palette", found, target: targetCount };

  console.warn(
    warning.kind === "degraded-palette"
      ? `[palette] only found ${found} distinct colours (wanted ${targetCount}); some slots reuse colours`
      : `[palette] kept ${found} distinct colours (wanted ${targetCount})`,
  );

  return { palette: best, warnings: [warning] };
};
