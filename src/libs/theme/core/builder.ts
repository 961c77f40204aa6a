import type { CandidateSet, FilterOptions, PrepareOptions } from "../../../types/palette";
import { assignPalette } from "../../palette/assign";
import { prepareCandidates } from "../../palette/candidates";
import { InsufficientDistinctColorsError } from "../../palette/errors";
import { filterPalette } from "../../palette/filter";
import { InvalidThemeNameError } from "./errors";
import type { ThemeBuild } from "./types";

export type ThemeBuildOptions = PrepareOptions & {
  /** keep the image's dominant colour as the background */
  dominantBackground?: boolean;
  filter?: Omit<FilterOptions, "anchor">;
};

const THEME_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/i;

export const normalizeThemeName = (name: string): string => {
  const normalized = name.trim().replace(/^base16-/, "");
  if (!THEME_NAME_PATTERN.test(normalized)) {
    throw new InvalidThemeNameError(name);
  }
  return normalized;
};

/**
 * Turns extracted candidates into a complete slot assignment:
 * prepare (tone + brightness window), filter to distinct colours, assign.
 */
export const buildTheme = (
  name: string,
  candidates: CandidateSet,
  options: ThemeBuildOptions = {},
): ThemeBuild => {
  const themeName = normalizeThemeName(name);
  const dominantBackground = options.dominantBackground ?? false;

  const prepared = prepareCandidates(candidates, {
    variant: options.variant,
    intensity: options.intensity,
  });
  const dominant = candidates[0];
  // the dominant colour stays the background even outside the brightness window
  const windowed =
    dominantBackground && dominant
      ? [dominant, ...prepared.candidates.filter((color) => color !== dominant)]
      : prepared.candidates;

  const { palette, warnings } = filterPalette(windowed, prepared.tone, {
    ...options.filter,
    anchor: dominantBackground ? "dominant" : "extreme",
  });

  if (palette.length === 0) {
    throw new InsufficientDistinctColorsError({
      found: 0,
      minimum: options.filter?.minimumCount ?? 1,
      message: `no candidate colours left inside the ${prepared.tone} brightness window`,
    });
  }

  return {
    name: themeName,
    tone: prepared.tone,
    palette,
    assignment: assignPalette(palette, prepared.tone, { dominantBackground }),
    warnings,
  };
};
