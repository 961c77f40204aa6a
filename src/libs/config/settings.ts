import type { TintforgeConfig } from "../../types/config";
import type { ExtractOptions } from "../image/extract";
import type { ThemeBuildOptions } from "../theme/core/builder";
import { resolveThemeFormats } from "../theme/core/resolve";
import type { ThemeFormat, ThemeFormatName } from "../theme/core/types";
import { DEFAULT_SHELL_DIR, DEFAULT_VIM_DIR } from "./constants";
import { expandPath } from "./normalizer";

export type SettingOverrides = {
  variant?: ThemeBuildOptions["variant"];
  intensity?: number;
  dominantBackground?: boolean;
  formats?: string[];
  vimDir?: string;
  shellDir?: string;
};

export type RunSettings = {
  build: ThemeBuildOptions;
  extract: ExtractOptions;
  formats: ThemeFormat[];
  outputDirs: Record<ThemeFormatName, string>;
};

/** Merges the config file with command-line overrides; flags win. */
export const resolveRunSettings = (
  config: TintforgeConfig,
  overrides: SettingOverrides,
  workspace: string,
): RunSettings => ({
  build: {
    variant: overrides.variant ?? config.theme?.variant,
    intensity: overrides.intensity ?? config.theme?.intensity,
    dominantBackground: overrides.dominantBackground ?? config.theme?.dominantBackground,
    filter: { ...config.filter },
  },
  extract: { ...config.extract },
  formats: resolveThemeFormats(overrides.formats ?? config.output?.formats),
  outputDirs: {
    vim: overrides.vimDir ?? config.output?.vimDir ?? expandPath(DEFAULT_VIM_DIR, workspace),
    shell: overrides.shellDir ?? config.output?.shellDir ?? expandPath(DEFAULT_SHELL_DIR, workspace),
  },
});
