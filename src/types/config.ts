import type { BackgroundThresholdRule, Tone } from "./palette";

export type ThemeConfig = {
  variant?: Tone;
  /** 0..100, how far the palette may reach toward the opposite tone */
  intensity?: number;
  dominantBackground?: boolean;
};

export type FilterConfig = {
  targetCount?: number;
  maxIterations?: number;
  minimumCount?: number;
  backgroundThreshold?: BackgroundThresholdRule;
};

export type ExtractConfig = {
  colorCount?: number;
  quality?: number;
  maxDimension?: number;
};

export type OutputConfig = {
  formats?: string[];
  vimDir?: string;
  shellDir?: string;
};

export type TintforgeConfig = {
  theme?: ThemeConfig;
  filter?: FilterConfig;
  extract?: ExtractConfig;
  output?: OutputConfig;
};
