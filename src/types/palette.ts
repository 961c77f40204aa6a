export type Color = readonly [red: number, green: number, blue: number];

export type CandidateSet = readonly Color[];

export type Tone = "dark" | "light";

export const TONES = ["dark", "light"] as const satisfies readonly Tone[];

export type Hue = "red" | "green" | "blue";

export type MetricKind =
  | "dark"
  | "light"
  | "red"
  | "green"
  | "blue"
  | "cyan"
  | "magenta"
  | "yellow";

export const SLOT_NAMES = [
  "color00",
  "color01",
  "color02",
  "color03",
  "color04",
  "color05",
  "color06",
  "color07",
  "color08",
  "color09",
  "color10",
  "color11",
  "color12",
  "color13",
  "color14",
  "color15",
  "color16",
  "color17",
  "color18",
  "color19",
  "color20",
  "color21",
] as const;

export type SlotName = (typeof SLOT_NAMES)[number];

export type PaletteAssignment = Readonly<Record<SlotName, Color>>;

export type SlotRule = {
  slot: SlotName;
  metric: MetricKind;
};

export type ReuseRule =
  | {
      kind: "copy";
      from: SlotName;
    }
  | {
      kind: "best";
      from: readonly SlotName[];
      metric: MetricKind;
    };

export type BackgroundThresholdRule = "quartic" | "linear";

export type AnchorMode = "extreme" | "dominant";

export type PaletteWarning =
  | {
      kind: "degraded-palette";
      found: number;
      target: number;
    }
  | {
      kind: "overfull-palette";
      found: number;
      target: number;
    };

export type FilterOptions = {
  targetCount?: number;
  maxIterations?: number;
  minimumCount?: number;
  anchor?: AnchorMode;
  backgroundThreshold?: BackgroundThresholdRule;
};

export type FilterResult = {
  palette: Color[];
  warnings: PaletteWarning[];
};

export type AssignOptions = {
  dominantBackground?: boolean;
};

export type PrepareOptions = {
  variant?: Tone;
  intensity?: number;
};

export type PreparedCandidates = {
  tone: Tone;
  candidates: Color[];
};

export const DEFAULT_FILTER_OPTIONS: Required<FilterOptions> = {
  targetCount: 16,
  maxIterations: 50,
  minimumCount: 8,
  anchor: "extreme",
  backgroundThreshold: "quartic",
};

export const DEFAULT_INTENSITY = 100;
