/**
 * Base16 slot catalog.
 *
 * Purpose:
 * - Define the per-tone priority order in which slots are scored.
 * - Define how slots are filled once the palette runs out of colours.
 * - Define the bright ANSI slots that always mirror a primary slot.
 */

import {
  SLOT_NAMES,
  TONES,
  type ReuseRule,
  type SlotName,
  type SlotRule,
  type Tone,
} from "../../types/palette";
import { IncompleteAssignmentError } from "./errors";

const ACCENT_SLOTS = [
  "color01",
  "color02",
  "color03",
  "color04",
  "color05",
  "color06",
] as const satisfies readonly SlotName[];

const scoredOrder = (tone: Tone): readonly SlotRule[] => {
  const background = tone;
  const foreground = tone === "dark" ? "light" : "dark";

  return [
    { slot: "color00", metric: background },
    { slot: "color07", metric: foreground },
    { slot: "color01", metric: "red" },
    { slot: "color02", metric: "green" },
    { slot: "color04", metric: "blue" },
    { slot: "color03", metric: "yellow" },
    { slot: "color05", metric: "magenta" },
    { slot: "color06", metric: "cyan" },
    { slot: "color18", metric: background },
    { slot: "color19", metric: background },
    { slot: "color20", metric: background },
    { slot: "color21", metric: background },
    { slot: "color15", metric: background },
    { slot: "color16", metric: background },
    { slot: "color17", metric: background },
    { slot: "color08", metric: background },
  ];
};

export const SCORED_SLOT_ORDER: Readonly<Record<Tone, readonly SlotRule[]>> = {
  dark: scoredOrder("dark"),
  light: scoredOrder("light"),
};

export const REUSE_POLICY: Readonly<Partial<Record<SlotName, ReuseRule>>> = {
  color07: { kind: "copy", from: "color00" },
  color01: { kind: "best", from: ["color00", "color07"], metric: "red" },
  color02: { kind: "best", from: ["color00", "color07", "color01"], metric: "green" },
  color04: {
    kind: "best",
    from: ["color00", "color07", "color01", "color02"],
    metric: "blue",
  },
  color03: {
    kind: "best",
    from: ["color00", "color07", "color01", "color02", "color04"],
    metric: "yellow",
  },
  color05: {
    kind: "best",
    from: ["color00", "color07", "color01", "color02", "color04", "color03"],
    metric: "magenta",
  },
  color06: {
    kind: "best",
    from: ["color00", "color07", "color01", "color02", "color04", "color03", "color05"],
    metric: "cyan",
  },
  color08: { kind: "best", from: ACCENT_SLOTS, metric: "light" },
  color18: { kind: "best", from: ACCENT_SLOTS, metric: "dark" },
  color19: { kind: "copy", from: "color04" },
  color20: { kind: "copy", from: "color07" },
  color21: { kind: "copy", from: "color00" },
  color15: { kind: "copy", from: "color01" },
  color16: { kind: "copy", from: "color06" },
  color17: { kind: "copy", from: "color02" },
};

// bright variants of the six accents
export const MIRROR_SLOTS: Readonly<Partial<Record<SlotName, SlotName>>> = {
  color09: "color01",
  color10: "color02",
  color11: "color03",
  color12: "color04",
  color13: "color05",
  color14: "color06",
};

/** Builds a value for every catalog slot, in catalog order. */
export const mapSlots = <T>(fn: (slot: SlotName) => T): Record<SlotName, T> => ({
  color00: fn("color00"),
  color01: fn("color01"),
  color02: fn("color02"),
  color03: fn("color03"),
  color04: fn("color04"),
  color05: fn("color05"),
  color06: fn("color06"),
  color07: fn("color07"),
  color08: fn("color08"),
  color09: fn("color09"),
  color10: fn("color10"),
  color11: fn("color11"),
  color12: fn("color12"),
  color13: fn("color13"),
  color14: fn("color14"),
  color15: fn("color15"),
  color16: fn("color16"),
  color17: fn("color17"),
  color18: fn("color18"),
  color19: fn("color19"),
  color20: fn("color20"),
  color21: fn("color21"),
});

const reuseSources = (rule: ReuseRule): readonly SlotName[] =>
  rule.kind === "copy" ? [rule.from] : rule.from;

/**
 * Checks that the catalog can always produce a complete assignment from a
 * palette with at least one colour. Throws IncompleteAssignmentError otherwise.
 */
export const validateSlotCatalog = (): void => {
  for (const tone of TONES) {
    const order = SCORED_SLOT_ORDER[tone];
    const seen = new Set<SlotName>();

    order.forEach(({ slot }, index) => {
      if (seen.has(slot)) {
        throw new IncompleteAssignmentError(slot, `${slot} is scored twice in the ${tone} order`);
      }

      if (index > 0) {
        const rule = REUSE_POLICY[slot];
        if (!rule) {
          throw new IncompleteAssignmentError(slot, `${slot} has no reuse rule`);
        }

        const sources = reuseSources(rule);
        if (sources.length === 0) {
          throw new IncompleteAssignmentError(slot, `${slot} reuse rule names no source slot`);
        }

        for (const source of sources) {
          if (!seen.has(source)) {
            throw new IncompleteAssignmentError(
              slot,
              `${slot} reuses ${source}, which is not assigned before it in the ${tone} order`,
            );
          }
        }
      }

      seen.add(slot);
    });

    for (const [mirror, source] of Object.entries(MIRROR_SLOTS)) {
      if (!source || !seen.has(source)) {
        throw new IncompleteAssignmentError(mirror, `${mirror} mirrors an unscored slot`);
      }
    }

    for (const slot of SLOT_NAMES) {
      if (!seen.has(slot) && !MIRROR_SLOTS[slot]) {
        throw new IncompleteAssignmentError(slot, `${slot} is never assigned in the ${tone} order`);
      }
    }
  }
};
