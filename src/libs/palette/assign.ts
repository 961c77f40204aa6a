import {
  SLOT_NAMES,
  type AssignOptions,
  type Color,
  type PaletteAssignment,
  type SlotName,
  type Tone,
} from "../../types/palette";
import { assertColor } from "./color";
import { IncompleteAssignmentError } from "./errors";
import { scoreColor, sortByMetric } from "./metrics";
import { MIRROR_SLOTS, REUSE_POLICY, SCORED_SLOT_ORDER, mapSlots } from "./slots";

type Designations = Map<SlotName, Color>;

const requireAssigned = (designations: Designations, source: SlotName, slot: SlotName): Color => {
  const color = designations.get(source);
  if (!color) {
    throw new IncompleteAssignmentError(slot, `${slot} reuses ${source} before it is assigned`);
  }
  return color;
};

const reuseColor = (designations: Designations, slot: SlotName): Color => {
  const rule = REUSE_POLICY[slot];
  if (!rule) {
    throw new IncompleteAssignmentError(slot);
  }

  if (rule.kind === "copy") {
    return requireAssigned(designations, rule.from, slot);
  }

  let best: Color | undefined;
  let bestScore = Number.NEGATIVE_INFINITY;
  for (const source of rule.from) {
    const color = requireAssigned(designations, source, slot);
    const score = scoreColor(rule.metric, color);
    if (!best || score > bestScore) {
      best = color;
      bestScore = score;
    }
  }

  if (!best) {
    throw new IncompleteAssignmentError(slot);
  }
  return best;
};

/**
 * Designates palette colours to Base16 slots.
 *
 * Slots are visited in the tone's priority order; each takes the best
 * remaining colour for its metric. Once the palette is used up, slots fall
 * back to the reuse policy, which may repeat colours across slots.
 */
export const assignPalette = (
  palette: readonly Color[],
  tone: Tone,
  options: AssignOptions = {},
): PaletteAssignment => {
  palette.forEach((color) => assertColor(color));

  const designations: Designations = new Map();
  let working: Color[] = [...palette];

  for (const { slot, metric } of SCORED_SLOT_ORDER[tone]) {
    if (slot === "color00" && options.dominantBackground) {
      const [dominant, ...rest] = working;
      if (dominant) {
        designations.set(slot, dominant);
        working = rest;
        continue;
      }
    }

    working = sortByMetric(working, metric);
    designations.set(slot, working.pop() ?? reuseColor(designations, slot));
  }

  for (const slot of SLOT_NAMES) {
    const source = MIRROR_SLOTS[slot];
    if (!source) continue;
    designations.set(slot, requireAssigned(designations, source, slot));
  }

  return Object.freeze(
    mapSlots((slot) => {
      const color = designations.get(slot);
      if (!color) {
        throw new IncompleteAssignmentError(slot);
      }
      return color;
    }),
  );
};
