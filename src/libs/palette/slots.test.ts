import { describe, expect, test } from "vitest";

import { SLOT_NAMES } from "../../types/palette";
import { MIRROR_SLOTS, SCORED_SLOT_ORDER, mapSlots, validateSlotCatalog } from "./slots";

describe("slot catalog", () => {
  test("validates at start-up", () => {
    expect(() => validateSlotCatalog()).not.toThrow();
  });

  test("scores sixteen slots and mirrors the remaining six", () => {
    for (const order of Object.values(SCORED_SLOT_ORDER)) {
      expect(order).toHaveLength(16);
    }
    expect(Object.keys(MIRROR_SLOTS)).toEqual([
      "color09",
      "color10",
      "color11",
      "color12",
      "color13",
      "color14",
    ]);
  });

  test("starts with background then foreground for each tone", () => {
    expect(SCORED_SLOT_ORDER.dark.slice(0, 2)).toEqual([
      { slot: "color00", metric: "dark" },
      { slot: "color07", metric: "light" },
    ]);
    expect(SCORED_SLOT_ORDER.light.slice(0, 2)).toEqual([
      { slot: "color00", metric: "light" },
      { slot: "color07", metric: "dark" },
    ]);
  });

  test("mapSlots produces every slot in catalog order", () => {
    expect(Object.keys(mapSlots((slot) => slot))).toEqual([...SLOT_NAMES]);
  });
});
