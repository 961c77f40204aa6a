import { afterEach, describe, expect, test, vi } from "vitest";

import type { Color } from "../../types/palette";
import { rgbToHex } from "./color";
import { InsufficientDistinctColorsError } from "./errors";
import { filterBySimilarity, filterPalette, orderCandidates } from "./filter";

const SPREAD: Color[] = [
  [5, 5, 5],
  [200, 30, 30],
  [30, 200, 30],
  [30, 30, 200],
  [200, 200, 30],
  [200, 30, 200],
  [30, 200, 200],
  [250, 250, 250],
  [120, 120, 120],
  [255, 128, 0],
  [0, 128, 255],
  [128, 0, 255],
  [255, 0, 128],
  [90, 60, 30],
  [30, 90, 60],
  [60, 30, 90],
];

const SCENARIO: Color[] = [
  [10, 10, 10],
  [250, 250, 250],
  [200, 30, 30],
  [30, 200, 30],
  [30, 30, 200],
  [200, 200, 30],
  [200, 30, 200],
  [30, 200, 200],
];

const hexes = (colors: readonly Color[]) => colors.map((color) => rgbToHex(color));

afterEach(() => {
  vi.restoreAllMocks();
});

describe("filterBySimilarity", () => {
  test("always keeps the anchor and drops colours close to a kept one", () => {
    const kept = filterBySimilarity(
      [
        [0, 0, 0],
        [10, 10, 10],
        [255, 255, 255],
      ],
      0.5,
    );

    expect(kept).toEqual([
      [0, 0, 0],
      [255, 255, 255],
    ]);
  });

  test("background rule controls colours near the anchor brightness", () => {
    const colors: Color[] = [
      [0, 0, 0],
      [255, 0, 0],
    ];

    expect(filterBySimilarity(colors, 0.9, "quartic")).toEqual([[0, 0, 0]]);
    expect(filterBySimilarity(colors, 0.9, "linear")).toEqual(colors);
  });

  test("returns an empty list for empty input", () => {
    expect(filterBySimilarity([], 0.5)).toEqual([]);
  });
});

describe("orderCandidates", () => {
  test("sorts by brightness toward the tone", () => {
    const colors: Color[] = [
      [120, 120, 120],
      [5, 5, 5],
      [250, 250, 250],
    ];

    expect(orderCandidates(colors, "dark")).toEqual([
      [5, 5, 5],
      [120, 120, 120],
      [250, 250, 250],
    ]);
    expect(orderCandidates(colors, "light")).toEqual([
      [250, 250, 250],
      [120, 120, 120],
      [5, 5, 5],
    ]);
  });

  test("keeps the dominant colour in front in dominant mode", () => {
    const colors: Color[] = [
      [120, 120, 120],
      [250, 250, 250],
      [5, 5, 5],
    ];

    expect(orderCandidates(colors, "dark", "dominant")).toEqual([
      [120, 120, 120],
      [5, 5, 5],
      [250, 250, 250],
    ]);
  });
});

describe("filterPalette", () => {
  test("returns exactly sixteen distinct colours from sixteen candidates", () => {
    const result = filterPalette(SPREAD, "dark");

    expect(result.warnings).toEqual([]);
    expect(result.palette).toHaveLength(16);
    expect(result.palette[0]).toEqual([5, 5, 5]);
    expect(new Set(hexes(result.palette)).size).toBe(16);
    expect(hexes(result.palette).every((hex) => hexes(SPREAD).includes(hex))).toBe(true);
  });

  test("drops a near duplicate to land on sixteen colours", () => {
    const result = filterPalette([...SPREAD, [201, 30, 30]], "dark");
    const kept = hexes(result.palette);

    expect(result.palette).toHaveLength(16);
    expect(result.palette[0]).toEqual([5, 5, 5]);
    expect(kept.includes("c81e1e") && kept.includes("c91e1e")).toBe(false);
  });

  test("anchors on the brightest colour for light themes", () => {
    const result = filterPalette(SPREAD, "light");

    expect(result.palette).toHaveLength(16);
    expect(result.palette[0]).toEqual([250, 250, 250]);
  });

  test("fails when fewer than eight distinct colours exist", () => {
    const blacks: Color[] = Array.from({ length: 8 }, () => [0, 0, 0]);

    expect(() => filterPalette(blacks, "dark")).toThrow(InsufficientDistinctColorsError);
    expect(() => filterPalette(blacks, "dark")).toThrow("can only find 1 (< 8) distinct colours");
  });

  test("returns a degraded palette with a warning for ten colours", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

    const result = filterPalette(SPREAD.slice(0, 10), "dark");

    expect(result.palette).toHaveLength(10);
    expect(result.warnings).toEqual([{ kind: "degraded-palette", found: 10, target: 16 }]);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith(
      "[palette] only found 10 distinct colours (wanted 16); some slots reuse colours",
    );
  });

  test("keeps all eight colours of an already distinct palette", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});

    const result = filterPalette(SCENARIO, "dark");

    expect(result.palette).toEqual([
      [10, 10, 10],
      [200, 30, 30],
      [30, 200, 30],
      [30, 30, 200],
      [200, 200, 30],
      [200, 30, 200],
      [30, 200, 200],
      [250, 250, 250],
    ]);
    expect(result.warnings).toEqual([{ kind: "degraded-palette", found: 8, target: 16 }]);
  });

  test("returns the closest larger set when the target count is skipped", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

    const result = filterPalette(
      [
        [0, 0, 0],
        [255, 0, 0],
        [0, 0, 255],
      ],
      "dark",
      { targetCount: 2, minimumCount: 1 },
    );

    expect(result.palette).toEqual([
      [0, 0, 0],
      [255, 0, 0],
      [0, 0, 255],
    ]);
    expect(result.warnings).toEqual([{ kind: "overfull-palette", found: 3, target: 2 }]);
    expect(warnSpy).toHaveBeenCalledWith("[palette] kept 3 distinct colours (wanted 2)");
  });

  test("returns the closest round rather than the last one", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});

    // threshold 0.5 keeps 2 colours, threshold 0.75 keeps all 5
    const result = filterPalette(
      [
        [255, 255, 255],
        [255, 255, 100],
        [255, 100, 255],
        [100, 255, 255],
        [0, 0, 0],
      ],
      "dark",
      { targetCount: 3, minimumCount: 1, maxIterations: 2, backgroundThreshold: "linear" },
    );

    expect(result.palette).toEqual([
      [0, 0, 0],
      [255, 255, 100],
    ]);
    expect(result.warnings).toEqual([{ kind: "degraded-palette", found: 2, target: 3 }]);
  });

  test("treats undefined options as defaults", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});

    const result = filterPalette(SPREAD, "dark", {
      targetCount: undefined,
      maxIterations: undefined,
      minimumCount: undefined,
    });

    expect(result.palette).toHaveLength(16);
    expect(result.warnings).toEqual([]);
  });

  test("returns nothing for no candidates", () => {
    expect(filterPalette([], "dark")).toEqual({ palette: [], warnings: [] });
  });

  test("rejects a minimum above the target", () => {
    expect(() => filterPalette(SPREAD, "dark", { minimumCount: 20 })).toThrow(
      "filter.minimumCount must be <= filter.targetCount",
    );
  });
});
