export { assignPalette } from "./assign";
export { brightnessWindow, detectTone, prepareCandidates } from "./candidates";
export {
  assertColor,
  backgroundSimilarity,
  brightness,
  isColor,
  parseHexColor,
  rgbToHex,
  similarity,
} from "./color";
export {
  IncompleteAssignmentError,
  InsufficientDistinctColorsError,
  InvalidColorError,
  InvalidHueSelectionError,
} from "./errors";
export { filterBySimilarity, filterPalette, orderCandidates } from "./filter";
export { METRICS, prominence, scoreColor, sortByMetric } from "./metrics";
export {
  MIRROR_SLOTS,
  REUSE_POLICY,
  SCORED_SLOT_ORDER,
  mapSlots,
  validateSlotCatalog,
} from "./slots";
