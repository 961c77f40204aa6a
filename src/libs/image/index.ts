export { DEFAULT_MAX_DIMENSION, ImageDecodeError, extractCandidates } from "./extract";
export type { ExtractOptions } from "./extract";
export { DEFAULT_COLOR_COUNT, DEFAULT_QUALITY, quantizePixels } from "./quantize";
export type { QuantizeOptions, RawPixels } from "./quantize";
