declare module 'gifenc' {
  export type GifPaletteColor = [number, number, number] | [number, number, number, number]

  export type GifColorFormat = 'rgb565' | 'rgb444' | 'rgba4444'

  export function quantize(
    rgba: Uint8Array | Uint8ClampedArray,
    maxColors: number,
    options?: {
      format?: GifColorFormat
      clearAlpha?: boolean
      clearAlphaColor?: number
      clearAlphaThreshold?: number
      oneBitAlpha?: boolean | number
      useSqrt?: boolean
    },
  ): GifPaletteColor[]

  export function applyPalette(
    rgba: Uint8Array | Uint8ClampedArray,
    palette: GifPaletteColor[],
    format?: GifColorFormat,
  ): Uint8Array
}
