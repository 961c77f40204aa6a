import { SLOT_NAMES, type Color, type PaletteAssignment } from "../../../types/palette";
import { rgbToHex } from "../../palette/color";

const SWATCH = "█████";

/** Truecolor ANSI swatch followed by `text`. */
export const formatSwatch = (color: Color, text: string): string => {
  const [red, green, blue] = color;
  return `\x1B[38;2;${red};${green};${blue}m${SWATCH}${text}\x1B[0m`;
};

export const formatPalettePreview = (palette: readonly Color[]): string[] =>
  palette.map((color) => formatSwatch(color, ` ${rgbToHex(color)}`));

export const formatAssignmentPreview = (assignment: PaletteAssignment): string[] =>
  SLOT_NAMES.map((slot) => {
    const color = assignment[slot];
    return formatSwatch(color, ` ${rgbToHex(color)} -> ${slot}`);
  });
