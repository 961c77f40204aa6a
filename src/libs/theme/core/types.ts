/**
 * Theme type contracts.
 *
 * Purpose:
 * - Describe the output formats a palette assignment can be rendered into.
 * - Describe the result of one theme build.
 */

import type {
  Color,
  PaletteAssignment,
  PaletteWarning,
  Tone,
} from "../../../types/palette";

export type ThemeFormatName = "shell" | "vim";

export type ThemeFormat = {
  name: ThemeFormatName;
  /** file name inside the template directory */
  templateFile: string;
  /** placed between channels in `__colorNN__` substitutions */
  separator: string;
  /** output location relative to the format's output directory */
  outputPath: (themeName: string) => string;
};

export type ThemeBuild = {
  name: string;
  tone: Tone;
  palette: Color[];
  assignment: PaletteAssignment;
  warnings: PaletteWarning[];
};
