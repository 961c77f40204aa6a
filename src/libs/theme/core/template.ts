/**
 * Template rendering.
 *
 * Purpose:
 * - Substitute a palette assignment into a theme template.
 * - Locate the bundled template files.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { SLOT_NAMES, type PaletteAssignment } from "../../../types/palette";
import { rgbToHex } from "../../palette/color";
import type { ThemeFormat } from "./types";

export const DEFAULT_TEMPLATE_DIR = fileURLToPath(new URL("../../../templates/", import.meta.url));

export type RenderContext = {
  themeName: string;
  assignment: PaletteAssignment;
  separator: string;
};

export const renderTemplate = (template: string, context: RenderContext): string => {
  let rendered = template.replaceAll("__theme_name__", context.themeName);

  for (const slot of SLOT_NAMES) {
    const color = context.assignment[slot];
    rendered = rendered
      .replaceAll(`__hashed_${slot}__`, `#${rgbToHex(color)}`)
      .replaceAll(`__${slot}__`, rgbToHex(color, context.separator));
  }

  return rendered;
};

export const loadTemplate = async (
  format: ThemeFormat,
  templateDir: string = DEFAULT_TEMPLATE_DIR,
): Promise<string> => readFile(join(templateDir, format.templateFile), "utf8");
