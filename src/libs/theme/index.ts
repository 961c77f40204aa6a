/**
 * Public exports for the theme module.
 *
 * Purpose:
 * - Build a slot assignment from extracted candidates.
 * - Render and write it in the registered formats.
 */

export type { ThemeBuild, ThemeFormat, ThemeFormatName } from "./core/types";
export type { ThemeBuildOptions } from "./core/builder";
export type { RenderContext } from "./core/template";
export type { SaveThemeOptions } from "./core/writer";
export { buildTheme, normalizeThemeName } from "./core/builder";
export { InvalidThemeNameError } from "./core/errors";
export { formatAssignmentPreview, formatPalettePreview, formatSwatch } from "./core/preview";
export {
  BUILTIN_THEME_FORMAT_NAMES,
  BUILTIN_THEME_FORMATS,
  SHELL_FORMAT,
  VIM_FORMAT,
} from "./core/registry";
export {
  DEFAULT_THEME_FORMAT_NAMES,
  isThemeFormatName,
  resolveThemeFormats,
} from "./core/resolve";
export { DEFAULT_TEMPLATE_DIR, loadTemplate, renderTemplate } from "./core/template";
export { saveTheme } from "./core/writer";
