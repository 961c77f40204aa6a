import { BUILTIN_THEME_FORMAT_NAMES, BUILTIN_THEME_FORMATS } from "./registry";
import type { ThemeFormat, ThemeFormatName } from "./types";

export const DEFAULT_THEME_FORMAT_NAMES: readonly ThemeFormatName[] = ["vim", "shell"];

export const isThemeFormatName = (value: string): value is ThemeFormatName =>
  BUILTIN_THEME_FORMAT_NAMES.some((name) => name === value);

export const resolveThemeFormats = (names?: readonly string[]): ThemeFormat[] => {
  const requested = names ?? DEFAULT_THEME_FORMAT_NAMES;
  const resolved: ThemeFormat[] = [];

  for (const name of requested) {
    const normalizedName = name.trim();
    if (!isThemeFormatName(normalizedName)) {
      throw new Error(
        `Unknown theme format "${normalizedName}". Supported formats: ${BUILTIN_THEME_FORMAT_NAMES.join(", ")}`,
      );
    }

    const format = BUILTIN_THEME_FORMATS[normalizedName];
    if (!resolved.includes(format)) {
      resolved.push(format);
    }
  }

  if (resolved.length === 0) {
    throw new Error(
      `At least one theme format is required. Supported formats: ${BUILTIN_THEME_FORMAT_NAMES.join(", ")}`,
    );
  }

  return resolved;
};
