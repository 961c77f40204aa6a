/**
 * Built-in theme format registry.
 *
 * Purpose:
 * - Register output formats by stable name.
 * - Export registry metadata for resolve and tests.
 */

import { join } from "node:path";

import type { ThemeFormat, ThemeFormatName } from "./types";

export const SHELL_FORMAT: ThemeFormat = {
  name: "shell",
  templateFile: "shell.txt",
  separator: "/",
  outputPath: (themeName) => join("scripts", `base16-${themeName}.sh`),
};

export const VIM_FORMAT: ThemeFormat = {
  name: "vim",
  templateFile: "vim.txt",
  separator: "",
  outputPath: (themeName) => join("colors", `base16-${themeName}.vim`),
};

export const BUILTIN_THEME_FORMATS = {
  shell: SHELL_FORMAT,
  vim: VIM_FORMAT,
} as const satisfies Record<ThemeFormatName, ThemeFormat>;

export const BUILTIN_THEME_FORMAT_NAMES = Object.freeze([
  "shell",
  "vim",
] as const) satisfies readonly ThemeFormatName[];
