import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import type { ThemeFormat, ThemeFormatName, ThemeBuild } from "./types";
import { loadTemplate, renderTemplate } from "./template";

export type SaveThemeOptions = {
  formats: readonly ThemeFormat[];
  outputDirs: Readonly<Record<ThemeFormatName, string>>;
  templateDir?: string;
};

/** Renders every requested format and returns the written file paths. */
export const saveTheme = async (
  build: ThemeBuild,
  options: SaveThemeOptions,
): Promise<string[]> => {
  if (options.formats.length === 0) {
    throw new Error("output.formats must name at least one format");
  }

  const written: string[] = [];
  for (const format of options.formats) {
    const template = await loadTemplate(format, options.templateDir);
    const rendered = renderTemplate(template, {
      themeName: build.name,
      assignment: build.assignment,
      separator: format.separator,
    });

    const target = join(options.outputDirs[format.name], format.outputPath(build.name));
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, rendered, "utf8");
    written.push(target);
  }

  return written;
};
