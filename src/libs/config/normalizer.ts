import { homedir } from "node:os";
import { join, resolve } from "node:path";

import type { TintforgeConfig } from "../../types/config";

const cloneConfig = (config: TintforgeConfig): TintforgeConfig => structuredClone(config);

export const expandPath = (path: string, workspace: string, home: string = homedir()): string => {
  const expanded = path.replaceAll("{workspace}", resolve(workspace));
  if (expanded === "~") {
    return home;
  }
  if (expanded.startsWith("~/")) {
    return join(home, expanded.slice(2));
  }
  return resolve(workspace, expanded);
};

/** Expands `~` and `{workspace}` in output directories; other sections are copied. */
export const expandPathVariables = (
  config: TintforgeConfig,
  workspace: string,
  home: string = homedir(),
): TintforgeConfig => {
  const normalizedConfig = cloneConfig(config);
  const output = normalizedConfig.output;

  if (!output) {
    return normalizedConfig;
  }

  if (output.vimDir !== undefined) {
    output.vimDir = expandPath(output.vimDir, workspace, home);
  }
  if (output.shellDir !== undefined) {
    output.shellDir = expandPath(output.shellDir, workspace, home);
  }

  return normalizedConfig;
};
