import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import type { TintforgeConfig } from "../../types/config";
import { CONFIG_FILENAME } from "./constants";
import { expandPathVariables } from "./normalizer";
import { validateConfig } from "./validator";

export type LoadConfigOptions = {
  workspace: string;
  configPath?: string;
};

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export const loadConfig = async (options: LoadConfigOptions): Promise<TintforgeConfig> => {
  const workspacePath = resolve(options.workspace);
  const filepath = options.configPath
    ? resolve(options.configPath)
    : resolve(workspacePath, CONFIG_FILENAME);

  let content: string;
  try {
    content = await readFile(filepath, "utf8");
  } catch (error) {
    // an explicit --config path must exist
    if (isMissingFileError(error) && !options.configPath) {
      return {};
    }
    throw error;
  }

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in ${filepath}`);
  }

  if (typeof rawConfig !== "object" || rawConfig === null || Array.isArray(rawConfig)) {
    throw new Error(`${filepath} must be a JSON object`);
  }

  console.log(`[config] loaded ${filepath}`);
  return expandPathVariables(validateConfig(rawConfig), workspacePath);
};
