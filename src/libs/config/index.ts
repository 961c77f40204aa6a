export type { LoadConfigOptions } from "./loader";
export { loadConfig } from "./loader";
export { CONFIG_FILENAME, DEFAULT_SHELL_DIR, DEFAULT_VIM_DIR } from "./constants";
export { expandPath, expandPathVariables } from "./normalizer";
export type { RunSettings, SettingOverrides } from "./settings";
export { resolveRunSettings } from "./settings";
export { validateConfig } from "./validator";
