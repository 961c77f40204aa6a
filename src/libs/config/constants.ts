export const CONFIG_FILENAME = "tintforge.config.json";

export const DEFAULT_VIM_DIR = "~/.vim";

export const DEFAULT_SHELL_DIR = "~/.config/base16-shell";
