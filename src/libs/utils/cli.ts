import { resolve } from "node:path";
import { parseArgs } from "node:util";

import type { Tone } from "../../types/palette";

export type CliOptions = {
  imagePath: string;
  themeName: string;
  workspace: string;
  configPath?: string;
  variant?: Tone;
  intensity?: number;
  preview: boolean;
  dominantBackground?: boolean;
  formats?: string[];
  vimDir?: string;
  shellDir?: string;
};

const SUPPORTED_ARGUMENTS =
  "<image> <name>, --variant, --intensity, --preview, --dominant-background, --format, --vim-dir, --shell-dir, --workspace, --config";

const parseRawArgs = (argv: string[]) =>
  parseArgs({
    args: argv,
    options: {
      variant: { type: "string" },
      intensity: { type: "string" },
      preview: { type: "boolean" },
      "dominant-background": { type: "boolean" },
      format: { type: "string" },
      "vim-dir": { type: "string" },
      "shell-dir": { type: "string" },
      workspace: { type: "string" },
      config: { type: "string" },
    },
    strict: true,
    allowPositionals: true,
  });

const nonEmpty = (value: string | undefined, flag: string): string | undefined => {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (trimmed === "") {
    throw new Error(`Invalid ${flag}. It must be non-empty`);
  }
  return trimmed;
};

export const parseCliOptions = (argv: string[], startupCwd: string): CliOptions => {
  let parsed: ReturnType<typeof parseRawArgs>;
  try {
    parsed = parseRawArgs(argv);
  } catch (error) {
    const message =
      error instanceof Error
        ? error.message
        : `Invalid CLI arguments. Supported arguments: ${SUPPORTED_ARGUMENTS}`;
    throw new Error(message);
  }

  const { values, positionals } = parsed;
  const [image, name, ...extra] = positionals;
  if (!image || !name) {
    throw new Error("Missing arguments. Usage: tintforge <image> <name> [options]");
  }
  if (extra.length > 0) {
    throw new Error(`Unexpected argument: ${extra.join(" ")}`);
  }

  const rawVariant = values.variant?.trim();
  let variant: Tone | undefined;
  if (rawVariant !== undefined) {
    if (rawVariant !== "dark" && rawVariant !== "light") {
      throw new Error("Invalid --variant. Supported values: dark, light");
    }
    variant = rawVariant;
  }

  let intensity: number | undefined;
  if (values.intensity !== undefined) {
    intensity = Number(values.intensity);
    if (
      values.intensity.trim() === "" ||
      !Number.isInteger(intensity) ||
      intensity < 0 ||
      intensity > 100
    ) {
      throw new Error("Invalid --intensity. It must be an integer in range 0..100");
    }
  }

  const formats = nonEmpty(values.format, "--format")
    ?.split(",")
    .map((format) => format.trim())
    .filter((format) => format.length > 0);

  const workspace = resolve(startupCwd, values.workspace ?? ".");
  const vimDir = nonEmpty(values["vim-dir"], "--vim-dir");
  const shellDir = nonEmpty(values["shell-dir"], "--shell-dir");

  return {
    imagePath: resolve(startupCwd, image),
    themeName: name,
    workspace,
    configPath: values.config ? resolve(startupCwd, values.config) : undefined,
    variant,
    intensity,
    preview: values.preview ?? false,
    dominantBackground: values["dominant-background"],
    formats,
    vimDir: vimDir ? resolve(startupCwd, vimDir) : undefined,
    shellDir: shellDir ? resolve(startupCwd, shellDir) : undefined,
  };
};
