/* Runtime */
import { readFileSync } from "node:fs";

/* Framework */
import { loadConfig, resolveRunSettings } from "./libs/config";
import { extractCandidates } from "./libs/image";
import { validateSlotCatalog } from "./libs/palette";
import {
  buildTheme,
  formatAssignmentPreview,
  formatPalettePreview,
  saveTheme,
  type ThemeBuild,
} from "./libs/theme";
import { parseCliOptions } from "./libs/utils/cli";

const HELP_TEXT = `Usage: tintforge <image> <name> [options]

Generates a Base16 colour scheme from an image.

Options:
  --help, -h                    Show this help message
  --version, -v                 Show version information
  --variant <dark|light>        Theme tone (default: detected from the image)
  --intensity <0..100>          Brightness range kept from the image (default: 100)
  --dominant-background         Use the image's dominant colour as background
  --preview                     Print the palette without writing files
  --format <list>               Output formats, comma separated (default: vim,shell)
  --vim-dir <path>              Vim runtime directory (default: ~/.vim)
  --shell-dir <path>            base16-shell directory (default: ~/.config/base16-shell)
  --workspace <path>            Workspace directory (default: .)
  --config <path>               Path to tintforge.config.json

Examples:
  tintforge ./wallpaper.jpg dusk
  tintforge ./wallpaper.jpg dusk --variant light --intensity 80 --preview
`;

const getAppVersion = (): string => {
  try {
    const packageJsonUrl = new URL("../package.json", import.meta.url);
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonUrl, "utf8"));
    if (
      typeof packageJson === "object" &&
      packageJson !== null &&
      "version" in packageJson &&
      typeof packageJson.version === "string"
    ) {
      return packageJson.version;
    }
    return "unknown";
  } catch {
    return "unknown";
  }
};

const printVersionInfo = (version: string) => {
  console.log(`tintforge v${version}`);
  console.log(`node ${process.versions.node}`);
  console.log(`${process.platform} ${process.arch}`);
};

const formatDuration = (startTime: number): string =>
  `${(performance.now() - startTime).toFixed(0)}ms`;

const logStage = (message: string) => console.log(`[startup] ${message}`);

const printBuild = (build: ThemeBuild) => {
  console.log(`[theme] ${build.name} (${build.tone}, ${build.palette.length} colours)`);
  for (const line of formatPalettePreview(build.palette)) {
    console.log(line);
  }
  console.log("");
  for (const line of formatAssignmentPreview(build.assignment)) {
    console.log(line);
  }
};

const main = async () => {
  const startTime = performance.now();
  const argv = process.argv.slice(2);
  if (argv.includes("--help") || argv.includes("-h")) {
    console.log(HELP_TEXT);
    return;
  }
  if (argv.includes("--version") || argv.includes("-v")) {
    printVersionInfo(getAppVersion());
    return;
  }

  const cliOptions = parseCliOptions(argv, process.cwd());
  validateSlotCatalog();

  const config = await loadConfig({
    workspace: cliOptions.workspace,
    configPath: cliOptions.configPath,
  });
  const settings = resolveRunSettings(config, cliOptions, cliOptions.workspace);
  logStage(`workspace=${cliOptions.workspace}`);

  const candidates = await extractCandidates(cliOptions.imagePath, settings.extract);
  console.log(
    `[extract] ${candidates.length} candidate colours from ${cliOptions.imagePath} (${formatDuration(startTime)})`,
  );

  const build = buildTheme(cliOptions.themeName, candidates, settings.build);
  printBuild(build);

  if (cliOptions.preview) {
    return;
  }

  const written = await saveTheme(build, {
    formats: settings.formats,
    outputDirs: settings.outputDirs,
  });
  for (const path of written) {
    console.log(`[theme] wrote ${path}`);
  }
  logStage(`done (${formatDuration(startTime)})`);
};

void main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[error] ${message}`);
  process.exit(1);
});
