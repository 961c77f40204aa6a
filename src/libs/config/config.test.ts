import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { CONFIG_FILENAME } from "./constants";
import { loadConfig } from "./loader";
import { expandPath, expandPathVariables } from "./normalizer";
import { resolveRunSettings } from "./settings";
import { validateConfig } from "./validator";

describe("config", () => {
  let workspace = "";

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    workspace = await mkdtemp(join(tmpdir(), "tintforge-config-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(workspace, { recursive: true, force: true });
  });

  test("expandPath handles home and workspace placeholders", () => {
    expect(expandPath("~/.vim", "/work", "/home/me")).toBe(join("/home/me", ".vim"));
    expect(expandPath("~", "/work", "/home/me")).toBe("/home/me");
    expect(expandPath("{workspace}/themes", "/work", "/home/me")).toBe(join("/work", "themes"));
    expect(expandPath("relative", "/work", "/home/me")).toBe(join("/work", "relative"));
  });

  test("expandPathVariables returns a cloned config", () => {
    const raw = { output: { vimDir: "{workspace}/vim", formats: ["vim"] } };

    const expanded = expandPathVariables(raw, "/work", "/home/me");

    expect(expanded).not.toBe(raw);
    expect(raw.output.vimDir).toBe("{workspace}/vim");
    expect(expanded.output?.vimDir).toBe(join("/work", "vim"));
    expect(expanded.output?.shellDir).toBeUndefined();
  });

  test("validateConfig accepts a full config", () => {
    const config = {
      theme: { variant: "dark", intensity: 90, dominantBackground: true },
      filter: { targetCount: 16, maxIterations: 40, minimumCount: 6, backgroundThreshold: "linear" },
      extract: { colorCount: 40, quality: 2, maxDimension: 200 },
      output: { formats: ["vim"], vimDir: "~/.vim", shellDir: "~/.config/base16-shell" },
    };

    expect(validateConfig(config)).toEqual(config);
  });

  test("validateConfig reports the key path of a bad value", () => {
    expect(() => validateConfig({ theme: { intensity: 120 } })).toThrow("theme.intensity");
    expect(() => validateConfig({ theme: { variant: "dim" } })).toThrow("theme.variant");
    expect(() => validateConfig({ filter: { unknown: 1 } })).toThrow("Invalid config");
    expect(() => validateConfig({ filter: { minimumCount: 20 } })).toThrow(
      "filter.minimumCount must be <= filter.targetCount",
    );
  });

  test("loadConfig returns an empty config when the file is missing", async () => {
    expect(await loadConfig({ workspace })).toEqual({});
  });

  test("loadConfig rejects a missing explicit config path", async () => {
    await expect(
      loadConfig({ workspace, configPath: join(workspace, "missing.json") }),
    ).rejects.toThrow();
  });

  test("loadConfig reads, validates and expands the workspace config", async () => {
    await writeFile(
      join(workspace, CONFIG_FILENAME),
      JSON.stringify({ theme: { variant: "light" }, output: { shellDir: "{workspace}/shell" } }),
    );

    const config = await loadConfig({ workspace });

    expect(config.theme?.variant).toBe("light");
    expect(config.output?.shellDir).toBe(join(workspace, "shell"));
  });

  test("loadConfig rejects invalid JSON and non-objects", async () => {
    const badJson = join(workspace, "bad.json");
    const list = join(workspace, "list.json");
    await writeFile(badJson, "{ nope");
    await writeFile(list, "[]");

    await expect(loadConfig({ workspace, configPath: badJson })).rejects.toThrow(
      `Invalid JSON in ${badJson}`,
    );
    await expect(loadConfig({ workspace, configPath: list })).rejects.toThrow(
      `${list} must be a JSON object`,
    );
  });

  test("resolveRunSettings lets command-line values win", () => {
    const settings = resolveRunSettings(
      {
        theme: { variant: "dark", intensity: 70 },
        filter: { minimumCount: 4 },
        output: { formats: ["vim"], vimDir: "/cfg/vim", shellDir: "/cfg/shell" },
      },
      { variant: "light", formats: ["shell"], shellDir: "/cli/shell" },
      "/work",
    );

    expect(settings.build).toEqual({
      variant: "light",
      intensity: 70,
      dominantBackground: undefined,
      filter: { minimumCount: 4 },
    });
    expect(settings.formats.map((format) => format.name)).toEqual(["shell"]);
    expect(settings.outputDirs).toEqual({ vim: "/cfg/vim", shell: "/cli/shell" });
  });
});
