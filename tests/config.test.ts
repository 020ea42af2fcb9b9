import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import {
  ConfigError,
  DEFAULT_MAX_DEPTH,
  loadConfig,
  resolveScanRoot,
  ScanRootError,
  type ScanConfig
} from "../src/core/config.js";

const scanConfig = (argv: string[], env: NodeJS.ProcessEnv = {}): ScanConfig => {
  const commandLine = loadConfig(argv, env);
  if (commandLine.command !== "scan") {
    throw new Error("expected a scan command line");
  }
  return commandLine.config;
};

describe("loadConfig", () => {
  it("uses defaults when no flags are given", () => {
    const config = scanConfig([]);

    expect(config).toEqual({
      dir: ".",
      showClean: false,
      verbose: false,
      maxDepth: DEFAULT_MAX_DEPTH,
      parallel: false,
      json: false,
      concurrency: os.availableParallelism(),
      excludedDirectories: []
    });
  });

  it("accepts single-dash, double-dash and inline values", () => {
    const config = scanConfig([
      "-dir",
      "/src",
      "--show-clean",
      "-max-depth=4",
      "-parallel",
      "--concurrency",
      "3",
      "-json=true",
      "-verbose=false",
      "-exclude=build, .cache"
    ]);

    expect(config).toEqual({
      dir: "/src",
      showClean: true,
      verbose: false,
      maxDepth: 4,
      parallel: true,
      json: true,
      concurrency: 3,
      excludedDirectories: ["build", ".cache"]
    });
  });

  it("falls back to environment variables and lets flags win", () => {
    const env = { GSW_MAX_DEPTH: "2", GSW_CONCURRENCY: "6", GSW_EXCLUDE: "target" };

    const fromEnv = scanConfig([], env);
    const overridden = scanConfig(["-max-depth", "7"], env);

    expect(fromEnv.maxDepth).toBe(2);
    expect(fromEnv.concurrency).toBe(6);
    expect(fromEnv.excludedDirectories).toEqual(["target"]);
    expect(overridden.maxDepth).toBe(7);
  });

  it("treats blank environment values as unset", () => {
    expect(scanConfig([], { GSW_MAX_DEPTH: "  " }).maxDepth).toBe(DEFAULT_MAX_DEPTH);
  });

  it("allows a zero depth but not a zero concurrency", () => {
    expect(scanConfig(["-max-depth", "0"]).maxDepth).toBe(0);
    expect(() => scanConfig(["-concurrency", "0"])).toThrow("concurrency must be a positive integer.");
  });

  it("returns the help command", () => {
    expect(loadConfig(["-h"], {})).toEqual({ command: "help" });
    expect(loadConfig(["--help", "-json"], {})).toEqual({ command: "help" });
  });

  it.each([
    [["-max-depth", "deep"], "max-depth must be a non-negative integer."],
    [["-max-depth", "-1"], "max-depth must be a non-negative integer."],
    [["-nope"], "Unknown flag: -nope"],
    [["-dir"], "Flag -dir requires a value."],
    [["-json=maybe"], 'Invalid boolean value "maybe" for -json.'],
    [["some/path"], "Unexpected argument: some/path"],
    [["--", "extra"], "Unexpected argument: extra"]
  ])("rejects %j", (argv, message) => {
    expect(() => loadConfig(argv, {})).toThrow(ConfigError);
    expect(() => loadConfig(argv, {})).toThrow(message);
  });
});

describe("resolveScanRoot", () => {
  it("resolves a relative directory against the working directory", async () => {
    const base = await mkdtemp(path.join(os.tmpdir(), "gsw-config-"));
    try {
      await expect(resolveScanRoot(".", base)).resolves.toBe(base);
    } finally {
      await rm(base, { recursive: true, force: true });
    }
  });

  it("rejects missing paths and files", async () => {
    const base = await mkdtemp(path.join(os.tmpdir(), "gsw-config-"));
    try {
      const file = path.join(base, "file.txt");
      await writeFile(file, "x", "utf8");

      await expect(resolveScanRoot("missing", base)).rejects.toThrow(ScanRootError);
      await expect(resolveScanRoot(file, base)).rejects.toThrow(`Scan root is not a directory: ${file}`);
    } finally {
      await rm(base, { recursive: true, force: true });
    }
  });
});
