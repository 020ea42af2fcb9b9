import { stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export interface ScanConfig {
  dir: string;
  showClean: boolean;
  verbose: boolean;
  maxDepth: number;
  parallel: boolean;
  json: boolean;
  concurrency: number;
  excludedDirectories: string[];
}

export type CommandLine = { command: "help" } | { command: "scan"; config: ScanConfig };

export class ConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ScanRootError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "ScanRootError";
  }
}

export const USAGE = [
  "Usage: gsw [flags]",
  "",
  "Flags:",
  "  -dir <path>          Directory to scan for git repositories (default \".\")",
  "  -show-clean          Show clean branches in addition to dirty ones",
  "  -verbose             Print progress diagnostics to stderr",
  "  -max-depth <n>       Maximum directory depth to search (default 10, env GSW_MAX_DEPTH)",
  "  -parallel            Inspect repositories in parallel",
  "  -concurrency <n>     Parallel worker limit (default: CPU count, env GSW_CONCURRENCY)",
  "  -exclude <a,b>       Extra directory names to skip (env GSW_EXCLUDE)",
  "  -json                Output JSON instead of text",
  "  -h, -help            Show this help"
].join("\n");

export const DEFAULT_MAX_DEPTH = 10;

type FlagKind = "boolean" | "string";

const FLAGS = new Map<string, FlagKind>([
  ["dir", "string"],
  ["show-clean", "boolean"],
  ["verbose", "boolean"],
  ["max-depth", "string"],
  ["parallel", "boolean"],
  ["concurrency", "string"],
  ["exclude", "string"],
  ["json", "boolean"],
  ["h", "boolean"],
  ["help", "boolean"]
]);

const parseInteger = (name: string, value: string, minimum: number): number => {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(`${name} must be ${minimum > 0 ? "a positive" : "a non-negative"} integer.`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < minimum) {
    throw new ConfigError(`${name} must be ${minimum > 0 ? "a positive" : "a non-negative"} integer.`);
  }

  return parsed;
};

const parseBoolean = (name: string, value: string): boolean => {
  if (/^(1|t|true)$/i.test(value)) {
    return true;
  }
  if (/^(0|f|false)$/i.test(value)) {
    return false;
  }

  throw new ConfigError(`Invalid boolean value "${value}" for -${name}.`);
};

const parseNameList = (value: string): string[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

interface RawFlags {
  booleans: Map<string, boolean>;
  strings: Map<string, string>;
}

const readFlags = (argv: readonly string[]): RawFlags => {
  const flags: RawFlags = { booleans: new Map(), strings: new Map() };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === undefined) {
      break;
    }

    if (token === "--") {
      const rest = argv.slice(index + 1);
      if (rest.length > 0) {
        throw new ConfigError(`Unexpected argument: ${rest.join(" ")}`);
      }
      break;
    }

    if (!token.startsWith("-") || token === "-") {
      throw new ConfigError(`Unexpected argument: ${token}`);
    }

    const body = token.replace(/^--?/, "");
    const separator = body.indexOf("=");
    const name = separator === -1 ? body : body.slice(0, separator);
    const inlineValue = separator === -1 ? undefined : body.slice(separator + 1);
    const kind = FLAGS.get(name);

    if (!kind) {
      throw new ConfigError(`Unknown flag: -${name}`);
    }

    if (kind === "boolean") {
      flags.booleans.set(name, inlineValue === undefined ? true : parseBoolean(name, inlineValue));
      continue;
    }

    if (inlineValue !== undefined) {
      flags.strings.set(name, inlineValue);
      continue;
    }

    const next = argv[index + 1];
    if (next === undefined) {
      throw new ConfigError(`Flag -${name} requires a value.`);
    }
    flags.strings.set(name, next);
    index += 1;
  }

  return flags;
};

const fromEnv = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const value = env[name]?.trim();
  return value ? value : undefined;
};

/**
 * Parses command-line flags. Numeric and list settings fall back to GSW_* environment
 * variables when the flag is absent.
 */
export const loadConfig = (argv: readonly string[], env: NodeJS.ProcessEnv = process.env): CommandLine => {
  const flags = readFlags(argv);

  if (flags.booleans.get("h") || flags.booleans.get("help")) {
    return { command: "help" };
  }

  const maxDepthRaw = flags.strings.get("max-depth") ?? fromEnv(env, "GSW_MAX_DEPTH");
  const concurrencyRaw = flags.strings.get("concurrency") ?? fromEnv(env, "GSW_CONCURRENCY");
  const excludeRaw = flags.strings.get("exclude") ?? fromEnv(env, "GSW_EXCLUDE");

  const config: ScanConfig = {
    dir: flags.strings.get("dir") ?? ".",
    showClean: flags.booleans.get("show-clean") ?? false,
    verbose: flags.booleans.get("verbose") ?? false,
    maxDepth: maxDepthRaw === undefined ? DEFAULT_MAX_DEPTH : parseInteger("max-depth", maxDepthRaw, 0),
    parallel: flags.booleans.get("parallel") ?? false,
    json: flags.booleans.get("json") ?? false,
    concurrency:
      concurrencyRaw === undefined ? os.availableParallelism() : parseInteger("concurrency", concurrencyRaw, 1),
    excludedDirectories: excludeRaw === undefined ? [] : parseNameList(excludeRaw)
  };

  return { command: "scan", config };
};

/**
 * Resolves the scan root against `cwd` and checks that it is a directory.
 */
export const resolveScanRoot = async (dir: string, cwd: string = process.cwd()): Promise<string> => {
  const absolute = path.resolve(cwd, dir);

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(absolute)).isDirectory();
  } catch (error) {
    throw new ScanRootError(
      `Error resolving path ${absolute}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!isDirectory) {
    throw new ScanRootError(`Scan root is not a directory: ${absolute}`);
  }

  return absolute;
};
