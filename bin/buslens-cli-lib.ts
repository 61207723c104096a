// bin/buslens-cli-lib.ts
// Argument parsing and help for the buslens command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import type { BusKind, ConfigLayer } from "../src/core/config";
import { ConfigError } from "../src/core/config";
import type { TraceSink } from "../src/ports/types";
import { fileTraceSink, nullTraceSink } from "../src/ports/sink";
import { errorMessage } from "../src/errors";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  bus?: BusKind;
  address?: string;
  filter?: string;
  timeoutMs?: number;
  configFile?: string;
  logFile?: string;
  demo?: boolean;
  activatable?: boolean;
  /** First problem found in the arguments, if any. */
  error?: string;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

const VALUE_FLAGS = new Set(["--address", "--filter", "--timeout", "--config", "--log"]);

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length && !result.error; i++) {
    const arg = args[i] ?? "";

    if (VALUE_FLAGS.has(arg)) {
      const value = args[++i];
      if (value === undefined || value.startsWith("--")) {
        result.error = `${arg} needs a value`;
        break;
      }
      applyValue(result, arg, value);
    } else if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--demo") {
      result.demo = true;
    } else if (arg === "--activatable") {
      result.activatable = true;
    } else if (arg === "session" || arg === "system") {
      if (result.bus && result.bus !== arg) {
        result.error = `choose one bus, got both ${result.bus} and ${arg}`;
      }
      result.bus = arg;
    } else if (arg.startsWith("-")) {
      result.error = `unknown option: ${arg}`;
    } else {
      result.error = `unexpected argument: ${arg} (expected "session" or "system")`;
    }
  }

  return result;
}

function applyValue(result: CliArgs, flag: string, value: string): void {
  switch (flag) {
    case "--address":
      result.address = value;
      break;
    case "--filter":
      result.filter = value;
      break;
    case "--config":
      result.configFile = value;
      break;
    case "--log":
      result.logFile = value;
      break;
    case "--timeout": {
      const ms = Number(value);
      if (!Number.isInteger(ms) || ms < 1) {
        result.error = `--timeout must be a positive number of milliseconds, got ${value}`;
      } else {
        result.timeoutMs = ms;
      }
      break;
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
buslens - interactive D-Bus explorer

USAGE:
  buslens [session|system] [options]

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  --address <addr>                   Connect to this bus address instead
  --filter <text>                    Only list services whose name contains text
  --timeout <ms>                     Wait at most this long for each reply
  --config <file>                    Read settings from a JSON file
  --log <file>                       Append a JSON line per bus round-trip
  --activatable                      Also list services that start on demand
  --demo                             Explore a built-in example service instead of a real bus

ENVIRONMENT:
  BUSLENS_BUS, BUSLENS_ADDRESS, BUSLENS_TIMEOUT_MS, BUSLENS_MAX_IN_FLIGHT,
  BUSLENS_MAX_DEPTH, BUSLENS_FILTER, BUSLENS_LOG_FILE, BUSLENS_ACTIVATABLE

SHELL:
  Type :help inside the shell for its commands.

EXAMPLES:
  buslens session                    # Explore the session bus
  buslens system --filter login1     # Only services containing "login1"
  buslens --demo                     # Try it without a bus
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = path.join(__dirname, "..", "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `buslens v${pkg.version}`;
    }
    return "buslens v0.1.0";
  } catch {
    return "buslens v0.1.0";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Settings given on the command line, as the top configuration layer.
 */
export function buildConfig(args: CliArgs): ConfigLayer {
  const layer: ConfigLayer = {};

  if (args.bus !== undefined || args.address !== undefined || args.activatable) {
    layer.bus = {};
    if (args.bus !== undefined) layer.bus.kind = args.bus;
    if (args.address !== undefined) layer.bus.address = args.address;
    if (args.activatable) layer.bus.activatable = true;
  }
  if (args.timeoutMs !== undefined) layer.calls = { timeoutMs: args.timeoutMs };
  if (args.filter !== undefined) layer.ui = { filter: args.filter };
  if (args.logFile !== undefined) layer.log = { file: args.logFile };

  return layer;
}

/**
 * Open the trace file named by --log. A file that cannot be opened is a
 * configuration error.
 */
export function openTraceSink(file: string | undefined): TraceSink {
  if (!file) return nullTraceSink;
  try {
    return fileTraceSink(file);
  } catch (e) {
    throw new ConfigError(`Cannot open log file ${file}: ${errorMessage(e)}`);
  }
}
