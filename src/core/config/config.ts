// src/core/config/config.ts
// Configuration for buslens: defaults, environment, JSON file, CLI overrides.

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type BusKind = "session" | "system";

export type BusConfig = {
  /** Which well-known bus to connect to */
  kind: BusKind;
  /** Explicit bus address, e.g. unix:path=/run/dbus/system_bus_socket; overrides kind */
  address?: string;
  /** How long to wait for the bus to accept the connection */
  connectTimeoutMs: number;
  /** Also list names that can be started on demand */
  activatable: boolean;
};

export type CallsConfig = {
  /** Bounded wait for every round-trip */
  timeoutMs: number;
  /** In-flight requests per target service; the rest queue */
  maxInFlightPerService: number;
};

export type SignatureConfig = {
  /** Container nesting limit */
  maxDepth: number;
};

export type UiConfig = {
  /** How often the shell applies finished work */
  tickMs: number;
  /** Only show services whose name contains this */
  filter?: string;
};

export type LogConfig = {
  /** Append trace events to this file as JSON lines */
  file?: string;
};

export type BusLensConfig = {
  bus: BusConfig;
  calls: CallsConfig;
  signature: SignatureConfig;
  ui: UiConfig;
  log: LogConfig;
};

/** One source of settings; anything left out falls through to lower layers. */
export type ConfigLayer = {
  [K in keyof BusLensConfig]?: Partial<BusLensConfig[K]>;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_BUS_CONFIG: BusConfig = {
  kind: "system",
  connectTimeoutMs: 5_000,
  activatable: false,
};

export const DEFAULT_CALLS_CONFIG: CallsConfig = {
  timeoutMs: 25_000,
  maxInFlightPerService: 4,
};

export const DEFAULT_CONFIG: BusLensConfig = {
  bus: DEFAULT_BUS_CONFIG,
  calls: DEFAULT_CALLS_CONFIG,
  signature: { maxDepth: 32 },
  ui: { tickMs: 50 },
  log: {},
};

export const DEFAULT_CONFIG_FILE = "buslens.config.json";

// =========================================================================
// Configuration Loading
// =========================================================================

function isBusKind(s: string | undefined): s is BusKind {
  return s === "session" || s === "system";
}

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const n = parseInt(env[name] || "", 10);
  return Number.isNaN(n) ? undefined : n;
}

function envBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const v = env[name]?.toLowerCase();
  if (v === "1" || v === "true" || v === "yes") return true;
  if (v === "0" || v === "false" || v === "no") return false;
  return undefined;
}

/** Drop keys whose value is undefined so they do not shadow lower layers. */
function defined<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(obj)) {
    if (isKeyOf(obj, key) && obj[key] !== undefined) out[key] = obj[key];
  }
  return out;
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return key in obj;
}

/**
 * Load configuration from environment variables.
 * Unset or unparseable variables are left out.
 */
export function configFromEnv(prefix = "BUSLENS", env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const kind = env[`${prefix}_BUS`];
  return {
    bus: defined({
      kind: isBusKind(kind) ? kind : undefined,
      address: env[`${prefix}_ADDRESS`] || undefined,
      connectTimeoutMs: envInt(env, `${prefix}_CONNECT_TIMEOUT_MS`),
      activatable: envBool(env, `${prefix}_ACTIVATABLE`),
    }),
    calls: defined({
      timeoutMs: envInt(env, `${prefix}_TIMEOUT_MS`),
      maxInFlightPerService: envInt(env, `${prefix}_MAX_IN_FLIGHT`),
    }),
    signature: defined({ maxDepth: envInt(env, `${prefix}_MAX_DEPTH`) }),
    ui: defined({
      tickMs: envInt(env, `${prefix}_TICK_MS`),
      filter: env[`${prefix}_FILTER`] || undefined,
    }),
    log: defined({ file: env[`${prefix}_LOG_FILE`] || undefined }),
  };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): ConfigLayer {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new ConfigError(`Unsupported config file format: ${ext || "(none)"}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConfigError(`Cannot read ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return configFromObject(data);
}

type Section = Record<string, unknown>;

function isSection(u: unknown): u is Section {
  return typeof u === "object" && u !== null && !Array.isArray(u);
}

function section(data: Section, name: string): Section {
  const v = data[name];
  if (v === undefined) return {};
  if (!isSection(v)) throw new ConfigError(`${name} must be an object`);
  return v;
}

/** Read `camelCase`, falling back to `snake_case`. */
function field(sec: Section, camel: string): unknown {
  const snake = camel.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
  return sec[camel] ?? sec[snake];
}

function num(sec: Section, where: string, camel: string): number | undefined {
  const v = field(sec, camel);
  if (v === undefined) return undefined;
  if (typeof v !== "number" || !Number.isFinite(v)) throw new ConfigError(`${where}.${camel} must be a number`);
  return v;
}

function text(sec: Section, where: string, camel: string): string | undefined {
  const v = field(sec, camel);
  if (v === undefined) return undefined;
  if (typeof v !== "string") throw new ConfigError(`${where}.${camel} must be a string`);
  return v;
}

function flag(sec: Section, where: string, camel: string): boolean | undefined {
  const v = field(sec, camel);
  if (v === undefined) return undefined;
  if (typeof v !== "boolean") throw new ConfigError(`${where}.${camel} must be true or false`);
  return v;
}

/**
 * Create configuration from a plain object (e.g. parsed JSON).
 *
 * @throws ConfigError when a setting has the wrong type
 */
export function configFromObject(data: unknown): ConfigLayer {
  if (!isSection(data)) throw new ConfigError("config must be a JSON object");
  const bus = section(data, "bus");
  const calls = section(data, "calls");
  const signature = section(data, "signature");
  const ui = section(data, "ui");
  const log = section(data, "log");

  const kind = text(bus, "bus", "kind");
  if (kind !== undefined && !isBusKind(kind)) {
    throw new ConfigError(`bus.kind must be "session" or "system", got "${kind}"`);
  }

  return {
    bus: defined({
      kind,
      address: text(bus, "bus", "address"),
      connectTimeoutMs: num(bus, "bus", "connectTimeoutMs"),
      activatable: flag(bus, "bus", "activatable"),
    }),
    calls: defined({
      timeoutMs: num(calls, "calls", "timeoutMs"),
      maxInFlightPerService: num(calls, "calls", "maxInFlightPerService"),
    }),
    signature: defined({ maxDepth: num(signature, "signature", "maxDepth") }),
    ui: defined({ tickMs: num(ui, "ui", "tickMs"), filter: text(ui, "ui", "filter") }),
    log: defined({ file: text(log, "log", "file") }),
  };
}

/**
 * Merge layers over the defaults, later ones overriding earlier ones.
 */
export function mergeConfigs(...layers: ConfigLayer[]): BusLensConfig {
  const result: BusLensConfig = {
    bus: { ...DEFAULT_CONFIG.bus },
    calls: { ...DEFAULT_CONFIG.calls },
    signature: { ...DEFAULT_CONFIG.signature },
    ui: { ...DEFAULT_CONFIG.ui },
    log: { ...DEFAULT_CONFIG.log },
  };

  for (const layer of layers) {
    if (layer.bus) result.bus = { ...result.bus, ...layer.bus };
    if (layer.calls) result.calls = { ...result.calls, ...layer.calls };
    if (layer.signature) result.signature = { ...result.signature, ...layer.signature };
    if (layer.ui) result.ui = { ...result.ui, ...layer.ui };
    if (layer.log) result.log = { ...result.log, ...layer.log };
  }

  return result;
}

/**
 * Load configuration.
 * Priority: overrides (CLI) > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: ConfigLayer;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): BusLensConfig {
  const layers: ConfigLayer[] = [configFromEnv("BUSLENS", options?.env ?? process.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const defaultPath = path.join(options?.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
    if (fs.existsSync(defaultPath)) {
      layers.push(configFromFile(defaultPath));
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: BusLensConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  const positive: Array<[string, number]> = [
    ["bus.connectTimeoutMs", config.bus.connectTimeoutMs],
    ["calls.timeoutMs", config.calls.timeoutMs],
    ["calls.maxInFlightPerService", config.calls.maxInFlightPerService],
    ["ui.tickMs", config.ui.tickMs],
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value < 1) {
      errors.push(`${name} must be a positive integer, got ${value}`);
    }
  }

  const depth = config.signature.maxDepth;
  if (!Number.isInteger(depth) || depth < 1 || depth > 64) {
    errors.push(`signature.maxDepth must be between 1 and 64, got ${depth}`);
  }

  if (config.calls.timeoutMs >= 1 && config.calls.timeoutMs < 100) {
    warnings.push(`calls.timeoutMs of ${config.calls.timeoutMs}ms is very short; most replies will time out`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
