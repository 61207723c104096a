#!/usr/bin/env npx tsx
// bin/buslens.ts
// Interactive D-Bus explorer
//
// Run:  npx tsx bin/buslens.ts [session|system] [options]

import * as readline from "readline";
import { parseCliArgs, getHelpText, getVersion, buildConfig, openTraceSink } from "./buslens-cli-lib";
import type { BusLensConfig } from "../src/core/config";
import { ConfigError, loadConfig, validateConfig } from "../src/core/config";
import type { BusPort } from "../src/ports/bus";
import type { TraceSink } from "../src/ports/types";
import { connectBus } from "../src/adapters/dbus-next/bus";
import { createDemoBus } from "../src/adapters/demoBus";
import { loggingBus } from "../src/adapters/logging";
import { BusSession } from "../src/core/session";
import { errorMessage } from "../src/errors";
import { createShellState, processCommand } from "../src/repl/commands";
import type { ShellContext } from "../src/repl/commands";
import { renderEvent } from "../src/repl/render";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.error) {
    console.error(`buslens: ${cliArgs.error}`);
    console.error("Try buslens --help");
    process.exit(2);
  }

  if (cliArgs.help) {
    console.log(getHelpText());
    process.exit(0);
  }

  if (cliArgs.version) {
    console.log(getVersion());
    process.exit(0);
  }

  const config = readConfig(cliArgs.configFile, buildConfig(cliArgs));
  const trace = openTrace(config.log.file);

  let session: BusSession | undefined;
  const bus = await openBus(config, cliArgs.demo === true, trace, (detail) => {
    session?.notice(`bus error: ${detail}`);
  });

  session = new BusSession({
    bus: config.log.file ? loggingBus(bus, trace) : bus,
    trace,
    timeoutMs: config.calls.timeoutMs,
    maxInFlightPerService: config.calls.maxInFlightPerService,
    maxDepth: config.signature.maxDepth,
    includeActivatable: config.bus.activatable,
    filter: config.ui.filter,
  });

  await shell(session, config);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SETUP
// ═══════════════════════════════════════════════════════════════════════════════

function readConfig(configFile: string | undefined, overrides: ReturnType<typeof buildConfig>): BusLensConfig {
  let config: BusLensConfig;
  try {
    config = loadConfig({ configFile, overrides });
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(`buslens: ${e.message}`);
      process.exit(2);
    }
    throw e;
  }

  const validation = validateConfig(config);
  for (const warning of validation.warnings) console.warn(`warning: ${warning}`);
  if (!validation.valid) {
    for (const error of validation.errors) console.error(`buslens: ${error}`);
    process.exit(2);
  }
  return config;
}

function openTrace(file: string | undefined): TraceSink {
  try {
    return openTraceSink(file);
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(`buslens: ${e.message}`);
      process.exit(2);
    }
    throw e;
  }
}

async function openBus(
  config: BusLensConfig,
  demo: boolean,
  trace: TraceSink,
  onError: (detail: string) => void
): Promise<BusPort> {
  if (demo) {
    const bus = createDemoBus();
    trace.emit({ tag: "E_Connect", bus: bus.label, ok: true });
    return bus;
  }

  const label = config.bus.address ?? config.bus.kind;
  try {
    const bus = await connectBus({
      kind: config.bus.kind,
      address: config.bus.address,
      timeoutMs: config.bus.connectTimeoutMs,
      onError,
    });
    trace.emit({ tag: "E_Connect", bus: label, ok: true });
    return bus;
  } catch (e) {
    trace.emit({ tag: "E_Connect", bus: label, ok: false, error: errorMessage(e) });
    console.error(`buslens: ${errorMessage(e)}`);
    process.exit(1);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL
// ═══════════════════════════════════════════════════════════════════════════════

/** Apply finished work until nothing is running or waiting. */
async function drain(session: BusSession): Promise<void> {
  do {
    await session.settled();
    session.tick();
  } while (session.inFlight > 0 || session.queued > 0);
}

async function shell(session: BusSession, config: BusLensConfig): Promise<void> {
  const ctx: ShellContext = {
    session,
    state: createShellState(),
    nowMs: () => Date.now(),
    log: (message) => console.log(message),
  };

  const isTTY = process.stdin.isTTY;

  // ─────────────────────────────────────────────────────────────────
  // Piped input: one command at a time, each run to completion
  // ─────────────────────────────────────────────────────────────────
  if (!isTTY) {
    session.onEvent((event) => {
      for (const line of renderEvent(event)) console.log(line);
    });
    session.refreshServices();
    await drain(session);

    const rl = readline.createInterface({ input: process.stdin });
    try {
      for await (const line of rl) {
        const trimmed = line.trim();
        if (trimmed === "" || trimmed.startsWith("#")) continue;
        const { shouldExit } = processCommand(trimmed, ctx);
        if (shouldExit) break;
        await drain(session);
      }
    } finally {
      rl.close();
      process.stdin.pause();
    }
    await session.close();
    return;
  }

  // ─────────────────────────────────────────────────────────────────
  // Interactive mode
  // ─────────────────────────────────────────────────────────────────
  console.log(`buslens on the ${session.bus.label} bus. Type :help for commands.`);

  const prompt = () => (ctx.state.service ? `${ctx.state.service}:${ctx.state.path}> ` : "buslens> ");
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: prompt(),
  });

  session.onEvent((event) => {
    readline.clearLine(process.stdout, 0);
    readline.cursorTo(process.stdout, 0);
    for (const line of renderEvent(event)) console.log(line);
    rl.prompt(true);
  });

  const ticker = setInterval(() => session.tick(), config.ui.tickMs);
  session.refreshServices();
  rl.prompt();

  let closing = false;
  const exit = () => {
    if (closing) return;
    closing = true;
    clearInterval(ticker);
    session.close().then(
      () => process.exit(0),
      (e: unknown) => {
        console.error(`buslens: ${errorMessage(e)}`);
        process.exit(1);
      }
    );
  };

  rl.on("line", (line) => {
    const { shouldExit } = processCommand(line, ctx);
    if (shouldExit) {
      rl.close();
      return;
    }
    rl.setPrompt(prompt());
    rl.prompt();
  });

  rl.on("close", () => {
    console.log("\nGoodbye!");
    exit();
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

main().catch((error: unknown) => {
  console.error("Fatal error:", errorMessage(error));
  process.exit(1);
});
