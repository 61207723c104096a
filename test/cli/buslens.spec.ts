// test/cli/buslens.spec.ts
// Tests for the buslens command line

import { describe, it, expect } from "vitest";
import { parseCliArgs, getHelpText, getVersion, buildConfig, openTraceSink } from "../../bin/buslens-cli-lib";
import { ConfigError, mergeConfigs } from "../../src/core/config";
import { nullTraceSink } from "../../src/ports/sink";

describe("buslens CLI", () => {
  describe("Command-line argument parsing", () => {
    it("should parse --help and -v", () => {
      expect(parseCliArgs(["--help"]).help).toBe(true);
      expect(parseCliArgs(["-v"]).version).toBe(true);
    });

    it("should take the bus as a positional argument", () => {
      expect(parseCliArgs(["session"])).toEqual({ bus: "session" });
      expect(parseCliArgs([])).toEqual({});
    });

    it("should parse value flags", () => {
      const parsed = parseCliArgs([
        "system",
        "--filter",
        "login1",
        "--timeout",
        "1500",
        "--log",
        "trace.jsonl",
        "--address",
        "unix:path=/tmp/test-bus",
        "--activatable",
      ]);
      expect(parsed).toEqual({
        bus: "system",
        filter: "login1",
        timeoutMs: 1500,
        logFile: "trace.jsonl",
        address: "unix:path=/tmp/test-bus",
        activatable: true,
      });
    });

    it("should parse --demo and --config", () => {
      expect(parseCliArgs(["--demo", "--config", "lens.json"])).toEqual({ demo: true, configFile: "lens.json" });
    });

    it("should report a flag without its value", () => {
      expect(parseCliArgs(["--filter"]).error).toBe("--filter needs a value");
      expect(parseCliArgs(["--log", "--demo"]).error).toBe("--log needs a value");
    });

    it("should reject a bad timeout", () => {
      expect(parseCliArgs(["--timeout", "soon"]).error).toBe(
        "--timeout must be a positive number of milliseconds, got soon"
      );
      expect(parseCliArgs(["--timeout", "0"]).error).toBe(
        "--timeout must be a positive number of milliseconds, got 0"
      );
    });

    it("should reject unknown options and arguments", () => {
      expect(parseCliArgs(["--verbose"]).error).toBe("unknown option: --verbose");
      expect(parseCliArgs(["starbus"]).error).toBe('unexpected argument: starbus (expected "session" or "system")');
      expect(parseCliArgs(["session", "system"]).error).toBe("choose one bus, got both session and system");
    });

    it("should stop at the first error", () => {
      const parsed = parseCliArgs(["--verbose", "--demo"]);
      expect(parsed.error).toBe("unknown option: --verbose");
      expect(parsed.demo).toBeUndefined();
    });
  });

  describe("Help and version", () => {
    it("should start with the tool name", () => {
      expect(getHelpText().split("\n")[0]).toBe("buslens - interactive D-Bus explorer");
    });

    it("should list every flag", () => {
      const help = getHelpText();
      for (const flag of ["--address", "--filter", "--timeout", "--config", "--log", "--activatable", "--demo"]) {
        expect(help).toContain(flag);
      }
    });

    it("should report the package version", () => {
      expect(getVersion()).toBe("buslens v0.1.0");
    });
  });

  describe("Config building", () => {
    it("should add nothing when no settings are given", () => {
      expect(buildConfig({ demo: true })).toEqual({});
    });

    it("should map flags onto config sections", () => {
      expect(
        buildConfig({ bus: "session", activatable: true, timeoutMs: 800, filter: "example", logFile: "out.jsonl" })
      ).toEqual({
        bus: { kind: "session", activatable: true },
        calls: { timeoutMs: 800 },
        ui: { filter: "example" },
        log: { file: "out.jsonl" },
      });
    });

    it("should override lower layers when merged last", () => {
      const config = mergeConfigs({ bus: { kind: "system", connectTimeoutMs: 100 } }, buildConfig({ bus: "session" }));
      expect(config.bus).toEqual({ kind: "session", connectTimeoutMs: 100, activatable: false });
    });
  });

  describe("Trace file", () => {
    it("should not open anything without --log", () => {
      expect(openTraceSink(undefined)).toBe(nullTraceSink);
    });

    it("should report a log file it cannot open as a configuration error", () => {
      const file = "/nonexistent-buslens-dir/trace.jsonl";
      expect(() => openTraceSink(file)).toThrow(ConfigError);
      expect(() => openTraceSink(file)).toThrow(/^Cannot open log file \/nonexistent-buslens-dir\/trace\.jsonl: ENOENT/);
    });
  });
});
