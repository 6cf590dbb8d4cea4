// test/cli/minischeme.spec.ts
// Tests for the minischeme CLI argument handling

import { describe, it, expect } from "vitest";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  detectMode,
  buildConfig,
} from "../../bin/minischeme-cli-lib";

describe("minischeme CLI", () => {
  describe("Command-line argument parsing", () => {
    it("should default to REPL mode with no arguments", () => {
      expect(parseCliArgs([])).toEqual({ errors: [], mode: "repl" });
    });

    it("should parse --help and --version", () => {
      expect(parseCliArgs(["--help"]).help).toBe(true);
      expect(parseCliArgs(["-h"]).help).toBe(true);
      expect(parseCliArgs(["--version"]).version).toBe(true);
      expect(parseCliArgs(["-v"]).version).toBe(true);
    });

    it("should set exec mode when --eval is provided", () => {
      const parsed = parseCliArgs(["-e", "(+ 1 2)"]);
      expect(parsed.eval).toBe("(+ 1 2)");
      expect(parsed.mode).toBe("exec");
    });

    it("should keep an empty --eval", () => {
      const parsed = parseCliArgs(["--eval", ""]);
      expect(parsed.eval).toBe("");
      expect(parsed.errors).toEqual([]);
    });

    it("should parse config, scoping and switches together", () => {
      const parsed = parseCliArgs(["--scoping", "dynamic", "--verbose", "--no-banner", "-c", "my.yaml"]);
      expect(parsed).toEqual({
        errors: [],
        mode: "repl",
        scoping: "dynamic",
        verbose: true,
        noBanner: true,
        config: "my.yaml",
      });
    });

    it("should report a flag missing its value", () => {
      expect(parseCliArgs(["--eval"]).errors).toEqual(["--eval requires a value"]);
      expect(parseCliArgs(["--config"]).errors).toEqual(["--config requires a value"]);
    });

    it("should report bad scoping and unknown arguments", () => {
      expect(parseCliArgs(["--scoping", "static"]).errors).toEqual([
        "--scoping must be lexical or dynamic, got 'static'",
      ]);
      expect(parseCliArgs(["--unknown-flag", "file.scm"]).errors).toEqual([
        "Unknown argument: --unknown-flag",
        "Unknown argument: file.scm",
      ]);
    });
  });

  describe("Help text formatting", () => {
    it("should list every option", () => {
      const help = getHelpText();
      expect(help.startsWith("minischeme - ")).toBe(true);
      for (const flag of ["--help", "--version", "--eval", "--config", "--scoping", "--verbose", "--no-banner"]) {
        expect(help).toContain(flag);
      }
    });

    it("should include REPL commands", () => {
      const help = getHelpText();
      expect(help).toContain(":env");
      expect(help).toContain(":reset");
      expect(help).toContain(":quit");
    });
  });

  describe("Version display", () => {
    it("should read the package version", () => {
      expect(getVersion()).toBe("minischeme v0.1.0");
    });
  });

  describe("Mode detection", () => {
    it("should respect an explicit mode", () => {
      expect(detectMode({ mode: "repl" })).toBe("repl");
    });

    it("should infer exec from --eval", () => {
      expect(detectMode({ eval: "(+ 1 2)" })).toBe("exec");
      expect(detectMode({})).toBe("repl");
    });
  });

  describe("Configuration building", () => {
    it("should leave overrides unset by default", () => {
      expect(buildConfig({})).toEqual({ mode: "repl", overrides: { runtime: {}, repl: {} } });
    });

    it("should carry code and config file", () => {
      const config = buildConfig(parseCliArgs(["-e", "(* 2 3)", "-c", "x.json"]));
      expect(config.mode).toBe("exec");
      expect(config.code).toBe("(* 2 3)");
      expect(config.configFile).toBe("x.json");
    });

    it("should map switches onto overrides", () => {
      const config = buildConfig(parseCliArgs(["--scoping", "dynamic", "--verbose", "--no-banner"]));
      expect(config.overrides).toEqual({
        runtime: { scoping: "dynamic" },
        repl: { verbose: true, banner: false },
      });
    });

    it("should drop an invalid scoping", () => {
      expect(buildConfig({ scoping: "static" }).overrides.runtime?.scoping).toBeUndefined();
    });
  });
});
