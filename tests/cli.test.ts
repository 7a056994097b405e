/**
 * Tests for the variant-name CLI
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { HELP_TEXT, parseArgs, runCli } from "../src/cli/index.js";
import type { CliIO } from "../src/cli/expand.js";
import { CONSTABLE, POINT } from "./fixtures.js";

// ============================================================================
// Test Helpers
// ============================================================================

interface CapturedIO extends CliIO {
  out: string[];
  err: string[];
}

function captureIO(): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  };
}

let dir: string;

function writeFixture(name: string, content: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content, "utf-8");
  return file;
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "variant-name-cli-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

// ============================================================================
// Argument parsing
// ============================================================================

describe("parseArgs", () => {
  it("shows help without arguments", () => {
    expect(parseArgs([])).toEqual({ kind: "help" });
    expect(parseArgs(["--help"])).toEqual({ kind: "help" });
    expect(parseArgs(["expand", "a.ts", "-h"])).toEqual({ kind: "help" });
  });

  it("parses every option", () => {
    expect(
      parseArgs(["expand", "a.ts", "--diff", "-o", "b.ts", "-v", "--no-color"]),
    ).toEqual({
      kind: "run",
      options: {
        file: "a.ts",
        check: false,
        diff: true,
        out: "b.ts",
        verbose: true,
        colors: false,
      },
    });
  });

  it("marks the check command", () => {
    const parsed = parseArgs(["check", "a.ts"]);

    expect(parsed).toMatchObject({ kind: "run", options: { check: true } });
  });

  it("rejects unknown commands", () => {
    expect(parseArgs(["frob"])).toEqual({
      kind: "error",
      message: "Unknown command: frob\nUsage: variant-name <expand|check> <file> [options]",
    });
  });

  it("rejects malformed arguments", () => {
    expect(parseArgs(["expand"])).toEqual({
      kind: "error",
      message: "expand requires a file argument: variant-name expand <file>",
    });
    expect(parseArgs(["expand", "a.ts", "--out"])).toEqual({
      kind: "error",
      message: "--out requires a file argument",
    });
    expect(parseArgs(["check", "a.ts", "--bogus"])).toEqual({
      kind: "error",
      message: "Unknown option: --bogus",
    });
    expect(parseArgs(["check", "a.ts", "b.ts"])).toEqual({
      kind: "error",
      message: "Unexpected argument: b.ts",
    });
  });
});

// ============================================================================
// Commands
// ============================================================================

describe("runCli", () => {
  it("prints help", () => {
    const io = captureIO();

    expect(runCli(["--help"], io)).toBe(0);
    expect(io.out).toEqual([HELP_TEXT]);
  });

  it("prints argument errors to stderr", () => {
    const io = captureIO();

    expect(runCli(["expand"], io)).toBe(1);
    expect(io.err).toEqual([
      "expand requires a file argument: variant-name expand <file>",
    ]);
  });

  it("prints the expanded file", () => {
    const file = writeFixture("constable.ts", CONSTABLE);
    const io = captureIO();

    expect(runCli(["expand", file], io)).toBe(0);
    expect(io.err).toEqual([]);
    expect(io.out).toHaveLength(1);
    expect(io.out[0]).toContain("export namespace Constable {");
    expect(io.out[0]).toContain('export const NAME = "Beta";');
  });

  it("summarizes a check", () => {
    const file = writeFixture("constable.ts", CONSTABLE);
    const io = captureIO();

    expect(runCli(["check", file], io)).toBe(0);
    expect(io.out).toEqual([`${file}: 1 expanded, 1 folded`]);
  });

  it("writes the expanded file with --out", () => {
    const file = writeFixture("constable.ts", CONSTABLE);
    const out = path.join(dir, "constable.expanded.ts");
    const io = captureIO();

    expect(runCli(["expand", file, "--out", out], io)).toBe(0);
    expect(io.out).toEqual([`Wrote ${out}`]);
    expect(fs.readFileSync(out, "utf-8")).toContain("export namespace Constable {");
  });

  it("shows a line diff", () => {
    const file = writeFixture("constable.ts", CONSTABLE);
    const io = captureIO();

    expect(runCli(["expand", file, "--diff", "--no-color"], io)).toBe(0);
    expect(io.out.slice(0, 2)).toEqual([
      `--- ${file} (original)`,
      `+++ ${file} (expanded)`,
    ]);
    expect(io.out[2]).toMatch(/^@@ -\d+,\d+ \+\d+,\d+ @@$/);
    expect(io.out).toContain('+ export const NAME = "Beta";');
  });

  it("reports an unchanged file in the diff", () => {
    const file = writeFixture("plain.ts", "export const x = 1;\n");
    const io = captureIO();

    expect(runCli(["expand", file, "--diff"], io)).toBe(0);
    expect(io.out).toEqual([
      `--- ${file} (original)`,
      `+++ ${file} (expanded)`,
      "(no changes)",
    ]);
  });

  it("fails with rendered diagnostics on an invalid target", () => {
    const file = writeFixture("point.ts", POINT);
    const io = captureIO();

    expect(runCli(["check", file, "--no-color"], io)).toBe(1);
    expect(io.out).toEqual([]);
    expect(io.err).toHaveLength(1);

    const lines = io.err[0].split("\n");
    expect(lines[0]).toBe(
      "error[VN9001]: @derive VariantName is only applicable to sum types: `Point` is an interface",
    );
    expect(lines[1]).toBe(`  --> ${file}:2:11`);
    expect(lines[lines.length - 1]).toBe("1 error generated");
  });

  it("prints warnings without failing", () => {
    const file = writeFixture(
      "unknown.ts",
      `/** @derive Unknown */\nexport type T = { kind: "a" } | { kind: "b" };\n`,
    );
    const io = captureIO();

    expect(runCli(["check", file, "--no-color"], io)).toBe(0);
    expect(io.err[0].split("\n").pop()).toBe("1 warning generated");
    expect(io.out).toEqual([`${file}: 0 expanded, 0 folded`]);
  });

  it("fails on a missing file", () => {
    const missing = path.join(dir, "missing.ts");
    const io = captureIO();

    expect(runCli(["expand", missing], io)).toBe(1);
    expect(io.err).toEqual([`File not found: ${missing}`]);
  });

  it("fails on invalid configuration next to the file", () => {
    writeFixture(".variantnamerc.json", JSON.stringify({ fold: "sometimes" }));
    const file = writeFixture("constable.ts", CONSTABLE);
    const io = captureIO();

    expect(runCli(["expand", file], io)).toBe(1);
    expect(io.err).toEqual([
      `Configuration error: fold must be a boolean (in ${path.join(dir, ".variantnamerc.json")})`,
    ]);
  });

  it("applies configuration found next to the file", () => {
    writeFixture(".variantnamerc.json", JSON.stringify({ fold: false }));
    const file = writeFixture("constable.ts", CONSTABLE);
    const io = captureIO();

    expect(runCli(["check", file], io)).toBe(0);
    expect(io.out).toEqual([`${file}: 1 expanded, 0 folded`]);
  });

  it("logs expansions with --verbose", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const file = writeFixture("constable.ts", CONSTABLE);
    const io = captureIO();

    expect(runCli(["check", file, "--verbose"], io)).toBe(0);
    expect(log).toHaveBeenCalledWith(
      "[variant-name] @variantName on Constable: Alpha, Beta { .. }",
    );
  });
});
