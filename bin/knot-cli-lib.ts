// bin/knot-cli-lib.ts
// Shared CLI utilities for the knot command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import type { PartialKnotConfig } from "../src/core/config/config";
import type { RunResult } from "../src/core/eval/run";
import type { Failure } from "../src/outcome/failure";
import { allDiagnostics } from "../src/outcome/failure";
import { formatDiagnostic } from "../src/outcome/diagnostic";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  eval?: string;
  file?: string;
  trace?: boolean;
  config?: string;
  entry?: string;
};

export type CliConfig = {
  /** Program source given with --eval */
  code?: string;
  file?: string;
  configFile?: string;
  overrides: PartialKnotConfig;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--trace" || arg === "-t") {
      result.trace = true;
    } else if (arg === "--eval" || arg === "-e") {
      result.eval = args[++i] || "";
    } else if (arg === "--config" || arg === "-c") {
      result.config = args[++i];
    } else if (arg === "--entry") {
      result.entry = args[++i];
    } else if (!arg.startsWith("-")) {
      // First non-flag argument is the file
      if (!result.file) {
        result.file = arg;
      }
    }
    // Ignore unknown flags
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
knot - run programs written in the Knot language

USAGE:
  knot [options] <file>              Run a Knot program
  knot --eval <source>               Run program source given inline

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -e, --eval <source>                Run source text instead of a file
  -t, --trace                        Print every parser attempt while parsing
  -c, --config <file>                Load configuration (.json, .yaml, .yml)
  --entry <name>                     Function to start from (default: main)

ENVIRONMENT:
  KNOT_TRACE                         1/true/yes turns the parser trace on
  KNOT_ENTRY                         Entry function name
  KNOT_MAX_CALL_DEPTH                Nested call limit

EXAMPLES:
  knot examples/fact.knot
  knot --eval "fn main() { return 2 + 3 * 4; }"
  knot --trace --entry start program.knot
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
      return `knot-lang v${pkg.version}`;
    }
    return "knot-lang v0.1.0";
  } catch {
    return "knot-lang v0.1.0";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function buildConfig(args: Partial<CliArgs>): CliConfig {
  const overrides: PartialKnotConfig = {};
  if (args.trace) {
    overrides.parser = { trace: true };
  }
  if (args.entry) {
    overrides.runtime = { entry: args.entry };
  }

  const config: CliConfig = { overrides };

  if (args.eval !== undefined) {
    config.code = args.eval;
  } else if (args.file) {
    config.file = args.file;
  }

  if (args.config) {
    config.configFile = args.config;
  }

  return config;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RESULT FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

export function formatResult(entry: string, result: RunResult): string {
  return result.value === undefined
    ? `${entry}() returned no value`
    : `${entry}() returned: ${result.value}`;
}

/** One line per diagnostic; the bare message when there is none. */
export function formatFailure(f: Failure): string[] {
  const diagnostics = allDiagnostics(f);
  if (diagnostics.length === 0) {
    return [`error: ${f.message}`];
  }
  return diagnostics.map((d) => `error ${formatDiagnostic(d)}`);
}
