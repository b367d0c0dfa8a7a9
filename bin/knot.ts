#!/usr/bin/env npx tsx
// bin/knot.ts
// Knot CLI: parse and run a program, print its output and the entry function's result.
//
// Run:  npx tsx bin/knot.ts [options] <file>

import * as fs from "fs";
import { parseCliArgs, getHelpText, getVersion, buildConfig, formatResult, formatFailure } from "./knot-cli-lib";
import { loadConfig, validateConfig } from "../src/core/config/config";
import { consoleOutput } from "../src/ports/output";
import { KnotRuntime } from "../src/runtime";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

function main(): number {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return 0;
  }

  if (cliArgs.version) {
    console.log(getVersion());
    return 0;
  }

  const cli = buildConfig(cliArgs);

  let source: string;
  if (cli.code !== undefined) {
    source = cli.code;
  } else if (cli.file) {
    if (!fs.existsSync(cli.file)) {
      console.error(`File not found: ${cli.file}`);
      return 1;
    }
    source = fs.readFileSync(cli.file, "utf8");
  } else {
    console.error(getHelpText());
    return 1;
  }

  const config = loadConfig({ configFile: cli.configFile, overrides: cli.overrides });
  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    console.error(`warning: ${warning}`);
  }
  if (!validation.valid) {
    for (const error of validation.errors) {
      console.error(`config error: ${error}`);
    }
    return 1;
  }

  const runtime = new KnotRuntime({ config, output: consoleOutput, file: cli.file });
  const result = runtime.runSource(source);

  if (result.tag === "Fail") {
    for (const line of formatFailure(result.failure)) {
      console.error(line);
    }
    return 1;
  }

  console.log(formatResult(config.runtime.entry, result.value));
  return 0;
}

try {
  process.exitCode = main();
} catch (error) {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
