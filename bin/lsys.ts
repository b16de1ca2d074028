#!/usr/bin/env npx tsx
// bin/lsys.ts
// Print the generations of the built-in L-systems
//
// Run:  npx tsx bin/lsys.ts [options] [preset]

import { executeRun, getHelpText, listPresets, parseCliArgs, resolveConfig } from "./lsys-cli-lib";
import { isFail } from "../src/outcome/outcome";
import { allDiagnostics, type Failure } from "../src/outcome/failure";
import type { Diagnostic } from "../src/outcome/diagnostic";

function reportFailure(f: Failure): void {
  console.error(`lsys: ${f.message}`);
  for (const diag of allDiagnostics(f)) {
    console.error(`  ${diag.severity} ${diag.code}: ${diag.message}`);
  }
}

function reportWarnings(diagnostics: Diagnostic[] = []): void {
  for (const diag of diagnostics) {
    console.error(`lsys: ${diag.severity} ${diag.code}: ${diag.message}`);
  }
}

function main(): void {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return;
  }

  if (cliArgs.list) {
    for (const line of listPresets()) console.log(line);
    return;
  }

  const config = resolveConfig(cliArgs);
  if (isFail(config)) {
    reportFailure(config.failure);
    process.exitCode = 2;
    return;
  }
  reportWarnings(config.meta.diagnostics);

  const outcome = executeRun(config.value);
  if (isFail(outcome)) {
    reportFailure(outcome.failure);
    process.exitCode = 1;
    return;
  }

  for (const line of outcome.value) console.log(line);
}

main();
