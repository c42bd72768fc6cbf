#!/usr/bin/env node
import { ConfigError } from "../config/config.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { buildProgram } from "./program.js";

const log = createSubsystemLogger("cli");

try {
  await buildProgram().parseAsync(process.argv);
} catch (err) {
  if (err instanceof ConfigError) {
    process.stderr.write(`${err.message}\n`);
  } else {
    log.error(`Harvest failed: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}`);
  }
  process.exitCode = 1;
}
