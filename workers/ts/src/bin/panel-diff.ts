#!/usr/bin/env node
import { runDiff } from "../cli/diff.js";
import { processIO } from "../cli/io.js";
import { loadConfig } from "../config.js";
import { errorMessage } from "../errors.js";

try {
  process.exitCode = await runDiff(process.argv.slice(2), { io: processIO, config: loadConfig() });
} catch (err) {
  process.stderr.write(`${errorMessage(err)}\n`);
  process.exitCode = 1;
}
