import readline from "node:readline";
import { errorMessage } from "./errors.js";
import { handleLine } from "./worker.js";

const rl = readline.createInterface({ input: process.stdin, crlfDelay: Infinity });

async function main() {
  for await (const line of rl) {
    if (!line.trim()) continue;
    process.stdout.write(JSON.stringify(handleLine(line)) + "\n");
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`panel worker stopped: ${errorMessage(err)}\n`);
  process.exitCode = 1;
});
