import type { Config } from "../config.js";
import { PanelError } from "../errors.js";
import type { PanelFile } from "../protocol.js";
import { DirectoryPanelStore, type PanelStore } from "../source.js";
import { formatIssue, hasErrors, validatePanels } from "../validate.js";
import type { CliIO } from "./io.js";

export const VALIDATE_USAGE = "Usage: panel-validate [panels_dir] [--strict-case]";

export type ValidateDeps = {
  io: CliIO;
  config: Config;
  store?: PanelStore;
};

/**
 * Validates every panel under the configured root. Warnings print first,
 * then errors; the exit code is 0 only when no file has an error.
 */
export async function runValidate(args: string[], deps: ValidateDeps): Promise<number> {
  const { io, config } = deps;
  const strictCase = config.strictCase || args.includes("--strict-case");
  const positional = args.filter((a) => !a.startsWith("--"));
  const unknown = args.filter((a) => a.startsWith("--") && a !== "--strict-case");
  if (positional.length > 1 || unknown.length > 0) {
    io.stderr.write(`${VALIDATE_USAGE}\n`);
    return 1;
  }

  const store = deps.store ?? new DirectoryPanelStore(positional[0] ?? config.panelsDir, config.extension);
  let files: PanelFile[];
  try {
    files = await store.list();
  } catch (err) {
    if (err instanceof PanelError) {
      io.stderr.write(`${err.message}\n`);
      return 1;
    }
    throw err;
  }

  const results = validatePanels(files);
  for (const r of results) {
    for (const w of r.warnings) io.stderr.write(`WARNING: ${formatIssue(r.path, w)}\n`);
  }
  for (const r of results) {
    for (const e of r.errors) io.stderr.write(`ERROR: ${formatIssue(r.path, e)}\n`);
  }

  if (hasErrors(results, strictCase)) return 1;
  io.stdout.write("All panels validated successfully.\n");
  return 0;
}
