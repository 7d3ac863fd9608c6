import type { Config } from "../config.js";
import { comparePanels } from "../diff.js";
import { PanelError, UsageError } from "../errors.js";
import { renderReport } from "../report.js";
import { GitRevisionSource, type RevisionSource } from "../source.js";
import type { CliIO } from "./io.js";

export const DIFF_USAGE = "Usage: panel-diff <base_ref> <head_ref>";

export type DiffDeps = {
  io: CliIO;
  config: Config;
  source?: RevisionSource;
};

export function parseDiffArgs(args: string[]): { baseRef: string; headRef: string } {
  const [baseRef, headRef] = args;
  if (args.length !== 2 || !baseRef || !headRef) throw new UsageError(DIFF_USAGE);
  return { baseRef, headRef };
}

export async function runDiff(args: string[], deps: DiffDeps): Promise<number> {
  const { io, config } = deps;
  try {
    const { baseRef, headRef } = parseDiffArgs(args);
    const source = deps.source ?? new GitRevisionSource(config.gitBin);
    const diffs = await comparePanels(source, baseRef, headRef, {
      panelsDir: config.panelsDir,
      extension: config.extension,
    });
    io.stdout.write(`${renderReport(diffs)}\n`);
    return 0;
  } catch (err) {
    if (err instanceof PanelError) {
      io.stderr.write(`${err.message}\n`);
      return 1;
    }
    throw err;
  }
}
