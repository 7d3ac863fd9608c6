import type { CliIO } from "../src/cli/io.js";
import type { Config } from "../src/config.js";
import type { PanelFile } from "../src/protocol.js";
import type { PanelStore, RevisionSource } from "../src/source.js";

export const testConfig: Config = { panelsDir: "panels", extension: ".txt", strictCase: false, gitBin: "git" };

export class MemoryPanelStore implements PanelStore {
  constructor(private readonly files: PanelFile[]) {}

  async list(): Promise<PanelFile[]> {
    return this.files;
  }
}

/** Files per ref; `changed` is what a `diff --name-only` between any two refs would list. */
export class MemoryRevisionSource implements RevisionSource {
  readonly listCalls: Array<[string, string, string]> = [];

  constructor(
    private readonly refs: Record<string, Record<string, string>>,
    private readonly changed: string[],
  ) {}

  async fetchText(ref: string, filePath: string): Promise<string | null> {
    return this.refs[ref]?.[filePath] ?? null;
  }

  async listChanged(baseRef: string, headRef: string, dir: string): Promise<string[]> {
    this.listCalls.push([baseRef, headRef, dir]);
    return this.changed;
  }
}

export function captureIO(): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: { write: (chunk: string) => out.push(chunk) },
    stderr: { write: (chunk: string) => err.push(chunk) },
  };
}
