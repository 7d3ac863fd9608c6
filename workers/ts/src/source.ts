import { execFile } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";
import util from "node:util";
import { SourceError, errorMessage } from "./errors.js";
import type { PanelFile } from "./protocol.js";

const execFileAsync = util.promisify(execFile);

/**
 * True for a child that ran and exited with a status, which is how
 * `git show` reports a path absent at a ref. Spawn failures carry a string
 * code, and killed or overflowing children have no numeric one.
 */
export function isNonZeroExit(err: unknown): boolean {
  return err instanceof Error && "code" in err && typeof err.code === "number" && err.code !== 0;
}

/** Text of panel files at points in version-control history. */
export interface RevisionSource {
  /** Resolves `null` when the path does not exist at `ref`. */
  fetchText(ref: string, filePath: string): Promise<string | null>;
  listChanged(baseRef: string, headRef: string, dir: string): Promise<string[]>;
}

/** The current panel files under one root. */
export interface PanelStore {
  list(): Promise<PanelFile[]>;
}

export class DirectoryPanelStore implements PanelStore {
  constructor(private readonly root: string, private readonly extension: string) {}

  async list(): Promise<PanelFile[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.root);
    } catch (err) {
      throw new SourceError(`Panels directory not found at ${this.root}`, err);
    }
    const files: PanelFile[] = [];
    for (const name of names.filter((n) => n.endsWith(this.extension)).sort()) {
      const full = path.join(this.root, name);
      files.push({ path: full, content: await fs.readFile(full, "utf8") });
    }
    return files;
  }
}

export class GitRevisionSource implements RevisionSource {
  constructor(private readonly gitBin = "git", private readonly cwd = process.cwd()) {}

  async fetchText(ref: string, filePath: string): Promise<string | null> {
    try {
      const { stdout } = await this.git(["show", `${ref}:${filePath}`]);
      return stdout;
    } catch (err) {
      if (isNonZeroExit(err)) return null;
      throw new SourceError(`Error running git show ${ref}:${filePath}: ${errorMessage(err)}`, err);
    }
  }

  async listChanged(baseRef: string, headRef: string, dir: string): Promise<string[]> {
    try {
      const { stdout } = await this.git(["diff", "--name-only", baseRef, headRef, "--", dir]);
      return stdout.split("\n").filter((line) => line.length > 0);
    } catch (err) {
      throw new SourceError(`Error running git diff: ${errorMessage(err)}`, err);
    }
  }

  private git(args: string[]) {
    return execFileAsync(this.gitBin, args, { cwd: this.cwd, encoding: "utf8", maxBuffer: 64 * 1024 * 1024 });
  }
}
