import { endsWithLineBreak, isComment, splitLines, stripBom } from "./panel.js";
import type { PanelFile, ValidationIssue, ValidationResult } from "./protocol.js";

type Seen = { token: string; line: number };

/**
 * Checks panel text against the formatting rules and collects every
 * violation. Nothing short-circuits: one report carries all problems.
 */
export function validatePanel(text: string): ValidationResult {
  const body = stripBom(text);
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  if (body.length > 0 && !endsWithLineBreak(body)) {
    errors.push({ kind: "FormatError", message: "file must end with a newline" });
  }

  const exact = new Map<string, number>();
  const folded = new Map<string, Seen>();
  const genes: string[] = [];

  splitLines(body).forEach((raw, idx) => {
    const line = idx + 1;
    const token = raw.trim();
    if (!token || isComment(token)) return;

    if (/\s/.test(token)) {
      errors.push({
        kind: "FormatError",
        message: `invalid entry '${token}' (contains whitespace)`,
        line,
        token,
      });
      return;
    }

    const firstExact = exact.get(token);
    const key = token.toLowerCase();
    const firstFolded = folded.get(key);
    if (firstExact !== undefined) {
      errors.push({
        kind: "DuplicateError",
        message: `duplicate gene '${token}' (first seen on line ${firstExact})`,
        line,
        firstLine: firstExact,
        token,
      });
    } else if (firstFolded) {
      warnings.push({
        kind: "DuplicateWarning",
        message: `gene '${token}' differs only in case from '${firstFolded.token}' on line ${firstFolded.line}`,
        line,
        firstLine: firstFolded.line,
        token,
      });
    }

    if (firstExact === undefined) exact.set(token, line);
    if (!firstFolded) folded.set(key, { token, line });
    genes.push(token);
  });

  if (!isCaseInsensitiveSorted(genes)) {
    errors.push({ kind: "OrderError", message: "genes must be sorted alphabetically (case-insensitive)" });
  }

  return { errors, warnings };
}

export function compareFolded(a: string, b: string): number {
  const ka = a.toLowerCase();
  const kb = b.toLowerCase();
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

export function isCaseInsensitiveSorted(genes: readonly string[]): boolean {
  const sorted = [...genes].sort(compareFolded);
  return sorted.every((gene, i) => gene === genes[i]);
}

export function validatePanels(files: readonly PanelFile[]): Array<{ path: string } & ValidationResult> {
  return files.map((f) => ({ path: f.path, ...validatePanel(f.content) }));
}

export function hasErrors(results: readonly ValidationResult[], strictCase = false): boolean {
  return results.some((r) => r.errors.length > 0 || (strictCase && r.warnings.length > 0));
}

export function formatIssue(path: string, issue: ValidationIssue): string {
  return issue.line === undefined ? `${path}: ${issue.message}` : `${path}:${issue.line}: ${issue.message}`;
}
