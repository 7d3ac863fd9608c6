import { parsePanel, slugFromPath } from "./panel.js";
import type { DiffResult } from "./protocol.js";
import type { RevisionSource } from "./source.js";

export function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function diffGenes(base: readonly string[], head: readonly string[]): DiffResult {
  const baseSet = new Set(base);
  const headSet = new Set(head);
  const added: string[] = [];
  const removed: string[] = [];

  for (const gene of headSet) {
    if (!baseSet.has(gene)) added.push(gene);
  }
  for (const gene of baseSet) {
    if (!headSet.has(gene)) removed.push(gene);
  }

  return { added: added.sort(compareCodeUnits), removed: removed.sort(compareCodeUnits) };
}

export function isEmptyDiff(diff: DiffResult): boolean {
  return diff.added.length === 0 && diff.removed.length === 0;
}

/** `null` stands for a file absent on that side. */
export function diffTexts(base: string | null, head: string | null, slug = "panel"): DiffResult {
  const baseGenes = base === null ? [] : parsePanel(base, slug).genes;
  const headGenes = head === null ? [] : parsePanel(head, slug).genes;
  return diffGenes(baseGenes, headGenes);
}

export type CompareOptions = { panelsDir: string; extension: string };

/**
 * Diffs every panel file changed between two refs. Files whose gene sets
 * are unchanged (comment or whitespace edits) are left out.
 */
export async function comparePanels(
  source: RevisionSource,
  baseRef: string,
  headRef: string,
  opts: CompareOptions,
): Promise<Map<string, DiffResult>> {
  const changed = await source.listChanged(baseRef, headRef, opts.panelsDir);
  const paths = changed.filter((p) => p.endsWith(opts.extension)).sort(compareCodeUnits);
  const diffs = new Map<string, DiffResult>();

  for (const p of paths) {
    const [base, head] = await Promise.all([source.fetchText(baseRef, p), source.fetchText(headRef, p)]);
    const diff = diffTexts(base, head, slugFromPath(p));
    if (!isEmptyDiff(diff)) diffs.set(p, diff);
  }

  return diffs;
}
