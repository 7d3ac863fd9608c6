import { compareCodeUnits, isEmptyDiff } from "./diff.js";
import type { DiffResult } from "./protocol.js";

export const NO_CHANGES = "No gene changes detected.";

function sortedList(genes: readonly string[]): string {
  return [...genes].sort(compareCodeUnits).join(", ");
}

/** Markdown summary of gene changes, one `## <file>` section per changed file. */
export function renderReport(diffs: ReadonlyMap<string, DiffResult>): string {
  const sections = [...diffs.entries()]
    .filter(([, diff]) => !isEmptyDiff(diff))
    .sort(([a], [b]) => compareCodeUnits(a, b))
    .map(([file, diff]) => {
      const lines = [`## ${file}`];
      if (diff.added.length > 0) lines.push(`Added: ${sortedList(diff.added)}`);
      if (diff.removed.length > 0) lines.push(`Removed: ${sortedList(diff.removed)}`);
      return lines.join("\n");
    });

  return sections.length > 0 ? sections.join("\n\n") : NO_CHANGES;
}

/** Pull-request body for a single panel edit. */
export function summarizeChange(slug: string, diff: DiffResult): string {
  return [
    `Automated update of panel \`${slug}\` via web editor.`,
    "",
    `Added genes: ${diff.added.length > 0 ? sortedList(diff.added) : "none"}`,
    `Removed genes: ${diff.removed.length > 0 ? sortedList(diff.removed) : "none"}`,
  ].join("\n");
}
