import { parsePanel, slugFromPath } from "./panel.js";
import type { PanelFile, PanelSnapshot, PanelSummary, SearchResult } from "./protocol.js";

/** Underscores become spaces; every run of letters starts with a capital. */
export function titleFromSlug(slug: string): string {
  return slug
    .replace(/_/g, " ")
    .toLowerCase()
    .replace(/[a-z]+/g, (word) => word[0].toUpperCase() + word.slice(1));
}

export function summarizePanel(snapshot: PanelSnapshot): PanelSummary {
  return {
    slug: snapshot.slug,
    title: snapshot.metadata.get("title") ?? titleFromSlug(snapshot.slug),
    geneCount: snapshot.genes.length,
    metadata: [...snapshot.metadata],
  };
}

function snapshotsOf(files: readonly PanelFile[]): PanelSnapshot[] {
  return files
    .map((f) => parsePanel(f.content, slugFromPath(f.path)))
    .sort((a, b) => (a.slug < b.slug ? -1 : a.slug > b.slug ? 1 : 0));
}

export function buildCatalogue(files: readonly PanelFile[]): PanelSummary[] {
  return snapshotsOf(files).map(summarizePanel);
}

export function searchPanels(files: readonly PanelFile[], query: string): SearchResult {
  const q = query.trim().toLowerCase();
  if (!q) return { geneMatches: [], nameMatches: [] };

  const geneMatches: PanelSummary[] = [];
  const nameMatches: PanelSummary[] = [];
  for (const snapshot of snapshotsOf(files)) {
    const summary = summarizePanel(snapshot);
    if (summary.slug.toLowerCase().includes(q) || summary.title.toLowerCase().includes(q)) {
      nameMatches.push(summary);
    }
    if (snapshot.genes.some((g) => g.toLowerCase() === q)) geneMatches.push(summary);
  }
  return { geneMatches, nameMatches };
}
