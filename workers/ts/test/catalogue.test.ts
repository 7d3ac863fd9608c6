import { describe, expect, it } from "vitest";
import { buildCatalogue, searchPanels, titleFromSlug } from "../src/catalogue.js";

const files = [
  { path: "panels/hereditary_cancer.txt", content: "ATM\nBRCA1\nBRCA2\n" },
  { path: "panels/cardio.txt", content: "# title: Cardiomyopathy Core\nMYH7\nTNNT2\n" },
];

describe("buildCatalogue", () => {
  it("lists panels by slug with titles and gene counts", () => {
    expect(buildCatalogue(files)).toEqual([
      { slug: "cardio", title: "Cardiomyopathy Core", geneCount: 2, metadata: [["title", "Cardiomyopathy Core"]] },
      { slug: "hereditary_cancer", title: "Hereditary Cancer", geneCount: 3, metadata: [] },
    ]);
  });

  it("derives a title from the slug", () => {
    expect(titleFromSlug("long_qt_syndrome")).toBe("Long Qt Syndrome");
  });

  it("capitalises letters after hyphens and digits", () => {
    expect(titleFromSlug("x-linked_id")).toBe("X-Linked Id");
    expect(titleFromSlug("panel2b")).toBe("Panel2B");
    expect(titleFromSlug("BRCA_only")).toBe("Brca Only");
  });
});

describe("searchPanels", () => {
  it("matches genes case-insensitively and exactly", () => {
    const result = searchPanels(files, "brca1");
    expect(result.geneMatches.map((p) => p.slug)).toEqual(["hereditary_cancer"]);
    expect(result.nameMatches).toEqual([]);
    expect(searchPanels(files, "BRCA").geneMatches).toEqual([]);
  });

  it("matches panel names against slug and title", () => {
    expect(searchPanels(files, "cancer").nameMatches.map((p) => p.slug)).toEqual(["hereditary_cancer"]);
    expect(searchPanels(files, "core").nameMatches.map((p) => p.slug)).toEqual(["cardio"]);
  });

  it("returns nothing for a blank query", () => {
    expect(searchPanels(files, "   ")).toEqual({ geneMatches: [], nameMatches: [] });
  });
});
