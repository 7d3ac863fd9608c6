import { describe, expect, it } from "vitest";
import { NO_CHANGES, renderReport, summarizeChange } from "../src/report.js";

describe("renderReport", () => {
  it("prints the no-change message for an empty map", () => {
    expect(renderReport(new Map())).toBe("No gene changes detected.");
    expect(NO_CHANGES).toBe("No gene changes detected.");
  });

  it("writes one section per file, ordered by path", () => {
    const report = renderReport(
      new Map([
        ["panels/b.txt", { added: ["Z"], removed: [] }],
        ["panels/a.txt", { added: ["GAMMA", "DELTA"], removed: ["BETA"] }],
      ]),
    );
    expect(report).toBe("## panels/a.txt\nAdded: DELTA, GAMMA\nRemoved: BETA\n\n## panels/b.txt\nAdded: Z");
  });

  it("prints only the removed line when nothing was added", () => {
    expect(renderReport(new Map([["p.txt", { added: [], removed: ["MYH7", "ACTC1"] }]]))).toBe(
      "## p.txt\nRemoved: ACTC1, MYH7",
    );
  });

  it("skips files whose diff is empty", () => {
    expect(renderReport(new Map([["p.txt", { added: [], removed: [] }]]))).toBe(NO_CHANGES);
  });
});

describe("summarizeChange", () => {
  it("lists added and removed genes for a pull request", () => {
    expect(summarizeChange("cardio", { added: [], removed: ["MYH7"] })).toBe(
      "Automated update of panel `cardio` via web editor.\n\nAdded genes: none\nRemoved genes: MYH7",
    );
  });
});
