import { describe, it, expect, beforeEach } from "vitest";
import { analyzeHtml } from "../src/lib/analyze.js";
import type { AnalysisResult } from "../src/lib/analyze.js";
import { diffResults } from "../src/lib/diff.js";
import { MapErrorRegistry } from "../src/lib/error-registry.js";
import {
  formatDiff,
  formatHeadingTree,
  formatLandmarkTree,
  formatResult,
  formatRuleTable,
} from "../src/lib/format.js";
import { RULES, getRuleLabel } from "../src/lib/rules.js";

let registry: MapErrorRegistry;

function run(html: string, types: Array<"headings" | "landmarks"> = ["headings", "landmarks"]): AnalysisResult {
  registry.clearAll();
  return analyzeHtml(html, types, registry);
}

beforeEach(() => {
  registry = new MapErrorRegistry();
});

describe("formatResult", () => {
  it("describes a skipped level with its element", () => {
    const output = formatResult(run("<h1>Title</h1><h3>Sub</h3>", ["headings"]));
    expect(output).toBe(
      [
        "Heading structure: 1 issue",
        "",
        "[ERROR] headings/skipped-level: Skipped heading level (1)",
        "   A heading skips one or more levels relative to its parent heading.",
        "   Element: h3:nth-of-type(1)",
        "   HTML: <h3>Sub</h3>",
      ].join("\n")
    );
  });

  it("prints document-level findings without a selector", () => {
    const output = formatResult(run("<main><h1>Title</h1></main><p>x</p>", ["headings", "landmarks"]));
    expect(output).toBe(
      ["Heading structure: no issues found.", "", "Landmark structure: no issues found."].join("\n")
    );

    const missing = formatResult(run("<p>x</p>", ["landmarks"]));
    expect(missing.split("\n")).toContain("   Element: (document)");
  });

  it("lists errors before warnings", () => {
    const output = formatResult(run("<h1>A</h1><h1>B</h1><h2></h2>", ["headings"]));
    const errorIdx = output.indexOf("headings/empty-heading");
    const warningIdx = output.indexOf("headings/multiple-h1");
    expect(errorIdx).toBeGreaterThan(-1);
    expect(errorIdx).toBeLessThan(warningIdx);
    expect(output.split("\n")[0]).toBe("Heading structure: 2 issues");
  });

  it("uses the requested locale", () => {
    const output = formatResult(run("<p>x</p>", ["landmarks"]), { locale: "de" });
    expect(output.split("\n")[0]).toBe("Landmark-Struktur: 1 Problem");
    expect(output).toContain("[FEHLER] landmarks/missing-main: Main-Landmark fehlt (1)");
  });

  it("appends outlines when asked", () => {
    const output = formatResult(run("<h1>Title</h1><h3>Sub</h3>", ["headings"]), { showTree: true });
    expect(output.endsWith(
      "Heading structure outline:\nH1 Title\n  H3 Sub (skips 1 level)  [headings/skipped-level]"
    )).toBe(true);
  });

  it("reports when nothing was analyzed", () => {
    expect(formatResult(run("<p>x</p>", []))).toBe("No structure types were analyzed.");
  });
});

describe("outline formatting", () => {
  it("marks empty headings", () => {
    const result = run("<h1>Title</h1><h2> </h2>", ["headings"]);
    expect(formatHeadingTree(result.trees.headings ?? [])).toBe(
      "H1 Title\n  H2 (empty)  [headings/empty-heading]"
    );
  });

  it("indents nested landmarks and quotes names", () => {
    const result = run('<header></header><main><nav aria-label="Crumbs"></nav></main>', ["landmarks"]);
    expect(formatLandmarkTree(result.trees.landmarks ?? [])).toBe(
      'banner\nmain\n  navigation "Crumbs"'
    );
  });

  it("handles empty trees", () => {
    expect(formatHeadingTree([])).toBe("(no headings)");
    expect(formatLandmarkTree([])).toBe("(no landmarks)");
  });

  it("translates outline placeholders", () => {
    const result = run("<h1>Title</h1><h3> </h3>", ["headings"]);
    expect(formatHeadingTree(result.trees.headings ?? [], "de")).toBe(
      "H1 Title\n  H3 (leer) (überspringt 1 Ebene)  [headings/empty-heading, headings/skipped-level]"
    );
    expect(formatHeadingTree([], "de")).toBe("(keine Überschriften)");
    expect(formatLandmarkTree([], "de")).toBe("(keine Landmarks)");
  });
});

describe("formatDiff", () => {
  it("shows fixed findings after a correction", () => {
    const before = run("<h2>A</h2>");
    const after = run("<h1>A</h1><main></main>");
    const output = formatDiff(diffResults(before, after));

    expect(output).toBe(
      [
        "Summary: 3 fixed, 0 new, 0 changed, 0 remaining",
        "",
        "FIXED:",
        "  - [ERROR] headings/missing-h1: Missing top-level heading",
        "  - [ERROR] headings/skipped-level: Skipped heading level",
        "  - [ERROR] landmarks/missing-main: Missing main landmark",
      ].join("\n")
    );
  });

  it("shows count changes and new findings", () => {
    const before = run("<h1>A</h1><main></main><h3>B</h3>");
    const after = run("<h1>A</h1><main></main><h3>B</h3><h1>C</h1><h3>D</h3>");
    const output = formatDiff(diffResults(before, after));

    expect(output).toContain("Summary: 0 fixed, 1 new, 1 changed, 0 remaining");
    expect(output).toContain("  - [ERROR] headings/skipped-level: Skipped heading level (1 → 2)");
    expect(output).toContain("  - [WARNING] headings/multiple-h1: Multiple top-level headings (1)");
  });
});

describe("rules", () => {
  it("falls back to the raw id for unknown rules", () => {
    expect(getRuleLabel("headings/not-a-rule")).toEqual({ title: "headings/not-a-rule", description: "" });
  });

  it("formats the rule table", () => {
    const output = formatRuleTable(RULES.filter((r) => r.ruleId === "headings/multiple-h1"));
    expect(output).toBe(
      "1 rule:\n  ID  |  Title  |  Severity  |  WCAG\n  ---|---|---|---\n" +
        "  headings/multiple-h1  |  Multiple top-level headings  |  warning  |  1.3.1"
    );
  });

  it("returns a message for an empty rule list", () => {
    expect(formatRuleTable([])).toBe("No rules match the specified filters.");
    expect(formatRuleTable([], "de")).toBe("Keine Regeln passen zu den Filtern.");
  });

  it("formats the rule table in German", () => {
    const output = formatRuleTable(
      RULES.filter((r) => r.tag === "landmarks" && r.severity === "warning"),
      "de"
    );
    expect(output.split("\n").slice(0, 2)).toEqual([
      "1 Regel:",
      "  ID  |  Titel  |  Schweregrad  |  WCAG",
    ]);
  });
});
