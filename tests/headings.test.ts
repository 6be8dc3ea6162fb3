import { describe, it, expect, beforeEach } from "vitest";
import { MapErrorRegistry } from "../src/lib/error-registry.js";
import { buildHeadingTree, headingLevel, selectHeadings, validateHeadings } from "../src/lib/headings.js";
import { parseSnapshot } from "../src/lib/parse.js";
import { flattenTree } from "../src/lib/tree.js";
import type { HeadingNode, StructureDocument } from "../src/lib/types.js";

function outline(html: string): { doc: StructureDocument; tree: HeadingNode[] } {
  const doc = parseSnapshot(html);
  return { doc, tree: buildHeadingTree(selectHeadings(doc)) };
}

function depth(nodes: HeadingNode[]): number {
  return nodes.reduce((max, n) => Math.max(max, 1 + depth(n.children)), 0);
}

function skips(tree: HeadingNode[]): Array<[string, number]> {
  return flattenTree(tree).map((n): [string, number] => [n.label, n.skippedLevels]);
}

describe("headingLevel", () => {
  it("reads the level from the tag", () => {
    const doc = parseSnapshot("<h4>Four</h4>");
    expect(headingLevel(doc.select("h4")[0])).toBe(4);
  });

  it("prefers a valid aria-level on role=heading", () => {
    const doc = parseSnapshot('<div role="heading" aria-level="2">Two</div><h3 role="heading" aria-level="5">Five</h3>');
    expect(headingLevel(doc.select("div")[0])).toBe(2);
    expect(headingLevel(doc.select("h3")[0])).toBe(5);
  });

  it("accepts only a single-digit aria-level", () => {
    const doc = parseSnapshot(
      '<div role="heading" aria-level="2.0">A</div><p role="heading" aria-level=" 2e0">B</p><span role="heading" aria-level=" 3 ">C</span>'
    );
    expect(headingLevel(doc.select("div")[0])).toBe(0);
    expect(headingLevel(doc.select("p")[0])).toBe(0);
    expect(headingLevel(doc.select("span")[0])).toBe(3);
    expect(selectHeadings(doc).map((el) => el.tagName)).toEqual(["span"]);
  });

  it("ignores an out-of-range aria-level", () => {
    const doc = parseSnapshot('<div role="heading" aria-level="9">Nine</div>');
    expect(headingLevel(doc.select("div")[0])).toBe(0);
    expect(selectHeadings(doc)).toEqual([]);
  });
});

describe("buildHeadingTree", () => {
  it("nests a gapless chain one level per heading", () => {
    const { tree } = outline("<h1>A</h1><h2>B</h2><h3>C</h3><h4>D</h4>");
    expect(depth(tree)).toBe(4);
    expect(skips(tree)).toEqual([
      ["A", 0],
      ["B", 0],
      ["C", 0],
      ["D", 0],
    ]);
  });

  it("attaches siblings and returns to shallower levels", () => {
    const { tree } = outline("<h1>A</h1><h2>B</h2><h2>C</h2><h1>D</h1>");
    expect(tree.map((n) => n.label)).toEqual(["A", "D"]);
    expect(tree[0].children.map((n) => n.label)).toEqual(["B", "C"]);
  });

  it("flags h3 directly under h1 with one skipped level", () => {
    const { tree } = outline("<h1>Title</h1><h3>Deep</h3>");
    expect(tree).toHaveLength(1);
    expect(tree[0].children).toHaveLength(1);
    expect(tree[0].children[0].level).toBe(3);
    expect(tree[0].children[0].skippedLevels).toBe(1);
  });

  it("flags every repetition of a skipping pattern", () => {
    const { tree } = outline("<h1>A</h1><h3>B</h3><h1>C</h1><h3>D</h3>");
    expect(skips(tree)).toEqual([
      ["A", 0],
      ["B", 1],
      ["C", 0],
      ["D", 1],
    ]);
  });

  it("flags a sibling that repeats a recorded skip without skipping itself", () => {
    const { tree } = outline("<h1>A</h1><h3>B</h3><h3>C</h3>");
    expect(skips(tree)).toEqual([
      ["A", 0],
      ["B", 1],
      ["C", 1],
    ]);
  });

  it("uses the visual skip count for repeated pairs", () => {
    // The second h4 has no direct skip but repeats the recorded (1, 4) pair.
    const { tree } = outline("<h1>A</h1><h4>B</h4><h4>C</h4>");
    expect(skips(tree)).toEqual([
      ["A", 0],
      ["B", 2],
      ["C", 2],
    ]);
  });

  it("does not flag a heading whose parent pair never skipped", () => {
    const { tree } = outline("<h1>A</h1><h2>B</h2><h4>C</h4><h3>D</h3>");
    expect(skips(tree)).toEqual([
      ["A", 0],
      ["B", 0],
      ["C", 1],
      ["D", 0],
    ]);
    expect(tree[0].children[0].children.map((n) => n.label)).toEqual(["C", "D"]);
  });

  it("treats a first heading below level 1 as a skip from the document", () => {
    const { tree } = outline("<h2>Start</h2><h2>Next</h2>");
    expect(skips(tree)).toEqual([
      ["Start", 1],
      ["Next", 1],
    ]);
  });

  it("returns an empty tree for no headings", () => {
    expect(outline("<p>Plain</p>").tree).toEqual([]);
  });
});

describe("validateHeadings", () => {
  let registry: MapErrorRegistry;

  beforeEach(() => {
    registry = new MapErrorRegistry();
  });

  function validate(html: string) {
    const { doc, tree } = outline(html);
    validateHeadings(tree, doc.root, registry);
    return { doc, tree, nodes: flattenTree(tree) };
  }

  it("reports a missing h1 once, on the document root", () => {
    const { doc } = validate("<p>No headings</p>");
    expect(registry.get(doc.root).map((f) => f.ruleId)).toEqual(["headings/missing-h1"]);
    expect(registry.getAggregatedByTag("headings")).toEqual([
      { ruleId: "headings/missing-h1", severity: "error", tag: "headings", count: 1 },
    ]);
  });

  it("attaches the multiple-h1 warning to every h1", () => {
    const { nodes } = validate("<h1>A</h1><h1>B</h1><h1>C</h1>");
    for (const n of nodes) {
      expect(registry.get(n.element)).toEqual([
        { ruleId: "headings/multiple-h1", severity: "warning", tag: "headings" },
      ]);
    }
  });

  it("reports empty headings", () => {
    const { nodes } = validate("<h1>Title</h1><h2>   </h2>");
    expect(registry.get(nodes[0].element)).toEqual([]);
    expect(registry.get(nodes[1].element).map((f) => f.ruleId)).toEqual(["headings/empty-heading"]);
  });

  it("reports exactly one skipped level for [h1, h3] on the h3", () => {
    const { nodes } = validate("<h1>Title</h1><h3>Deep</h3>");
    expect(registry.get(nodes[1].element).map((f) => f.ruleId)).toEqual(["headings/skipped-level"]);
    expect(registry.getAggregatedByTag("headings")).toEqual([
      { ruleId: "headings/skipped-level", severity: "error", tag: "headings", count: 1 },
    ]);
  });

  it("keeps detecting other defects next to a bad heading", () => {
    const { nodes } = validate("<h1>A</h1><h3></h3><h2>C</h2>");
    expect(registry.get(nodes[1].element).map((f) => f.ruleId)).toEqual([
      "headings/empty-heading",
      "headings/skipped-level",
    ]);
    expect(registry.get(nodes[2].element)).toEqual([]);
  });
});
