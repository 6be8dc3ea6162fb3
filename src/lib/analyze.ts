import type { ContentCache } from "./content-cache.js";
import type { ErrorRegistry } from "./error-registry.js";
import { buildHeadingTree, selectHeadings, validateHeadings } from "./headings.js";
import { buildLandmarkTree, selectLandmarks, validateLandmarks } from "./landmarks.js";
import type { GroupCounts } from "./landmarks.js";
import { parseSnapshot } from "./parse.js";
import { getCountPolicy } from "./rules.js";
import { attachFindings } from "./tree.js";
import type {
  AggregatedFinding,
  HeadingNode,
  LandmarkNode,
  RuleId,
  StructureDocument,
  StructureTag,
} from "./types.js";

export interface Occurrence {
  key: string;
  /** The finding belongs to the document as a whole. */
  isDocument: boolean;
  selector: string;
  html: string;
}

export interface AnalysisResult {
  trees: {
    headings?: HeadingNode[];
    landmarks?: LandmarkNode[];
  };
  aggregatedFindings: Partial<Record<StructureTag, AggregatedFinding[]>>;
  /** Sum of summary counts per analyzed tag. */
  totals: Partial<Record<StructureTag, number>>;
  /** Elements carrying each rule, as plain data that outlives the DOM. */
  occurrences: Partial<Record<RuleId, Occurrence[]>>;
}

function summarize(
  aggregated: AggregatedFinding[],
  groupCounts: GroupCounts
): AggregatedFinding[] {
  return aggregated.map((f) => {
    switch (getCountPolicy(f.ruleId)) {
      case "extra":
        return { ...f, count: f.count - 1 };
      case "group":
        return { ...f, count: groupCounts.get(f.ruleId) ?? f.count };
      default:
        return f;
    }
  });
}

/**
 * Run the enabled structure checks over one snapshot. Each tag is cleared
 * in the registry before it is repopulated; tags that are not enabled keep
 * whatever the registry already holds.
 */
export function analyze(
  doc: StructureDocument,
  enabledTypes: Iterable<StructureTag>,
  registry: ErrorRegistry
): AnalysisResult {
  const enabled = new Set(enabledTypes);
  const result: AnalysisResult = {
    trees: {},
    aggregatedFindings: {},
    totals: {},
    occurrences: {},
  };

  const collect = (tag: StructureTag, groupCounts: GroupCounts): void => {
    const findings = summarize(registry.getAggregatedByTag(tag), groupCounts);
    result.aggregatedFindings[tag] = findings;
    result.totals[tag] = findings.reduce((sum, f) => sum + f.count, 0);
    for (const f of findings) {
      result.occurrences[f.ruleId] = registry.elementsWith(f.ruleId).map((el) => ({
        key: el.key,
        isDocument: el.key === doc.root.key,
        selector: el.selector(),
        html: el.snippet(),
      }));
    }
  };

  if (enabled.has("headings")) {
    registry.clearByTag("headings");
    const tree = buildHeadingTree(selectHeadings(doc));
    validateHeadings(tree, doc.root, registry);
    attachFindings(tree, registry, "headings");
    result.trees.headings = tree;
    collect("headings", new Map());
  }

  if (enabled.has("landmarks")) {
    registry.clearByTag("landmarks");
    const tree = buildLandmarkTree(selectLandmarks(doc));
    const groupCounts = validateLandmarks(tree, doc.root, registry);
    attachFindings(tree, registry, "landmarks");
    result.trees.landmarks = tree;
    collect("landmarks", groupCounts);
  }

  return result;
}

export function analyzeHtml(
  html: string,
  enabledTypes: Iterable<StructureTag>,
  registry: ErrorRegistry
): AnalysisResult {
  return analyze(parseSnapshot(html), enabledTypes, registry);
}

export interface AnalyzeUrlDeps {
  cache: ContentCache;
  registry: ErrorRegistry;
}

/** Fetch errors propagate to the caller as ContentFetchError. */
export async function analyzeUrl(
  url: string,
  enabledTypes: Iterable<StructureTag>,
  deps: AnalyzeUrlDeps
): Promise<AnalysisResult> {
  const html = await deps.cache.fetchContent(url);
  return analyzeHtml(html, enabledTypes, deps.registry);
}
