import type { AnalysisResult } from "./analyze.js";
import type { AggregatedFinding, RuleId } from "./types.js";
import { STRUCTURE_TAGS } from "./types.js";

export interface CountChange {
  finding: AggregatedFinding;
  before: number;
  after: number;
}

export interface StructureDiff {
  fixed: AggregatedFinding[];
  added: AggregatedFinding[];
  changed: CountChange[];
  unchanged: AggregatedFinding[];
}

function byRule(result: AnalysisResult): Map<RuleId, AggregatedFinding> {
  const map = new Map<RuleId, AggregatedFinding>();
  for (const tag of STRUCTURE_TAGS) {
    for (const f of result.aggregatedFindings[tag] ?? []) {
      map.set(f.ruleId, f);
    }
  }
  return map;
}

/**
 * Compare two passes by rule. Only tags analyzed in both passes are
 * compared, so turning a structure type off does not read as "fixed".
 */
export function diffResults(before: AnalysisResult, after: AnalysisResult): StructureDiff {
  const shared = new Set(
    STRUCTURE_TAGS.filter(
      (tag) => before.aggregatedFindings[tag] !== undefined && after.aggregatedFindings[tag] !== undefined
    )
  );
  const prev = byRule(before);
  const next = byRule(after);
  const diff: StructureDiff = { fixed: [], added: [], changed: [], unchanged: [] };

  for (const [ruleId, f] of prev) {
    if (!shared.has(f.tag)) continue;
    const current = next.get(ruleId);
    if (!current) {
      diff.fixed.push(f);
    } else if (current.count !== f.count) {
      diff.changed.push({ finding: current, before: f.count, after: current.count });
    } else {
      diff.unchanged.push(current);
    }
  }
  for (const [ruleId, f] of next) {
    if (shared.has(f.tag) && !prev.has(ruleId)) {
      diff.added.push(f);
    }
  }

  return diff;
}
