import type { AnalysisResult, Occurrence } from "./analyze.js";
import type { StructureDiff } from "./diff.js";
import type { Locale, Rule } from "./rules.js";
import { getRuleLabel, getSeverityLabel } from "./rules.js";
import type {
  AggregatedFinding,
  HeadingNode,
  LandmarkNode,
  Severity,
  StructureTag,
} from "./types.js";
import { STRUCTURE_TAGS } from "./types.js";

const MAX_ELEMENTS = 10;

export const SEVERITY_ORDER: Record<Severity, number> = {
  error: 0,
  warning: 1,
};

const TAG_TITLES: Record<Locale, Record<StructureTag, string>> = {
  en: { headings: "Heading structure", landmarks: "Landmark structure" },
  de: { headings: "Überschriftenstruktur", landmarks: "Landmark-Struktur" },
};

type Noun = [one: string, many: string];

interface Phrases {
  issue: Noun;
  none: string;
  outline: string;
  rule: Noun;
  level: Noun;
  skips: string;
  empty: string;
  noHeadings: string;
  noLandmarks: string;
  noRules: string;
  tableHeader: string;
}

const PHRASES: Record<Locale, Phrases> = {
  en: {
    issue: ["issue", "issues"],
    none: "no issues found.",
    outline: "outline",
    rule: ["rule", "rules"],
    level: ["level", "levels"],
    skips: "skips",
    empty: "(empty)",
    noHeadings: "(no headings)",
    noLandmarks: "(no landmarks)",
    noRules: "No rules match the specified filters.",
    tableHeader: "  ID  |  Title  |  Severity  |  WCAG",
  },
  de: {
    issue: ["Problem", "Probleme"],
    none: "keine Probleme gefunden.",
    outline: "Gliederung",
    rule: ["Regel", "Regeln"],
    level: ["Ebene", "Ebenen"],
    skips: "überspringt",
    empty: "(leer)",
    noHeadings: "(keine Überschriften)",
    noLandmarks: "(keine Landmarks)",
    noRules: "Keine Regeln passen zu den Filtern.",
    tableHeader: "  ID  |  Titel  |  Schweregrad  |  WCAG",
  },
};

export interface FormatOptions {
  locale?: Locale;
  showTree?: boolean;
}

function counted(n: number, [one, many]: Noun): string {
  return `${n} ${n === 1 ? one : many}`;
}

function severityTag(severity: Severity, locale: Locale): string {
  return `[${getSeverityLabel(severity, locale).toUpperCase()}]`;
}

function formatOccurrence(o: Occurrence): string[] {
  if (o.isDocument) {
    return ["   Element: (document)"];
  }
  return [`   Element: ${o.selector}`, `   HTML: ${o.html}`];
}

function formatFinding(
  f: AggregatedFinding,
  occurrences: Occurrence[],
  locale: Locale
): string {
  const label = getRuleLabel(f.ruleId, locale);
  const lines: string[] = [];
  lines.push(`${severityTag(f.severity, locale)} ${f.ruleId}: ${label.title} (${f.count})`);
  if (label.description) {
    lines.push(`   ${label.description}`);
  }
  for (const o of occurrences.slice(0, MAX_ELEMENTS)) {
    lines.push(...formatOccurrence(o));
  }
  if (occurrences.length > MAX_ELEMENTS) {
    lines.push(`   … and ${occurrences.length - MAX_ELEMENTS} more`);
  }
  return lines.join("\n");
}

function formatSection(tag: StructureTag, result: AnalysisResult, locale: Locale): string {
  const findings = [...(result.aggregatedFindings[tag] ?? [])].sort(
    (a, b) => SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity]
  );
  const title = TAG_TITLES[locale][tag];
  const total = result.totals[tag] ?? 0;
  const phrases = PHRASES[locale];
  if (findings.length === 0) {
    return `${title}: ${phrases.none}`;
  }

  const blocks = findings.map((f) => formatFinding(f, result.occurrences[f.ruleId] ?? [], locale));
  return [`${title}: ${counted(total, phrases.issue)}`, "", ...blocks].join("\n");
}

interface Walked<N> {
  node: N;
  depth: number;
}

function walk<N extends { children: N[] }>(roots: N[]): Walked<N>[] {
  const out: Walked<N>[] = [];
  const pending: Walked<N>[] = roots.map((node) => ({ node, depth: 0 })).reverse();
  let next = pending.pop();
  while (next) {
    out.push(next);
    const { node, depth } = next;
    for (let i = node.children.length - 1; i >= 0; i--) {
      pending.push({ node: node.children[i], depth: depth + 1 });
    }
    next = pending.pop();
  }
  return out;
}

function findingSuffix(node: { findings: { ruleId: string }[] }): string {
  return node.findings.length > 0 ? `  [${node.findings.map((f) => f.ruleId).join(", ")}]` : "";
}

export function formatHeadingTree(roots: HeadingNode[], locale: Locale = "en"): string {
  const phrases = PHRASES[locale];
  if (roots.length === 0) return phrases.noHeadings;
  return walk(roots)
    .map(({ node, depth }) => {
      const skip =
        node.skippedLevels > 0 ? ` (${phrases.skips} ${counted(node.skippedLevels, phrases.level)})` : "";
      return `${"  ".repeat(depth)}H${node.level} ${node.label || phrases.empty}${skip}${findingSuffix(node)}`;
    })
    .join("\n");
}

export function formatLandmarkTree(roots: LandmarkNode[], locale: Locale = "en"): string {
  if (roots.length === 0) return PHRASES[locale].noLandmarks;
  return walk(roots)
    .map(({ node, depth }) => {
      const label = node.label ? ` "${node.label}"` : "";
      return `${"  ".repeat(depth)}${node.role}${label}${findingSuffix(node)}`;
    })
    .join("\n");
}

export function formatResult(result: AnalysisResult, options?: FormatOptions): string {
  const locale = options?.locale ?? "en";
  const blocks: string[] = [];

  for (const tag of STRUCTURE_TAGS) {
    if (result.aggregatedFindings[tag] === undefined) continue;
    blocks.push(formatSection(tag, result, locale));
    if (options?.showTree) {
      const tree =
        tag === "headings"
          ? formatHeadingTree(result.trees.headings ?? [], locale)
          : formatLandmarkTree(result.trees.landmarks ?? [], locale);
      blocks.push(`${TAG_TITLES[locale][tag]} ${PHRASES[locale].outline}:\n${tree}`);
    }
  }

  if (blocks.length === 0) {
    return "No structure types were analyzed.";
  }
  return blocks.join("\n\n");
}

function diffLine(f: AggregatedFinding, locale: Locale, suffix = ""): string {
  return `  - ${severityTag(f.severity, locale)} ${f.ruleId}: ${getRuleLabel(f.ruleId, locale).title}${suffix}`;
}

export function formatDiff(diff: StructureDiff, options?: FormatOptions): string {
  const locale = options?.locale ?? "en";
  const lines: string[] = [];

  lines.push(
    `Summary: ${diff.fixed.length} fixed, ${diff.added.length} new, ${diff.changed.length} changed, ${diff.unchanged.length} remaining`
  );

  if (diff.fixed.length > 0) {
    lines.push("", "FIXED:");
    for (const f of diff.fixed) lines.push(diffLine(f, locale));
  }
  if (diff.added.length > 0) {
    lines.push("", "NEW:");
    for (const f of diff.added) lines.push(diffLine(f, locale, ` (${f.count})`));
  }
  if (diff.changed.length > 0) {
    lines.push("", "CHANGED:");
    for (const c of diff.changed) lines.push(diffLine(c.finding, locale, ` (${c.before} → ${c.after})`));
  }
  if (diff.unchanged.length > 0) {
    lines.push("", "REMAINING:");
    for (const f of diff.unchanged) lines.push(diffLine(f, locale, ` (${f.count})`));
  }

  return lines.join("\n");
}

export function formatRuleTable(rules: readonly Rule[], locale: Locale = "en"): string {
  const phrases = PHRASES[locale];
  if (rules.length === 0) {
    return phrases.noRules;
  }

  const header = `${counted(rules.length, phrases.rule)}:\n`;
  const rows = rules.map(
    (r) =>
      `  ${r.ruleId}  |  ${getRuleLabel(r.ruleId, locale).title}  |  ${r.severity}  |  ${r.wcag.join(", ")}`
  );

  return `${header}${phrases.tableHeader}\n  ---|---|---|---\n${rows.join("\n")}`;
}
