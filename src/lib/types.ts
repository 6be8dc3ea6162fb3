export type Severity = "error" | "warning";

export type StructureTag = "headings" | "landmarks";

export const STRUCTURE_TAGS: readonly StructureTag[] = ["headings", "landmarks"];

export type RuleId =
  | "headings/missing-h1"
  | "headings/multiple-h1"
  | "headings/empty-heading"
  | "headings/skipped-level"
  | "landmarks/missing-main"
  | "landmarks/duplicate-main"
  | "landmarks/duplicate-same-label"
  | "landmarks/multiple-unlabeled-landmarks";

export interface Finding {
  readonly ruleId: RuleId;
  readonly severity: Severity;
  readonly tag: StructureTag;
}

export interface AggregatedFinding extends Finding {
  count: number;
}

/**
 * Read-only view of one element in a parsed snapshot. The analysis code only
 * talks to elements through this interface.
 */
export interface StructureElement {
  /** Unique across snapshots: "s<n>:root" for the body, "s<n>:e1", "s<n>:e2", … otherwise. */
  readonly key: string;
  readonly tagName: string;
  attr(name: string): string | null;
  /** Text content with whitespace runs collapsed and trimmed. */
  text(): string;
  parent(): StructureElement | null;
  ancestors(): StructureElement[];
  byId(id: string): StructureElement | null;
  selector(): string;
  snippet(): string;
}

export interface StructureDocument {
  readonly root: StructureElement;
  readonly isFragment: boolean;
  select(selector: string): StructureElement[];
}

export type LandmarkRole =
  | "banner"
  | "main"
  | "navigation"
  | "complementary"
  | "contentinfo"
  | "region"
  | "search"
  | "form";

export interface StructureNodeBase<N> {
  element: StructureElement;
  label: string;
  children: N[];
  hasError: boolean;
  findings: Finding[];
}

export interface HeadingNode extends StructureNodeBase<HeadingNode> {
  level: number;
  /** Levels skipped as shown to the user; 0 when the node is not flagged. */
  skippedLevels: number;
}

export interface LandmarkNode extends StructureNodeBase<LandmarkNode> {
  role: LandmarkRole;
}
