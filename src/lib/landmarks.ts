import type { ErrorRegistry } from "./error-registry.js";
import { finding } from "./rules.js";
import { flattenTree } from "./tree.js";
import type {
  LandmarkNode,
  LandmarkRole,
  RuleId,
  StructureDocument,
  StructureElement,
} from "./types.js";

export const LANDMARK_ROLES: readonly LandmarkRole[] = [
  "banner",
  "main",
  "navigation",
  "complementary",
  "contentinfo",
  "region",
  "search",
  "form",
];

const IMPLICIT_ROLES: Record<string, LandmarkRole> = {
  main: "main",
  nav: "navigation",
  aside: "complementary",
  header: "banner",
  footer: "contentinfo",
  form: "form",
};

// header/footer only map to banner/contentinfo outside sectioning content.
const SCOPING_ANCESTORS = new Set(["article", "aside", "main", "nav", "section", "header", "footer"]);

export const LANDMARK_SELECTOR = [
  ...LANDMARK_ROLES.map((role) => `[role="${role}"]`),
  "main",
  "nav",
  "aside",
  "form",
  "header",
  "footer",
  "section[aria-label]",
  "section[aria-labelledby]",
].join(", ");

const ROLE_NAMES: ReadonlySet<string> = new Set(LANDMARK_ROLES);

function isLandmarkRole(value: string): value is LandmarkRole {
  return ROLE_NAMES.has(value);
}

/**
 * Accessible name: a non-blank aria-label, else the joined text of every
 * aria-labelledby target that resolves, else "".
 */
export function accessibleName(element: StructureElement): string {
  const ariaLabel = element.attr("aria-label")?.trim();
  if (ariaLabel) {
    return ariaLabel;
  }

  const labelledBy = element.attr("aria-labelledby")?.trim();
  if (labelledBy) {
    return labelledBy
      .split(/\s+/)
      .map((id) => element.byId(id)?.text() ?? "")
      .filter((text) => text.length > 0)
      .join(" ");
  }

  return "";
}

/** The element's landmark role, or null when it is not a landmark. */
export function landmarkRole(element: StructureElement): LandmarkRole | null {
  const explicit = element.attr("role")?.trim().toLowerCase();
  if (explicit) {
    const first = explicit.split(/\s+/)[0];
    return isLandmarkRole(first) ? first : null;
  }

  const tag = element.tagName;
  if (tag === "section") {
    return accessibleName(element) ? "region" : null;
  }
  if (tag === "header" || tag === "footer") {
    const scoped = element.ancestors().some((a) => SCOPING_ANCESTORS.has(a.tagName));
    return scoped ? null : IMPLICIT_ROLES[tag];
  }
  return IMPLICIT_ROLES[tag] ?? null;
}

export function selectLandmarks(doc: StructureDocument): StructureElement[] {
  return doc.select(LANDMARK_SELECTOR).filter((el) => landmarkRole(el) !== null);
}

/**
 * Nest each landmark under its nearest landmark ancestor in the DOM.
 * Elements that do not resolve to a landmark role are skipped.
 */
export function buildLandmarkTree(elements: StructureElement[]): LandmarkNode[] {
  const byKey = new Map<string, LandmarkNode>();
  const ordered: LandmarkNode[] = [];

  for (const element of elements) {
    const role = landmarkRole(element);
    if (role === null || byKey.has(element.key)) continue;
    const node: LandmarkNode = {
      element,
      role,
      label: accessibleName(element),
      children: [],
      hasError: false,
      findings: [],
    };
    byKey.set(element.key, node);
    ordered.push(node);
  }

  const roots: LandmarkNode[] = [];
  for (const node of ordered) {
    let parent: LandmarkNode | undefined;
    for (const ancestor of node.element.ancestors()) {
      parent = byKey.get(ancestor.key);
      if (parent) break;
    }
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
  }

  return roots;
}

function groupBy<T>(items: T[], keyOf: (item: T) => string | null): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    if (key === null) continue;
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

/** Summary counts for the rules that count offending groups. */
export type GroupCounts = Map<RuleId, number>;

/**
 * Write landmark findings into the registry. Rules look at every landmark
 * regardless of nesting. Callers clear the "landmarks" tag first.
 */
export function validateLandmarks(
  tree: LandmarkNode[],
  root: StructureElement,
  registry: ErrorRegistry
): GroupCounts {
  const all = flattenTree(tree);
  const groupCounts: GroupCounts = new Map();

  const mains = all.filter((l) => l.role === "main");
  if (mains.length === 0) {
    registry.add(root, finding("landmarks/missing-main"));
  }
  if (mains.length > 1) {
    for (const main of mains) {
      registry.add(main.element, finding("landmarks/duplicate-main"));
    }
  }

  const duplicateLabels = [...groupBy(all, (l) => l.label || null).values()].filter(
    (group) => group.length >= 2
  );
  for (const group of duplicateLabels) {
    for (const landmark of group) {
      registry.add(landmark.element, finding("landmarks/duplicate-same-label"));
    }
  }
  if (duplicateLabels.length > 0) {
    groupCounts.set("landmarks/duplicate-same-label", duplicateLabels.length);
  }

  const unlabeledGroups: LandmarkNode[][] = [];
  for (const [role, group] of groupBy(all, (l) => l.role)) {
    if (role === "main" || group.length < 2) continue;
    const unlabeled = group.filter((l) => !l.label);
    if (unlabeled.length > 1) {
      unlabeledGroups.push(unlabeled);
    }
  }
  for (const group of unlabeledGroups) {
    for (const landmark of group) {
      registry.add(landmark.element, finding("landmarks/multiple-unlabeled-landmarks"));
    }
  }
  if (unlabeledGroups.length > 0) {
    groupCounts.set("landmarks/multiple-unlabeled-landmarks", unlabeledGroups.length);
  }

  return groupCounts;
}
