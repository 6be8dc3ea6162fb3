import type { ErrorRegistry } from "./error-registry.js";
import { finding } from "./rules.js";
import { flattenTree } from "./tree.js";
import type { HeadingNode, StructureDocument, StructureElement } from "./types.js";

export const HEADING_SELECTOR = 'h1, h2, h3, h4, h5, h6, [role="heading"][aria-level]';

/**
 * 1–6, or 0 when the element is not a usable heading. An explicit
 * role="heading" with a valid aria-level overrides the tag.
 */
export function headingLevel(element: StructureElement): number {
  if (element.attr("role") === "heading") {
    const level = /^[1-6]$/.exec((element.attr("aria-level") ?? "").trim());
    if (level) {
      return Number(level[0]);
    }
  }
  const match = /^h([1-6])$/.exec(element.tagName);
  return match ? Number(match[1]) : 0;
}

export function selectHeadings(doc: StructureDocument): StructureElement[] {
  return doc.select(HEADING_SELECTOR).filter((el) => headingLevel(el) > 0);
}

/**
 * Build the heading outline. Each heading nests under the nearest earlier
 * heading of a lower level. skippedLevels is set on headings that skip
 * levels, and on later headings that repeat a (parent level, level) pair
 * already seen skipping, so a repeated pattern is flagged every time.
 */
export function buildHeadingTree(headings: StructureElement[]): HeadingNode[] {
  const roots: HeadingNode[] = [];
  const stack: HeadingNode[] = [];
  const skipped = new Map<number, Set<number>>();

  for (const element of headings) {
    const level = headingLevel(element);
    if (level === 0) continue;

    let parentLevel = 0;
    for (let i = stack.length - 1; i >= 0; i--) {
      if (stack[i].level < level) {
        parentLevel = stack[i].level;
        break;
      }
    }
    const expected = stack.length > 0 ? stack[stack.length - 1].level + 1 : 1;
    const directSkip = Math.max(0, level - expected);

    let skippedLevels = 0;
    if (directSkip > 0) {
      const children = skipped.get(parentLevel) ?? new Set<number>();
      children.add(level);
      skipped.set(parentLevel, children);
      skippedLevels = directSkip;
    } else if (skipped.get(parentLevel)?.has(level)) {
      skippedLevels = level - parentLevel - 1;
    }

    const node: HeadingNode = {
      element,
      level,
      label: element.text(),
      children: [],
      skippedLevels,
      hasError: false,
      findings: [],
    };

    while (stack.length > 0 && stack[stack.length - 1].level >= level) {
      stack.pop();
    }
    if (stack.length === 0) {
      roots.push(node);
    } else {
      stack[stack.length - 1].children.push(node);
    }
    stack.push(node);
  }

  return roots;
}

/**
 * Write heading findings into the registry. Callers clear the "headings"
 * tag first.
 */
export function validateHeadings(
  tree: HeadingNode[],
  root: StructureElement,
  registry: ErrorRegistry
): void {
  const nodes = flattenTree(tree);
  const topLevel = nodes.filter((n) => n.level === 1);

  if (topLevel.length === 0) {
    registry.add(root, finding("headings/missing-h1"));
  }

  if (topLevel.length > 1) {
    for (const n of topLevel) {
      registry.add(n.element, finding("headings/multiple-h1"));
    }
  }

  for (const n of nodes) {
    if (n.label.length === 0) {
      registry.add(n.element, finding("headings/empty-heading"));
    }
    if (n.skippedLevels > 0) {
      registry.add(n.element, finding("headings/skipped-level"));
    }
  }
}
