import type { ErrorRegistry } from "./error-registry.js";
import type { StructureNodeBase, StructureTag } from "./types.js";

/** Document-order walk with an explicit stack. */
export function flattenTree<N extends { children: N[] }>(roots: N[]): N[] {
  const result: N[] = [];
  const pending = [...roots].reverse();
  while (pending.length > 0) {
    const node = pending.pop();
    if (node === undefined) break;
    result.push(node);
    for (let i = node.children.length - 1; i >= 0; i--) {
      pending.push(node.children[i]);
    }
  }
  return result;
}

/** Fill hasError/findings on every node from the registry. */
export function attachFindings<N extends StructureNodeBase<N>>(
  roots: N[],
  registry: ErrorRegistry,
  tag: StructureTag
): void {
  for (const node of flattenTree(roots)) {
    node.findings = registry.getByTag(node.element, tag);
    node.hasError = node.findings.length > 0;
  }
}
