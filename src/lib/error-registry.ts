import type {
  AggregatedFinding,
  Finding,
  RuleId,
  StructureElement,
  StructureTag,
} from "./types.js";
import { STRUCTURE_TAGS } from "./types.js";

export interface ErrorRegistry {
  store(element: StructureElement, findings: Finding[]): void;
  /** No-op when the element already carries a finding with the same ruleId. */
  add(element: StructureElement, finding: Finding): void;
  get(element: StructureElement): readonly Finding[];
  getAggregatedByTag(tag: StructureTag): AggregatedFinding[];
  getAllAggregated(): AggregatedFinding[];
  getByTag(element: StructureElement, tag: StructureTag): Finding[];
  elementsWith(ruleId: RuleId): StructureElement[];
  clearByTag(tag: StructureTag): void;
  clearAll(): void;
}

interface Entry {
  element: StructureElement;
  findings: Finding[];
}

/**
 * Findings keyed by element key. Entries keep insertion order, so
 * aggregation reports rules in the order they were first recorded.
 */
export class MapErrorRegistry implements ErrorRegistry {
  private readonly entries = new Map<string, Entry>();

  store(element: StructureElement, findings: Finding[]): void {
    this.entries.set(element.key, { element, findings: [...findings] });
  }

  add(element: StructureElement, finding: Finding): void {
    let entry = this.entries.get(element.key);
    if (!entry) {
      entry = { element, findings: [] };
      this.entries.set(element.key, entry);
    } else {
      entry.element = element;
    }
    if (!entry.findings.some((f) => f.ruleId === finding.ruleId)) {
      entry.findings.push(finding);
    }
  }

  get(element: StructureElement): readonly Finding[] {
    return this.entries.get(element.key)?.findings ?? [];
  }

  getAggregatedByTag(tag: StructureTag): AggregatedFinding[] {
    const byRule = new Map<string, AggregatedFinding>();
    for (const { findings } of this.entries.values()) {
      for (const f of findings) {
        if (f.tag !== tag) continue;
        const existing = byRule.get(f.ruleId);
        if (existing) {
          existing.count += 1;
        } else {
          byRule.set(f.ruleId, { ...f, count: 1 });
        }
      }
    }
    return Array.from(byRule.values());
  }

  getAllAggregated(): AggregatedFinding[] {
    return STRUCTURE_TAGS.flatMap((tag) => this.getAggregatedByTag(tag));
  }

  getByTag(element: StructureElement, tag: StructureTag): Finding[] {
    return this.get(element).filter((f) => f.tag === tag);
  }

  elementsWith(ruleId: RuleId): StructureElement[] {
    const elements: StructureElement[] = [];
    for (const { element, findings } of this.entries.values()) {
      if (findings.some((f) => f.ruleId === ruleId)) {
        elements.push(element);
      }
    }
    return elements;
  }

  clearByTag(tag: StructureTag): void {
    for (const [key, entry] of this.entries) {
      const remaining = entry.findings.filter((f) => f.tag !== tag);
      if (remaining.length === 0) {
        this.entries.delete(key);
      } else {
        entry.findings = remaining;
      }
    }
  }

  clearAll(): void {
    this.entries.clear();
  }
}
