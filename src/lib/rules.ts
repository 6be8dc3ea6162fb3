import type { Finding, RuleId, Severity } from "./types.js";

export type Locale = "en" | "de";

/**
 * How a rule's summary count is derived from the elements that carry it.
 * - element: one per element
 * - extra: one per element beyond the first
 * - group: one per offending group, reported by the validator
 */
export type CountPolicy = "element" | "extra" | "group";

export interface RuleLabel {
  title: string;
  description: string;
}

export interface Rule extends Finding {
  countPolicy: CountPolicy;
  wcag: string[];
}

type RuleMeta = Omit<Rule, "ruleId">;

const RULE_META: Record<RuleId, RuleMeta> = {
  "headings/missing-h1": { severity: "error", tag: "headings", countPolicy: "element", wcag: ["1.3.1", "2.4.6"] },
  "headings/multiple-h1": { severity: "warning", tag: "headings", countPolicy: "extra", wcag: ["1.3.1"] },
  "headings/empty-heading": { severity: "error", tag: "headings", countPolicy: "element", wcag: ["1.3.1", "2.4.6"] },
  "headings/skipped-level": { severity: "error", tag: "headings", countPolicy: "element", wcag: ["1.3.1"] },
  "landmarks/missing-main": { severity: "error", tag: "landmarks", countPolicy: "element", wcag: ["1.3.1", "2.4.1"] },
  "landmarks/duplicate-main": { severity: "error", tag: "landmarks", countPolicy: "extra", wcag: ["1.3.1"] },
  "landmarks/duplicate-same-label": { severity: "error", tag: "landmarks", countPolicy: "group", wcag: ["1.3.1", "2.4.1"] },
  "landmarks/multiple-unlabeled-landmarks": { severity: "warning", tag: "landmarks", countPolicy: "group", wcag: ["1.3.1", "2.4.1"] },
};

function isRuleId(id: string): id is RuleId {
  return Object.prototype.hasOwnProperty.call(RULE_META, id);
}

export const RULES: readonly Rule[] = Object.entries(RULE_META).flatMap(([id, meta]) =>
  isRuleId(id) ? [{ ruleId: id, ...meta }] : []
);

/** Fresh Finding value for a rule; findings never carry rule metadata. */
export function finding(ruleId: RuleId): Finding {
  const { severity, tag } = RULE_META[ruleId];
  return { ruleId, severity, tag };
}

export function getCountPolicy(ruleId: RuleId): CountPolicy {
  return RULE_META[ruleId].countPolicy;
}

const LABELS: Record<Locale, Record<RuleId, RuleLabel>> = {
  en: {
    "headings/missing-h1": {
      title: "Missing top-level heading",
      description: "The page has no level 1 heading. Add one h1 that names the page content.",
    },
    "headings/multiple-h1": {
      title: "Multiple top-level headings",
      description: "More than one level 1 heading was found. Usually a page has a single h1.",
    },
    "headings/empty-heading": {
      title: "Empty heading",
      description: "A heading has no text content. Screen reader users hear an empty heading.",
    },
    "headings/skipped-level": {
      title: "Skipped heading level",
      description: "A heading skips one or more levels relative to its parent heading.",
    },
    "landmarks/missing-main": {
      title: "Missing main landmark",
      description: "The page has no main landmark. Wrap the primary content in a main element.",
    },
    "landmarks/duplicate-main": {
      title: "Duplicate main landmarks",
      description: "More than one main landmark was found. A page should contain exactly one.",
    },
    "landmarks/duplicate-same-label": {
      title: "Landmarks share the same name",
      description: "Several landmarks use the same accessible name and cannot be told apart.",
    },
    "landmarks/multiple-unlabeled-landmarks": {
      title: "Unlabeled landmarks of the same role",
      description: "Several landmarks of one role have no accessible name. Label each of them.",
    },
  },
  de: {
    "headings/missing-h1": {
      title: "Hauptüberschrift fehlt",
      description: "Die Seite enthält keine Überschrift der Ebene 1.",
    },
    "headings/multiple-h1": {
      title: "Mehrere Hauptüberschriften",
      description: "Es wurde mehr als eine Überschrift der Ebene 1 gefunden.",
    },
    "headings/empty-heading": {
      title: "Leere Überschrift",
      description: "Eine Überschrift enthält keinen Text.",
    },
    "headings/skipped-level": {
      title: "Übersprungene Überschriftenebene",
      description: "Eine Überschrift überspringt eine oder mehrere Ebenen.",
    },
    "landmarks/missing-main": {
      title: "Main-Landmark fehlt",
      description: "Die Seite enthält keinen Hauptinhaltsbereich (main).",
    },
    "landmarks/duplicate-main": {
      title: "Mehrere Main-Landmarks",
      description: "Es wurde mehr als ein Hauptinhaltsbereich gefunden.",
    },
    "landmarks/duplicate-same-label": {
      title: "Landmarks mit gleichem Namen",
      description: "Mehrere Landmarks verwenden denselben zugänglichen Namen.",
    },
    "landmarks/multiple-unlabeled-landmarks": {
      title: "Unbenannte Landmarks gleicher Rolle",
      description: "Mehrere Landmarks derselben Rolle haben keinen zugänglichen Namen.",
    },
  },
};

const SEVERITY_LABELS: Record<Locale, Record<Severity, string>> = {
  en: { error: "Error", warning: "Warning" },
  de: { error: "Fehler", warning: "Warnung" },
};

/** Falls back to the raw rule id for ids the catalogue does not know. */
export function getRuleLabel(id: string, locale: Locale = "en"): RuleLabel {
  return isRuleId(id) ? LABELS[locale][id] : { title: id, description: "" };
}

export function getSeverityLabel(severity: Severity, locale: Locale = "en"): string {
  return SEVERITY_LABELS[locale][severity];
}
