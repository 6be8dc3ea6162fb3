import { Window } from "happy-dom";
import { snapshotDocument } from "./element.js";
import type { StructureDocument } from "./types.js";

export interface ParseResult {
  document: Document;
  isFragment: boolean;
}

const FULL_DOC_PATTERN = /<!doctype\s+html|<html[\s>]/i;

/**
 * Parse an HTML string into a Document.
 * Fragments (no <html> or <!DOCTYPE>) are wrapped in a minimal document
 * shell. Scripts and external resources are never loaded: the markup is a
 * snapshot, not a page to run.
 */
export function parseHtml(html: string): ParseResult {
  const trimmed = html.trim();
  const isFragment = !FULL_DOC_PATTERN.test(trimmed);

  const fullHtml = isFragment
    ? `<!DOCTYPE html><html lang="en"><head><title>Audit</title></head><body>${trimmed}</body></html>`
    : trimmed;

  const window = new Window({
    url: "https://audit.local/",
    settings: {
      disableJavaScriptEvaluation: true,
      disableJavaScriptFileLoading: true,
      disableCSSFileLoading: true,
    },
  });

  const doc = window.document;
  doc.write(fullHtml);

  return { document: doc as unknown as Document, isFragment };
}

export function parseSnapshot(html: string): StructureDocument {
  const { document, isFragment } = parseHtml(html);
  return snapshotDocument(document, isFragment);
}
