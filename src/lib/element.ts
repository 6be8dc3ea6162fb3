import { debug } from "./config.js";
import type { StructureDocument, StructureElement } from "./types.js";

const SNIPPET_LENGTH = 120;
const SELECTOR_DEPTH = 4;

let snapshotCount = 0;

export function normalizeText(text: string | null | undefined): string {
  return (text ?? "").replace(/\s+/g, " ").trim();
}

function cssPath(el: Element): string {
  const id = el.getAttribute("id");
  if (id) return `#${id}`;
  const parts: string[] = [];
  let e: Element | null = el;
  while (e && parts.length < SELECTOR_DEPTH) {
    const tag = e.tagName.toLowerCase();
    if (tag === "html" || tag === "body") break;
    let nth = 1;
    let sib = e.previousElementSibling;
    while (sib) {
      if (sib.tagName === e.tagName) nth++;
      sib = sib.previousElementSibling;
    }
    parts.unshift(`${tag}:nth-of-type(${nth})`);
    e = e.parentElement;
  }
  return parts.length > 0 ? parts.join(" > ") : el.tagName.toLowerCase();
}

/**
 * Wraps a parsed Document so every DOM node maps to one StructureElement,
 * keyed by document order. Every snapshot gets its own key prefix, so keys
 * from two parses of the same markup never collide in a registry.
 */
class DomSnapshot implements StructureDocument {
  readonly root: StructureElement;
  private readonly order = new Map<Element, number>();
  private readonly wrappers = new Map<Element, DomElement>();
  private readonly prefix = `s${++snapshotCount}`;

  constructor(
    private readonly document: Document,
    readonly isFragment: boolean
  ) {
    const all = document.querySelectorAll("*");
    for (let i = 0; i < all.length; i++) {
      this.order.set(all[i], i + 1);
    }
    const rootNode = document.body ?? document.documentElement;
    const root = new DomElement(rootNode, `${this.prefix}:root`, this);
    this.wrappers.set(rootNode, root);
    this.root = root;
  }

  wrap(el: Element): DomElement {
    let wrapped = this.wrappers.get(el);
    if (!wrapped) {
      const index = this.order.get(el);
      // Nodes added after the snapshot was taken get keys past the end.
      const key = `${this.prefix}:e${index ?? this.order.size + this.wrappers.size + 1}`;
      wrapped = new DomElement(el, key, this);
      this.wrappers.set(el, wrapped);
    }
    return wrapped;
  }

  select(selector: string): StructureElement[] {
    try {
      return Array.from(this.document.querySelectorAll(selector), (el) => this.wrap(el));
    } catch (err) {
      debug(`selector failed: ${selector}`, err);
      return [];
    }
  }

  byId(id: string): StructureElement | null {
    const el = this.document.getElementById(id);
    return el ? this.wrap(el) : null;
  }
}

class DomElement implements StructureElement {
  readonly tagName: string;

  constructor(
    private readonly el: Element,
    readonly key: string,
    private readonly snapshot: DomSnapshot
  ) {
    this.tagName = el.tagName.toLowerCase();
  }

  attr(name: string): string | null {
    return this.el.getAttribute(name);
  }

  text(): string {
    return normalizeText(this.el.textContent);
  }

  parent(): StructureElement | null {
    const p = this.el.parentElement;
    return p ? this.snapshot.wrap(p) : null;
  }

  ancestors(): StructureElement[] {
    const result: StructureElement[] = [];
    let p = this.el.parentElement;
    while (p) {
      result.push(this.snapshot.wrap(p));
      p = p.parentElement;
    }
    return result;
  }

  byId(id: string): StructureElement | null {
    return this.snapshot.byId(id);
  }

  selector(): string {
    return cssPath(this.el);
  }

  snippet(): string {
    const html = this.el.outerHTML;
    return html.length > SNIPPET_LENGTH ? `${html.slice(0, SNIPPET_LENGTH)}…` : html;
  }
}

export function snapshotDocument(document: Document, isFragment = false): StructureDocument {
  return new DomSnapshot(document, isFragment);
}
