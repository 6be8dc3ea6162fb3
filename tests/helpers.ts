import type { StructureElement } from "../src/lib/types.js";

/** Minimal element for tests that only need identity. */
export function fakeElement(key: string, tagName = "div"): StructureElement {
  return {
    key,
    tagName,
    attr: () => null,
    text: () => "",
    parent: () => null,
    ancestors: () => [],
    byId: () => null,
    selector: () => tagName,
    snippet: () => `<${tagName}></${tagName}>`,
  };
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
