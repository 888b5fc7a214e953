import { JSDOM } from 'jsdom';

import { createDomToolkit, type DomToolkitOptions } from '../src/toolkit/dom.js';
import { setLogHandler, type LogRecord } from '../src/core/dev.js';
import type { Toolkit } from '../src/toolkit/types.js';

// ─── shared helpers ─────────────────────────────────────────────────────────

export interface TestDom {
  dom: JSDOM;
  doc: Document;
  toolkit: Toolkit<HTMLElement>;
}

/** Fresh JSDOM plus a DOM toolkit bound to it. */
export function createDom(options: DomToolkitOptions = {}): TestDom {
  const dom = new JSDOM('<!doctype html><html><body></body></html>', {
    url: 'http://localhost/',
  });
  const doc = dom.window.document;
  return { dom, doc, toolkit: createDomToolkit(doc, options) };
}

/** querySelector that fails the test instead of returning null. */
export function query<E extends Element = HTMLElement>(root: ParentNode, selector: string): E {
  const el = root.querySelector<E>(selector);
  if (!el) throw new Error(`No element matches ${selector}`);
  return el;
}

export function fire(dom: JSDOM, el: Element, type: string): void {
  el.dispatchEvent(new dom.window.Event(type, { bubbles: true }));
}

export function keydown(dom: JSDOM, el: Element, key: string): void {
  el.dispatchEvent(new dom.window.KeyboardEvent('keydown', { key, bubbles: true }));
}

/** Set an input's value and emit `change`, as a user edit would. */
export function edit(dom: JSDOM, el: HTMLInputElement, value: string): void {
  el.value = value;
  fire(dom, el, 'change');
}

export function select(dom: JSDOM, el: HTMLSelectElement, index: number): void {
  el.selectedIndex = index;
  fire(dom, el, 'change');
}

/**
 * Capture log records for the duration of `fn`.
 * Console output is suppressed while capturing.
 */
export async function captureLogs(fn: (records: LogRecord[]) => void | Promise<void>): Promise<LogRecord[]> {
  const records: LogRecord[] = [];
  setLogHandler((record) => records.push(record));
  try {
    await fn(records);
  } finally {
    setLogHandler(null);
  }
  return records;
}
