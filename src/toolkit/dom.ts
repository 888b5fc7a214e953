/**
 * DOM toolkit
 *
 * Implements the widget-factory capability set over plain DOM elements:
 *
 *   checkbox    <input type="checkbox">        toggled      → change
 *   combo box   <select>                       selected     → change
 *   spin box    <input role="spinbutton">      valueChanged → change (Arrow keys step)
 *   text field  <input type="text">            editingDone  → change
 *   action      <button>                       triggered    → click
 *   dialog      <dialog>                       (see dialog.ts)
 *
 * Every widget carries its name in `data-name` (form controls also in `name`).
 *
 * Example:
 * ```ts
 * const toolkit = createDomToolkit(document, {
 *   nativeViews: [{ matches: (v) => v instanceof Date, createWidget: (v, ctx) => dateInput(ctx.document, v) }],
 * });
 * ```
 */

import { reportError } from '../core/dev.js';
import { createDomDialog } from './dialog.js';
import type { FrameLayout, SpinBoxOptions, TextFieldOptions, Toolkit, WidgetEvent } from './types.js';

export interface NativeViewContext {
  document: Document;
  /** Raw tag string of the field. */
  tags: string;
}

/** Toolkit-supplied view/editor for a family of native values. */
export interface NativeValueView {
  matches(value: unknown): boolean;
  /** Inline value view; when absent the field gets a button opening `createEditor`. */
  createWidget?(value: unknown, ctx: NativeViewContext): HTMLElement;
  /** Editor hosted in a dialog. */
  createEditor?(value: unknown, ctx: NativeViewContext): HTMLElement;
}

export interface DomToolkitOptions {
  nativeViews?: readonly NativeValueView[];
}

const DOM_EVENTS: Record<WidgetEvent, string> = {
  toggled: 'change',
  selected: 'change',
  valueChanged: 'change',
  editingDone: 'change',
  triggered: 'click',
};

function decimals(step: number): number {
  const text = String(step);
  const dot = text.indexOf('.');
  return dot === -1 ? 0 : text.length - dot - 1;
}

export function createDomToolkit(doc: Document, options: DomToolkitOptions = {}): Toolkit<HTMLElement> {
  const win = doc.defaultView;
  if (!win) {
    throw new Error('[fieldview] createDomToolkit() needs a document attached to a window.');
  }
  const nativeViews = options.nativeViews ?? [];

  const nameOf = (el: HTMLElement) => el.getAttribute('data-name') ?? '';

  const input = (el: HTMLElement): HTMLInputElement => {
    if (el instanceof win.HTMLInputElement) return el;
    throw new Error(`[fieldview] Widget "${nameOf(el)}" is not an input element.`);
  };

  const select = (el: HTMLElement): HTMLSelectElement => {
    if (el instanceof win.HTMLSelectElement) return el;
    throw new Error(`[fieldview] Widget "${nameOf(el)}" is not a select element.`);
  };

  const named = <E extends HTMLElement>(el: E, name: string, parent: HTMLElement): E => {
    el.setAttribute('data-name', name);
    parent.appendChild(el);
    return el;
  };

  const control = <E extends HTMLInputElement | HTMLSelectElement>(el: E, name: string, parent: HTMLElement): E => {
    el.name = name;
    return named(el, name, parent);
  };

  const findNative = (value: unknown) => nativeViews.find((view) => view.matches(value));

  const stepFloat = (text: string, up: boolean, opts: SpinBoxOptions): string => {
    const current = Number.parseFloat(text);
    const base = Number.isFinite(current) ? current : 0;
    let next = up ? base + opts.step : base - opts.step;
    if (opts.max !== undefined) next = Math.min(next, opts.max);
    if (opts.min !== undefined) next = Math.max(next, opts.min);
    return next.toFixed(decimals(opts.step));
  };

  const stepBigInt = (text: string, up: boolean, opts: SpinBoxOptions): string => {
    const digits = /-?\d+/.exec(text);
    const base = digits ? BigInt(digits[0]) : 0n;
    const step = BigInt(Math.max(1, Math.trunc(opts.step)));
    let next = up ? base + step : base - step;
    if (opts.max !== undefined && next > opts.max) next = BigInt(Math.floor(opts.max));
    if (opts.min !== undefined && next < opts.min) next = BigInt(Math.ceil(opts.min));
    return next.toString();
  };

  /** Arrow keys step the value, keeping within min/max, then emit change. */
  const wireStepping = (el: HTMLInputElement, opts: SpinBoxOptions) => {
    el.addEventListener('keydown', (ev) => {
      if (ev.key !== 'ArrowUp' && ev.key !== 'ArrowDown') return;
      ev.preventDefault();
      const up = ev.key === 'ArrowUp';
      el.value = opts.bigint ? stepBigInt(el.value, up, opts) : stepFloat(el.value, up, opts);
      el.dispatchEvent(new win.Event('change', { bubbles: true }));
    });
  };

  return {
    frame(name: string, layout: FrameLayout) {
      const el = doc.createElement('div');
      el.setAttribute('data-name', name);
      el.className = `fv-frame fv-${layout}`;
      if (layout === 'grid') {
        el.style.display = 'grid';
        el.style.gridTemplateColumns = 'max-content 1fr';
      } else {
        el.style.display = 'flex';
      }
      return el;
    },

    clear(parent) {
      while (parent.firstChild) parent.removeChild(parent.firstChild);
    },

    append(parent, child) {
      parent.appendChild(child);
    },

    label(parent, name, text, tooltip) {
      const el = named(doc.createElement('label'), name, parent);
      el.className = 'fv-label';
      el.textContent = text;
      if (tooltip) el.title = tooltip;
      return el;
    },

    checkBox(parent, name, checked) {
      const el = doc.createElement('input');
      el.type = 'checkbox';
      el.checked = checked;
      return control(el, name, parent);
    },

    comboBox(parent, name, items, current) {
      const el = doc.createElement('select');
      for (const item of items) {
        const opt = doc.createElement('option');
        opt.value = item;
        opt.textContent = item;
        el.appendChild(opt);
      }
      el.selectedIndex = current;
      return control(el, name, parent);
    },

    spinBox(parent, name, opts) {
      const el = doc.createElement('input');
      el.type = 'text';
      el.setAttribute('inputmode', 'decimal');
      el.setAttribute('role', 'spinbutton');
      el.setAttribute('data-step', String(opts.step));
      if (opts.min !== undefined) el.setAttribute('aria-valuemin', String(opts.min));
      if (opts.max !== undefined) el.setAttribute('aria-valuemax', String(opts.max));
      el.value = opts.value;
      wireStepping(el, opts);
      return control(el, name, parent);
    },

    textField(parent, name, text, opts?: TextFieldOptions) {
      const el = doc.createElement('input');
      el.type = 'text';
      el.value = text;
      el.style.minWidth = '10em';
      if (opts?.width !== undefined) el.style.width = `${opts.width}ch`;
      return control(el, name, parent);
    },

    action(parent, name, text) {
      const el = named(doc.createElement('button'), name, parent);
      el.type = 'button';
      el.textContent = text;
      return el;
    },

    dialog(opts) {
      return createDomDialog(doc, opts);
    },

    widgetName: nameOf,

    setInactive(widget) {
      widget.setAttribute('disabled', '');
      widget.setAttribute('aria-disabled', 'true');
    },

    setTooltip(widget, text) {
      widget.title = text;
    },

    isChecked: (widget) => input(widget).checked,
    setChecked(widget, checked) {
      input(widget).checked = checked;
    },

    currentIndex: (widget) => select(widget).selectedIndex,
    setCurrentIndex(widget, index) {
      select(widget).selectedIndex = index;
    },

    spinText: (widget) => input(widget).value,
    setSpinText(widget, text) {
      input(widget).value = text;
    },

    text: (widget) => input(widget).value,
    setText(widget, text) {
      input(widget).value = text;
    },

    connect(widget, event, handler) {
      const type = DOM_EVENTS[event];
      const listener = () => {
        try {
          handler(widget);
        } catch (error) {
          reportError(error, `${event} handler of "${nameOf(widget)}"`);
        }
      };
      widget.addEventListener(type, listener);
      return () => widget.removeEventListener(type, listener);
    },

    isNative: (value) => findNative(value) !== undefined,

    nativeView(parent, name, value, tags) {
      const view = findNative(value);
      if (!view?.createWidget) return null;
      return named(view.createWidget(value, { document: doc, tags }), name, parent);
    },

    nativeEditor(parent, value, tags) {
      const view = findNative(value);
      if (!view?.createEditor) return null;
      const el = view.createEditor(value, { document: doc, tags });
      parent.appendChild(el);
      return el;
    },
  };
}
