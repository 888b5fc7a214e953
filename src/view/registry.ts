/**
 * View registry
 *
 * Toolkit callbacks only hand back the emitting widget. Every widget is named
 * `"<ViewName>:<FieldName>"`, and this process-wide map turns the view part
 * of that name back into the view that owns the field.
 *
 * Entries are added when a view is constructed and live until process exit
 * (or `resetViewRegistry()`). Registering a name twice replaces the earlier
 * view: widgets built by the earlier view then resolve to the later one.
 * Dialogs re-register their child view on every open; only a name reused
 * for a different object is warned about.
 */

import { warn } from '../core/dev.js';
import { getConfig } from '../core/config.js';
import type { FieldDescriptor } from './schema.js';

/** What the edit callbacks need from a view. */
export interface RegisteredView {
  readonly name: string;
  readonly target: object;
  descriptor(field: string): FieldDescriptor<object> | undefined;
  setFieldValue(field: string, value: unknown): void;
  /** Open the editor behind an action button for `field`. */
  editField(field: string): void;
}

export interface ResolvedWidget {
  view: RegisteredView;
  field: string;
}

export class UnknownViewError extends Error {
  constructor(readonly viewName: string, readonly widgetName?: string) {
    super(
      widgetName === undefined
        ? `[fieldview] No view registered under "${viewName}".`
        : `[fieldview] Widget "${widgetName}" does not resolve to a registered view ("${viewName}").`
    );
    this.name = 'UnknownViewError';
  }
}

const views = new Map<string, RegisteredView>();

export function registerView(view: RegisteredView): void {
  const previous = views.get(view.name);
  if (previous && previous.target !== view.target && getConfig().warnOnNameReuse) {
    warn(`View name "${view.name}" registered twice; widgets of the earlier view now edit the later view's object.`);
  }
  views.set(view.name, view);
}

export function findView(name: string): RegisteredView | undefined {
  return views.get(name);
}

export function lookupView(name: string): RegisteredView {
  const view = views.get(name);
  if (!view) throw new UnknownViewError(name);
  return view;
}

/** Split a widget name on its first `:` and resolve the view part. */
export function resolveWidgetName(widgetName: string): ResolvedWidget {
  const sep = widgetName.indexOf(':');
  if (sep === -1) throw new UnknownViewError(widgetName, widgetName);

  const viewName = widgetName.slice(0, sep);
  const view = views.get(viewName);
  if (!view) throw new UnknownViewError(viewName, widgetName);

  return { view, field: widgetName.slice(sep + 1) };
}

export function widgetNameFor(viewName: string, field: string): string {
  return `${viewName}:${field}`;
}

export function registeredViewNames(): string[] {
  return Array.from(views.keys());
}

/** Drop every entry. For tests and process teardown. */
export function resetViewRegistry(): void {
  views.clear();
}
