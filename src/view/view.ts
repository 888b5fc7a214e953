/**
 * View - binds one object to a widget tree.
 *
 * `build()` walks the object's schema and creates a label and an editing
 * widget per visible field; `refresh()` pushes current field values into the
 * widgets built last time. Edits come back through the name-addressed
 * callbacks in `edit.ts`, which find this view in the registry.
 *
 * Example:
 * ```ts
 * const view = new View(sim, 'sim', { toolkit: createDomToolkit(document) });
 * document.body.append(view.build());
 * sim.count = 7;
 * view.refresh();
 * ```
 */

import { createScope, withScope, type Scope } from '../core/scope.js';
import { warn } from '../core/dev.js';
import type { Toolkit } from '../toolkit/types.js';
import { classifyField, type FieldKind } from './dispatch.js';
import { NestedEditor } from './nested.js';
import { registerView, widgetNameFor, type RegisteredView } from './registry.js';
import { schemaOf, type FieldDescriptor, type Schema } from './schema.js';
import { hasTagValue, parseTags, tagValue } from './tags.js';
import { validateFieldTags } from './validate.js';
import { createFieldWidget, updateFieldWidget } from './widgets.js';

// ============================================================================
// Types
// ============================================================================

export interface ViewOptions<W> {
  toolkit: Toolkit<W>;
  /** Lay fields out in a row instead of a two-column grid. */
  inline?: boolean;
  /** Build every widget read-only, as if each field were tagged `inactive:"+"`. */
  inactive?: boolean;
  /** Use this schema instead of looking one up from the target. */
  schema?: Schema<object>;
}

export interface FieldBinding<W> {
  readonly field: string;
  readonly kind: FieldKind;
  readonly widget: W;
  /** Child view embedded for `view:"inline"` nested fields. */
  readonly child?: View<W>;
}

export type ViewSlot = 'main' | 'inline' | 'dialog';

/**
 * Implemented by bound objects that keep per-instance tags and want to know
 * about the views created for them (see `ViewObject`).
 */
export interface ViewHost {
  tagsFor(field: string): string | undefined;
  attachView(view: { refresh(): void }, slot: ViewSlot): void;
}

function isViewHost(value: object): value is ViewHost {
  return (
    'tagsFor' in value &&
    typeof value.tagsFor === 'function' &&
    'attachView' in value &&
    typeof value.attachView === 'function'
  );
}

// ============================================================================
// View
// ============================================================================

export class View<W> implements RegisteredView {
  /** Fields rendered by the toolkit's own value views. */
  readonly toolkitViews = new Map<string, FieldBinding<W>>();
  /** Fields rendered by this engine. */
  readonly widgets = new Map<string, FieldBinding<W>>();

  readonly toolkit: Toolkit<W>;
  readonly inline: boolean;
  readonly inactive: boolean;

  private readonly explicitSchema: Schema<object> | undefined;
  private frame: W | null = null;
  private buildScope: Scope | null = null;
  private readonly editors = new WeakMap<object, NestedEditor<W>>();

  constructor(
    readonly target: object,
    readonly name: string,
    options: ViewOptions<W>
  ) {
    this.toolkit = options.toolkit;
    this.inline = options.inline ?? false;
    this.inactive = options.inactive ?? false;
    this.explicitSchema = options.schema;
    registerView(this);
  }

  /** Root widget of the last build, or null before the first. */
  get root(): W | null {
    return this.frame;
  }

  get schema(): Schema<object> {
    const schema = this.explicitSchema ?? schemaOf(this.target);
    if (!schema) {
      throw new Error(`[fieldview] View "${this.name}": target has no schema. Register one with defineSchema().register().`);
    }
    return schema;
  }

  descriptor(field: string): FieldDescriptor<object> | undefined {
    return this.schema.field(field);
  }

  /** Full tag string for `field`: the per-instance override, else the schema's. */
  fieldTags(field: string): string {
    const override = isViewHost(this.target) ? this.target.tagsFor(field) : undefined;
    return override ?? this.descriptor(field)?.tags ?? '';
  }

  fieldTagValue(field: string, key: string): string {
    return tagValue(this.fieldTags(field), key);
  }

  /**
   * Discard the previous widget tree and build a new one from the current
   * fields. `parent`, when given, receives the root frame on first build.
   */
  build(parent?: W): W {
    this.buildScope?.dispose();
    this.toolkitViews.clear();
    this.widgets.clear();

    let frame = this.frame;
    if (frame === null) {
      frame = this.toolkit.frame(this.name, this.inline ? 'row' : 'grid');
      this.frame = frame;
      if (parent !== undefined) this.toolkit.append(parent, frame);
    } else {
      this.toolkit.clear(frame);
    }

    // Nested under the enclosing build (if any), so a parent rebuild tears
    // down inline children too.
    const scope = createScope();
    this.buildScope = scope;
    const root = frame;
    withScope(scope, () => {
      for (const descriptor of this.schema.fields) {
        this.buildField(root, descriptor);
      }
    });

    return frame;
  }

  private buildField(frame: W, descriptor: FieldDescriptor<object>): void {
    const field = descriptor.name;
    const rawTags = this.fieldTags(field);
    const tags = parseTags(rawTags);
    validateFieldTags(field, tags);
    if (hasTagValue(tags, 'view', '-')) return;

    const value = descriptor.get(this.target);
    const desc = tagValue(tags, 'desc');
    this.toolkit.label(frame, `lbl_${field}`, field, desc || undefined);

    const kind = classifyField(value, descriptor, tags, (v) => this.toolkit.isNative(v));
    const inactive = this.inactive || hasTagValue(tags, 'inactive', '+');

    if (kind.kind === 'nested' && kind.inline && value !== null && typeof value === 'object') {
      const child = new View<W>(value, `${this.name}_${field}`, { toolkit: this.toolkit, inline: true, inactive });
      if (isViewHost(value)) value.attachView(child, 'inline');
      const widget = child.build(frame);
      if (desc) this.toolkit.setTooltip(widget, desc);
      this.widgets.set(field, { field, kind, widget, child });
      return;
    }

    const name = widgetNameFor(this.name, field);
    const created = createFieldWidget(this.toolkit, frame, name, field, kind, value, tags, rawTags, inactive);
    const binding: FieldBinding<W> = { field, kind, widget: created.widget };
    if (created.toolkitView) this.toolkitViews.set(field, binding);
    else this.widgets.set(field, binding);
  }

  /**
   * Re-read every built field and push its value into the existing widget.
   * Toolkit views and nested fields are skipped: call the child view's
   * `refresh()` to update those.
   */
  refresh(): void {
    for (const binding of this.widgets.values()) {
      if (binding.kind.kind === 'nested' || binding.kind.kind === 'native') continue;
      const descriptor = this.descriptor(binding.field);
      if (!descriptor) {
        warn(`View "${this.name}": field "${binding.field}" left the schema; rebuild to drop its widget.`);
        continue;
      }
      updateFieldWidget(this.toolkit, binding.widget, binding.field, binding.kind, descriptor.get(this.target));
    }
  }

  setFieldValue(field: string, value: unknown): void {
    const descriptor = this.descriptor(field);
    if (!descriptor) {
      throw new Error(`[fieldview] View "${this.name}" has no field "${field}".`);
    }
    descriptor.set(this.target, value);
  }

  /** The dialog editor for a field's current object value, if one was opened. */
  editorFor(field: string): NestedEditor<W> | undefined {
    const value = this.descriptor(field)?.get(this.target);
    return value !== null && typeof value === 'object' ? this.editors.get(value) : undefined;
  }

  /** Open the dialog editor behind a nested or toolkit-native field. */
  editField(field: string): void {
    const descriptor = this.descriptor(field);
    if (!descriptor) {
      throw new Error(`[fieldview] View "${this.name}" has no field "${field}".`);
    }
    const value = descriptor.get(this.target);
    if (value === null || typeof value !== 'object') {
      warn(`View "${this.name}": field "${field}" holds no object to edit.`);
      return;
    }

    const title = `${this.name}_${field}`;
    let editor = this.editors.get(value);
    if (!editor) {
      editor = new NestedEditor(this.toolkit, title);
      this.editors.set(value, editor);
    }

    if (this.toolkit.isNative(value)) {
      const tags = this.fieldTags(field);
      editor.open((body) => {
        if (this.toolkit.nativeEditor(body, value, tags) === null) {
          warn(`View "${this.name}": toolkit has no editor for field "${field}".`);
        }
      });
      return;
    }

    if (!schemaOf(value)) {
      warn(`View "${this.name}": field "${field}" is neither a bound object nor a toolkit value.`);
      return;
    }

    editor.open((body) => {
      const child = new View<W>(value, title, { toolkit: this.toolkit });
      if (isViewHost(value)) value.attachView(child, 'dialog');
      child.build(body);
    });
  }
}
