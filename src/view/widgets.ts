import { getCurrentScope } from '../core/scope.js';
import { warn } from '../core/dev.js';
import type { Toolkit, WidgetEvent } from '../toolkit/types.js';
import { displayNumber, kindAccepts, type FieldKind } from './dispatch.js';
import { editObject, setBoolValue, setEnumValue, setNumberValue, setStringValue } from './edit.js';
import { tagValue, type TagSet } from './tags.js';

export interface CreatedWidget<W> {
  widget: W;
  /** True when the toolkit's own value view renders the field. */
  toolkitView: boolean;
}

/** Connects a handler for the lifetime of the current scope (the build). */
function connect<W>(toolkit: Toolkit<W>, widget: W, event: WidgetEvent, handler: (sender: W) => void): void {
  const disconnect = toolkit.connect(widget, event, handler);
  getCurrentScope()?.onCleanup(disconnect);
}

function buildWidget<W>(
  toolkit: Toolkit<W>,
  parent: W,
  name: string,
  field: string,
  kind: FieldKind,
  value: unknown,
  rawTags: string
): CreatedWidget<W> {
  switch (kind.kind) {
    case 'bool': {
      const widget = toolkit.checkBox(parent, name, value === true);
      connect(toolkit, widget, 'toggled', (sender) => setBoolValue(toolkit, sender));
      return { widget, toolkitView: false };
    }

    case 'enum': {
      const widget = toolkit.comboBox(parent, name, kind.type.names, kind.type.indexOf(value));
      connect(toolkit, widget, 'selected', (sender) => setEnumValue(toolkit, sender));
      return { widget, toolkitView: false };
    }

    case 'native': {
      const view = toolkit.nativeView(parent, name, value, rawTags);
      if (view !== null) return { widget: view, toolkitView: true };
      const widget = toolkit.action(parent, name, field);
      connect(toolkit, widget, 'triggered', (sender) => editObject(toolkit, sender));
      return { widget, toolkitView: false };
    }

    case 'nested': {
      const widget = toolkit.action(parent, name, field);
      connect(toolkit, widget, 'triggered', (sender) => editObject(toolkit, sender));
      return { widget, toolkitView: false };
    }

    case 'number': {
      const numberKind = kind;
      const text = typeof value === 'number' || typeof value === 'bigint' ? displayNumber(kind, value) : String(value);
      const widget = toolkit.spinBox(parent, name, {
        value: text,
        step: kind.step,
        min: kind.min,
        max: kind.max,
        bigint: kind.numeric === 'bigint',
      });
      connect(toolkit, widget, 'valueChanged', (sender) => setNumberValue(toolkit, sender, numberKind));
      return { widget, toolkitView: false };
    }

    case 'text': {
      const widget = toolkit.textField(parent, name, String(value), { width: kind.width });
      connect(toolkit, widget, 'editingDone', (sender) => setStringValue(toolkit, sender));
      return { widget, toolkitView: false };
    }
  }
}

/**
 * Create the editing widget for one field and apply the cross-cutting tags.
 * Inline nested views are built by the view itself, not here.
 */
export function createFieldWidget<W>(
  toolkit: Toolkit<W>,
  parent: W,
  name: string,
  field: string,
  kind: FieldKind,
  value: unknown,
  tags: TagSet,
  rawTags: string,
  inactive: boolean
): CreatedWidget<W> {
  const created = buildWidget(toolkit, parent, name, field, kind, value, rawTags);

  const desc = tagValue(tags, 'desc');
  if (desc) toolkit.setTooltip(created.widget, desc);
  if (inactive) toolkit.setInactive(created.widget);

  return created;
}

/**
 * Push the current value into an existing widget.
 * Native and nested fields are left alone; they keep themselves in sync.
 */
export function updateFieldWidget<W>(toolkit: Toolkit<W>, widget: W, field: string, kind: FieldKind, value: unknown): void {
  if (!kindAccepts(kind, value)) {
    warn(`Field "${field}": value ${String(value)} no longer fits its ${kind.kind} widget; not refreshed.`);
    return;
  }

  switch (kind.kind) {
    case 'bool':
      toolkit.setChecked(widget, value === true);
      break;
    case 'enum':
      toolkit.setCurrentIndex(widget, kind.type.indexOf(value));
      break;
    case 'number':
      if (typeof value === 'number' || typeof value === 'bigint') {
        toolkit.setSpinText(widget, displayNumber(kind, value));
      }
      break;
    case 'text':
      toolkit.setText(widget, String(value));
      break;
    case 'native':
    case 'nested':
      break;
  }
}
