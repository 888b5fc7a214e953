/**
 * Edit callbacks.
 *
 * Each handler receives only the emitting widget. It reads the widget's
 * value, resolves `"<ViewName>:<FieldName>"` through the registry, and
 * writes the converted value into that view's object.
 */

import { warn } from '../core/dev.js';
import type { Toolkit } from '../toolkit/types.js';
import { parseNumeric, type NumberKind } from './dispatch.js';
import { resolveWidgetName } from './registry.js';

export function setBoolValue<W>(toolkit: Toolkit<W>, sender: W): void {
  const { view, field } = resolveWidgetName(toolkit.widgetName(sender));
  view.setFieldValue(field, toolkit.isChecked(sender));
}

export function setEnumValue<W>(toolkit: Toolkit<W>, sender: W): void {
  const name = toolkit.widgetName(sender);
  const { view, field } = resolveWidgetName(name);
  const type = view.descriptor(field)?.enum;
  if (!type) {
    warn(`Combo box "${name}": field "${field}" of view "${view.name}" has no enum type.`);
    return;
  }

  const index = toolkit.currentIndex(sender);
  const value = type.valueAt(index);
  if (value === undefined) {
    warn(`Combo box "${name}": index ${index} is outside ${type.name}.`);
    return;
  }
  view.setFieldValue(field, value);
}

export function setNumberValue<W>(toolkit: Toolkit<W>, sender: W, kind: NumberKind): void {
  const name = toolkit.widgetName(sender);
  const { view, field } = resolveWidgetName(name);
  const text = toolkit.spinText(sender);
  const value = parseNumeric(text, kind.numeric, kind.format);
  if (value === undefined) {
    warn(`Spin box "${name}": "${text}" is not a valid ${kind.numeric} value; edit ignored.`);
    return;
  }
  view.setFieldValue(field, value);
}

/** Stores the raw text: text fields carry no type information back. */
export function setStringValue<W>(toolkit: Toolkit<W>, sender: W): void {
  const { view, field } = resolveWidgetName(toolkit.widgetName(sender));
  view.setFieldValue(field, toolkit.text(sender));
}

export function editObject<W>(toolkit: Toolkit<W>, sender: W): void {
  const { view, field } = resolveWidgetName(toolkit.widgetName(sender));
  view.editField(field);
}
