/**
 * fieldview
 *
 * Builds editable widget trees over bound objects from per-field tags,
 * keeps them in sync, and routes widget edits back into the objects.
 *
 * @module fieldview
 */

export { setDevMode, isInDevMode, setLogHandler, type LogLevel, type LogRecord } from './core/dev.js';
export { configure, getConfig, resetConfig, type FieldViewConfig } from './core/config.js';

export { parseTags, tagValue, hasTagValue, type TagSet } from './view/tags.js';
export {
  defineSchema,
  bindSchema,
  schemaOf,
  isBound,
  enumType,
  SchemaBuilder,
  type Schema,
  type FieldDescriptor,
  type FieldOptions,
  type EnumType,
  type EnumValue,
  type NumericKind,
} from './view/schema.js';
export { classifyField, parseNumeric, type FieldKind, type FieldKindName, type NumberKind } from './view/dispatch.js';
export { formatNumber } from './view/format.js';
export {
  registerView,
  findView,
  lookupView,
  resolveWidgetName,
  widgetNameFor,
  registeredViewNames,
  resetViewRegistry,
  UnknownViewError,
  type RegisteredView,
  type ResolvedWidget,
} from './view/registry.js';
export { View, type ViewOptions, type FieldBinding, type ViewHost, type ViewSlot } from './view/view.js';
export { NestedEditor, type EditorState } from './view/nested.js';
export { ViewObject } from './view/view-object.js';
export { applyParams, type ParamSel, type ParamSheet, type ApplyParamsOptions } from './view/params.js';

export type {
  Toolkit,
  WidgetEvent,
  FrameLayout,
  SpinBoxOptions,
  TextFieldOptions,
  DialogHandle,
  DialogOptions,
  DialogResult,
} from './toolkit/types.js';
export { createDomToolkit, type DomToolkitOptions, type NativeValueView, type NativeViewContext } from './toolkit/dom.js';
