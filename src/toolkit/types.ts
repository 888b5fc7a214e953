/**
 * Toolkit Types
 *
 * The widget-factory capability set the view engine builds on.
 * `W` is the toolkit's opaque widget handle; the engine never looks inside it
 * and addresses widgets only through their names.
 */

/** Layout used by `frame()`: a two-column grid for full views, a row for inline ones. */
export type FrameLayout = 'grid' | 'row';

/** User interactions a widget can emit. */
export type WidgetEvent = 'toggled' | 'selected' | 'valueChanged' | 'editingDone' | 'triggered';

export interface SpinBoxOptions {
  /** Initial displayed text. */
  value: string;
  step: number;
  min?: number;
  max?: number;
  /** The value is an arbitrary-size integer; stepping must not go through floats. */
  bigint?: boolean;
}

export interface TextFieldOptions {
  /** Width in characters. */
  width?: number;
}

export type DialogResult = 'ok' | 'cancel';

export interface DialogOptions {
  /** Dialog title, also used as its widget name. */
  title: string;
}

export interface DialogHandle<W> {
  /** Container the dialog content is added to. */
  readonly body: W;
  show(): void;
  close(result?: DialogResult): void;
  /** Bring an already shown dialog to front. */
  raise(): void;
  isOpen(): boolean;
  /** Subscribe to close. Returns unsubscribe function. */
  onClose(fn: (result: DialogResult) => void): () => void;
}

export interface Toolkit<W> {
  frame(name: string, layout: FrameLayout): W;
  /** Remove every child of a container. */
  clear(parent: W): void;
  append(parent: W, child: W): void;

  label(parent: W, name: string, text: string, tooltip?: string): W;
  checkBox(parent: W, name: string, checked: boolean): W;
  comboBox(parent: W, name: string, items: readonly string[], current: number): W;
  spinBox(parent: W, name: string, options: SpinBoxOptions): W;
  textField(parent: W, name: string, text: string, options?: TextFieldOptions): W;
  action(parent: W, name: string, text: string): W;
  dialog(options: DialogOptions): DialogHandle<W>;

  widgetName(widget: W): string;
  setInactive(widget: W): void;
  setTooltip(widget: W, text: string): void;

  isChecked(widget: W): boolean;
  setChecked(widget: W, checked: boolean): void;
  currentIndex(widget: W): number;
  setCurrentIndex(widget: W, index: number): void;
  spinText(widget: W): string;
  setSpinText(widget: W, text: string): void;
  text(widget: W): string;
  setText(widget: W, text: string): void;

  /**
   * Connect a handler to a widget event.
   * The handler only receives the emitting widget.
   * Returns a disconnect function.
   */
  connect(widget: W, event: WidgetEvent, handler: (sender: W) => void): () => void;

  /** True for values whose type belongs to the toolkit or the engine behind it. */
  isNative(value: unknown): boolean;
  /** The toolkit's own value view for `value`, or null when it has none. */
  nativeView(parent: W, name: string, value: unknown, tags: string): W | null;
  /** Dedicated editor for `value`, hosted in a dialog, or null when it has none. */
  nativeEditor(parent: W, value: unknown, tags: string): W | null;
}
