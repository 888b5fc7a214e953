import { signal, type Signal } from '../core/signal.js';
import { warn } from '../core/dev.js';
import type { DialogHandle, DialogResult, Toolkit } from '../toolkit/types.js';

export type EditorState = 'closed' | 'opening' | 'open';

/**
 * Dialog-hosted editor for one object.
 *
 *   closed --open()--> opening --content built--> open --Ok/Cancel--> closed
 *
 * Activating it again while `opening` or `open` returns the existing dialog
 * (raised to front when already shown) instead of stacking a second one.
 */
export class NestedEditor<W> {
  readonly state: Signal<EditorState> = signal<EditorState>('closed');
  private handle: DialogHandle<W> | null = null;

  constructor(
    private readonly toolkit: Toolkit<W>,
    readonly title: string
  ) {}

  get dialog(): DialogHandle<W> | null {
    return this.handle;
  }

  /**
   * Open the dialog, building its content with `populate`.
   * If `populate` throws, the dialog is discarded and the error propagates.
   */
  open(populate: (body: W) => void): DialogHandle<W> {
    if (this.handle) {
      if (this.state() === 'open') this.handle.raise();
      else warn(`Editor "${this.title}" activated again while opening.`);
      return this.handle;
    }

    this.state.set('opening');
    const dialog = this.toolkit.dialog({ title: this.title });
    this.handle = dialog;

    const unsubscribe = dialog.onClose(() => {
      unsubscribe();
      this.handle = null;
      this.state.set('closed');
    });

    try {
      populate(dialog.body);
    } catch (error) {
      unsubscribe();
      this.handle = null;
      this.state.set('closed');
      dialog.close('cancel');
      throw error;
    }

    dialog.show();
    this.state.set('open');
    return dialog;
  }

  close(result: DialogResult = 'cancel'): void {
    this.handle?.close(result);
  }
}
