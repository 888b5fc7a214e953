import { requireToolkit } from '../core/config.js';
import type { DialogHandle, Toolkit } from '../toolkit/types.js';
import { NestedEditor } from './nested.js';
import { View, type ViewHost, type ViewSlot } from './view.js';

/**
 * Base class for bound objects.
 *
 * Holds per-instance tag overrides and the views created for the object, so
 * the owner can refresh them after changing fields out of band. None of
 * these members are fields of the object's schema.
 *
 * View names must be unique for the life of the process: toolkit callbacks
 * find views by name only.
 */
export abstract class ViewObject implements ViewHost {
  private readonly tagOverrides = new Map<string, string>();
  private mainView: { refresh(): void } | null = null;
  private inlineView: { refresh(): void } | null = null;
  private dialogEditor: NestedEditor<unknown> | null = null;

  setTags(field: string, tags: string): void {
    this.tagOverrides.set(field, tags);
  }

  tagsFor(field: string): string | undefined {
    return this.tagOverrides.get(field);
  }

  attachView(view: { refresh(): void }, slot: ViewSlot): void {
    if (slot === 'main' || slot === 'dialog') this.mainView = view;
    else this.inlineView = view;
  }

  /** Create (but not build) the main view for this object. */
  newView<W>(name: string, toolkit: Toolkit<W>): View<W>;
  newView(name: string): View<unknown>;
  newView<W>(name: string, toolkit?: Toolkit<W>): View<W> | View<unknown> {
    const view = toolkit
      ? new View<W>(this, name, { toolkit })
      : new View<unknown>(this, name, { toolkit: requireToolkit() });
    this.attachView(view, 'main');
    return view;
  }

  /** Create (but not build) a single-row view, for embedding in another view. */
  newInlineView<W>(name: string, toolkit: Toolkit<W>): View<W>;
  newInlineView(name: string): View<unknown>;
  newInlineView<W>(name: string, toolkit?: Toolkit<W>): View<W> | View<unknown> {
    const view = toolkit
      ? new View<W>(this, name, { toolkit, inline: true })
      : new View<unknown>(this, name, { toolkit: requireToolkit(), inline: true });
    this.attachView(view, 'inline');
    return view;
  }

  updateView(): void {
    this.mainView?.refresh();
  }

  updateInlineView(): void {
    this.inlineView?.refresh();
  }

  /**
   * Open a dialog with a full view of this object, or raise the one already open.
   */
  openViewDialog(name: string, toolkit: Toolkit<unknown> = requireToolkit()): DialogHandle<unknown> {
    if (!this.dialogEditor) this.dialogEditor = new NestedEditor(toolkit, name);
    return this.dialogEditor.open((body) => {
      const view = new View<unknown>(this, name, { toolkit });
      this.attachView(view, 'dialog');
      view.build(body);
    });
  }
}
