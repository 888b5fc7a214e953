import { signal } from '../core/signal.js';
import { reportError } from '../core/dev.js';
import type { DialogHandle, DialogOptions, DialogResult } from './types.js';

function showElement(el: HTMLDialogElement): void {
  // Some DOM implementations lack the modal API; the attribute is the fallback.
  if (typeof el.showModal === 'function') el.showModal();
  else el.setAttribute('open', '');
}

function hideElement(el: HTMLDialogElement): void {
  if (typeof el.close === 'function') el.close();
  else el.removeAttribute('open');
}

/**
 * Modal `<dialog>` with a body container and Ok/Cancel buttons.
 *
 * Closing (buttons, Escape, backdrop click) removes the element from the
 * document and notifies `onClose` listeners exactly once.
 */
export function createDomDialog(doc: Document, options: DialogOptions): DialogHandle<HTMLElement> {
  const el = doc.createElement('dialog');
  el.setAttribute('data-name', options.title);
  el.setAttribute('aria-modal', 'true');
  el.className = 'fv-dialog';

  const heading = doc.createElement('h2');
  heading.textContent = options.title;
  const body = doc.createElement('div');
  body.className = 'fv-dialog-body';
  const footer = doc.createElement('div');
  footer.className = 'fv-dialog-footer';
  const ok = doc.createElement('button');
  ok.type = 'button';
  ok.textContent = 'Ok';
  ok.setAttribute('data-action', 'ok');
  const cancel = doc.createElement('button');
  cancel.type = 'button';
  cancel.textContent = 'Cancel';
  cancel.setAttribute('data-action', 'cancel');
  footer.append(ok, cancel);
  el.append(heading, body, footer);

  const open = signal(false);
  let closed = false;
  const listeners = new Set<(result: DialogResult) => void>();

  const unsub = open.on((isOpen) => {
    if (isOpen && !el.hasAttribute('open')) showElement(el);
    else if (!isOpen && el.hasAttribute('open')) hideElement(el);
  });

  const close = (result: DialogResult = 'cancel') => {
    if (closed) return;
    closed = true;
    open.set(false);
    unsub();
    el.remove();
    for (const fn of Array.from(listeners)) {
      try {
        fn(result);
      } catch (error) {
        reportError(error, `close handler of dialog "${options.title}"`);
      }
    }
    listeners.clear();
  };

  ok.addEventListener('click', () => close('ok'));
  cancel.addEventListener('click', () => close('cancel'));
  // Escape / native close.
  el.addEventListener('close', () => close('cancel'));
  el.addEventListener('click', (e) => {
    if (e.target === el) close('cancel');
  });

  return {
    body,
    show() {
      if (closed) return;
      if (!el.isConnected) doc.body.appendChild(el);
      open.set(true);
    },
    close,
    raise() {
      if (closed || !el.isConnected) return;
      doc.body.appendChild(el);
      el.focus();
    },
    isOpen: () => open(),
    onClose(fn) {
      listeners.add(fn);
      return () => {
        listeners.delete(fn);
      };
    },
  };
}
