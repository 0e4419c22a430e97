/**
 * events.ts — Host interactions → script events → default actions
 *
 * The dispatcher fires the script-visible event first and only then decides
 * what the browser itself does. Links and form submission can be canceled
 * with preventDefault(); typing is cancelable at keydown, never at change.
 */

import { VElement, closestElement, preorder, type VNode } from './dom.js';

export type DefaultAction =
  | { kind: 'none' }
  | { kind: 'navigate'; url: string; method: 'GET' | 'POST'; body?: string }
  | { kind: 'focus'; input: VElement };

/** The part of the bridge the dispatcher talks to. */
export interface EventSink {
  dispatchEvent(type: string, node: VNode): boolean;
}

export interface PageContext {
  readonly url: string;
  render(): void;
}

const NONE: DefaultAction = { kind: 'none' };

/** Resolve `href` against `base`; hrefs that do not form a URL are kept as written. */
export function resolveUrl(href: string, base: string): string {
  try {
    return new URL(href, base).href;
  } catch (e) {
    if (e instanceof TypeError) return href;
    throw e;
  }
}

function enclosing(node: VElement, tag: string): VElement | null {
  for (var n: VElement | null = node; n; n = n.parentNode) {
    if (n.localName === tag) return n;
  }
  return null;
}

export class EventDispatcher {
  private _sink: EventSink;
  private _page: PageContext;

  constructor(sink: EventSink, page: PageContext) {
    this._sink = sink;
    this._page = page;
  }

  /**
   * Click on `target`. Text is retargeted to its parent element. If no
   * listener cancels, the nearest link, input or button decides the action.
   */
  click(target: VNode): DefaultAction {
    var el = closestElement(target);
    if (!el) return NONE;
    if (this._sink.dispatchEvent('click', el)) return NONE;

    for (var n: VElement | null = el; n; n = n.parentNode) {
      if (n.localName === 'a' && n.hasAttribute('href')) {
        return { kind: 'navigate', url: resolveUrl(n.getAttribute('href') ?? '', this._page.url), method: 'GET' };
      }
      if (n.localName === 'input') {
        n.setAttribute('value', '');
        this._page.render();
        return { kind: 'focus', input: n };
      }
      if (n.localName === 'button') {
        var form = enclosing(n, 'form');
        return form ? this.submit(form) : NONE;
      }
    }
    return NONE;
  }

  /** Submit `form`: `submit` fires on it first and may cancel. */
  submit(form: VElement): DefaultAction {
    if (this._sink.dispatchEvent('submit', form)) return NONE;
    var pairs: string[] = [];
    for (var n of preorder(form)) {
      if (!(n instanceof VElement) || n.localName !== 'input') continue;
      var name = n.getAttribute('name');
      if (!name) continue;
      pairs.push(encodeURIComponent(name) + '=' + encodeURIComponent(n.getAttribute('value') ?? ''));
    }
    var action = form.getAttribute('action') ?? '';
    return { kind: 'navigate', url: resolveUrl(action, this._page.url), method: 'POST', body: pairs.join('&') };
  }

  /**
   * Type `ch` into `input`. `keydown` can veto the insertion; `change` sees
   * the new value and cannot undo it. Returns whether the character went in.
   */
  keypress(input: VElement, ch: string): boolean {
    if (ch.length !== 1 || ch < ' ' || ch > '~') return false;
    if (this._sink.dispatchEvent('keydown', input)) return false;
    input.setAttribute('value', (input.getAttribute('value') ?? '') + ch);
    this._sink.dispatchEvent('change', input);
    this._page.render();
    return true;
  }

  /** Enter in an input submits its form, if it has one. */
  enter(input: VElement): DefaultAction {
    var form = enclosing(input, 'form');
    return form ? this.submit(form) : NONE;
  }
}
