/**
 * page.ts — A loaded document and its render pipeline
 *
 * Stylesheets are collected once, when the page is built; later DOM
 * mutations only re-run style, layout and paint.
 */

import { VDocument, VElement, preorder, type VNode } from './dom.js';
import { parseFragment, findInlineStyles } from './html.js';
import { parseSelector, matchesSelector, type SelectorList } from './selector.js';
import { parseStylesheet, renderDocument, hitTest, displayText } from './render.js';
import type { DocumentEngine, RenderResult, StyleRule } from './types.js';

export class Page implements DocumentEngine {
  readonly url: string;
  readonly doc: VDocument;
  readonly rules: readonly StyleRule[];
  private _width: number;
  private _last: RenderResult | null = null;
  private _renders = 0;

  /**
   * @param stylesheets  text of each linked stylesheet, in link order; `<style>`
   *                     elements of the document are applied after them
   */
  constructor(url: string, doc: VDocument, stylesheets: readonly string[], viewportWidth: number) {
    this.url    = url;
    this.doc    = doc;
    this._width = viewportWidth;
    var rules: StyleRule[] = [];
    for (var css of [...stylesheets, ...findInlineStyles(doc)]) {
      rules.push(...parseStylesheet(css, rules.length));
    }
    this.rules = rules;
  }

  get root(): VElement { return this.doc.documentElement; }
  get title(): string { return this.doc.title; }

  /** Number of times render() has run. */
  get renderCount(): number { return this._renders; }

  /** The most recent render, rendering first if there is none yet. */
  get layout(): RenderResult {
    return this._last ?? this._renderNow();
  }

  render(): void {
    this._renderNow();
  }

  private _renderNow(): RenderResult {
    var result = renderDocument(this.root, this.rules, this._width);
    this._last = result;
    this._renders++;
    return result;
  }

  hitTest(x: number, y: number): VNode | null {
    return hitTest(this.layout.root, x, y);
  }

  /** Visible text, one string per rendered line. */
  textLines(): string[] {
    return displayText(this.layout.displayList);
  }

  // ── DocumentEngine ─────────────────────────────────────────────────────────

  parseFragment(html: string): VNode[] { return parseFragment(html); }
  treeNodesPreorder(): VNode[] { return preorder(this.root); }
  parseSelector(text: string): SelectorList { return parseSelector(text); }
  selectorMatches(selector: SelectorList, el: VElement): boolean { return matchesSelector(selector, el); }
  createElement(tag: string): VElement { return new VElement(tag); }
}
