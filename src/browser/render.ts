/**
 * render.ts — Text-mode style, layout and paint
 *
 * Every glyph occupies one CHAR_W × LINE_H cell. Block boxes stack down the
 * page; inline content flows word by word and wraps at the container edge.
 * Inputs and buttons are fixed-size inline boxes.
 *
 *   style(el)   → display from tag default, stylesheet rules, inline style
 *   layout      → LayoutBox tree
 *   paint       → DisplayItem[] (text runs and widget rectangles)
 */

import { VElement, VText, type VNode } from './dom.js';
import { parseSelector, matchSpecificity, SelectorSyntaxError } from './selector.js';
import { CHAR_W, LINE_H, CONTENT_PAD, INPUT_CHARS, BUTTON_PAD_CHARS } from './constants.js';
import type { Display, StyleRule, LayoutBox, DisplayItem, RenderResult } from './types.js';

// ── Style ─────────────────────────────────────────────────────────────────────

const HIDDEN_TAGS = new Set(['head', 'script', 'style', 'title', 'meta', 'link', 'base', 'noscript', 'template']);

const BLOCK_TAGS = new Set([
  'html', 'body', 'div', 'p', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'ul', 'ol', 'li',
  'form', 'section', 'article', 'header', 'footer', 'nav', 'main', 'aside', 'pre',
  'blockquote', 'table', 'tr', 'hr', 'dl', 'dt', 'dd', 'fieldset', 'figure',
]);

function isDisplay(v: string): v is Display {
  return v === 'block' || v === 'inline' || v === 'none';
}

function displayValue(raw: string): Display | null {
  var v = raw.trim().toLowerCase();
  if (v === 'inline-block' || v === 'inline-flex') return 'inline';
  if (v === 'flex' || v === 'grid' || v === 'list-item' || v === 'table') return 'block';
  return isDisplay(v) ? v : null;
}

/** `display` out of a declaration block; the last valid declaration wins. */
function declaredDisplay(decls: string): Display | null {
  var out: Display | null = null;
  for (var decl of decls.split(';')) {
    var colon = decl.indexOf(':');
    if (colon < 0) continue;
    if (decl.slice(0, colon).trim().toLowerCase() !== 'display') continue;
    var d = displayValue(decl.slice(colon + 1).replace(/!important/i, ''));
    if (d) out = d;
  }
  return out;
}

/**
 * Extract `display` rules from a stylesheet. Rules with selectors the engine
 * does not understand are dropped; other properties are ignored.
 */
export function parseStylesheet(css: string, firstOrder = 0): StyleRule[] {
  var rules: StyleRule[] = [];
  var src = css.replace(/\/\*[\s\S]*?\*\//g, '');
  var re = /([^{}]+)\{([^}]*)\}/g;
  var order = firstOrder;
  var m: RegExpExecArray | null;
  while ((m = re.exec(src)) !== null) {
    var selText = m[1].trim();
    if (!selText || selText[0] === '@') continue;
    var display = declaredDisplay(m[2]);
    if (!display) continue;
    try {
      rules.push({ selector: parseSelector(selText), display, order: order++ });
    } catch (e) {
      if (e instanceof SelectorSyntaxError) continue;
      throw e;
    }
  }
  return rules;
}

export function computeDisplay(el: VElement, rules: readonly StyleRule[]): Display {
  var display: Display = HIDDEN_TAGS.has(el.localName) ? 'none'
                       : BLOCK_TAGS.has(el.localName) ? 'block' : 'inline';
  var bestSpec = -1;
  var bestOrder = -1;
  for (var r of rules) {
    var spec = matchSpecificity(r.selector, el);
    if (spec < 0) continue;
    if (spec > bestSpec || (spec === bestSpec && r.order > bestOrder)) {
      bestSpec = spec; bestOrder = r.order; display = r.display;
    }
  }
  var inline = el.getAttribute('style');
  if (inline) {
    var d = declaredDisplay(inline);
    if (d) display = d;
  }
  return display;
}

// ── Layout ────────────────────────────────────────────────────────────────────

function isWidget(el: VElement): boolean {
  return el.localName === 'input' || el.localName === 'button';
}

function widgetLabel(el: VElement): string {
  return el.localName === 'button' ? el.textContent.trim() : (el.getAttribute('value') ?? '');
}

function widgetWidth(el: VElement): number {
  if (el.localName === 'input') return INPUT_CHARS * CHAR_W;
  return (widgetLabel(el).length + 2 * BUTTON_PAD_CHARS) * CHAR_W;
}

class LineFlow {
  private _x0:   number;
  private _y0:   number;
  private _maxX: number;
  private _x:    number;
  private _y:    number;
  private _used = false;

  constructor(x0: number, y: number, width: number) {
    this._x0 = x0; this._y0 = y; this._maxX = x0 + width;
    this._x  = x0; this._y  = y;
  }

  /** Reserve `w` pixels on the current line, wrapping first if it does not fit; returns the box origin. */
  place(w: number): { x: number; y: number } {
    var gap = this._x > this._x0 ? CHAR_W : 0;
    if (this._x + gap + w > this._maxX && this._x > this._x0) {
      this._y += LINE_H; this._x = this._x0; gap = 0;
    }
    var at = { x: this._x + gap, y: this._y };
    this._x = at.x + w;
    this._used = true;
    return at;
  }

  /** Height consumed so far. */
  get height(): number { return this._used ? this._y + LINE_H - this._y0 : 0; }
}

function unionBox(node: VNode, kids: LayoutBox[], fallbackX: number, fallbackY: number): LayoutBox {
  if (!kids.length) return { node, x: fallbackX, y: fallbackY, w: 0, h: 0, children: kids };
  var x0 = Infinity, y0 = Infinity, x1 = -Infinity, y1 = -Infinity;
  for (var k of kids) {
    x0 = Math.min(x0, k.x); y0 = Math.min(y0, k.y);
    x1 = Math.max(x1, k.x + k.w); y1 = Math.max(y1, k.y + k.h);
  }
  return { node, x: x0, y: y0, w: x1 - x0, h: y1 - y0, children: kids };
}

function layoutInline(node: VNode, flow: LineFlow, rules: readonly StyleRule[], x: number, y: number): LayoutBox | null {
  if (node instanceof VText) {
    var frags: LayoutBox[] = [];
    for (var word of node.data.split(/\s+/)) {
      if (!word) continue;
      var at = flow.place(word.length * CHAR_W);
      frags.push({ node, x: at.x, y: at.y, w: word.length * CHAR_W, h: LINE_H, text: word, children: [] });
    }
    return frags.length ? unionBox(node, frags, x, y) : null;
  }
  if (!(node instanceof VElement)) return null;
  if (computeDisplay(node, rules) === 'none') return null;
  if (isWidget(node)) {
    var w = widgetWidth(node);
    var pos = flow.place(w);
    return { node, x: pos.x, y: pos.y, w, h: LINE_H, children: [] };
  }
  var kids: LayoutBox[] = [];
  for (var c of node.childNodes) {
    var b = layoutInline(c, flow, rules, x, y);
    if (b) kids.push(b);
  }
  return unionBox(node, kids, x, y);
}

function layoutBlock(el: VElement, x: number, y: number, w: number, rules: readonly StyleRule[]): LayoutBox {
  var pad = el.localName === 'body' ? CONTENT_PAD : 0;
  var innerX = x + pad;
  var innerW = Math.max(CHAR_W, w - 2 * pad);
  var cursorY = y + pad;
  var box: LayoutBox = { node: el, x, y, w, h: 0, children: [] };
  var run: VNode[] = [];

  function flush(): void {
    if (!run.length) return;
    var flow = new LineFlow(innerX, cursorY, innerW);
    for (var n of run) {
      var b = layoutInline(n, flow, rules, innerX, cursorY);
      if (b) box.children.push(b);
    }
    cursorY += flow.height;
    run = [];
  }

  for (var c of el.childNodes) {
    if (c instanceof VElement) {
      var d = computeDisplay(c, rules);
      if (d === 'none') continue;
      if (d === 'block') {
        flush();
        var child = layoutBlock(c, innerX, cursorY, innerW, rules);
        box.children.push(child);
        cursorY += child.h;
        continue;
      }
    }
    run.push(c);
  }
  flush();
  box.h = cursorY - y + pad;
  return box;
}

export function layout(root: VElement, rules: readonly StyleRule[], viewportWidth: number): LayoutBox {
  return layoutBlock(root, 0, 0, viewportWidth, rules);
}

// ── Paint ─────────────────────────────────────────────────────────────────────

export function paint(root: LayoutBox): DisplayItem[] {
  var items: DisplayItem[] = [];
  function visit(b: LayoutBox): void {
    if (b.text !== undefined) {
      items.push({ kind: 'text', x: b.x, y: b.y, text: b.text, node: b.node });
      return;
    }
    var el = b.node;
    if (el instanceof VElement && isWidget(el)) {
      items.push({ kind: 'rect', x: b.x, y: b.y, w: b.w, h: b.h, node: el });
      var label = widgetLabel(el);
      var pad = el.localName === 'button' ? BUTTON_PAD_CHARS * CHAR_W : 0;
      if (label) items.push({ kind: 'text', x: b.x + pad, y: b.y, text: label.slice(0, INPUT_CHARS), node: el });
      return;
    }
    for (var c of b.children) visit(c);
  }
  visit(root);
  return items;
}

/** Text items grouped into lines top to bottom; words on a line joined by single spaces. */
export function displayText(items: readonly DisplayItem[]): string[] {
  var rows = new Map<number, { x: number; text: string }[]>();
  for (var it of items) {
    if (it.kind !== 'text') continue;
    var row = rows.get(it.y);
    if (!row) { row = []; rows.set(it.y, row); }
    row.push({ x: it.x, text: it.text });
  }
  return [...rows.keys()].sort((a, b) => a - b).map(y => {
    var row = rows.get(y) ?? [];
    return row.sort((a, b) => a.x - b.x).map(r => r.text).join(' ');
  });
}

// ── Pipeline ──────────────────────────────────────────────────────────────────

export function renderDocument(root: VElement, rules: readonly StyleRule[], viewportWidth: number): RenderResult {
  var box = layout(root, rules, viewportWidth);
  return { root: box, displayList: paint(box), height: box.h };
}

function contains(b: LayoutBox, x: number, y: number): boolean {
  return x >= b.x && x < b.x + b.w && y >= b.y && y < b.y + b.h;
}

/** Deepest node whose box contains (x, y); later siblings are on top. */
export function hitTest(root: LayoutBox, x: number, y: number): VNode | null {
  function deepest(b: LayoutBox): VNode | null {
    for (var i = b.children.length - 1; i >= 0; i--) {
      var hit = deepest(b.children[i]);
      if (hit) return hit;
    }
    return contains(b, x, y) ? b.node : null;
  }
  return deepest(root);
}
