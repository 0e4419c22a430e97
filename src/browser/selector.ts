/**
 * selector.ts — CSS selector parser and matcher
 *
 * Supported:  *  tag  #id  .class  [attr]  [attr=v]  [attr^=v]  [attr$=v]
 *             [attr*=v]  [attr~=v]  :first-child  :last-child  :only-child
 *             descendant ( ), child (>), adjacent (+), sibling (~), lists (,)
 */

import { VElement } from './dom.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export type AttrOp = 'exists' | '=' | '^=' | '$=' | '*=' | '~=';

export interface AttrTest {
  name:  string;
  op:    AttrOp;
  value: string;
}

export type PseudoClass = 'first-child' | 'last-child' | 'only-child';

export interface CompoundSelector {
  /** Lower-case tag, or null for `*` / no type selector. */
  tag:     string | null;
  ids:     string[];
  classes: string[];
  attrs:   AttrTest[];
  pseudos: PseudoClass[];
}

export type Combinator = ' ' | '>' | '+' | '~';

export interface ComplexSelector {
  /** Left to right; `combinators[i]` sits between `compounds[i]` and `compounds[i + 1]`. */
  compounds:   CompoundSelector[];
  combinators: Combinator[];
}

export interface SelectorList {
  text:      string;
  selectors: ComplexSelector[];
}

export class SelectorSyntaxError extends Error {
  readonly selector: string;
  constructor(selector: string, message: string) {
    super(message + ' in selector ' + JSON.stringify(selector));
    this.name     = 'SelectorSyntaxError';
    this.selector = selector;
  }
}

// ── Parser ────────────────────────────────────────────────────────────────────

const PSEUDOS = new Set<string>(['first-child', 'last-child', 'only-child'] satisfies PseudoClass[]);

function isPseudo(name: string): name is PseudoClass {
  return PSEUDOS.has(name);
}

export function parseSelector(text: string): SelectorList {
  var src = text;
  var n = src.length;
  var i = 0;

  function fail(message: string): never {
    throw new SelectorSyntaxError(text, message);
  }
  function skipWS(): boolean {
    var start = i;
    while (i < n && /\s/.test(src[i])) i++;
    return i > start;
  }
  function readIdent(): string {
    var start = i;
    while (i < n && /[A-Za-z0-9_\-\u00A0-\uFFFF]/.test(src[i])) i++;
    return src.slice(start, i);
  }
  function readValue(): string {
    var q = src[i];
    if (q === '"' || q === "'") {
      var end = src.indexOf(q, i + 1);
      if (end < 0) fail('unterminated string');
      var v = src.slice(i + 1, end);
      i = end + 1;
      return v;
    }
    var id = readIdent();
    if (!id) fail('expected attribute value');
    return id;
  }
  function parseAttr(): AttrTest {
    i++;  // [
    skipWS();
    var name = readIdent().toLowerCase();
    if (!name) fail('expected attribute name');
    skipWS();
    if (src[i] === ']') { i++; return { name, op: 'exists', value: '' }; }
    var op: AttrOp;
    if (src[i] === '=') { op = '='; i++; }
    else {
      var two = src.slice(i, i + 2);
      if (two === '^=' || two === '$=' || two === '*=' || two === '~=') { op = two; i += 2; }
      else fail('unexpected ' + (i < n ? JSON.stringify(src[i]) : 'end of input') + ' in attribute selector');
    }
    skipWS();
    var value = readValue();
    skipWS();
    if (src[i] !== ']') fail('expected "]"');
    i++;
    return { name, op, value };
  }
  function parseCompound(): CompoundSelector | null {
    var c: CompoundSelector = { tag: null, ids: [], classes: [], attrs: [], pseudos: [] };
    var any = false;
    if (src[i] === '*') { i++; any = true; }
    else if (i < n && /[A-Za-z_\-\u00A0-\uFFFF]/.test(src[i])) { c.tag = readIdent().toLowerCase(); any = true; }
    for (;;) {
      var ch = src[i];
      if (ch === '#') {
        i++;
        var id = readIdent();
        if (!id) fail('expected id after "#"');
        c.ids.push(id);
      } else if (ch === '.') {
        i++;
        var cls = readIdent();
        if (!cls) fail('expected class name after "."');
        c.classes.push(cls);
      } else if (ch === '[') {
        c.attrs.push(parseAttr());
      } else if (ch === ':') {
        i++;
        var pseudo = readIdent().toLowerCase();
        if (!isPseudo(pseudo)) fail('unsupported pseudo-class ":' + pseudo + '"');
        c.pseudos.push(pseudo);
      } else {
        break;
      }
      any = true;
    }
    return any ? c : null;
  }
  function parseComplex(): ComplexSelector {
    var first = parseCompound();
    if (!first) fail(i < n ? 'unexpected ' + JSON.stringify(src[i]) : 'expected selector');
    var sel: ComplexSelector = { compounds: [first], combinators: [] };
    for (;;) {
      var sawWS = skipWS();
      if (i >= n || src[i] === ',') break;
      var comb: Combinator;
      var ch = src[i];
      if (ch === '>' || ch === '+' || ch === '~') { comb = ch; i++; skipWS(); }
      else if (sawWS) comb = ' ';
      else fail('unexpected ' + JSON.stringify(ch));
      var next = parseCompound();
      if (!next) fail('expected selector after combinator');
      sel.combinators.push(comb);
      sel.compounds.push(next);
    }
    return sel;
  }

  var selectors: ComplexSelector[] = [];
  skipWS();
  if (i >= n) fail('empty selector');
  for (;;) {
    selectors.push(parseComplex());
    if (i >= n) break;
    // parseComplex only stops at end of input or a comma.
    i++;
    skipWS();
    if (i >= n) fail('expected selector after ","');
  }
  return { text, selectors };
}

// ── Matching ──────────────────────────────────────────────────────────────────

function prevElement(el: VElement): VElement | null {
  var p = el.parentNode;
  if (!p) return null;
  var sibs = p.childNodes;
  for (var k = sibs.indexOf(el) - 1; k >= 0; k--) {
    var s = sibs[k];
    if (s instanceof VElement) return s;
  }
  return null;
}

function nextElement(el: VElement): VElement | null {
  var p = el.parentNode;
  if (!p) return null;
  var sibs = p.childNodes;
  for (var k = sibs.indexOf(el) + 1; k < sibs.length; k++) {
    var s = sibs[k];
    if (s instanceof VElement) return s;
  }
  return null;
}

function matchAttr(t: AttrTest, el: VElement): boolean {
  var v = el.getAttribute(t.name);
  if (v === null) return false;
  switch (t.op) {
    case 'exists': return true;
    case '=':      return v === t.value;
    case '^=':     return t.value !== '' && v.startsWith(t.value);
    case '$=':     return t.value !== '' && v.endsWith(t.value);
    case '*=':     return t.value !== '' && v.includes(t.value);
    case '~=':     return v.split(/\s+/).includes(t.value);
  }
}

function matchCompound(c: CompoundSelector, el: VElement): boolean {
  if (c.tag !== null && c.tag !== el.localName) return false;
  for (var id of c.ids)     if (el.id !== id) return false;
  for (var cls of c.classes) if (!el.hasClass(cls)) return false;
  for (var a of c.attrs)    if (!matchAttr(a, el)) return false;
  for (var p of c.pseudos) {
    var hasPrev = prevElement(el) !== null;
    var hasNext = nextElement(el) !== null;
    if (p === 'first-child' && hasPrev) return false;
    if (p === 'last-child'  && hasNext) return false;
    if (p === 'only-child'  && (hasPrev || hasNext)) return false;
  }
  return true;
}

function matchFrom(sel: ComplexSelector, idx: number, el: VElement): boolean {
  if (!matchCompound(sel.compounds[idx], el)) return false;
  if (idx === 0) return true;
  switch (sel.combinators[idx - 1]) {
    case '>': {
      var parent = el.parentNode;
      return parent !== null && matchFrom(sel, idx - 1, parent);
    }
    case ' ':
      for (var anc = el.parentNode; anc; anc = anc.parentNode) {
        if (matchFrom(sel, idx - 1, anc)) return true;
      }
      return false;
    case '+': {
      var prev = prevElement(el);
      return prev !== null && matchFrom(sel, idx - 1, prev);
    }
    case '~':
      for (var sib = prevElement(el); sib; sib = prevElement(sib)) {
        if (matchFrom(sel, idx - 1, sib)) return true;
      }
      return false;
  }
}

export function matchesComplex(sel: ComplexSelector, el: VElement): boolean {
  return matchFrom(sel, sel.compounds.length - 1, el);
}

export function matchesSelector(list: SelectorList, el: VElement): boolean {
  return list.selectors.some(s => matchesComplex(s, el));
}

/** Specificity packed as ids·10⁴ + (classes, attributes, pseudo-classes)·10² + types. */
export function specificity(sel: ComplexSelector): number {
  var a = 0, b = 0, c = 0;
  for (var comp of sel.compounds) {
    a += comp.ids.length;
    b += comp.classes.length + comp.attrs.length + comp.pseudos.length;
    if (comp.tag !== null) c++;
  }
  return a * 10000 + b * 100 + c;
}

/** Highest specificity among the selectors in `list` that match `el`, or -1. */
export function matchSpecificity(list: SelectorList, el: VElement): number {
  var best = -1;
  for (var s of list.selectors) {
    if (matchesComplex(s, el)) best = Math.max(best, specificity(s));
  }
  return best;
}
