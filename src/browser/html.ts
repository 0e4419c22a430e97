/**
 * html.ts — Tolerant HTML tokeniser and tree builder
 *
 * Produces a VDocument with the implicit html/head/body structure. Good
 * enough for the pages the tab loads and for innerHTML fragments; no attempt
 * is made at the full HTML5 insertion-mode algorithm.
 */

import { VDocument, VElement, VText, VOID_ELEMENTS, preorder, walk, type VNode } from './dom.js';
import type { HtmlToken, ScriptRecord } from './types.js';

// ── Entities ──────────────────────────────────────────────────────────────────

const ENTITIES: Record<string, string> = {
  amp: '&', lt: '<', gt: '>', quot: '"', apos: "'", nbsp: ' ',
  copy: '©', reg: '®', trade: '™', hellip: '…',
  mdash: '—', ndash: '–', laquo: '«', raquo: '»',
  bull: '•', middot: '·',
};

export function decodeEntities(s: string): string {
  if (s.indexOf('&') < 0) return s;
  return s.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (m: string, body: string) => {
    if (body[0] === '#') {
      var code = body[1] === 'x' || body[1] === 'X' ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
      return code > 0 && code <= 0x10FFFF ? String.fromCodePoint(code) : m;
    }
    return Object.hasOwn(ENTITIES, body) ? ENTITIES[body] : m;
  });
}

// ── Tokeniser ─────────────────────────────────────────────────────────────────

/** Elements whose content is not markup. */
const RAW_TEXT = new Set(['script', 'style']);
/** Raw content, but entities are still decoded. */
const ESCAPABLE_RAW_TEXT = new Set(['textarea', 'title']);

export function tokenise(html: string): HtmlToken[] {
  var tokens: HtmlToken[] = [];
  var n = html.length;
  var i = 0;

  function isWS(c: string | undefined): boolean {
    return c === ' ' || c === '\t' || c === '\n' || c === '\r' || c === '\f';
  }
  function skipWS(): void {
    while (i < n && isWS(html[i])) i++;
  }
  function readAttrValue(): string {
    if (i >= n) return '';
    if (html[i] === '"' || html[i] === "'") {
      var q = html[i++];
      var start = i;
      while (i < n && html[i] !== q) i++;
      var v = html.slice(start, i);
      if (i < n) i++;
      return decodeEntities(v);
    }
    var s2 = i;
    while (i < n && html[i] !== '>' && !isWS(html[i])) i++;
    return decodeEntities(html.slice(s2, i));
  }
  function readTag(): HtmlToken | null {
    i++;
    var close = false;
    if (html[i] === '/') { close = true; i++; }
    if (html[i] === '!' || html[i] === '?') {
      if (html.startsWith('!--', i)) {
        var end = html.indexOf('-->', i + 3);
        i = end < 0 ? n : end + 3;
        return null;
      }
      while (i < n && html[i] !== '>') i++;
      if (i < n) i++;
      return null;
    }
    var tag = '';
    while (i < n && html[i] !== '>' && html[i] !== '/' && !isWS(html[i])) tag += html[i++];
    tag = tag.toLowerCase();
    var attrs = new Map<string, string>();
    skipWS();
    while (i < n && html[i] !== '>') {
      if (html[i] === '/') {
        if (html[i + 1] === '>') break;
        i++; continue;
      }
      var nm = '';
      while (i < n && html[i] !== '=' && html[i] !== '>' && html[i] !== '/' && !isWS(html[i])) nm += html[i++];
      nm = nm.toLowerCase();
      skipWS();
      var vl = '';
      if (i < n && html[i] === '=') { i++; skipWS(); vl = readAttrValue(); }
      if (nm && !attrs.has(nm)) attrs.set(nm, vl);
      skipWS();
    }
    var self = false;
    if (i < n && html[i] === '/') { self = true; i++; }
    if (i < n && html[i] === '>') i++;
    var kind: 'open' | 'close' | 'self' = close ? 'close' : (self ? 'self' : 'open');
    return { kind, tag, text: '', attrs };
  }
  function readRawText(tag: string, decode: boolean): void {
    var lower = html.toLowerCase();
    var end = lower.indexOf('</' + tag, i);
    if (end < 0) end = n;
    var body = html.slice(i, end);
    i = end;
    if (body) tokens.push({ kind: 'text', tag: '', text: decode ? decodeEntities(body) : body, attrs: new Map() });
  }

  while (i < n) {
    if (html[i] === '<' && i + 1 < n && /[a-zA-Z\/!?]/.test(html[i + 1])) {
      var tok = readTag();
      if (!tok || !tok.tag) continue;
      tokens.push(tok);
      if (tok.kind === 'open' && RAW_TEXT.has(tok.tag)) readRawText(tok.tag, false);
      else if (tok.kind === 'open' && ESCAPABLE_RAW_TEXT.has(tok.tag)) readRawText(tok.tag, true);
    } else {
      var start = i;
      i++;
      while (i < n && html[i] !== '<') i++;
      tokens.push({ kind: 'text', tag: '', text: decodeEntities(html.slice(start, i)), attrs: new Map() });
    }
  }
  return tokens;
}

// ── Tree builder ──────────────────────────────────────────────────────────────

/** Tags that stay in <head> when seen before any body content. */
const HEAD_TAGS = new Set(['title', 'meta', 'link', 'style', 'script', 'base', 'noscript']);

/** Opening the key tag implicitly closes an open element in the value set. */
const IMPLICIT_CLOSE: Record<string, string[]> = {
  p:      ['p'],
  div:    ['p'],
  ul:     ['p'],
  ol:     ['p'],
  form:   ['p'],
  h1:     ['p'], h2: ['p'], h3: ['p'], h4: ['p'], h5: ['p'], h6: ['p'],
  li:     ['li'],
  dt:     ['dt', 'dd'],
  dd:     ['dt', 'dd'],
  option: ['option'],
  tr:     ['tr', 'td', 'th'],
  td:     ['td', 'th'],
  th:     ['td', 'th'],
};

export function parseHTML(html: string): VDocument {
  var doc = new VDocument();
  var inBody = false;
  var stack: VElement[] = [];

  function current(): VElement {
    return stack.length ? stack[stack.length - 1] : (inBody ? doc.body : doc.head);
  }
  function enterBody(): void {
    if (!inBody) { inBody = true; stack = []; }
  }
  function copyAttrs(el: VElement, attrs: Map<string, string>): void {
    attrs.forEach((v, k) => { if (!el.hasAttribute(k)) el.setAttribute(k, v); });
  }
  function closeTo(tag: string): void {
    for (var j = stack.length - 1; j >= 0; j--) {
      if (stack[j].localName === tag) { stack.length = j; return; }
    }
  }

  for (var tok of tokenise(html)) {
    if (tok.kind === 'text') {
      // Whitespace between tags carries nothing in a text-mode layout.
      if (!/\S/.test(tok.text) && !(stack.length && RAW_TEXT.has(current().localName))) continue;
      if (!inBody && !stack.length) enterBody();
      current().appendChild(new VText(tok.text));
      continue;
    }

    var tag = tok.tag;
    if (tok.kind === 'close') {
      if (tag === 'head') { enterBody(); continue; }
      if (tag === 'body' || tag === 'html') { inBody = true; stack = []; continue; }
      closeTo(tag);
      continue;
    }

    if (tag === 'html') { copyAttrs(doc.documentElement, tok.attrs); continue; }
    if (tag === 'head') continue;
    if (tag === 'body') { enterBody(); copyAttrs(doc.body, tok.attrs); continue; }
    if (!inBody && !stack.length && !HEAD_TAGS.has(tag)) enterBody();

    var closes = IMPLICIT_CLOSE[tag];
    if (closes && stack.length) {
      var top = stack[stack.length - 1];
      if (closes.includes(top.localName)) stack.pop();
    }

    var el = new VElement(tag);
    tok.attrs.forEach((v, k) => el.setAttribute(k, v));
    current().appendChild(el);
    if (tok.kind === 'open' && !VOID_ELEMENTS.has(tag)) stack.push(el);
  }
  return doc;
}

/**
 * Parse `html` as the content of a body element and return the resulting
 * top-level nodes, detached.
 */
export function parseFragment(html: string): VNode[] {
  var doc = parseHTML('<html><body>' + html + '</body></html>');
  var nodes = doc.body.childNodes.slice();
  doc.body.replaceChildren([]);
  return nodes;
}

// ── Page resources ────────────────────────────────────────────────────────────

const JS_TYPES = /^(text|application)\/(x-)?(java|ecma)script$/i;

/** Scripts in document order. Non-JavaScript types (JSON, templates, modules) are skipped. */
export function findScripts(doc: VDocument): ScriptRecord[] {
  var scripts: ScriptRecord[] = [];
  walk(doc.documentElement, el => {
    if (el.localName !== 'script') return;
    var type = (el.getAttribute('type') ?? '').trim();
    if (type && !JS_TYPES.test(type)) return;
    var src = el.getAttribute('src');
    if (src !== null && src !== '') scripts.push({ inline: false, src, code: '', type });
    else scripts.push({ inline: true, src: '', code: el.textContent, type });
  });
  return scripts;
}

/** `href` of every `<link rel="stylesheet">`, in document order. */
export function findStylesheetLinks(doc: VDocument): string[] {
  var out: string[] = [];
  walk(doc.documentElement, el => {
    if (el.localName !== 'link') return;
    var rel = (el.getAttribute('rel') ?? '').toLowerCase().split(/\s+/);
    var href = el.getAttribute('href');
    if (rel.includes('stylesheet') && href) out.push(href);
  });
  return out;
}

/** Text of every `<style>` element, in document order. */
export function findInlineStyles(doc: VDocument): string[] {
  return preorder(doc.documentElement)
    .filter((n): n is VElement => n instanceof VElement && n.localName === 'style')
    .map(el => el.textContent);
}
