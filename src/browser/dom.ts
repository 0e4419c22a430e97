/**
 * dom.ts — Host-side document tree
 *
 * The host is authoritative over this tree: page scripts never hold a VNode,
 * only an integer handle that the bridge resolves (see handles.ts).
 *
 * Provides:
 *   VNode / VElement / VText / VDocument
 *   walk(), preorder()            tree traversal
 *   serializeNode(), serializeChildren()
 */

// ── VNode base ────────────────────────────────────────────────────────────────

export class VNode {
  static readonly ELEMENT_NODE  = 1;
  static readonly TEXT_NODE     = 3;

  readonly nodeType: number;
  parentNode: VElement | null = null;
  childNodes: VNode[] = [];

  constructor(nodeType: number) {
    this.nodeType = nodeType;
  }

  get nodeName(): string { return '#node'; }

  get textContent(): string {
    var out = '';
    for (var c of this.childNodes) out += c.textContent;
    return out;
  }

  get isConnected(): boolean {
    var n: VNode = this;
    while (n.parentNode) n = n.parentNode;
    return n instanceof VElement && n._isDocumentRoot;
  }

  /** True when `other` is this node or one of its descendants. */
  contains(other: VNode | null): boolean {
    var n: VNode | null = other;
    while (n) { if (n === this) return true; n = n.parentNode; }
    return false;
  }
}

// ── Text ──────────────────────────────────────────────────────────────────────

export class VText extends VNode {
  data: string;

  constructor(data: string) {
    super(VNode.TEXT_NODE);
    this.data = data;
  }

  override get nodeName(): string { return '#text'; }
  override get textContent(): string { return this.data; }
}

// ── Element ───────────────────────────────────────────────────────────────────

export class VElement extends VNode {
  /** Upper-case tag name, e.g. "DIV". */
  readonly tagName:   string;
  readonly localName: string;
  readonly _attrs: Map<string, string> = new Map();
  /** Set on the <html> element owned by a VDocument. */
  _isDocumentRoot = false;

  constructor(tag: string) {
    super(VNode.ELEMENT_NODE);
    this.localName = tag.toLowerCase();
    this.tagName   = tag.toUpperCase();
  }

  override get nodeName(): string { return this.tagName; }

  get id(): string { return this._attrs.get('id') ?? ''; }

  get children(): VElement[] {
    return this.childNodes.filter((c): c is VElement => c instanceof VElement);
  }

  get classNames(): string[] {
    var raw = this._attrs.get('class');
    return raw ? raw.split(/\s+/).filter(Boolean) : [];
  }

  hasClass(cls: string): boolean { return this.classNames.includes(cls); }

  getAttribute(name: string): string | null { return this._attrs.get(name.toLowerCase()) ?? null; }
  hasAttribute(name: string): boolean { return this._attrs.has(name.toLowerCase()); }
  setAttribute(name: string, value: string): void { this._attrs.set(name.toLowerCase(), value); }
  removeAttribute(name: string): void { this._attrs.delete(name.toLowerCase()); }

  appendChild(child: VNode): VNode {
    if (child.parentNode) child.parentNode.removeChild(child);
    child.parentNode = this;
    this.childNodes.push(child);
    return child;
  }

  removeChild(child: VNode): VNode {
    var i = this.childNodes.indexOf(child);
    if (i >= 0) { this.childNodes.splice(i, 1); child.parentNode = null; }
    return child;
  }

  /** Inserts before `ref`; a null `ref` appends. `ref` must be a child of this element. */
  insertBefore(child: VNode, ref: VNode | null): VNode {
    if (!ref) return this.appendChild(child);
    if (child === ref) return child;
    if (child.parentNode) child.parentNode.removeChild(child);
    var i = this.childNodes.indexOf(ref);
    if (i < 0) throw new Error('insertBefore: reference node is not a child');
    child.parentNode = this;
    this.childNodes.splice(i, 0, child);
    return child;
  }

  /**
   * Swap the whole child list. Old children are detached (parent cleared) but
   * nothing else about them changes; anyone still holding them keeps them alive.
   */
  replaceChildren(nodes: VNode[]): void {
    for (var old of this.childNodes) old.parentNode = null;
    this.childNodes = [];
    for (var n of nodes) {
      if (n.parentNode) n.parentNode.removeChild(n);
      n.parentNode = this;
      this.childNodes.push(n);
    }
  }
}

// ── Document ──────────────────────────────────────────────────────────────────

export class VDocument {
  readonly documentElement: VElement;
  readonly head: VElement;
  readonly body: VElement;

  constructor() {
    this.documentElement = new VElement('html');
    this.documentElement._isDocumentRoot = true;
    this.head = new VElement('head');
    this.body = new VElement('body');
    this.documentElement.appendChild(this.head);
    this.documentElement.appendChild(this.body);
  }

  get title(): string {
    var t = preorder(this.head).find(n => n instanceof VElement && n.localName === 'title');
    return t ? t.textContent.trim() : '';
  }

  getElementById(id: string): VElement | null {
    var found: VElement | null = null;
    walk(this.documentElement, el => { if (!found && el.id === id) found = el; });
    return found;
  }
}

// ── Traversal ─────────────────────────────────────────────────────────────────

/** Visit every element below `root` (not `root` itself) in document order. */
export function walk(root: VNode, fn: (el: VElement) => void): void {
  for (var c of root.childNodes) {
    if (c instanceof VElement) { fn(c); walk(c, fn); }
  }
}

/** `root` followed by all of its descendants, pre-order. */
export function preorder(root: VNode): VNode[] {
  var out: VNode[] = [];
  var stack: VNode[] = [root];
  while (stack.length) {
    var n = stack.pop();
    if (!n) break;
    out.push(n);
    for (var i = n.childNodes.length - 1; i >= 0; i--) stack.push(n.childNodes[i]);
  }
  return out;
}

/** Nearest element at or above `node`. */
export function closestElement(node: VNode | null): VElement | null {
  for (var n = node; n; n = n.parentNode) {
    if (n instanceof VElement) return n;
  }
  return null;
}

// ── Serializer ────────────────────────────────────────────────────────────────

export const VOID_ELEMENTS = new Set([
  'area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input', 'link', 'meta', 'param', 'source', 'track', 'wbr',
]);

function escapeText(s: string): string { return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;'); }
function escapeAttr(s: string): string { return s.replace(/&/g, '&amp;').replace(/"/g, '&quot;'); }

export function serializeChildren(node: VNode): string {
  return node.childNodes.map(serializeNode).join('');
}

export function serializeNode(node: VNode): string {
  if (node instanceof VText) return escapeText(node.data);
  if (!(node instanceof VElement)) return '';
  var tag = node.localName;
  var attrs = '';
  node._attrs.forEach((v, k) => { attrs += ' ' + k + (v !== '' ? '="' + escapeAttr(v) + '"' : ''); });
  if (VOID_ELEMENTS.has(tag)) return '<' + tag + attrs + '>';
  return '<' + tag + attrs + '>' + serializeChildren(node) + '</' + tag + '>';
}
