import type { VElement, VNode } from './dom.js';
import type { SelectorList } from './selector.js';

// ── HTML tokens ───────────────────────────────────────────────────────────────

export interface HtmlToken {
  kind:  'open' | 'close' | 'self' | 'text';
  tag:   string;
  text:  string;
  attrs: Map<string, string>;
}

// ── Scripts (collected in document order) ─────────────────────────────────────

export interface ScriptRecord {
  inline: boolean;
  src:    string;   // URL for external
  code:   string;   // source for inline
  type:   string;   // mime-type, '' when absent
}

// ── Style ─────────────────────────────────────────────────────────────────────

export type Display = 'block' | 'inline' | 'none';

export interface StyleRule {
  selector:     SelectorList;
  display:      Display;
  /** Source order, used as the tie-break between equally specific rules. */
  order:        number;
}

// ── Layout ────────────────────────────────────────────────────────────────────

export interface LayoutBox {
  node:     VNode;
  x:        number;
  y:        number;
  w:        number;
  h:        number;
  /** Word fragments of a text node carry their text. */
  text?:    string;
  children: LayoutBox[];
}

// ── Paint ─────────────────────────────────────────────────────────────────────

export type DisplayItem =
  | { kind: 'text'; x: number; y: number; text: string; node: VNode }
  | { kind: 'rect'; x: number; y: number; w: number; h: number; node: VElement };

export interface RenderResult {
  root:        LayoutBox;
  displayList: DisplayItem[];
  /** Total document height in pixels. */
  height:      number;
}

// ── Network (external collaborator) ───────────────────────────────────────────

export interface FetchResponse {
  status: number;
  body:   string;
}

export interface Fetcher {
  fetch(url: string, body?: string): Promise<FetchResponse>;
}

// ── Document engine (what the bridge needs from the page) ─────────────────────

export interface DocumentEngine {
  /** The document's root element. */
  readonly root: VElement;
  /** Parse `html` as body content; the returned nodes are detached. */
  parseFragment(html: string): VNode[];
  /** Re-run style, layout and paint over the current tree. */
  render(): void;
  /** Every node under the root, root first, in document order. */
  treeNodesPreorder(): VNode[];
  /** Throws SelectorSyntaxError for selectors the engine cannot parse. */
  parseSelector(text: string): SelectorList;
  selectorMatches(selector: SelectorList, el: VElement): boolean;
  /** A new element, not attached anywhere. */
  createElement(tag: string): VElement;
}
