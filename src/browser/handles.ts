/**
 * handles.ts — Stable integer references for script-visible elements
 *
 * Page scripts never see a VElement; they see the integer handle this table
 * hands out. Handles start at 1, grow by one, and are never reissued within a
 * page load: an element keeps its one handle for as long as the page lives,
 * and a handle resolves to that element and nothing else.
 *
 * Known leak: the table holds every handled element strongly until the page
 * is unloaded, including elements detached by innerHTML replacement. Scripts
 * may still hold their handles, and nothing tells the host when they let go.
 */

import type { VElement } from './dom.js';

export class UnknownHandleError extends Error {
  readonly handle: number;
  constructor(handle: number) {
    super('unknown node handle ' + handle);
    this.name   = 'UnknownHandleError';
    this.handle = handle;
  }
}

export class HandleTable {
  private _byNode   = new Map<VElement, number>();
  private _byHandle = new Map<number, VElement>();
  private _next     = 1;

  get size(): number { return this._byHandle.size; }

  /** Handle for `node`, allocating the next one the first time it is seen. */
  getOrCreateHandle(node: VElement): number {
    var h = this._byNode.get(node);
    if (h !== undefined) return h;
    h = this._next++;
    this._byNode.set(node, h);
    this._byHandle.set(h, node);
    return h;
  }

  resolve(handle: number): VElement {
    var node = this._byHandle.get(handle);
    if (!node) throw new UnknownHandleError(handle);
    return node;
  }
}
