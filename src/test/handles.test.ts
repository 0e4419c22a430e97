import { describe, expect, it } from 'vitest';

import { VElement } from '../browser/dom.js';
import { HandleTable, UnknownHandleError } from '../browser/handles.js';

describe('HandleTable', () => {
  it('hands out handles starting at 1, one per element', () => {
    var t = new HandleTable();
    var a = new VElement('div');
    var b = new VElement('span');
    expect(t.getOrCreateHandle(a)).toBe(1);
    expect(t.getOrCreateHandle(b)).toBe(2);
    expect(t.getOrCreateHandle(a)).toBe(1);
    expect(t.size).toBe(2);
  });

  it('resolves a handle back to the same element', () => {
    var t = new HandleTable();
    var el = new VElement('p');
    var h = t.getOrCreateHandle(el);
    expect(t.resolve(h)).toBe(el);
    expect(t.getOrCreateHandle(t.resolve(h))).toBe(h);
  });

  it('throws UnknownHandleError for handles never issued', () => {
    var t = new HandleTable();
    expect(() => t.resolve(7)).toThrow(UnknownHandleError);
    expect(() => t.resolve(7)).toThrow('unknown node handle 7');
  });

  it('keeps one handle per element across detach and reattach', () => {
    var t = new HandleTable();
    var parent = new VElement('div');
    var el = new VElement('p');
    parent.appendChild(el);
    var h = t.getOrCreateHandle(el);
    parent.removeChild(el);
    parent.appendChild(el);
    expect(t.getOrCreateHandle(el)).toBe(h);
    expect(t.getOrCreateHandle(new VElement('p'))).toBe(h + 1);
  });

  it('keeps detached elements alive until the page goes away', () => {
    var t = new HandleTable();
    var parent = new VElement('div');
    var child = new VElement('span');
    parent.appendChild(child);
    var h = t.getOrCreateHandle(child);
    parent.replaceChildren([]);
    expect(child.parentNode).toBeNull();
    expect(t.resolve(h)).toBe(child);
    expect(t.size).toBe(1);
  });
});
