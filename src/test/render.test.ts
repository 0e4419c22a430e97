import { describe, expect, it } from 'vitest';

import { VElement, VText } from '../browser/dom.js';
import { parseHTML } from '../browser/html.js';
import { Page } from '../browser/page.js';
import { computeDisplay, parseStylesheet } from '../browser/render.js';

function pageOf(html: string, css: string[] = [], width = 800): Page {
  return new Page('http://example.test/', parseHTML(html), css, width);
}

describe('style', () => {
  it('reads display rules and ignores other properties', () => {
    var rules = parseStylesheet('/* c */ .a { color: red; display: none } p { margin: 0 } @media x { }');
    expect(rules.length).toBe(1);
    expect(rules[0].display).toBe('none');
    expect(rules[0].selector.text).toBe('.a');
  });

  it('drops rules with selectors it cannot parse', () => {
    expect(parseStylesheet('a:hover { display: none } b { display: block }').map(r => r.selector.text)).toEqual(['b']);
  });

  it('lets specificity, then source order, then inline style decide', () => {
    var rules = parseStylesheet('#a { display: block } p { display: none } p { display: inline }');
    var p = new VElement('p');
    expect(computeDisplay(p, rules)).toBe('inline');
    p.setAttribute('id', 'a');
    expect(computeDisplay(p, rules)).toBe('block');
    p.setAttribute('style', 'display: none');
    expect(computeDisplay(p, rules)).toBe('none');
  });
});

describe('layout and paint', () => {
  it('stacks blocks and flows words inside the body padding', () => {
    var page = pageOf('<h1>Title</h1><p>hello world</p>');
    expect(page.textLines()).toEqual(['Title', 'hello world']);
    expect(page.layout.displayList).toEqual([
      { kind: 'text', x: 8,  y: 8,  text: 'Title', node: page.doc.body.children[0].childNodes[0] },
      { kind: 'text', x: 8,  y: 21, text: 'hello', node: page.doc.body.children[1].childNodes[0] },
      { kind: 'text', x: 56, y: 21, text: 'world', node: page.doc.body.children[1].childNodes[0] },
    ]);
    expect(page.layout.height).toBe(42);
  });

  it('wraps at the container edge', () => {
    var page = pageOf('<p>aaaa bbbb cccc</p>', [], 100);
    expect(page.textLines()).toEqual(['aaaa bbbb', 'cccc']);
  });

  it('hides head content and display:none elements', () => {
    var page = pageOf(
      '<html><head><title>T</title><style>.gone { display: none }</style></head>' +
      '<body><p class="gone">x</p><p>y</p></body></html>');
    expect(page.textLines()).toEqual(['y']);
  });

  it('applies linked stylesheets before style elements', () => {
    var page = pageOf('<style>p { display: block }</style><p>x</p>', ['p { display: none }']);
    expect(page.textLines()).toEqual(['x']);
  });

  it('paints inputs and buttons as fixed boxes', () => {
    var page = pageOf('<input value="hi"><button>Go</button>');
    var [input, button] = page.doc.body.children;
    expect(page.layout.displayList).toEqual([
      { kind: 'rect', x: 8,   y: 8, w: 160, h: 13, node: input },
      { kind: 'text', x: 8,   y: 8, text: 'hi', node: input },
      { kind: 'rect', x: 176, y: 8, w: 32,  h: 13, node: button },
      { kind: 'text', x: 184, y: 8, text: 'Go', node: button },
    ]);
  });
});

describe('hitTest', () => {
  it('returns the deepest node under the point', () => {
    var page = pageOf('<h1>Title</h1><p>hello world</p>');
    var hello = page.hitTest(60, 25);
    expect(hello).toBeInstanceOf(VText);
    expect(hello?.textContent).toBe('hello world');
    expect(page.hitTest(700, 10)).toBe(page.doc.body.children[0]);
    expect(page.hitTest(10, 500)).toBeNull();
  });

  it('hits widgets rather than their labels', () => {
    var page = pageOf('<button>Go</button>');
    expect(page.hitTest(20, 10)).toBe(page.doc.body.children[0]);
  });
});

describe('Page', () => {
  it('counts renders', () => {
    var page = pageOf('<p>x</p>');
    expect(page.renderCount).toBe(0);
    page.render();
    page.render();
    expect(page.renderCount).toBe(2);
  });
});
