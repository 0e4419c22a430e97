import { describe, expect, it } from 'vitest';

import { VElement, VText, serializeNode } from '../browser/dom.js';
import {
  decodeEntities, findScripts, findStylesheetLinks, parseFragment, parseHTML, tokenise,
} from '../browser/html.js';

function tags(el: VElement): string[] {
  return el.children.map(c => c.localName);
}

describe('tokenise', () => {
  it('splits tags, attributes and text', () => {
    var toks = tokenise('<a href="/x" data-k=v disabled>hi</a>');
    expect(toks.map(t => t.kind)).toEqual(['open', 'text', 'close']);
    expect(toks[0].tag).toBe('a');
    expect([...toks[0].attrs]).toEqual([['href', '/x'], ['data-k', 'v'], ['disabled', '']]);
    expect(toks[1].text).toBe('hi');
  });

  it('keeps script bodies raw', () => {
    var toks = tokenise('<script>if (a < b) { s = "<div>"; }</script>');
    expect(toks.map(t => t.kind)).toEqual(['open', 'text', 'close']);
    expect(toks[1].text).toBe('if (a < b) { s = "<div>"; }');
  });

  it('skips comments and doctypes', () => {
    var toks = tokenise('<!DOCTYPE html><!-- <p>no</p> --><p>yes</p>');
    expect(toks.map(t => t.kind + ':' + (t.tag || t.text))).toEqual(['open:p', 'text:yes', 'close:p']);
  });
});

describe('decodeEntities', () => {
  it('decodes named and numeric references', () => {
    expect(decodeEntities('a &amp; b &lt;c&gt; &#65;&#x42;')).toBe('a & b <c> AB');
  });

  it('leaves unknown references alone', () => {
    expect(decodeEntities('&bogus; &')).toBe('&bogus; &');
  });
});

describe('parseHTML', () => {
  it('builds html/head/body and closes paragraphs implicitly', () => {
    var doc = parseHTML(
      '<html><head><title>T &amp; U</title></head>' +
      '<body><div id="a" class="x y"><p>one<p>two</div></body></html>');
    expect(doc.title).toBe('T & U');
    expect(tags(doc.documentElement)).toEqual(['head', 'body']);
    expect(tags(doc.body)).toEqual(['div']);
    var div = doc.body.children[0];
    expect(tags(div)).toEqual(['p', 'p']);
    expect(div.children[1].textContent).toBe('two');
    expect(serializeNode(div)).toBe('<div id="a" class="x y"><p>one</p><p>two</p></div>');
  });

  it('supplies the implicit structure for bare content', () => {
    var doc = parseHTML('<title>T</title>hello <b>world</b>');
    expect(tags(doc.head)).toEqual(['title']);
    expect(doc.body.childNodes.length).toBe(2);
    expect(doc.body.textContent).toBe('hello world');
    expect(doc.documentElement.isConnected).toBe(true);
  });

  it('drops whitespace-only text between tags', () => {
    var doc = parseHTML('<div> <span>a</span>\n </div>');
    expect(doc.body.children[0].childNodes.length).toBe(1);
  });

  it('treats void elements as empty', () => {
    var doc = parseHTML('<p>a<br>b<input value="v">c</p>');
    var p = doc.body.children[0];
    expect(tags(p)).toEqual(['br', 'input']);
    expect(p.textContent).toBe('abc');
  });

  it('finds elements by id', () => {
    var doc = parseHTML('<div><span id="s">x</span></div>');
    expect(doc.getElementById('s')?.tagName).toBe('SPAN');
    expect(doc.getElementById('nope')).toBeNull();
  });
});

describe('parseFragment', () => {
  it('returns detached top-level nodes', () => {
    var nodes = parseFragment('<b>x</b>y');
    expect(nodes.length).toBe(2);
    expect(nodes[0]).toBeInstanceOf(VElement);
    expect(nodes[1]).toBeInstanceOf(VText);
    expect(nodes.every(n => n.parentNode === null)).toBe(true);
  });
});

describe('page resources', () => {
  it('collects scripts in document order and skips non-JavaScript types', () => {
    var doc = parseHTML(
      '<head><script src="a.js"></script><script type="application/json">{}</script></head>' +
      '<body><script>x = 1</script></body>');
    expect(findScripts(doc)).toEqual([
      { inline: false, src: 'a.js', code: '', type: '' },
      { inline: true, src: '', code: 'x = 1', type: '' },
    ]);
  });

  it('collects stylesheet links only', () => {
    var doc = parseHTML('<link rel="stylesheet" href="s.css"><link rel="icon" href="i.png">');
    expect(findStylesheetLinks(doc)).toEqual(['s.css']);
  });
});
