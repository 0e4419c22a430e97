import { describe, expect, it } from 'vitest';

import { VElement, preorder } from '../browser/dom.js';
import { parseHTML } from '../browser/html.js';
import { SelectorSyntaxError, matchesSelector, parseSelector, specificity } from '../browser/selector.js';

var doc = parseHTML(
  '<div id="main" class="box wide">' +
    '<p class="intro">a</p><p>b</p><span data-x="foo bar">c</span>' +
  '</div>' +
  '<ul><li>1</li><li>2</li></ul>');

/** `tag#id` (or just the tag) of every element matching `text`, in document order. */
function select(text: string): string[] {
  var list = parseSelector(text);
  return preorder(doc.documentElement)
    .filter((n): n is VElement => n instanceof VElement && matchesSelector(list, n))
    .map(el => el.localName + (el.id ? '#' + el.id : '') + (el.textContent.length === 1 ? '(' + el.textContent + ')' : ''));
}

describe('parseSelector / matchesSelector', () => {
  it('matches type, id and class selectors', () => {
    expect(select('p')).toEqual(['p(a)', 'p(b)']);
    expect(select('#main')).toEqual(['div#main']);
    expect(select('.box.wide')).toEqual(['div#main']);
    expect(select('p.intro')).toEqual(['p(a)']);
  });

  it('matches attribute selectors', () => {
    expect(select('[data-x]')).toEqual(['span(c)']);
    expect(select('[data-x~=bar]')).toEqual(['span(c)']);
    expect(select('[data-x^="fo"]')).toEqual(['span(c)']);
    expect(select('[data-x$=baz]')).toEqual([]);
    expect(select('[data-x*="o b"]')).toEqual(['span(c)']);
    expect(select('[class=intro]')).toEqual(['p(a)']);
  });

  it('matches combinators', () => {
    expect(select('#main > p')).toEqual(['p(a)', 'p(b)']);
    expect(select('body p.intro')).toEqual(['p(a)']);
    expect(select('p + span')).toEqual(['span(c)']);
    expect(select('p + p')).toEqual(['p(b)']);
    expect(select('.intro ~ span')).toEqual(['span(c)']);
    expect(select('ul > p')).toEqual([]);
  });

  it('matches structural pseudo-classes', () => {
    expect(select('li:first-child')).toEqual(['li(1)']);
    expect(select('li:last-child')).toEqual(['li(2)']);
    expect(select('li:only-child')).toEqual([]);
  });

  it('returns selector lists in document order', () => {
    expect(select('ul li, #main')).toEqual(['div#main', 'li(1)', 'li(2)']);
  });

  it('computes specificity', () => {
    expect(specificity(parseSelector('#a .b p').selectors[0])).toBe(10101);
    expect(specificity(parseSelector('*').selectors[0])).toBe(0);
  });

  it.each([
    ['',          'empty selector'],
    ['[',         'expected attribute name'],
    ['p >',       'expected selector after combinator'],
    ['div,',      'expected selector after ","'],
    ['a..b',      'expected class name after "."'],
    [':hover',    'unsupported pseudo-class ":hover"'],
    ['[x="y]',    'unterminated string'],
  ])('rejects %j', (text, message) => {
    expect(() => parseSelector(text)).toThrow(SelectorSyntaxError);
    expect(() => parseSelector(text)).toThrow(message + ' in selector ' + JSON.stringify(text));
  });
});
