import { afterEach, beforeAll, describe, expect, it } from 'vitest';
import { getQuickJS, type QuickJSWASMModule } from 'quickjs-emscripten';

import { ScriptContext, toGuestError, type ContextLimits } from '../process/script-context.js';

var QuickJS: QuickJSWASMModule;
var open: ScriptContext[] = [];

beforeAll(async () => {
  QuickJS = await getQuickJS();
});

afterEach(() => {
  for (var ctx of open) ctx.dispose();
  open = [];
});

function context(limits?: ContextLimits): ScriptContext {
  var ctx = ScriptContext.create(QuickJS, 'test', limits);
  open.push(ctx);
  return ctx;
}

describe('ScriptContext.eval', () => {
  it('returns the completion value', () => {
    expect(context().eval('1 + 2')).toEqual({ status: 'done', value: 3 });
  });

  it('keeps globals between evaluations', () => {
    var ctx = context();
    ctx.eval('var x = 40');
    expect(ctx.eval('x + 2')).toEqual({ status: 'done', value: 42 });
  });

  it('reports thrown errors with name and message', () => {
    var out = context().eval('throw new TypeError("bad")');
    expect(out.status).toBe('error');
    if (out.status !== 'error') return;
    expect(out.error.name).toBe('TypeError');
    expect(out.error.message).toBe('bad');
  });

  it('reports syntax errors', () => {
    var out = context().eval('function (', 'broken.js');
    expect(out.status === 'error' && out.error.name).toBe('SyntaxError');
  });

  it('reports thrown non-errors', () => {
    expect(context().eval('throw "oops"')).toEqual({
      status: 'error', error: { name: 'Error', message: 'uncaught oops', stack: '' },
    });
  });

  it('settles scripts whose completion value is a promise', () => {
    var ctx = context();
    expect(ctx.eval('Promise.resolve(1)').status).toBe('done');
    expect(ctx.eval('new Promise(function () {})').status).toBe('done');
    expect(ctx.eval('Promise.reject(new Error("x"))').status).toBe('done');
    expect(ctx.eval('1 + 1')).toEqual({ status: 'done', value: 2 });
  });

  it('interrupts evaluations that run past the deadline', () => {
    var ctx = context({ timeoutMs: 50 });
    expect(ctx.eval('for (;;) {}')).toEqual({ status: 'timeout' });
    expect(ctx.eval('1')).toEqual({ status: 'done', value: 1 });
  });
});

describe('ScriptContext.call', () => {
  it('calls a global function with marshalled arguments', () => {
    var ctx = context();
    ctx.eval('function join(a, b) { return a.concat(b).join("-") }');
    expect(ctx.call('join', [[1, 'x'], [null, true]])).toEqual({ status: 'done', value: '1-x--true' });
  });

  it('reports a missing function', () => {
    expect(context().call('missing')).toEqual({
      status: 'error', error: { name: 'TypeError', message: 'missing is not a function', stack: '' },
    });
  });
});

describe('ScriptContext.defineHostObject', () => {
  it('exposes host functions to the guest', () => {
    var ctx = context();
    var seen: unknown[][] = [];
    ctx.defineHostObject('__host', {
      add:  (a, b) => Number(a) + Number(b),
      take: (...args) => { seen.push(args); return undefined; },
      list: () => [1, 'a', null, [true]],
    });
    expect(ctx.eval('__host.add(2, 3)')).toEqual({ status: 'done', value: 5 });
    ctx.eval('__host.take("s", 4, null, [1, 2])');
    expect(seen).toEqual([['s', 4, null, [1, 2]]]);
    expect(ctx.eval('JSON.stringify(__host.list())')).toEqual({ status: 'done', value: '[1,"a",null,[true]]' });
  });

  it('binds each host function to its own implementation', () => {
    var ctx = context();
    ctx.defineHostObject('__host', {
      add:  (a, b) => Number(a) + Number(b),
      name: () => 'ctx',
      list: () => [1, 2, 3, 4],
    });
    expect(ctx.eval('[__host.add(2, 3), __host.name(), __host.list().length].join("|")'))
      .toEqual({ status: 'done', value: '5|ctx|4' });
  });

  it('accepts promises as arguments', () => {
    var ctx = context();
    var seen: unknown[][] = [];
    ctx.defineHostObject('__host', { take: (...args) => { seen.push(args); return null; } });
    expect(ctx.eval('__host.take(Promise.resolve(1), 2)')).toEqual({ status: 'done', value: null });
    expect(seen.length).toBe(1);
    expect(seen[0][1]).toBe(2);
  });

  it('turns host exceptions into catchable guest errors', () => {
    var ctx = context();
    ctx.defineHostObject('__host', {
      fail: () => {
        var e = new Error('nope');
        e.name = 'NotFoundError';
        throw e;
      },
    });
    expect(ctx.eval('try { __host.fail() } catch (e) { e.name + ":" + e.message }'))
      .toEqual({ status: 'done', value: 'NotFoundError:nope' });
  });

  it('builds host errors with the guest constructor of the same name', () => {
    var ctx = context();
    ctx.defineHostObject('__host', {
      fail: () => {
        var e = new Error('bad selector');
        e.name = 'SyntaxError';
        throw e;
      },
      custom: () => {
        var e = new Error('gone');
        e.name = 'NotFoundError';
        throw e;
      },
    });
    expect(ctx.eval('try { __host.fail() } catch (e) { (e instanceof SyntaxError) + ":" + e.name + ":" + e.message }'))
      .toEqual({ status: 'done', value: 'true:SyntaxError:bad selector' });
    expect(ctx.eval('try { __host.custom() } catch (e) { (e instanceof Error) + ":" + e.name }'))
      .toEqual({ status: 'done', value: 'true:NotFoundError' });
  });

  it('cannot be replaced or modified by the guest', () => {
    var ctx = context();
    ctx.defineHostObject('__host', { ping: () => 'pong' });
    ctx.eval('__host = null; __host.ping = null;');
    expect(ctx.eval('__host.ping()')).toEqual({ status: 'done', value: 'pong' });
  });
});

describe('ScriptContext jobs and lifecycle', () => {
  it('runs promise jobs only when pumped', () => {
    var ctx = context();
    ctx.eval('var ran = 0; Promise.resolve().then(function () { ran++; });');
    expect(ctx.eval('ran')).toEqual({ status: 'done', value: 0 });
    expect(ctx.pumpJobs()).toEqual({ errors: [], timedOut: false });
    expect(ctx.eval('ran')).toEqual({ status: 'done', value: 1 });
  });

  it('stops an endless promise chain at the deadline', () => {
    var ctx = context({ timeoutMs: 50 });
    expect(ctx.eval('Promise.resolve().then(function f() { Promise.resolve().then(f) })').status).toBe('done');
    expect(ctx.pumpJobs()).toEqual({ errors: [], timedOut: true });
    expect(ctx.eval('1')).toEqual({ status: 'done', value: 1 });
  });

  it('refuses work after dispose', () => {
    var ctx = context();
    ctx.dispose();
    expect(ctx.alive).toBe(false);
    expect(ctx.eval('1')).toEqual({
      status: 'error', error: { name: 'Error', message: 'script context test is disposed', stack: '' },
    });
    expect(ctx.pumpJobs()).toEqual({ errors: [], timedOut: false });
  });

  it('keeps pages apart', () => {
    var a = context();
    var b = context();
    a.eval('var secret = 1');
    expect(b.eval('typeof secret')).toEqual({ status: 'done', value: 'undefined' });
  });
});

describe('toGuestError', () => {
  it('normalises dumped error objects', () => {
    expect(toGuestError({ name: 'RangeError', message: 'm', stack: 's' })).toEqual({ name: 'RangeError', message: 'm', stack: 's' });
    expect(toGuestError({})).toEqual({ name: 'Error', message: '', stack: '' });
    expect(toGuestError(42)).toEqual({ name: 'Error', message: 'uncaught 42', stack: '' });
  });
});
