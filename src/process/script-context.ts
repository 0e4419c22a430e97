/**
 * script-context.ts — One isolated QuickJS runtime per page
 *
 * Each ScriptContext owns its own QuickJS runtime and context:
 *   • Separate GC and heap (memory limit per context, 4 MB by default)
 *   • Separate global scope; nothing is shared with other pages
 *   • Only plain values cross the boundary: strings, numbers, booleans,
 *     null, undefined and arrays of those
 *
 * ─── Host objects ────────────────────────────────────────────────────────────
 *
 *   var ctx = ScriptContext.create(QuickJS, 'page');
 *   ctx.defineHostObject('__host', {
 *     add: (a, b) => Number(a) + Number(b),
 *   });
 *   ctx.eval('__host.add(2, 3)');        // → { status: 'done', value: 5 }
 *   ctx.dispose();
 *
 * A host function that throws an Error surfaces in the guest as an Error with
 * the same name and message, so guest code can catch it.
 *
 * ─── Deadlines ───────────────────────────────────────────────────────────────
 *
 * With `timeoutMs` set, every eval() and call() is interrupted once the
 * deadline passes and reports { status: 'timeout' }. pumpJobs() gets a
 * deadline of its own, so an endless promise chain is cut off as well; jobs
 * still queued at that point run on the next pump. The context stays usable
 * afterwards. With it at 0 a non-terminating script never returns.
 */

import type { QuickJSContext, QuickJSHandle, QuickJSRuntime, QuickJSWASMModule } from 'quickjs-emscripten';

export interface GuestError {
  name:    string;
  message: string;
  stack:   string;
}

export type EvalOutcome =
  | { status: 'done';    value: unknown }
  | { status: 'error';   error: GuestError }
  | { status: 'timeout' };

/** Values a host function may return to the guest. */
export type HostValue = string | number | boolean | null | undefined | readonly HostValue[];

export type HostFunction = (...args: unknown[]) => HostValue;

export interface JobsOutcome {
  /** Errors thrown by jobs that ran to their end. */
  errors:   GuestError[];
  /** The deadline passed before the queue was empty. */
  timedOut: boolean;
}

export interface ContextLimits {
  /** Heap limit in bytes; 0 leaves the heap unbounded. */
  memoryLimitBytes?: number;
  /** Per-evaluation deadline in milliseconds; 0 disables it. */
  timeoutMs?:        number;
}

const DEFAULT_MEMORY_LIMIT = 4 * 1024 * 1024;

const DEFINE_READONLY_GLOBAL =
  '(function (name, value) {\n' +
  '  Object.freeze(value);\n' +
  '  Object.defineProperty(globalThis, name, { value: value, writable: false, configurable: true, enumerable: false });\n' +
  '})';

/** Builds guest errors through the guest's own constructors, so `instanceof` holds. */
const MAKE_ERROR =
  '(function (name, message) {\n' +
  '  var C = globalThis[name];\n' +
  '  var e = typeof C === "function" && C.prototype instanceof Error ? new C(message) : new Error(message);\n' +
  '  if (e.name !== name) e.name = name;\n' +
  '  return e;\n' +
  '})';

/** Normalise whatever the guest threw into name/message/stack. */
export function toGuestError(thrown: unknown): GuestError {
  if (thrown !== null && typeof thrown === 'object') {
    var name    = 'name'    in thrown && typeof thrown.name    === 'string' ? thrown.name    : 'Error';
    var message = 'message' in thrown && typeof thrown.message === 'string' ? thrown.message : '';
    var stack   = 'stack'   in thrown && typeof thrown.stack   === 'string' ? thrown.stack   : '';
    return { name, message, stack };
  }
  return { name: 'Error', message: 'uncaught ' + String(thrown), stack: '' };
}

/** A failure on the host side of eval()/call(), reported like a guest error. */
function hostFailure(e: unknown): EvalOutcome {
  if (e instanceof Error) return { status: 'error', error: { name: e.name, message: e.message, stack: e.stack ?? '' } };
  return { status: 'error', error: { name: 'Error', message: String(e), stack: '' } };
}

export class ScriptContext {
  readonly name: string;
  private _rt:        QuickJSRuntime;
  private _vm:        QuickJSContext;
  private _timeoutMs: number;
  private _alive = true;
  private _makeError: QuickJSHandle | null = null;

  private constructor(name: string, rt: QuickJSRuntime, vm: QuickJSContext, timeoutMs: number) {
    this.name       = name;
    this._rt        = rt;
    this._vm        = vm;
    this._timeoutMs = timeoutMs;
  }

  // ── Static factory ─────────────────────────────────────────────────────────

  static create(module: QuickJSWASMModule, name: string, limits: ContextLimits = {}): ScriptContext {
    var rt = module.newRuntime();
    var mem = limits.memoryLimitBytes ?? DEFAULT_MEMORY_LIMIT;
    if (mem > 0) rt.setMemoryLimit(mem);
    var vm = rt.newContext();
    return new ScriptContext(name, rt, vm, limits.timeoutMs ?? 0);
  }

  // ── Lifecycle ──────────────────────────────────────────────────────────────

  get alive(): boolean { return this._alive; }

  /** Free the runtime and everything in it. Later calls report an error. */
  dispose(): void {
    if (!this._alive) return;
    this._alive = false;
    if (this._makeError) this._makeError.dispose();
    this._makeError = null;
    this._vm.dispose();
    this._rt.dispose();
  }

  // ── Code execution ─────────────────────────────────────────────────────────

  /** Evaluate `code` as a global script. Globals persist between calls. */
  eval(code: string, filename = this.name): EvalOutcome {
    if (!this._alive) return this._dead();
    var vm = this._vm;
    try {
      var out = this._withDeadline((): EvalOutcome => {
        var result = vm.evalCode(code, filename);
        if (result.error) return { status: 'error', error: toGuestError(this._take(result.error)) };
        return { status: 'done', value: this._take(result.value) };
      });
      return out.timedOut ? { status: 'timeout' } : out.result;
    } catch (e) {
      return hostFailure(e);
    }
  }

  /** Call the global function `globalName` with marshalled arguments. */
  call(globalName: string, args: readonly HostValue[] = []): EvalOutcome {
    if (!this._alive) return this._dead();
    var vm = this._vm;
    var fn = vm.getProp(vm.global, globalName);
    if (vm.typeof(fn) !== 'function') {
      fn.dispose();
      return { status: 'error', error: { name: 'TypeError', message: globalName + ' is not a function', stack: '' } };
    }
    var argHandles = args.map(a => this._toHandle(a));
    try {
      var out = this._withDeadline((): EvalOutcome => {
        var result = vm.callFunction(fn, vm.undefined, ...argHandles);
        if (result.error) return { status: 'error', error: toGuestError(this._take(result.error)) };
        return { status: 'done', value: this._take(result.value) };
      });
      return out.timedOut ? { status: 'timeout' } : out.result;
    } catch (e) {
      return hostFailure(e);
    } finally {
      for (var h of argHandles) h.dispose();
      fn.dispose();
    }
  }

  /**
   * Run queued promise jobs until the queue is empty or the deadline passes.
   * A job that throws does not stop the others.
   */
  pumpJobs(): JobsOutcome {
    if (!this._alive) return { errors: [], timedOut: false };
    var out = this._withDeadline((expired) => {
      var errors: GuestError[] = [];
      while (this._rt.hasPendingJob() && !expired()) {
        var res = this._rt.executePendingJobs(1);
        if (!res.error) continue;
        var err = toGuestError(this._take(res.error));
        // The job cut off by the interrupt is reported as the timeout.
        if (!expired()) errors.push(err);
      }
      return errors;
    });
    return { errors: out.result, timedOut: out.timedOut };
  }

  // ── Host bindings ──────────────────────────────────────────────────────────

  /**
   * Install a frozen, non-writable global object whose methods call back into
   * the host. Arguments arrive as plain values (see HostValue). The binding
   * stays configurable so a trusted prelude can capture it and then delete it.
   */
  defineHostObject(name: string, functions: Record<string, HostFunction>): void {
    if (!this._alive) throw new Error('ScriptContext ' + this.name + ' is disposed');
    var vm = this._vm;
    var obj = vm.newObject();
    try {
      for (var key of Object.keys(functions)) {
        var fnHandle = this._hostFunction(key, functions[key]);
        vm.setProp(obj, key, fnHandle);
        fnHandle.dispose();
      }
      var definer = vm.unwrapResult(vm.evalCode(DEFINE_READONLY_GLOBAL, '<host>'));
      var nameHandle = vm.newString(name);
      var res = vm.callFunction(definer, vm.undefined, nameHandle, obj);
      nameHandle.dispose();
      definer.dispose();
      vm.unwrapResult(res).dispose();
    } finally {
      obj.dispose();
    }
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private _hostFunction(key: string, impl: HostFunction): QuickJSHandle {
    var vm = this._vm;
    return vm.newFunction(key, (...argHandles: QuickJSHandle[]) => {
      // Dump copies: dumping a promise releases the handle it is given.
      var args: unknown[] = argHandles.map(h => this._take(h.dup()));
      try {
        return this._toHandle(impl(...args));
      } catch (e) {
        return { error: e instanceof Error ? this._guestError(e.name, e.message) : vm.newError(String(e)) };
      }
    });
  }

  private _guestError(name: string, message: string): QuickJSHandle {
    var vm = this._vm;
    if (!this._makeError) this._makeError = vm.unwrapResult(vm.evalCode(MAKE_ERROR, '<host>'));
    var nameHandle = vm.newString(name);
    var messageHandle = vm.newString(message);
    var res = vm.callFunction(this._makeError, vm.undefined, nameHandle, messageHandle);
    nameHandle.dispose();
    messageHandle.dispose();
    if (!res.error) return res.value;
    res.error.dispose();
    return vm.newError({ name, message });
  }

  /** Dump `h` to a plain value and release it, unless dumping already did. */
  private _take(h: QuickJSHandle): unknown {
    try {
      return this._vm.dump(h);
    } finally {
      if (h.alive) h.dispose();
    }
  }

  private _toHandle(v: HostValue): QuickJSHandle {
    var vm = this._vm;
    if (v === undefined) return vm.undefined;
    if (v === null)      return vm.null;
    if (v === true)      return vm.true;
    if (v === false)     return vm.false;
    if (typeof v === 'number') return vm.newNumber(v);
    if (typeof v === 'string') return vm.newString(v);
    var arr = vm.newArray();
    for (var i = 0; i < v.length; i++) {
      var item = this._toHandle(v[i]);
      vm.setProp(arr, i, item);
      item.dispose();
    }
    return arr;
  }

  private _withDeadline<T>(run: (expired: () => boolean) => T): { result: T; timedOut: boolean } {
    if (this._timeoutMs <= 0) return { result: run(() => false), timedOut: false };
    var deadline = Date.now() + this._timeoutMs;
    var fired = false;
    var expired = (): boolean => {
      if (!fired && Date.now() > deadline) fired = true;
      return fired;
    };
    this._rt.setInterruptHandler(expired);
    try {
      var result = run(expired);
      return { result, timedOut: fired };
    } finally {
      this._rt.removeInterruptHandler();
    }
  }

  private _dead(): EvalOutcome {
    return { status: 'error', error: { name: 'Error', message: 'script context ' + this.name + ' is disposed', stack: '' } };
  }
}
