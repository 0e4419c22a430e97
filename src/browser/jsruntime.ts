/**
 * jsruntime.ts — Bridge between page scripts and the document
 *
 * One PageJS per page load. It owns the page's ScriptContext, exports the
 * `__host` object the reflector layer (bootstrap.ts) is written against,
 * and turns host interactions into `__dispatchEvent` calls:
 *
 *  1. `__host` is installed when the bridge is created
 *  2. runBootstrap() evaluates the reflector program
 *  3. loadScript() runs each page script; globals and listeners persist
 *  4. dispatchEvent() runs listeners and reports whether to suppress the
 *     default action
 *
 * Every fault is contained here: page scripts can throw, hang (with a
 * deadline configured, in a script, a listener or a promise chain) or feed
 * the host garbage without taking the tab down.
 */

import type { QuickJSWASMModule } from 'quickjs-emscripten';
import { Logger } from '../core/log.js';
import { ScriptContext, type ContextLimits, type EvalOutcome, type GuestError, type HostFunction, type HostValue } from '../process/script-context.js';
import { VElement, type VNode } from './dom.js';
import { HandleTable } from './handles.js';
import { SelectorSyntaxError, type SelectorList } from './selector.js';
import { BOOTSTRAP_JS, BOOTSTRAP_FILENAME } from './bootstrap.js';
import {
  BridgeFault, BootstrapFault, FaultReporter, ScriptFault,
  type FaultSite,
} from './faults.js';
import type { DocumentEngine } from './types.js';

// ── Public types ──────────────────────────────────────────────────────────────

/** `ready` once bootstrapped; `failed` and `disposed` are terminal. */
export type BridgeState = 'fresh' | 'ready' | 'failed' | 'disposed';

export type ScriptResult =
  | { status: 'done' }
  | { status: 'error'; fault: ScriptFault }
  | { status: 'skipped' };

export interface PageJSOptions {
  /** Context name used in logs, usually the page URL. */
  name?:            string;
  limits?:          ContextLimits;
  log?:             Logger;
  faults?:          FaultReporter;
  /** Replaces the reflector program; mainly for embedders adding globals. */
  bootstrapSource?: string;
}

const INTERRUPTED: GuestError = { name: 'InternalError', message: 'interrupted', stack: '' };

const TAG_NAME  = /^[A-Za-z][A-Za-z0-9-]*$/;
const ATTR_NAME = /^[^\s"'<>\/=]+$/;

function formatArg(v: unknown): string {
  if (v === undefined) return 'undefined';
  try { return JSON.stringify(v) ?? String(v); }
  catch (_) { return String(v); }
}

function asString(v: unknown): string {
  return typeof v === 'string' ? v : String(v);
}

function asHandle(v: unknown): number {
  if (typeof v !== 'number' || !Number.isInteger(v) || v < 0) {
    throw new BridgeFault('TypeError', 'expected a node handle, got ' + formatArg(v));
  }
  return v;
}

// ── PageJS ────────────────────────────────────────────────────────────────────

export class PageJS {
  readonly handles = new HandleTable();
  readonly faults: FaultReporter;
  private _engine:    DocumentEngine;
  private _ctx:       ScriptContext;
  private _log:       Logger;
  private _console:   Logger;
  private _bootstrap: string;
  private _state:     BridgeState = 'fresh';

  constructor(quickjs: QuickJSWASMModule, engine: DocumentEngine, opts: PageJSOptions = {}) {
    this._engine    = engine;
    this._log       = opts.log ?? new Logger('bridge');
    this._console   = this._log.child('console');
    this.faults     = opts.faults ?? new FaultReporter(this._log.child('script'));
    this._bootstrap = opts.bootstrapSource ?? BOOTSTRAP_JS;
    this._ctx       = ScriptContext.create(quickjs, opts.name ?? 'page', opts.limits);
    this._ctx.defineHostObject('__host', this._hostObject());
  }

  get state(): BridgeState { return this._state; }

  // ── Page-load orchestration ────────────────────────────────────────────────

  /**
   * Evaluate the reflector program. Runs at most once; a failure leaves the
   * bridge failed for good and every later script is skipped.
   */
  runBootstrap(): void {
    if (this._state !== 'fresh') return;
    var out = this._ctx.eval(this._bootstrap, BOOTSTRAP_FILENAME);
    if (out.status === 'done') {
      this._state = 'ready';
      this._log.debug('bootstrap ready for ' + this._ctx.name);
      return;
    }
    this._state = 'failed';
    var fault = out.status === 'timeout'
      ? new BootstrapFault('bootstrap timed out')
      : new BootstrapFault(out.error.name + ': ' + out.error.message, out.error);
    this.faults.bootstrap(fault);
    throw fault;
  }

  /** Run one page script. Faults are reported and returned, never thrown. */
  loadScript(source: string, name = 'inline script'): ScriptResult {
    if (this._state === 'fresh') {
      try {
        this.runBootstrap();
      } catch (e) {
        if (!(e instanceof BootstrapFault)) throw e;
      }
    }
    if (this._state !== 'ready') {
      this._log.debug('skipping ' + name + ': bridge is ' + this._state);
      return { status: 'skipped' };
    }
    var fault = this._faultOf(this._ctx.eval(source, name), { phase: 'load', script: name });
    this._drainJobs();
    return fault ? { status: 'error', fault } : { status: 'done' };
  }

  // ── Interaction handlers ───────────────────────────────────────────────────

  /**
   * Fire `type` at `node`. Returns true when a listener called
   * preventDefault(), i.e. the caller should skip the default action.
   * Text nodes have no listeners and never suppress anything.
   */
  dispatchEvent(type: string, node: VNode): boolean {
    if (!(node instanceof VElement) || this._state !== 'ready') return false;
    var handle = this.handles.getOrCreateHandle(node);
    var out = this._ctx.call('__dispatchEvent', [handle, type]);
    var suppress = out.status === 'done' ? !out.value : false;
    this._faultOf(out, { phase: 'dispatch', eventType: type, handle });
    this._drainJobs();
    return suppress;
  }

  /** Tear down the script context. Handles from this page mean nothing afterwards. */
  dispose(): void {
    if (this._state === 'disposed') return;
    this._state = 'disposed';
    this._ctx.dispose();
  }

  // ── Fault plumbing ─────────────────────────────────────────────────────────

  private _faultOf(out: EvalOutcome, site: FaultSite): ScriptFault | null {
    if (out.status === 'done') return null;
    var fault = out.status === 'timeout'
      ? new ScriptFault(site, INTERRUPTED, true)
      : new ScriptFault(site, out.error);
    this.faults.script(fault);
    return fault;
  }

  private _drainJobs(): void {
    var jobs = this._ctx.pumpJobs();
    for (var err of jobs.errors) {
      this.faults.script(new ScriptFault({ phase: 'job' }, err));
    }
    if (jobs.timedOut) this.faults.script(new ScriptFault({ phase: 'job' }, INTERRUPTED, true));
  }

  /**
   * Wrap a host function. BridgeFaults go to the guest as they are; anything
   * else is a host defect and is reported before the guest sees it.
   */
  private _guard(name: string, impl: (...args: unknown[]) => HostValue): HostFunction {
    return (...args: unknown[]) => {
      try {
        return impl(...args);
      } catch (e) {
        if (e instanceof BridgeFault) throw e;
        this.faults.defect('__host.' + name + '(' + args.map(formatArg).join(', ') + ')', e);
        throw e;
      }
    };
  }

  // ── Host functions ─────────────────────────────────────────────────────────

  private _hostObject(): Record<string, HostFunction> {
    var engine  = this._engine;
    var handles = this.handles;

    function hierarchyCheck(parent: VElement, child: VElement): void {
      if (child.contains(parent)) {
        throw new BridgeFault('HierarchyRequestError', 'cannot insert a node into itself or its own descendant');
      }
    }

    return {
      querySelectorAll: this._guard('querySelectorAll', (selector) => {
        var text = asString(selector);
        var list: SelectorList;
        try {
          list = engine.parseSelector(text);
        } catch (e) {
          if (e instanceof SelectorSyntaxError) throw new BridgeFault('SyntaxError', e.message);
          throw e;
        }
        var out: number[] = [];
        for (var n of engine.treeNodesPreorder()) {
          if (n instanceof VElement && engine.selectorMatches(list, n)) out.push(handles.getOrCreateHandle(n));
        }
        return out;
      }),

      getAttribute: this._guard('getAttribute', (handle, name) =>
        handles.resolve(asHandle(handle)).getAttribute(asString(name))),

      setAttribute: this._guard('setAttribute', (handle, name, value) => {
        var el = handles.resolve(asHandle(handle));
        var attr = asString(name);
        if (!ATTR_NAME.test(attr)) throw new BridgeFault('InvalidCharacterError', 'invalid attribute name ' + formatArg(attr));
        el.setAttribute(attr, asString(value));
        engine.render();
        return undefined;
      }),

      setInnerHTML: this._guard('setInnerHTML', (handle, html) => {
        var el = handles.resolve(asHandle(handle));
        el.replaceChildren(engine.parseFragment(asString(html)));
        engine.render();
        return undefined;
      }),

      children: this._guard('children', (handle) =>
        handles.resolve(asHandle(handle)).children.map(c => handles.getOrCreateHandle(c))),

      createElement: this._guard('createElement', (tag) => {
        var name = asString(tag);
        if (!TAG_NAME.test(name)) throw new BridgeFault('InvalidCharacterError', 'invalid tag name ' + formatArg(name));
        return handles.getOrCreateHandle(engine.createElement(name));
      }),

      appendChild: this._guard('appendChild', (parentHandle, childHandle) => {
        var parent = handles.resolve(asHandle(parentHandle));
        var child  = handles.resolve(asHandle(childHandle));
        hierarchyCheck(parent, child);
        parent.appendChild(child);
        engine.render();
        return undefined;
      }),

      insertBefore: this._guard('insertBefore', (parentHandle, childHandle, refHandle) => {
        var parent = handles.resolve(asHandle(parentHandle));
        var child  = handles.resolve(asHandle(childHandle));
        var ref    = refHandle === null || refHandle === undefined ? null : handles.resolve(asHandle(refHandle));
        hierarchyCheck(parent, child);
        if (ref && ref.parentNode !== parent) {
          throw new BridgeFault('NotFoundError', 'reference node is not a child of this node');
        }
        parent.insertBefore(child, ref);
        engine.render();
        return undefined;
      }),

      log: this._guard('log', (message) => {
        this._console.info(asString(message));
        return undefined;
      }),
    };
  }
}
