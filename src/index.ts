/**
 * index.ts — Public entry point
 *
 *   import { createTab } from 'page-script-bridge';
 *
 *   var tab = await createTab({ fetcher });
 *   await tab.load('http://example.test/');
 *   await tab.click(20, 12);
 */

import { getQuickJS } from 'quickjs-emscripten';
import { BrowserTab, type BrowserTabOptions } from './browser/tab.js';

export { loadConfig, ConfigError, DEFAULTS, type BrowserConfig, type LoadConfigOptions } from './core/config.js';
export { Logger, MemorySink, consoleSink, type LogLevel, type LogSink, type LogEntry } from './core/log.js';
export { ScriptContext, type EvalOutcome, type JobsOutcome, type GuestError, type HostFunction, type HostValue, type ContextLimits } from './process/script-context.js';
export { VNode, VElement, VText, VDocument } from './browser/dom.js';
export { parseHTML, parseFragment, findScripts, findStylesheetLinks } from './browser/html.js';
export { parseSelector, matchesSelector, SelectorSyntaxError, type SelectorList } from './browser/selector.js';
export { renderDocument, hitTest, displayText } from './browser/render.js';
export { HandleTable, UnknownHandleError } from './browser/handles.js';
export { BOOTSTRAP_JS } from './browser/bootstrap.js';
export { PageJS, type PageJSOptions, type ScriptResult, type BridgeState } from './browser/jsruntime.js';
export { EventDispatcher, resolveUrl, type DefaultAction } from './browser/events.js';
export { ScriptFault, BridgeFault, BootstrapFault, FaultReporter, type FaultRecord } from './browser/faults.js';
export { Page } from './browser/page.js';
export { BrowserTab, type BrowserTabOptions } from './browser/tab.js';
export type { DocumentEngine, Fetcher, FetchResponse, ScriptRecord, RenderResult, DisplayItem, LayoutBox } from './browser/types.js';

/** A tab backed by the shared QuickJS module. */
export async function createTab(opts: Omit<BrowserTabOptions, 'quickjs'>): Promise<BrowserTab> {
  return new BrowserTab({ ...opts, quickjs: await getQuickJS() });
}
