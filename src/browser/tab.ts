/**
 * tab.ts — One browser tab: loading, history, input
 *
 * A load fetches the document, its stylesheets and its scripts through the
 * injected Fetcher, builds a fresh Page and PageJS, and runs the scripts in
 * document order. The previous page's bridge is disposed first, so handles
 * never leak from one page into the next.
 */

import type { QuickJSWASMModule } from 'quickjs-emscripten';
import { loadConfig, type BrowserConfig } from '../core/config.js';
import { Logger } from '../core/log.js';
import type { VElement } from './dom.js';
import { parseHTML, findScripts, findStylesheetLinks } from './html.js';
import { Page } from './page.js';
import { PageJS, type ScriptResult } from './jsruntime.js';
import { EventDispatcher, resolveUrl, type DefaultAction } from './events.js';
import { BootstrapFault, FaultReporter } from './faults.js';
import type { Fetcher, FetchResponse } from './types.js';

export interface BrowserTabOptions {
  quickjs: QuickJSWASMModule;
  fetcher: Fetcher;
  config?: BrowserConfig;
  log?:    Logger;
}

export class BrowserTab {
  readonly config:  BrowserConfig;
  readonly faults:  FaultReporter;
  readonly history: string[] = [];
  private _quickjs: QuickJSWASMModule;
  private _fetcher: Fetcher;
  private _log:     Logger;
  private _page:    Page | null = null;
  private _js:      PageJS | null = null;
  private _events:  EventDispatcher | null = null;
  private _focus:   VElement | null = null;

  constructor(opts: BrowserTabOptions) {
    this.config   = opts.config ?? loadConfig();
    this._quickjs = opts.quickjs;
    this._fetcher = opts.fetcher;
    this._log     = opts.log ?? new Logger('tab', this.config.logLevel);
    this.faults   = new FaultReporter(this._log.child('script'), this.config.maxFaultRecords);
  }

  get page(): Page | null { return this._page; }
  get js(): PageJS | null { return this._js; }
  get url(): string { return this._page ? this._page.url : ''; }
  get focus(): VElement | null { return this._focus; }

  // ── Loading ────────────────────────────────────────────────────────────────

  async load(url: string, body?: string): Promise<void> {
    var res = await this._fetcher.fetch(url, body);
    this._log.info((body === undefined ? 'GET ' : 'POST ') + url + ' ' + res.status + ' ' + res.body.length + 'B');
    var doc = parseHTML(res.body);

    var sheets: string[] = [];
    for (var href of findStylesheetLinks(doc)) {
      var css = await this._fetchResource('stylesheet', resolveUrl(href, url));
      if (css !== null) sheets.push(css);
    }

    if (this._js) this._js.dispose();
    this._focus = null;
    var page = new Page(url, doc, sheets, this.config.viewportWidth);
    var js = new PageJS(this._quickjs, page, {
      name:   url,
      limits: { memoryLimitBytes: this.config.memoryLimitBytes, timeoutMs: this.config.scriptTimeoutMs },
      log:    this._log.child('bridge'),
      faults: this.faults,
    });
    this._page   = page;
    this._js     = js;
    this._events = new EventDispatcher(js, page);
    this.history.push(url);

    try {
      js.runBootstrap();
    } catch (e) {
      if (!(e instanceof BootstrapFault)) throw e;
    }

    var inline = 0;
    for (var rec of findScripts(doc)) {
      var result: ScriptResult;
      if (rec.inline) {
        result = js.loadScript(rec.code, 'inline script ' + (++inline));
      } else {
        var src = resolveUrl(rec.src, url);
        var code = await this._fetchResource('script', src);
        if (code === null) continue;
        result = js.loadScript(code, src);
      }
      if (result.status === 'skipped') break;
    }
    page.render();
  }

  /** Go back one entry. Returns false when there is nothing to go back to. */
  async goBack(): Promise<boolean> {
    if (this.history.length < 2) return false;
    this.history.pop();
    var back = this.history.pop();
    if (back === undefined) return false;
    await this.load(back);
    return true;
  }

  // ── Input ──────────────────────────────────────────────────────────────────

  /** Click at page coordinates. */
  async click(x: number, y: number): Promise<void> {
    if (!this._page || !this._events) return;
    this._focus = null;
    var target = this._page.hitTest(x, y);
    if (!target) return;
    await this._perform(this._events.click(target));
  }

  /** Type one character into the focused input. */
  keypress(ch: string): boolean {
    if (!this._focus || !this._events) return false;
    return this._events.keypress(this._focus, ch);
  }

  async pressEnter(): Promise<void> {
    if (!this._focus || !this._events) return;
    await this._perform(this._events.enter(this._focus));
  }

  /** Tear down the current page's bridge. */
  close(): void {
    if (this._js) this._js.dispose();
    this._js = null;
    this._events = null;
    this._focus = null;
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private async _perform(action: DefaultAction): Promise<void> {
    switch (action.kind) {
      case 'none':
        return;
      case 'focus':
        this._focus = action.input;
        return;
      case 'navigate':
        await this.load(action.url, action.body);
        return;
    }
  }

  /** Body of a subresource, or null (reported) when it cannot be had. */
  private async _fetchResource(kind: string, url: string): Promise<string | null> {
    var res: FetchResponse;
    try {
      res = await this._fetcher.fetch(url);
    } catch (e) {
      this._log.warn(kind + ' ' + url + ' failed to load:', e);
      return null;
    }
    if (res.status >= 400) {
      this._log.warn(kind + ' ' + url + ' failed to load: HTTP ' + res.status);
      return null;
    }
    return res.body;
  }
}
