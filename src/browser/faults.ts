/**
 * faults.ts — Crash containment between page scripts and the host
 *
 *   ScriptFault     guest code threw, failed to parse or ran out of time.
 *                   Logged at warn; the page carries on.
 *   BridgeFault     host refused a request for a reason the script should
 *                   see (bad selector, hierarchy error). Surfaces in the
 *                   guest as an Error whose name is the fault code.
 *   bridge defect   anything else thrown inside a host function (unknown
 *                   handle included). Logged at error with the call that
 *                   triggered it; the guest still only sees an exception.
 *   BootstrapFault  the reflector program failed; scripting is off for
 *                   the rest of the page load.
 */

import type { Logger } from '../core/log.js';
import type { GuestError } from '../process/script-context.js';

export type FaultPhase = 'load' | 'dispatch' | 'job';

export interface FaultSite {
  phase:      FaultPhase;
  /** Script name for loads; absent for listener and job faults. */
  script?:    string;
  eventType?: string;
  handle?:    number;
}

// ── Fault types ───────────────────────────────────────────────────────────────

export class ScriptFault extends Error {
  readonly site:     FaultSite;
  readonly guest:    GuestError;
  readonly timedOut: boolean;

  constructor(site: FaultSite, guest: GuestError, timedOut = false) {
    super(describeSite(site) + ': ' + (timedOut ? 'timed out' : guest.name + ': ' + guest.message));
    this.name     = 'ScriptFault';
    this.site     = site;
    this.guest    = guest;
    this.timedOut = timedOut;
  }
}

export type BridgeFaultCode =
  | 'SyntaxError'
  | 'HierarchyRequestError'
  | 'NotFoundError'
  | 'InvalidCharacterError'
  | 'TypeError';

export class BridgeFault extends Error {
  readonly code: BridgeFaultCode;
  constructor(code: BridgeFaultCode, message: string) {
    super(message);
    // The guest sees `name`, so it carries the code.
    this.name = code;
    this.code = code;
  }
}

export class BootstrapFault extends Error {
  readonly guest: GuestError | null;
  constructor(message: string, guest: GuestError | null = null) {
    super(message);
    this.name  = 'BootstrapFault';
    this.guest = guest;
  }
}

function describeSite(site: FaultSite): string {
  var where = site.script ?? (site.phase === 'dispatch' ? 'listener' : 'script');
  var what: string = site.phase;
  if (site.eventType !== undefined) what += ' ' + site.eventType;
  if (site.handle !== undefined) what += ' on handle ' + site.handle;
  return 'crashed in ' + where + ' (' + what + ')';
}

// ── Reporter ──────────────────────────────────────────────────────────────────

export type FaultKind = 'script' | 'bootstrap' | 'defect';

export interface FaultRecord {
  kind:    FaultKind;
  message: string;
  time:    number;
}

/**
 * Developer-facing fault log. Keeps the most recent `limit` records and
 * mirrors each one to the logger.
 */
export class FaultReporter {
  private _records: FaultRecord[] = [];
  private _limit:   number;
  private _log:     Logger;

  constructor(log: Logger, limit = 100) {
    this._log   = log;
    this._limit = Math.max(1, limit);
  }

  get records(): readonly FaultRecord[] { return this._records; }

  count(kind?: FaultKind): number {
    return kind ? this._records.filter(r => r.kind === kind).length : this._records.length;
  }

  script(fault: ScriptFault): void {
    this._log.warn(fault.message);
    if (fault.guest.stack) this._log.debug(fault.guest.stack);
    this._push('script', fault.message);
  }

  bootstrap(fault: BootstrapFault): void {
    this._log.error('bootstrap failed, scripting disabled for this page: ' + fault.message);
    this._push('bootstrap', fault.message);
  }

  /** Unexpected host failure inside `call`, e.g. `__host.getAttribute(99, "id")`. */
  defect(call: string, err: unknown): void {
    this._log.error('bridge defect in ' + call + ':', err);
    this._push('defect', call + ': ' + (err instanceof Error ? err.name + ': ' + err.message : String(err)));
  }

  clear(): void { this._records = []; }

  private _push(kind: FaultKind, message: string): void {
    this._records.push({ kind, message, time: Date.now() });
    if (this._records.length > this._limit) this._records.splice(0, this._records.length - this._limit);
  }
}
