import type { IntakeFlowEngine } from "../intake/engine.js";
import type { CallSession } from "../intake/types.js";

type CallEntry = {
  session: CallSession;
  engine: IntakeFlowEngine | null;
};

/**
 * In-memory call sessions, keyed by call SID. An entry lives from the incoming-call
 * webhook until the call completes or its media stream closes.
 */
export class CallRegistry {
  private readonly calls = new Map<string, CallEntry>();

  open(callSid: string, callerId: string | null, now: Date = new Date()): CallSession {
    const existing = this.calls.get(callSid);
    if (existing) return existing.session;
    const session: CallSession = { callSid, callerId, state: {}, step: "initial", startedAt: now.toISOString() };
    this.calls.set(callSid, { session, engine: null });
    return session;
  }

  get(callSid: string): CallSession | undefined {
    return this.calls.get(callSid)?.session;
  }

  attach(callSid: string, engine: IntakeFlowEngine): void {
    const entry = this.calls.get(callSid);
    if (!entry) throw new Error(`No call session for ${callSid}`);
    entry.engine = engine;
  }

  /** Cancels the call's engine, if any, and forgets the session. Returns the session closed. */
  close(callSid: string): CallSession | undefined {
    const entry = this.calls.get(callSid);
    if (!entry) return undefined;
    entry.engine?.cancel();
    this.calls.delete(callSid);
    return entry.session;
  }

  get size(): number {
    return this.calls.size;
  }
}
