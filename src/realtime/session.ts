import WebSocket from "ws";
import type { WebSocket as TwilioWs } from "ws";
import type { IntakeFlowEngine } from "../intake/engine.js";
import { CallCancelledError, DependencyUnavailableError } from "../intake/errors.js";
import { contextSummary } from "../intake/summary.js";
import type { FunctionOutcome } from "../intake/types.js";
import { log as rootLog, type Logger } from "../utils/log.js";
import { openAiEventSchema, parseFrame, twilioMessageSchema, type FunctionCallDoneEvent, type OpenAiEvent } from "./events.js";
import {
  afterFunctionCall,
  functionCallOutput,
  responseCreate,
  sessionConfig,
  textMessage,
  type ClientEvent
} from "./protocol.js";

const OPENAI_REALTIME_URL = "wss://api.openai.com/v1/realtime";

/** Time for the agent's farewell to play out before the line is dropped. */
const HANGUP_DELAY_MS = 4000;

export const DEPENDENCY_FAILURE_MESSAGE =
  "The system could not complete this check right now. Ask the caller to hold on for a moment and try once more. " +
  "If it fails again, tell them a staff member will call them back, then call end_conversation.";

export type RealtimeSessionOptions = {
  twilioWs: TwilioWs;
  engine: IntakeFlowEngine;
  callSid: string;
  streamSid: string;
  openAi: { apiKey: string; model: string; voice: string };
  /** Ends the phone call; invoked once, after a terminal step. */
  hangUp: () => Promise<void>;
  logger?: Logger;
};

/**
 * Bridges one Twilio media stream to an OpenAI Realtime session and routes the
 * agent's function calls through the intake engine.
 */
export class RealtimeSession {
  private readonly openAiWs: WebSocket;
  private readonly twilioWs: TwilioWs;
  private readonly engine: IntakeFlowEngine;
  private readonly log: Logger;
  private readonly streamSid: string;
  private lastAssistantItemId: string | null = null;
  private responseStartTs: number | null = null;
  private latestMediaTs = 0;
  private markQueue: string[] = [];
  /** Conversation items the model holds, in creation order. */
  private itemIds: string[] = [];
  private calls: Promise<void> = Promise.resolve();
  private hangupTimer: NodeJS.Timeout | null = null;
  private ended = false;

  constructor(private readonly opts: RealtimeSessionOptions) {
    this.twilioWs = opts.twilioWs;
    this.engine = opts.engine;
    this.streamSid = opts.streamSid;
    this.log = (opts.logger ?? rootLog).child({ callSid: opts.callSid });

    this.openAiWs = new WebSocket(`${OPENAI_REALTIME_URL}?model=${encodeURIComponent(opts.openAi.model)}`, {
      headers: { Authorization: `Bearer ${opts.openAi.apiKey}` }
    });

    this.openAiWs.on("open", () => {
      this.log.info("OpenAI Realtime connected");
      this.initSession();
    });

    this.openAiWs.on("message", (data) => {
      const event = parseFrame(openAiEventSchema, data.toString());
      if (event) this.handleOpenAiEvent(event);
    });

    this.openAiWs.on("error", (err) => {
      this.log.error({ err }, "OpenAI Realtime WebSocket error");
      this.cleanup();
    });

    this.openAiWs.on("close", () => {
      this.log.info("OpenAI Realtime WebSocket closed");
    });
  }

  // ── Session initialisation ────────────────────────────────────────────────

  private initSession() {
    const step = this.engine.start();
    this.send(sessionConfig(step, { model: this.opts.openAi.model, voice: this.opts.openAi.voice }));
    // Nudge the model so the agent speaks first.
    this.send(textMessage("user", "(call connected, greet the caller)"));
    this.send(responseCreate);
  }

  // ── Handle events from OpenAI ─────────────────────────────────────────────

  private handleOpenAiEvent(event: OpenAiEvent) {
    switch (event.type) {
      case "response.output_audio.delta":
        this.forwardAudioToTwilio(event.delta);
        break;

      case "response.output_item.done":
        this.lastAssistantItemId = event.item.id;
        break;

      case "conversation.item.added":
        this.itemIds.push(event.item.id);
        break;

      case "input_audio_buffer.speech_started":
        this.handleBargein();
        break;

      case "response.function_call_arguments.done":
        this.queueFunctionCall(event);
        break;

      case "error":
        this.log.error({ error: event.error }, "OpenAI Realtime error event");
        break;
    }
  }

  private forwardAudioToTwilio(payload: string) {
    if (this.responseStartTs === null) {
      this.responseStartTs = this.latestMediaTs;
    }

    const mark = `r-${Date.now()}`;
    this.sendToTwilio({ event: "media", streamSid: this.streamSid, media: { payload } });
    this.sendToTwilio({ event: "mark", streamSid: this.streamSid, mark: { name: mark } });
    this.markQueue.push(mark);
  }

  private handleBargein() {
    if (this.markQueue.length === 0 || this.responseStartTs === null) return;

    const elapsed = this.latestMediaTs - this.responseStartTs;
    if (this.lastAssistantItemId) {
      this.send({
        type: "conversation.item.truncate",
        item_id: this.lastAssistantItemId,
        content_index: 0,
        audio_end_ms: Math.max(0, elapsed)
      });
    }
    this.sendToTwilio({ event: "clear", streamSid: this.streamSid });
    this.markQueue = [];
    this.responseStartTs = null;
  }

  // ── Function calls ────────────────────────────────────────────────────────

  /** One call at a time, so compaction and step updates land in the order the engine moved. */
  private queueFunctionCall(event: FunctionCallDoneEvent) {
    this.calls = this.calls
      .then(() => this.handleFunctionCall(event))
      .catch((err: unknown) => {
        this.log.error({ err, fn: event.name }, "function call failed");
        this.endCall();
      });
  }

  private async handleFunctionCall(event: FunctionCallDoneEvent) {
    let args: unknown;
    try {
      args = JSON.parse(event.arguments);
    } catch {
      this.log.warn({ fn: event.name, raw: event.arguments }, "Failed to parse function args");
      this.send(functionCallOutput(event.call_id, { status: "error", error: "The arguments were not valid JSON" }));
      this.send(responseCreate);
      return;
    }

    let outcome: FunctionOutcome;
    try {
      outcome = await this.engine.handleFunctionCall(event.name, args);
    } catch (err) {
      if (err instanceof CallCancelledError) {
        this.log.debug({ fn: event.name }, "function result discarded after hangup");
        return;
      }
      if (err instanceof DependencyUnavailableError) {
        this.log.warn({ err, dependency: err.dependency, fn: event.name }, "dependency unavailable");
        this.send(functionCallOutput(event.call_id, { status: "error", error: DEPENDENCY_FAILURE_MESSAGE }));
        this.send(responseCreate);
        return;
      }
      throw err;
    }

    const events = afterFunctionCall({
      callId: event.call_id,
      itemId: event.item_id,
      result: outcome.result,
      next: outcome.next,
      itemIds: this.itemIds,
      summary: contextSummary(this.engine.state)
    });
    if (outcome.next?.contextReset) this.itemIds = this.itemIds.filter((id) => id === event.item_id);
    for (const e of events) this.send(e);

    if (outcome.next?.postAction === "end_conversation") this.endCall();
  }

  private endCall() {
    if (this.ended) return;
    this.ended = true;
    this.log.info({ step: this.engine.step.name }, "ending call");
    this.hangupTimer = setTimeout(() => {
      this.opts.hangUp().catch((err: unknown) => this.log.warn({ err }, "failed to hang up call via REST"));
    }, HANGUP_DELAY_MS);
  }

  // ── Handle events from Twilio ─────────────────────────────────────────────

  handleTwilioMessage(raw: string) {
    const msg = parseFrame(twilioMessageSchema, raw);
    if (!msg) return;

    switch (msg.event) {
      case "start":
        this.latestMediaTs = 0;
        this.responseStartTs = null;
        break;

      case "media":
        this.latestMediaTs = msg.media.timestamp;
        this.send({ type: "input_audio_buffer.append", audio: msg.media.payload });
        break;

      case "mark":
        this.markQueue.shift();
        break;

      case "stop":
        this.cleanup();
        break;

      case "connected":
        break;
    }
  }

  // ── Cleanup ───────────────────────────────────────────────────────────────

  cleanup() {
    this.engine.cancel();
    if (this.openAiWs.readyState === WebSocket.OPEN || this.openAiWs.readyState === WebSocket.CONNECTING) {
      this.openAiWs.close();
    }
  }

  /** Drops a pending hangup; the call is already gone. */
  dispose() {
    if (this.hangupTimer) clearTimeout(this.hangupTimer);
    this.cleanup();
  }

  // ── Helpers ───────────────────────────────────────────────────────────────

  private send(event: ClientEvent) {
    if (this.openAiWs.readyState === WebSocket.OPEN) {
      this.openAiWs.send(JSON.stringify(event));
    }
  }

  private sendToTwilio(event: object) {
    if (this.twilioWs.readyState === WebSocket.OPEN) {
      this.twilioWs.send(JSON.stringify(event));
    }
  }
}
