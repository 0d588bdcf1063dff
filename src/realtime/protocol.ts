import { toolsFor } from "../intake/tools.js";
import type { Step, StepResult } from "../intake/types.js";

// Client events sent to the OpenAI Realtime API.

export type ClientEvent = { type: string } & Record<string, unknown>;

export type AudioSettings = { model: string; voice: string };

/** Full session configuration; sent on connect. */
export function sessionConfig(step: Step, audio: AudioSettings): ClientEvent {
  return {
    type: "session.update",
    session: {
      type: "realtime",
      model: audio.model,
      output_modalities: ["audio"],
      instructions: step.instructions,
      tools: toolsFor(step),
      tool_choice: "auto",
      audio: {
        input: {
          format: { type: "audio/pcmu" },
          turn_detection: { type: "semantic_vad" }
        },
        output: {
          format: { type: "audio/pcmu" },
          voice: audio.voice
        }
      }
    }
  };
}

/** Swaps instructions and tools when the dialogue moves to another step. */
export function stepUpdate(step: Step): ClientEvent {
  return {
    type: "session.update",
    session: { type: "realtime", instructions: step.instructions, tools: toolsFor(step) }
  };
}

export function functionCallOutput(callId: string, result: StepResult | null): ClientEvent {
  return {
    type: "conversation.item.create",
    item: {
      type: "function_call_output",
      call_id: callId,
      output: JSON.stringify(result ?? { status: "success" })
    }
  };
}

export function textMessage(role: "user" | "system", text: string): ClientEvent {
  return {
    type: "conversation.item.create",
    item: { type: "message", role, content: [{ type: "input_text", text }] }
  };
}

export const responseCreate: ClientEvent = { type: "response.create" };

/**
 * Replaces the dialogue so far with a summary. The function call being answered is
 * kept, since its output must follow it.
 */
export function compactionEvents(itemIds: readonly string[], keepItemId: string, summary: string): ClientEvent[] {
  return [
    ...itemIds
      .filter((id) => id !== keepItemId)
      .map((item_id) => ({ type: "conversation.item.delete", item_id })),
    textMessage("system", summary)
  ];
}

/**
 * Everything to send once the engine has answered a function call, in order. Terminal
 * steps get no new response: the farewell was spoken before the call ended.
 */
export function afterFunctionCall(opts: {
  callId: string;
  itemId: string;
  result: StepResult | null;
  next: Step | null;
  itemIds: readonly string[];
  summary: string;
}): ClientEvent[] {
  const { next } = opts;
  const events: ClientEvent[] = [];
  if (next?.contextReset) events.push(...compactionEvents(opts.itemIds, opts.itemId, opts.summary));
  events.push(functionCallOutput(opts.callId, opts.result));
  if (next) events.push(stepUpdate(next));
  if (!next?.postAction) events.push(responseCreate);
  return events;
}
