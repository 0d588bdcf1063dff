import { z } from "zod";

// ─── OpenAI Realtime server events (only the ones the bridge acts on) ────────

export const audioDeltaEventSchema = z.object({
  type: z.literal("response.output_audio.delta"),
  delta: z.string()
});

export const outputItemDoneEventSchema = z.object({
  type: z.literal("response.output_item.done"),
  item: z.object({ id: z.string() }).passthrough()
});

export const itemAddedEventSchema = z.object({
  type: z.literal("conversation.item.added"),
  item: z.object({ id: z.string() }).passthrough()
});

export const functionCallDoneEventSchema = z.object({
  type: z.literal("response.function_call_arguments.done"),
  name: z.string(),
  call_id: z.string(),
  item_id: z.string(),
  arguments: z.string().default("{}")
});

export const errorEventSchema = z.object({
  type: z.literal("error"),
  error: z.object({ message: z.string().optional(), code: z.string().nullish() }).passthrough()
});

export const openAiEventSchema = z.discriminatedUnion("type", [
  audioDeltaEventSchema,
  outputItemDoneEventSchema,
  itemAddedEventSchema,
  functionCallDoneEventSchema,
  errorEventSchema,
  z.object({ type: z.literal("input_audio_buffer.speech_started") })
]);

export type OpenAiEvent = z.infer<typeof openAiEventSchema>;
export type FunctionCallDoneEvent = z.infer<typeof functionCallDoneEventSchema>;

// ─── Twilio media stream messages ─────────────────────────────────────────────

export const twilioStartMessageSchema = z.object({
  event: z.literal("start"),
  start: z.object({
    streamSid: z.string(),
    callSid: z.string().optional(),
    customParameters: z.record(z.string()).default({})
  })
});

export const twilioMessageSchema = z.discriminatedUnion("event", [
  z.object({ event: z.literal("connected") }),
  twilioStartMessageSchema,
  z.object({
    event: z.literal("media"),
    media: z.object({ payload: z.string(), timestamp: z.coerce.number().default(0) })
  }),
  z.object({ event: z.literal("mark"), mark: z.object({ name: z.string() }).optional() }),
  z.object({ event: z.literal("stop") })
]);


/** Parses a raw frame, or returns null for anything malformed or of no interest. */
export function parseFrame<S extends z.ZodTypeAny>(schema: S, raw: string): z.output<S> | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed: z.SafeParseReturnType<unknown, z.output<S>> = schema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
