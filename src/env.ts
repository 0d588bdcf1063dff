import { z } from "zod";
import dotenv from "dotenv";
import { IntakeConfigError } from "./intake/errors.js";
import { describeZodError } from "./intake/schemas.js";
import { ENTRY_FUNCTIONS } from "./intake/types.js";

dotenv.config();

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((v) => v === "true");

/** dotenv leaves unset keys from .env as empty strings. */
const unsetIfBlank = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (typeof v === "string" && v.trim() === "" ? undefined : v), schema.optional());

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) => v.split(",").map((n) => n.trim()).filter(Boolean));

export const envSchema = z
  .object({
    PORT: z.coerce.number().default(3000),
    PUBLIC_BASE_URL: z.string().url(),

    TWILIO_ACCOUNT_SID: z.string().min(1),
    TWILIO_AUTH_TOKEN: z.string().min(1),
    TWILIO_VALIDATE_SIGNATURE: flag("false"),
    // Hex key for signing the media stream's auth parameter. Unset disables the check.
    STREAM_AUTH_SECRET: unsetIfBlank(z.string().regex(/^(?:[0-9a-fA-F]{2})+$/, "Expected a hex encoded key")),
    RECORD_CALLS: flag("false"),

    OPENAI_API_KEY: z.string().min(1),
    OPENAI_VOICE: z.string().default("sage"),
    OPENAI_REALTIME_MODEL: z.string().default("gpt-realtime"),

    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

    INITIAL_FUNCTION: z.enum(ENTRY_FUNCTIONS).default("system_phone_number"),
    INCOME_POVERTY_MULTIPLIER: z.coerce.number().positive().default(3),
    POVERTY_SCALE_REGION: z.enum(["contiguous", "ak", "hi"]).default("contiguous"),
    ASSET_LIMIT: z.coerce.number().int().nonnegative().default(10_000),
    CASE_TYPE_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
    ALTERNATIVE_PROVIDERS: commaList("Center for Legal Help,Local Legal Help"),

    SERVICE_AREA_MATCHER: z.enum(["fuzzy", "suffix"]).default("fuzzy"),

    CASE_TYPE_CLASSIFIER: z.enum(["static", "remote"]).default("static"),
    CLASSIFIER_URL: unsetIfBlank(z.string().url()),
    CLASSIFIER_API_KEY: unsetIfBlank(z.string().min(1)),

    CONFLICT_CHECKER: z.enum(["static", "remote"]).default("static"),
    LEGALSERVER_SUBDOMAIN: unsetIfBlank(z.string().min(1)),
    LEGALSERVER_BEARER_TOKEN: unsetIfBlank(z.string().min(1)),

    REMOTE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000)
  })
  .superRefine((v, ctx) => {
    const need = (key: keyof typeof v, when: string) => {
      if (!v[key]) ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `Required when ${when}` });
    };
    if (v.CASE_TYPE_CLASSIFIER === "remote") {
      need("CLASSIFIER_URL", "CASE_TYPE_CLASSIFIER=remote");
      need("CLASSIFIER_API_KEY", "CASE_TYPE_CLASSIFIER=remote");
    }
    if (v.CONFLICT_CHECKER === "remote") {
      need("LEGALSERVER_SUBDOMAIN", "CONFLICT_CHECKER=remote");
      need("LEGALSERVER_BEARER_TOKEN", "CONFLICT_CHECKER=remote");
    }
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) throw new IntakeConfigError(`Invalid environment: ${describeZodError(parsed.error)}`);
  return parsed.data;
}
