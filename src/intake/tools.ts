import type { FunctionName, Step } from "./types.js";
import { RECORD_STEPS } from "./types.js";

// ─── Tool definitions sent to the realtime model ─────────────────────────────

type JsonSchema = {
  type: "object" | "array" | "string" | "integer" | "boolean";
  description?: string;
  properties?: Record<string, JsonSchema>;
  additionalProperties?: JsonSchema | boolean;
  items?: JsonSchema;
  enum?: readonly string[];
  required?: readonly string[];
};

export type ToolDefinition = {
  type: "function";
  name: FunctionName;
  description: string;
  parameters: JsonSchema & { type: "object" };
};

const noArgs = { type: "object", properties: {}, required: [] } as const;

const incomeDetail: JsonSchema = {
  type: "object",
  properties: {
    amount: { type: "integer", description: "Whole dollars received" },
    period: { type: "string", enum: ["month", "year"], description: "How often the amount is received" }
  },
  required: ["amount", "period"]
};

const opposingParty: JsonSchema = {
  type: "object",
  properties: {
    first: { type: "string" },
    middle: { type: "string" },
    last: { type: "string" },
    dob: { type: "string", description: "Date of birth as YYYY-MM-DD, if known" },
    visa_number: { type: "string" },
    phones: {
      type: "array",
      items: {
        type: "object",
        properties: {
          number: { type: "string", description: "10 digit US phone number" },
          type: { type: "string", enum: ["business", "other", "home", "mobile", "fax"] }
        },
        required: ["number", "type"]
      }
    }
  },
  required: ["first", "last"]
};

export const TOOLS: Readonly<Record<FunctionName, ToolDefinition>> = {
  system_phone_number: {
    type: "function",
    name: "system_phone_number",
    description:
      "Check whether the phone system received the caller's number. Returns it for confirmation, or phone_number null when it must be collected.",
    parameters: noArgs
  },
  record_phone_number: {
    type: "function",
    name: "record_phone_number",
    description: "Record the caller's US phone number.",
    parameters: {
      type: "object",
      properties: { phone_number: { type: "string", description: "The caller's 10 digit US phone number" } },
      required: ["phone_number"]
    }
  },
  record_name: {
    type: "function",
    name: "record_name",
    description: "Record the caller's name.",
    parameters: {
      type: "object",
      properties: {
        first: { type: "string", description: "First name" },
        middle: { type: "string", description: "Middle name, or empty string" },
        last: { type: "string", description: "Last name" }
      },
      required: ["first", "middle", "last"]
    }
  },
  record_service_area: {
    type: "function",
    name: "record_service_area",
    description: "Record the city or county where the caller lives or where the legal problem happened.",
    parameters: {
      type: "object",
      properties: { location: { type: "string", description: "City or county name" } },
      required: ["location"]
    }
  },
  record_case_type: {
    type: "function",
    name: "record_case_type",
    description: "Check whether the caller's legal problem is a type of case we handle.",
    parameters: {
      type: "object",
      properties: { case_description: { type: "string", description: "Short description of the legal problem" } },
      required: ["case_description"]
    }
  },
  record_conflict: {
    type: "function",
    name: "record_conflict",
    description: "Check the opposing parties for a conflict of interest.",
    parameters: {
      type: "object",
      properties: {
        opposing_parties: { type: "array", items: opposingParty, description: "Everyone on the other side of the case" }
      },
      required: ["opposing_parties"]
    }
  },
  record_domestic_violence: {
    type: "function",
    name: "record_domestic_violence",
    description: "Record who is perpetrating domestic violence against the caller, if anyone.",
    parameters: {
      type: "object",
      properties: { perpetrators: { type: "array", items: { type: "string" } } },
      required: ["perpetrators"]
    }
  },
  record_income: {
    type: "function",
    name: "record_income",
    description: "Record income for every household member and check income eligibility.",
    parameters: {
      type: "object",
      properties: {
        income: {
          type: "object",
          description:
            'Household member name → income type → {amount, period}. Example: {"John Doe": {"wages": {"amount": 2000, "period": "month"}}}',
          additionalProperties: { type: "object", additionalProperties: incomeDetail }
        }
      },
      required: ["income"]
    }
  },
  record_assets_receives_benefits: {
    type: "function",
    name: "record_assets_receives_benefits",
    description: "Record whether the caller receives Medicaid, SSI, or TANF benefits.",
    parameters: {
      type: "object",
      properties: { receives_benefits: { type: "boolean" } },
      required: ["receives_benefits"]
    }
  },
  record_assets_list: {
    type: "function",
    name: "record_assets_list",
    description: "Record the household's assets and check asset eligibility.",
    parameters: {
      type: "object",
      properties: {
        assets: {
          type: "array",
          description: 'One entry per asset, name → net value in whole dollars. Example: [{"car": 5000}, {"savings": 2000}]',
          items: { type: "object", additionalProperties: { type: "integer" } }
        }
      },
      required: ["assets"]
    }
  },
  record_citizenship: {
    type: "function",
    name: "record_citizenship",
    description: "Record whether the caller is a US citizen.",
    parameters: {
      type: "object",
      properties: { is_a_us_citizen: { type: "boolean" } },
      required: ["is_a_us_citizen"]
    }
  },
  record_emergency: {
    type: "function",
    name: "record_emergency",
    description: "Record whether the caller's legal problem is an emergency.",
    parameters: {
      type: "object",
      properties: { is_emergency: { type: "boolean" } },
      required: ["is_emergency"]
    }
  },
  continue_intake: {
    type: "function",
    name: "continue_intake",
    description: "Continue the screening at the caller's request even though they may be over a limit.",
    parameters: {
      type: "object",
      properties: { next_step: { type: "string", enum: RECORD_STEPS, description: "The step to continue with" } },
      required: ["next_step"]
    }
  },
  end_conversation: {
    type: "function",
    name: "end_conversation",
    description: "End the call after saying goodbye.",
    parameters: noArgs
  },
  caller_ended_conversation: {
    type: "function",
    name: "caller_ended_conversation",
    description: "The caller has said goodbye or asked to stop.",
    parameters: noArgs
  }
};

export function toolsFor(step: Step): ToolDefinition[] {
  return step.functions.map((fn) => TOOLS[fn]);
}
