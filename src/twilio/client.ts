import twilio from "twilio";

export type TwilioClient = ReturnType<typeof twilio>;

export function createTwilioClient(accountSid: string, authToken: string): TwilioClient {
  return twilio(accountSid, authToken);
}

/** Ends an in-progress call through the REST API. */
export async function hangUpCall(client: TwilioClient, callSid: string): Promise<void> {
  await client.calls(callSid).update({ status: "completed" });
}
