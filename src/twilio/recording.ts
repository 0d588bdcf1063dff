import type { TwilioClient } from "./client.js";

export async function startCallRecording(client: TwilioClient, callSid: string, statusCallbackUrl: string) {
  // Caller path should not block TwiML; the webhook fires this without awaiting.
  await client.calls(callSid).recordings.create({
    recordingChannels: "dual",
    recordingStatusCallback: statusCallbackUrl,
    recordingStatusCallbackMethod: "POST"
  });
}
