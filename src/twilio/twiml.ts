import twilio from "twilio";

export function newVoiceResponse() {
  return new twilio.twiml.VoiceResponse();
}

/** Returns TwiML that connects the call to a bidirectional media stream. */
export function connectStreamTwiml(wsUrl: string, parameters: Record<string, string>): string {
  const vr = newVoiceResponse();
  // Brief pause so Twilio has time to set up the media stream before speaking.
  vr.pause({ length: 1 });
  const stream = vr.connect().stream({ url: wsUrl });
  for (const [name, value] of Object.entries(parameters)) stream.parameter({ name, value });
  return vr.toString();
}

/** Spoken apology for calls the line cannot take, followed by a hangup. */
export function unavailableTwiml(text: string): string {
  const vr = newVoiceResponse();
  vr.say({ voice: "Polly.Joanna" }, text);
  vr.hangup();
  return vr.toString();
}
