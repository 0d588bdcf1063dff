import { describe, expect, it } from "vitest";
import { connectStreamTwiml, unavailableTwiml } from "./twiml.js";

describe("connectStreamTwiml", () => {
  it("pauses, then connects the media stream with its parameters", () => {
    const xml = connectStreamTwiml("wss://intake.example.org/media-stream", { callSid: "CA1", auth: "abc" });
    expect(xml).toContain(
      '<Response><Pause length="1"/><Connect><Stream url="wss://intake.example.org/media-stream">' +
        '<Parameter name="callSid" value="CA1"/><Parameter name="auth" value="abc"/></Stream></Connect></Response>'
    );
  });

  it("connects without parameters", () => {
    const xml = connectStreamTwiml("wss://intake.example.org/media-stream", {});
    expect(xml).toContain('<Stream url="wss://intake.example.org/media-stream"/>');
  });
});

describe("unavailableTwiml", () => {
  it("apologises and hangs up", () => {
    expect(unavailableTwiml("Please call back later.")).toContain(
      '<Response><Say voice="Polly.Joanna">Please call back later.</Say><Hangup/></Response>'
    );
  });
});
