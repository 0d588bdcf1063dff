import type { Request } from "express";

export function buildAbsoluteUrl(path: string, publicBaseUrl: string): string {
  return new URL(path, publicBaseUrl).toString();
}

/** The media stream endpoint as Twilio must dial it, always over wss. */
export function mediaStreamUrl(publicBaseUrl: string): string {
  return buildAbsoluteUrl("/media-stream", publicBaseUrl).replace(/^https?:\/\//, "wss://");
}

export function getCallSid(req: Pick<Request, "body">): string {
  const sid: unknown = req.body?.CallSid;
  if (!sid || typeof sid !== "string") throw new Error("Missing CallSid");
  return sid;
}

/** Caller ID as Twilio reports it; withheld numbers arrive blank or as "Anonymous". */
export function getCallerId(req: Pick<Request, "body">): string | null {
  const from: unknown = req.body?.From;
  if (typeof from !== "string") return null;
  const trimmed = from.trim();
  return trimmed && trimmed.toLowerCase() !== "anonymous" ? trimmed : null;
}
