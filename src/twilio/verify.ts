import twilio from "twilio";
import type { Request, Response, NextFunction } from "express";
import type { Logger } from "../utils/log.js";

export function twilioValidateMiddleware(opts: {
  authToken: string;
  enabled: boolean;
  publicBaseUrl: string;
  logger: Logger;
}) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!opts.enabled) return next();

    const signature = req.header("X-Twilio-Signature");
    if (!signature) {
      opts.logger.warn({ path: req.path }, "twilio webhook without signature");
      return res.status(401).send("Missing Twilio signature");
    }

    // Voice webhooks are form-encoded, so the sorted-params variant applies.
    const url = new URL(req.originalUrl, opts.publicBaseUrl).toString();
    const params: Record<string, string> = req.body ?? {};
    if (!twilio.validateRequest(opts.authToken, signature, url, params)) {
      opts.logger.warn({ path: req.path }, "twilio webhook with invalid signature");
      return res.status(403).send("Invalid Twilio signature");
    }
    return next();
  };
}
