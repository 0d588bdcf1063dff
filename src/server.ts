import http from "node:http";
import express from "express";
import { WebSocketServer } from "ws";
import { pinoHttp } from "pino-http";

import { parseEnv } from "./env.js";
import { buildIntakeConfig } from "./intake/config.js";
import { IntakeFlowEngine } from "./intake/engine.js";
import { parseFrame, twilioStartMessageSchema } from "./realtime/events.js";
import { RealtimeSession } from "./realtime/session.js";
import { createTwilioClient, hangUpCall } from "./twilio/client.js";
import { buildAbsoluteUrl, getCallerId, getCallSid, mediaStreamUrl } from "./twilio/flow.js";
import { startCallRecording } from "./twilio/recording.js";
import { CallRegistry } from "./twilio/state.js";
import { streamAuthCode, verifyStreamAuthCode } from "./twilio/streamAuth.js";
import { connectStreamTwiml, unavailableTwiml } from "./twilio/twiml.js";
import { twilioValidateMiddleware } from "./twilio/verify.js";
import { log } from "./utils/log.js";

const UNAVAILABLE_MESSAGE = "Sorry, we cannot take your call right now. Please try again later.";

function main() {
  const env = parseEnv();
  log.level = env.LOG_LEVEL;

  const intake = buildIntakeConfig(env);
  const twilioClient = createTwilioClient(env.TWILIO_ACCOUNT_SID, env.TWILIO_AUTH_TOKEN);
  const calls = new CallRegistry();

  log.info(
    {
      initialFunction: intake.settings.initialFunction,
      serviceAreaMatcher: env.SERVICE_AREA_MATCHER,
      caseTypeClassifier: env.CASE_TYPE_CLASSIFIER,
      conflictChecker: env.CONFLICT_CHECKER
    },
    "intake configured"
  );

  const app = express();

  // ── Middleware ────────────────────────────────────────────────────────────

  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());
  app.use(pinoHttp({ logger: log }));

  const twilioVerify = twilioValidateMiddleware({
    authToken: env.TWILIO_AUTH_TOKEN,
    enabled: env.TWILIO_VALIDATE_SIGNATURE,
    publicBaseUrl: env.PUBLIC_BASE_URL,
    logger: log
  });

  // ── Health ────────────────────────────────────────────────────────────────

  app.get("/health", (_req, res) => res.json({ ok: true, activeCalls: calls.size }));

  // ═══════════════════════════════════════════════════════════════════════════
  // TWILIO WEBHOOKS
  // ═══════════════════════════════════════════════════════════════════════════

  app.post("/twilio/voice/incoming", twilioVerify, (req, res) => {
    let callSid: string;
    try {
      callSid = getCallSid(req);
    } catch (err) {
      log.warn({ err }, "incoming call rejected");
      return res.type("text/xml").send(unavailableTwiml(UNAVAILABLE_MESSAGE));
    }
    const callerId = getCallerId(req);
    calls.open(callSid, callerId);
    log.info({ callSid, hasCallerId: callerId !== null }, "incoming call");

    if (env.RECORD_CALLS) {
      startCallRecording(twilioClient, callSid, buildAbsoluteUrl("/twilio/voice/recording", env.PUBLIC_BASE_URL)).catch(
        (err: unknown) => log.warn({ err, callSid }, "start recording failed")
      );
    }

    const parameters: Record<string, string> = { callSid };
    if (env.STREAM_AUTH_SECRET) parameters.auth = streamAuthCode(env.STREAM_AUTH_SECRET, callSid);
    res.type("text/xml").send(connectStreamTwiml(mediaStreamUrl(env.PUBLIC_BASE_URL), parameters));
  });

  app.post("/twilio/voice/status", twilioVerify, (req, res) => {
    const callSid: unknown = req.body?.CallSid;
    const callStatus: unknown = req.body?.CallStatus;
    if (typeof callSid === "string" && callStatus === "completed") {
      const session = calls.close(callSid);
      if (session) log.info({ callSid, step: session.step, state: session.state }, "call completed");
    }
    res.sendStatus(200);
  });

  app.post("/twilio/voice/recording", twilioVerify, (req, res) => {
    const callSid: unknown = req.body?.CallSid;
    const recordingUrl: unknown = req.body?.RecordingUrl;
    if (env.RECORD_CALLS && typeof recordingUrl === "string") {
      log.info({ callSid, recordingUrl: `${recordingUrl}.mp3` }, "call recording available");
    }
    res.sendStatus(200);
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // HTTP server + WebSocket server (Twilio Media Streams)
  // ═══════════════════════════════════════════════════════════════════════════

  const server = http.createServer(app);
  const wss = new WebSocketServer({ server, path: "/media-stream" });

  wss.on("connection", (twilioWs) => {
    log.info("Twilio media stream WebSocket connected");

    let callSid: string | null = null;
    let session: RealtimeSession | null = null;

    twilioWs.on("message", (raw) => {
      const msg = raw.toString();
      if (session) return session.handleTwilioMessage(msg);

      const start = parseFrame(twilioStartMessageSchema, msg);
      if (!start) return;

      const params = start.start.customParameters;
      callSid = params.callSid ?? start.start.callSid ?? null;
      if (!callSid) {
        log.warn("media-stream start event missing callSid");
        return twilioWs.close();
      }
      if (env.STREAM_AUTH_SECRET && !verifyStreamAuthCode(env.STREAM_AUTH_SECRET, callSid, params.auth)) {
        log.warn({ callSid }, "media-stream auth code rejected");
        return twilioWs.close(1008, "unauthorized");
      }

      const callSession = calls.get(callSid);
      if (!callSession) {
        log.warn({ callSid }, "media-stream for unknown call");
        return twilioWs.close();
      }

      const sid = callSid;
      const engine = new IntakeFlowEngine(callSession, intake.settings, intake.deps, log);
      calls.attach(sid, engine);

      session = new RealtimeSession({
        twilioWs,
        engine,
        callSid: sid,
        streamSid: start.start.streamSid,
        openAi: { apiKey: env.OPENAI_API_KEY, model: env.OPENAI_REALTIME_MODEL, voice: env.OPENAI_VOICE },
        hangUp: () => hangUpCall(twilioClient, sid),
        logger: log
      });
      session.handleTwilioMessage(msg);
    });

    twilioWs.on("close", () => {
      log.info({ callSid }, "Twilio WebSocket closed");
      session?.dispose();
      if (callSid) calls.close(callSid);
    });

    twilioWs.on("error", (err) => {
      log.warn({ callSid, err }, "Twilio WebSocket error");
      session?.dispose();
    });
  });

  server.listen(env.PORT, () => {
    log.info({ port: env.PORT }, "server listening");
  });
}

try {
  main();
} catch (err) {
  log.error({ err }, "fatal");
  process.exit(1);
}
