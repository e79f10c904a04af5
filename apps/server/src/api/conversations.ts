import express, { type Request, type Response } from "express";
import {
  CreateConversationSchema,
  SafetyDecisionSchema,
  SendMessageSchema,
  TurnEventSchema,
  type TurnEvent,
} from "@surfloop/shared";
import { getConversation, getConversationEvents, getRecentConversationIds } from "../redis.js";
import { subscribe } from "../conversation-emitter.js";
import { childLogger } from "../logger.js";
import { errorMessage } from "../computer/errors.js";
import { PENDING_NOTICE } from "../agent/conversation.js";
import type { ConversationRegistry } from "../sessions.js";

const log = childLogger("api");

export function createConversationsRouter(registry: ConversationRegistry): express.Router {
  const router = express.Router();

  router.post("/", async (req: Request, res: Response) => {
    const parsed = CreateConversationSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid body", details: parsed.error.flatten() });
      return;
    }
    const meta = await registry.create(parsed.data.model);
    res.status(201).json({ conversation_id: meta.conversation_id });
  });

  router.get("/", async (_req: Request, res: Response) => {
    try {
      const ids = await getRecentConversationIds(50);
      const conversations = await Promise.all(ids.map((id) => getConversation(id)));
      res.json(conversations.filter((c) => c !== null));
    } catch (err) {
      log.error({ err: errorMessage(err) }, "listing conversations failed");
      res.status(500).json({ error: "Failed to list conversations" });
    }
  });

  router.get("/:conversation_id", async (req: Request, res: Response) => {
    const { conversation_id } = req.params;
    const meta = await getConversation(conversation_id);
    if (!meta) {
      res.status(404).json({ error: "Conversation not found" });
      return;
    }
    const session = registry.session(conversation_id);
    res.json({
      ...meta,
      messages: (session?.messages ?? []).map((m) => ({ role: m.role, text: m.text, has_image: Boolean(m.image) })),
      pending_safety_checks: session?.state.pendingApproval?.call.pendingSafetyChecks ?? [],
    });
  });

  router.post("/:conversation_id/messages", async (req: Request, res: Response) => {
    const { conversation_id } = req.params;
    const parsed = SendMessageSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid body", details: parsed.error.flatten() });
      return;
    }
    if (!(await getConversation(conversation_id))) {
      res.status(404).json({ error: "Conversation not found" });
      return;
    }
    const { text, stream } = parsed.data;
    if (registry.isBusy(conversation_id)) {
      // Still goes through the session so the notice lands in the transcript.
      await registry.sendMessage(conversation_id, text, stream);
      res.status(409).json({ error: PENDING_NOTICE });
      return;
    }
    res.status(202).json({ conversation_id, accepted: true });
    registry.sendMessage(conversation_id, text, stream).catch((err: unknown) => {
      log.error({ conversationId: conversation_id, err: errorMessage(err) }, "turn crashed");
    });
  });

  router.post("/:conversation_id/safety", async (req: Request, res: Response) => {
    const { conversation_id } = req.params;
    const parsed = SafetyDecisionSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid body", details: parsed.error.flatten() });
      return;
    }
    const session = registry.session(conversation_id);
    if (!session?.state.pendingApproval) {
      res.status(409).json({ error: "No action is waiting for approval" });
      return;
    }
    if (parsed.data.decision === "deny") {
      const result = await registry.decide(conversation_id, "deny");
      res.json({ conversation_id, result });
      return;
    }
    res.status(202).json({ conversation_id, accepted: true });
    registry.decide(conversation_id, "approve").catch((err: unknown) => {
      log.error({ conversationId: conversation_id, err: errorMessage(err) }, "approved step crashed");
    });
  });

  router.post("/:conversation_id/cancel", async (req: Request, res: Response) => {
    const { conversation_id } = req.params;
    if (!(await getConversation(conversation_id))) {
      res.status(404).json({ error: "Conversation not found" });
      return;
    }
    const cancelled = await registry.cancel(conversation_id);
    res.json({ conversation_id, cancelled });
  });

  router.get("/:conversation_id/events", async (req: Request, res: Response) => {
    const { conversation_id } = req.params;
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    const send = (e: TurnEvent) => {
      res.write(`data: ${JSON.stringify(e)}\n\n`);
    };

    if (!(await getConversation(conversation_id))) {
      send({ type: "error", payload: { error: "Conversation not found" } });
      res.end();
      return;
    }

    for (const raw of await getConversationEvents(conversation_id)) {
      const parsed = TurnEventSchema.safeParse(safeJson(raw));
      if (parsed.success) send(parsed.data);
    }
    send({ type: "stream_caught_up", payload: { conversation_id } });

    const unsubscribe = subscribe(conversation_id, send);
    req.on("close", unsubscribe);
  });

  return router;
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    log.debug({ err: errorMessage(err) }, "skipping unreadable stored event");
    return null;
  }
}
