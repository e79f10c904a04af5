import { randomUUID } from "crypto";
import type { ConversationMeta, ConversationStatus, TurnEvent } from "@surfloop/shared";
import { config } from "./config.js";
import { childLogger, type Logger } from "./logger.js";
import { emit as emitLive } from "./conversation-emitter.js";
import {
  appendConversationEvent,
  getConversation,
  setConversation,
  updateConversation,
} from "./redis.js";
import { errorMessage } from "./computer/errors.js";
import { ActionExecutor } from "./computer/executor.js";
import { StagehandSurface } from "./computer/stagehand-surface.js";
import type { LoopSettings, TurnEmitter } from "./agent/computer-loop.js";
import { ConversationSession, type TurnResult, type TurnStatus } from "./agent/conversation.js";
import { OpenAIGateway } from "./agent/model-gateway.js";

export type SessionHandle = {
  session: ConversationSession;
  close(): Promise<void>;
};

export type SessionFactory = (input: {
  conversationId: string;
  model: string;
  emit: TurnEmitter;
}) => Promise<SessionHandle>;

export function loopSettingsFromConfig(model: string): LoopSettings {
  return {
    model,
    maxIterations: config.MAX_CHAIN_ITERATIONS,
    maxConsecutiveWaits: config.MAX_CONSECUTIVE_WAITS,
    imageHaltPolicy: config.IMAGE_HALT_POLICY,
    safetyPolicy: config.SAFETY_CHECK_POLICY,
    strict: config.STRICT_COMPUTER_USE,
  };
}

/** Sessions backed by a Stagehand browser and the OpenAI Responses API. */
export function stagehandSessionFactory(): SessionFactory {
  const gateway = OpenAIGateway.fromConfig();
  return async ({ conversationId, model, emit }) => {
    const surface = await StagehandSurface.launch({
      env: config.BROWSER_ENV,
      headless: config.BROWSER_HEADLESS,
      viewport: { width: config.DISPLAY_WIDTH, height: config.DISPLAY_HEIGHT },
      browserbaseApiKey: config.BROWSERBASE_API_KEY,
      browserbaseProjectId: config.BROWSERBASE_PROJECT_ID,
      logger: childLogger("surface").child({ conversationId }),
    });
    const executor = new ActionExecutor(surface, { logger: childLogger("executor").child({ conversationId }) });
    const session = new ConversationSession({
      gateway,
      executor,
      settings: loopSettingsFromConfig(model),
      emit,
      logger: childLogger("conversation").child({ conversationId }),
    });
    return { session, close: () => surface.close() };
  };
}

const STATUS_AFTER_TURN: Record<Exclude<TurnStatus, "blocked">, ConversationStatus> = {
  completed: "idle",
  failed: "failed",
  cancelled: "cancelled",
  awaiting_approval: "awaiting_approval",
};

/**
 * Live conversations by id. Each gets its own surface on first use; metadata
 * and turn events go to redis (or memory) and out to SSE subscribers.
 */
export class ConversationRegistry {
  private readonly handles = new Map<string, SessionHandle>();
  private readonly launching = new Map<string, Promise<SessionHandle>>();
  private readonly log: Logger;

  constructor(
    private readonly factory: SessionFactory,
    logger?: Logger
  ) {
    this.log = logger ?? childLogger("conversations");
  }

  async create(model: string = config.CUA_MODEL): Promise<ConversationMeta> {
    const now = new Date().toISOString();
    const meta: ConversationMeta = {
      conversation_id: randomUUID(),
      model,
      status: "idle",
      created_at: now,
      updated_at: now,
    };
    await setConversation(meta);
    this.log.info({ conversationId: meta.conversation_id, model }, "conversation created");
    return meta;
  }

  session(conversationId: string): ConversationSession | null {
    return this.handles.get(conversationId)?.session ?? null;
  }

  isBusy(conversationId: string): boolean {
    const session = this.session(conversationId);
    return session !== null && session.busy;
  }

  async sendMessage(conversationId: string, text: string, stream: boolean): Promise<TurnResult> {
    const meta = await getConversation(conversationId);
    if (!meta) throw new Error(`Unknown conversation: ${conversationId}`);

    let handle: SessionHandle;
    try {
      handle = await this.handle(conversationId, meta.model);
    } catch (err) {
      const message = errorMessage(err);
      this.log.error({ conversationId, err: message }, "session launch failed");
      this.record(conversationId, { type: "turn_failed", payload: { error: message } });
      await updateConversation(conversationId, { status: "failed", error: message });
      return { status: "failed", text: "", error: message };
    }

    if (handle.session.busy) return handle.session.sendMessage(text, { stream });

    await updateConversation(conversationId, { status: "running", error: undefined });
    const result = await handle.session.sendMessage(text, { stream });
    await this.settle(conversationId, handle.session, result);
    return result;
  }

  async decide(conversationId: string, decision: "approve" | "deny"): Promise<TurnResult | null> {
    const session = this.session(conversationId);
    if (!session?.state.pendingApproval) return null;
    if (decision === "deny") {
      const result = session.deny();
      await this.settle(conversationId, session, result);
      return result;
    }
    await updateConversation(conversationId, { status: "running" });
    const result = await session.approve();
    await this.settle(conversationId, session, result);
    return result;
  }

  async cancel(conversationId: string): Promise<boolean> {
    const session = this.session(conversationId);
    if (!session) return false;
    const parked = session.state.pendingApproval !== null && !session.running;
    const cancelled = session.cancel();
    // A running turn settles its own status when it unwinds.
    if (cancelled && parked) {
      await updateConversation(conversationId, {
        status: "cancelled",
        last_response_id: undefined,
      });
    }
    return cancelled;
  }

  async closeAll(): Promise<void> {
    const handles = [...this.handles.entries()];
    this.handles.clear();
    await Promise.all(
      handles.map(async ([conversationId, handle]) => {
        try {
          await handle.close();
        } catch (err) {
          this.log.warn({ conversationId, err: errorMessage(err) }, "surface close failed");
        }
      })
    );
  }

  private async settle(conversationId: string, session: ConversationSession, result: TurnResult): Promise<void> {
    if (result.status === "blocked") return;
    await updateConversation(conversationId, {
      status: STATUS_AFTER_TURN[result.status],
      last_response_id: session.state.lastResponseId ?? undefined,
      error: result.error,
    });
  }

  private async handle(conversationId: string, model: string): Promise<SessionHandle> {
    const existing = this.handles.get(conversationId);
    if (existing) return existing;
    let pending = this.launching.get(conversationId);
    if (!pending) {
      pending = this.factory({
        conversationId,
        model,
        emit: (event) => this.record(conversationId, event),
      });
      this.launching.set(conversationId, pending);
    }
    try {
      const handle = await pending;
      this.handles.set(conversationId, handle);
      return handle;
    } finally {
      this.launching.delete(conversationId);
    }
  }

  private record(conversationId: string, event: TurnEvent): void {
    const stamped = { ...event, ts: event.ts ?? new Date().toISOString() };
    emitLive(conversationId, stamped);
    appendConversationEvent(conversationId, stamped).catch((err: unknown) => {
      this.log.warn({ conversationId, type: event.type, err: errorMessage(err) }, "event not persisted");
    });
  }
}
