import type { HaltReason, ModelResponse } from "@surfloop/shared";
import { childLogger, type Logger } from "../logger.js";
import { errorMessage } from "../computer/errors.js";
import type { ActionExecutor } from "../computer/executor.js";
import {
  ComputerCallResolver,
  createLoopState,
  createTurnContext,
  type LoopSettings,
  type LoopState,
  type ResolveOutcome,
  type TurnContext,
  type TurnEmitter,
} from "./computer-loop.js";
import { lastComputerCall, outputText, type ChatRequest, type ModelGateway } from "./model-gateway.js";

export type ConversationMessage = {
  role: "user" | "assistant" | "system";
  text: string;
  /** Latest capture for an assistant message, base64 PNG. */
  image?: string;
};

export type TurnStatus = "completed" | "blocked" | "failed" | "cancelled" | "awaiting_approval";

export type TurnResult = {
  status: TurnStatus;
  text: string;
  halt?: HaltReason;
  error?: string;
};

export type SessionOptions = {
  gateway: ModelGateway;
  executor: ActionExecutor;
  settings: LoopSettings;
  emit?: TurnEmitter;
  logger?: Logger;
};

export const PENDING_NOTICE = "Finish or cancel the pending computer action before sending another message.";

/**
 * One conversation with the model. Owns the loop state, so at most one turn
 * and one chain run against its surface at a time.
 */
export class ConversationSession {
  readonly state: LoopState = createLoopState();
  readonly messages: ConversationMessage[] = [];
  private readonly resolver: ComputerCallResolver;
  private readonly log: Logger;
  private turn: TurnContext | null = null;
  private assistant: ConversationMessage | null = null;
  private controller: AbortController | null = null;

  constructor(private readonly options: SessionOptions) {
    this.log = options.logger ?? childLogger("conversation");
    this.resolver = new ComputerCallResolver(this.state, {
      gateway: options.gateway,
      executor: options.executor,
      settings: options.settings,
      emit: options.emit,
      logger: this.log,
      notify: (text) => this.messages.push({ role: "system", text }),
      onResponse: (response) => this.appendText(outputText(response)),
    });
  }

  get running(): boolean {
    return this.controller !== null;
  }

  /** A turn is running, or a computer step is still owed or parked. */
  get busy(): boolean {
    return (
      this.running ||
      this.state.isResolving ||
      this.state.isAwaitingOutput ||
      this.state.pendingApproval !== null
    );
  }

  async sendMessage(text: string, options: { stream?: boolean } = {}): Promise<TurnResult> {
    if (this.busy) {
      this.log.info("message refused while a computer step is pending");
      this.messages.push({ role: "system", text: PENDING_NOTICE });
      this.emit("notice", { text: PENDING_NOTICE });
      return { status: "blocked", text: "" };
    }

    this.messages.push({ role: "user", text });
    const assistant: ConversationMessage = { role: "assistant", text: "" };
    this.messages.push(assistant);
    this.assistant = assistant;
    this.turn = createTurnContext(text);
    const controller = new AbortController();
    this.controller = controller;
    this.emit("turn_started", { text, stream: Boolean(options.stream) });

    const request: ChatRequest = {
      model: this.options.settings.model,
      input: text,
      previousResponseId: this.state.lastResponseId ?? undefined,
    };
    return this.runTurn(async () => {
      const hasCall = options.stream
        ? await this.streamTurn(request, controller.signal)
        : this.absorb(await this.options.gateway.sendChatRequest(request));
      if (!hasCall) return null;
      return this.resolver.resolve(this.currentTurn(), controller.signal);
    }, controller);
  }

  /** Runs the action parked for safety approval and continues the chain. */
  async approve(): Promise<TurnResult> {
    if (!this.state.pendingApproval || this.running) return { status: "blocked", text: "" };
    const controller = new AbortController();
    this.controller = controller;
    return this.runTurn(() => this.resolver.approve(this.currentTurn(), controller.signal), controller);
  }

  deny(): TurnResult {
    const outcome = this.resolver.deny();
    this.emit("turn_finished", { status: "cancelled", halt: outcome.halt });
    return { status: "cancelled", text: this.assistant?.text ?? "", halt: outcome.halt };
  }

  /** Stops the running turn before its next model request. A parked approval is denied. */
  cancel(): boolean {
    if (this.controller) {
      this.controller.abort();
      return true;
    }
    if (this.state.pendingApproval) {
      this.deny();
      return true;
    }
    return false;
  }

  private currentTurn(): TurnContext {
    this.turn ??= createTurnContext("");
    return this.turn;
  }

  private async runTurn(
    work: () => Promise<ResolveOutcome | null>,
    controller: AbortController
  ): Promise<TurnResult> {
    let result: TurnResult;
    try {
      const outcome = await work();
      const image = this.turn?.assistantImage;
      if (this.assistant && image) this.assistant.image = image;
      result = { status: statusFor(outcome, controller.signal), text: this.assistant?.text ?? "", halt: outcome?.halt };
    } catch (err) {
      const message = errorMessage(err);
      this.state.lastResponseId = null;
      if (controller.signal.aborted) {
        result = { status: "cancelled", text: this.assistant?.text ?? "" };
      } else {
        this.log.error({ err: message }, "turn failed");
        this.emit("turn_failed", { error: message });
        result = { status: "failed", text: this.assistant?.text ?? "", error: message };
      }
    } finally {
      this.controller = null;
    }
    this.emit("turn_finished", { status: result.status, halt: result.halt, text: result.text });
    return result;
  }

  /** Records a full response. True when it carries a computer_call. */
  private absorb(response: ModelResponse): boolean {
    this.state.lastResponseId = response.id;
    this.emit("response_received", { response_id: response.id });
    this.appendText(outputText(response));
    return lastComputerCall(response).kind !== "none";
  }

  private async streamTurn(request: ChatRequest, signal: AbortSignal): Promise<boolean> {
    let sawComputerCall = false;
    for await (const event of this.options.gateway.streamChatRequest(request, signal)) {
      switch (event.type) {
        case "created":
          this.state.lastResponseId = event.responseId;
          break;
        case "text_delta":
          if (this.assistant) this.assistant.text += event.delta;
          break;
        case "computer_call":
          // Deltas may lack the call_id; the resolver re-fetches the full response.
          sawComputerCall = true;
          break;
        case "completed":
          this.state.lastResponseId = event.response.id;
          this.emit("response_received", { response_id: event.response.id });
          if (this.assistant && !this.assistant.text) this.appendText(outputText(event.response));
          if (lastComputerCall(event.response).kind !== "none") sawComputerCall = true;
          break;
        case "failed":
          throw new Error(event.message);
      }
    }
    return sawComputerCall;
  }

  private appendText(piece: string): void {
    if (!piece || !this.assistant) return;
    this.assistant.text = this.assistant.text ? `${this.assistant.text}\n\n${piece}` : piece;
  }

  private emit(type: string, payload: Record<string, unknown>): void {
    this.options.emit?.({ type, payload });
  }
}

function statusFor(outcome: ResolveOutcome | null, signal: AbortSignal): TurnStatus {
  if (!outcome) return signal.aborted ? "cancelled" : "completed";
  switch (outcome.halt) {
    case "awaiting_approval":
      return "awaiting_approval";
    case "cancelled":
      return "cancelled";
    default:
      return "completed";
  }
}
