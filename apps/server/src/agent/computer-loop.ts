import type {
  Action,
  ActionResult,
  HaltReason,
  ImageHaltPolicy,
  ModelResponse,
  PendingToolCall,
  SafetyCheckPolicy,
} from "@surfloop/shared";
import { childLogger, type Logger } from "../logger.js";
import { coerceNumber, parseAction, resolveKind } from "../computer/action.js";
import { errorMessage } from "../computer/errors.js";
import type { ActionExecutor } from "../computer/executor.js";
import { executeActionWeave, resolveChainWeave, submitOutputWeave } from "../weave.js";
import {
  deriveUrlFromMessage,
  extractExplicitClickTarget,
  extractExplicitSearchQuery,
  refineSearchPhrase,
} from "./intent.js";
import { lastComputerCall, type ComputerCallOutput, type ModelGateway } from "./model-gateway.js";

export type PendingApproval = {
  call: PendingToolCall;
  previousResponseId: string;
};

/** Per-conversation loop bookkeeping. Only the resolver writes it. */
export type LoopState = {
  isResolving: boolean;
  isAwaitingOutput: boolean;
  consecutiveWaitCount: number;
  lastResponseId: string | null;
  pendingApproval: PendingApproval | null;
};

export function createLoopState(): LoopState {
  return {
    isResolving: false,
    isAwaitingOutput: false,
    consecutiveWaitCount: 0,
    lastResponseId: null,
    pendingApproval: null,
  };
}

/** What the loop knows about the turn that started the chain. */
export type TurnContext = {
  userText: string;
  /** Latest capture attached to the assistant message, base64 PNG. */
  assistantImage: string | null;
  searchOverrideUsed: boolean;
};

export function createTurnContext(userText: string): TurnContext {
  return { userText, assistantImage: null, searchOverrideUsed: false };
}

export type LoopSettings = {
  model: string;
  maxIterations: number;
  maxConsecutiveWaits: number;
  imageHaltPolicy: ImageHaltPolicy;
  safetyPolicy: SafetyCheckPolicy;
  /** Run the model's actions exactly as issued. */
  strict: boolean;
};

export type TurnEmitter = (event: { type: string; payload: Record<string, unknown> }) => void;

export type ResolverDeps = {
  gateway: ModelGateway;
  executor: ActionExecutor;
  settings: LoopSettings;
  emit?: TurnEmitter;
  /** Plain-language message for the conversation. */
  notify?: (text: string) => void;
  /** Every response the chain produces after a submission. */
  onResponse?: (response: ModelResponse) => void;
  logger?: Logger;
};

export type ResolveOutcome = {
  resolved: number;
  halt: HaltReason;
};

type StepOutcome = { kind: "continue"; response: ModelResponse } | { kind: "halt"; halt: HaltReason };

export const NOTICES = {
  fetchFailed: "Computer use stopped: the model's last response could not be loaded.",
  invalidCall: "Computer use stopped: the model sent an action that cannot be run.",
  executorFailed: (reason: string) => `Computer use stopped: ${reason}`,
  noScreenshot: "Computer use stopped: no screenshot could be captured to send back.",
  submitFailed: "Computer use stopped: the action result could not be sent to the model.",
  waitLimit: "Computer use interrupted: too many consecutive wait actions. I sent the last screenshot and stopped.",
  iterationLimit: "Computer use stopped after reaching the step limit for this message.",
  approvalNeeded: "Action requires approval before proceeding.",
  denied: "Action denied. Computer use stopped.",
} as const;

/**
 * Resolves chained computer_call items: fetch the pending call, run it on the
 * executor, submit the capture, repeat until the model stops asking.
 * Every exit leaves `lastResponseId` null unless the chain ended with no call pending.
 */
export class ComputerCallResolver {
  private readonly log: Logger;

  constructor(
    private readonly state: LoopState,
    private readonly deps: ResolverDeps
  ) {
    this.log = deps.logger ?? childLogger("loop");
  }

  get settings(): LoopSettings {
    return this.deps.settings;
  }

  async resolve(turn: TurnContext, signal?: AbortSignal): Promise<ResolveOutcome> {
    return this.guarded(() => this.loop(turn, 0, signal));
  }

  /** Runs the call parked for approval with its safety checks acknowledged, then resumes the chain. */
  async approve(turn: TurnContext, signal?: AbortSignal): Promise<ResolveOutcome> {
    const parked = this.state.pendingApproval;
    if (!parked) {
      this.log.warn("approve with nothing pending");
      return { resolved: 0, halt: "complete" };
    }
    return this.guarded(async () => {
      this.state.pendingApproval = null;
      this.log.info({ callId: parked.call.callId }, "safety checks approved");
      const step = await this.step(turn, parked.call, parked.previousResponseId, signal);
      if (step.kind === "halt") return { resolved: 1, halt: step.halt };
      return this.loop(turn, 1, signal);
    });
  }

  deny(): ResolveOutcome {
    const parked = this.state.pendingApproval;
    this.state.pendingApproval = null;
    this.state.isAwaitingOutput = false;
    this.clear("denied");
    if (parked) this.notice(NOTICES.denied);
    this.emit("chain_halted", { reason: "denied", resolved: 0 });
    return { resolved: 0, halt: "denied" };
  }

  private async guarded(run: () => Promise<ResolveOutcome>): Promise<ResolveOutcome> {
    if (this.state.isResolving) {
      this.log.info("already resolving, skipping");
      return { resolved: 0, halt: "busy" };
    }
    this.state.isResolving = true;
    try {
      const outcome = await run();
      this.emit("chain_halted", { reason: outcome.halt, resolved: outcome.resolved });
      this.log.info({ ...outcome, lastResponseId: this.state.lastResponseId }, "chain ended");
      return outcome;
    } finally {
      this.state.consecutiveWaitCount = 0;
      this.state.isResolving = false;
      if (!this.state.pendingApproval) this.state.isAwaitingOutput = false;
    }
  }

  private async loop(turn: TurnContext, alreadyResolved: number, signal?: AbortSignal): Promise<ResolveOutcome> {
    let resolved = alreadyResolved;
    let lastSubmitted: ModelResponse | null = null;

    for (let iteration = 1; iteration <= this.settings.maxIterations; iteration++) {
      if (signal?.aborted) {
        this.clear("cancelled");
        return { resolved, halt: "cancelled" };
      }
      const previousId = this.state.lastResponseId;
      if (!previousId) return { resolved, halt: "complete" };

      await resolveChainWeave({ previous_response_id: previousId, iteration });
      let response: ModelResponse;
      try {
        response = await this.deps.gateway.getResponse(previousId, signal);
      } catch (err) {
        this.clear("fetch failed");
        if (signal?.aborted) return { resolved, halt: "cancelled" };
        this.log.warn({ err: errorMessage(err), previousId }, "getResponse failed while resolving");
        this.notice(NOTICES.fetchFailed);
        return { resolved, halt: "fetch_failed" };
      }

      const lookup = lastComputerCall(response);
      if (lookup.kind === "none") return { resolved, halt: "complete" };
      if (lookup.kind === "malformed") {
        this.log.warn({ itemId: lookup.itemId, reason: lookup.reason }, "malformed computer_call");
        this.clear("malformed call");
        this.notice(NOTICES.invalidCall);
        return { resolved, halt: "invalid_action" };
      }
      const item = lookup.item;
      this.log.info({ iteration, itemId: item.id, callId: item.call_id ?? null }, "pending computer_call");

      if (this.shouldHaltOnImage(turn, item.action.type)) {
        this.log.info({ policy: this.settings.imageHaltPolicy }, "message already has a capture, halting");
        this.clear("image present");
        return { resolved, halt: "image_present" };
      }

      if (!item.call_id) {
        this.log.warn({ itemId: item.id }, "computer_call without call_id");
        this.clear("missing call_id");
        this.notice(NOTICES.invalidCall);
        return { resolved, halt: "missing_call_id" };
      }
      const action = parseAction(item.action);
      if (!action) {
        this.clear("unparseable action");
        this.notice(NOTICES.invalidCall);
        return { resolved, halt: "invalid_action" };
      }

      const call: PendingToolCall = {
        callId: item.call_id,
        itemId: item.id,
        action,
        pendingSafetyChecks: item.pending_safety_checks,
      };

      if (call.pendingSafetyChecks.length > 0) {
        for (const check of call.pendingSafetyChecks) {
          this.log.warn({ callId: call.callId, code: check.code, message: check.message }, "pending safety check");
        }
        if (this.settings.safetyPolicy === "confirm") {
          this.state.pendingApproval = { call, previousResponseId: previousId };
          this.state.isAwaitingOutput = true;
          this.emit("safety_checks", { call_id: call.callId, action: call.action, checks: call.pendingSafetyChecks });
          this.notice(NOTICES.approvalNeeded);
          return { resolved, halt: "awaiting_approval" };
        }
      }

      const step = await this.step(turn, call, previousId, signal);
      resolved++;
      if (step.kind === "halt") return { resolved, halt: step.halt };
      lastSubmitted = step.response;
    }

    if (lastSubmitted && lastComputerCall(lastSubmitted).kind !== "none") {
      this.log.warn({ maxIterations: this.settings.maxIterations }, "iteration budget exhausted with a call pending");
      this.clear("iteration limit");
      this.notice(NOTICES.iterationLimit);
      return { resolved, halt: "iteration_limit" };
    }
    return { resolved, halt: "complete" };
  }

  /** Execute one call and submit its capture. */
  private async step(
    turn: TurnContext,
    call: PendingToolCall,
    previousId: string,
    signal?: AbortSignal
  ): Promise<StepOutcome> {
    this.state.isAwaitingOutput = true;
    this.emit("action_started", { call_id: call.callId, action: call.action });

    let executed: Action = call.action;
    let result: ActionResult;
    const started = Date.now();
    try {
      const prepared = this.settings.strict ? { action: call.action } : await this.precondition(turn, call.action);
      if ("result" in prepared) {
        executed = prepared.action;
        result = prepared.result;
      } else {
        executed = prepared.action;
        result = await this.deps.executor.execute(executed);
      }
    } catch (err) {
      const reason = errorMessage(err);
      this.log.error({ err: reason, callId: call.callId, type: executed.type }, "action failed");
      this.clear("executor failed");
      this.notice(NOTICES.executorFailed(reason));
      return { kind: "halt", halt: "executor_failed" };
    }

    const latencyMs = Date.now() - started;
    this.emit("action_executed", {
      call_id: call.callId,
      action: executed,
      output: result.output,
      current_url: result.currentURL,
      has_screenshot: Boolean(result.screenshot),
      latency_ms: latencyMs,
    });
    await executeActionWeave({ action: executed, output: result.output, url_after: result.currentURL, latency_ms: latencyMs });

    let tripBreaker = false;
    if (resolveKind(executed.type) === "wait") {
      this.state.consecutiveWaitCount += 1;
      this.log.warn(
        { count: this.state.consecutiveWaitCount, max: this.settings.maxConsecutiveWaits },
        "consecutive wait"
      );
      tripBreaker = this.state.consecutiveWaitCount >= this.settings.maxConsecutiveWaits;
    } else {
      this.state.consecutiveWaitCount = 0;
    }

    if (!result.screenshot) {
      this.log.warn({ callId: call.callId }, "no screenshot, cannot answer call");
      this.clear("no screenshot");
      this.notice(NOTICES.noScreenshot);
      return { kind: "halt", halt: "no_screenshot" };
    }
    turn.assistantImage = result.screenshot;

    if (signal?.aborted) {
      this.clear("cancelled");
      return { kind: "halt", halt: "cancelled" };
    }

    const output: ComputerCallOutput = {
      type: "computer_call_output",
      call_id: call.callId,
      output: { type: "computer_screenshot", image_url: `data:image/png;base64,${result.screenshot}` },
      ...(call.pendingSafetyChecks.length > 0 ? { acknowledged_safety_checks: call.pendingSafetyChecks } : {}),
      ...(result.currentURL ? { current_url: result.currentURL } : {}),
    };

    let next: ModelResponse;
    try {
      next = await this.deps.gateway.sendComputerCallOutput(
        { model: this.settings.model, previousResponseId: previousId, output },
        signal
      );
    } catch (err) {
      this.clear("submit failed");
      if (signal?.aborted) return { kind: "halt", halt: "cancelled" };
      this.log.warn({ err: errorMessage(err), callId: call.callId }, "sendComputerCallOutput failed");
      this.notice(NOTICES.submitFailed);
      return { kind: "halt", halt: "submit_failed" };
    }

    this.log.info({ callId: call.callId, responseId: next.id }, "computer_call_output submitted");
    this.emit("output_submitted", { call_id: call.callId, response_id: next.id });
    await submitOutputWeave({ call_id: call.callId, previous_response_id: previousId, response_id: next.id });
    this.deps.onResponse?.(next);

    if (tripBreaker) {
      this.state.consecutiveWaitCount = 0;
      this.clear("wait limit");
      this.notice(NOTICES.waitLimit);
      return { kind: "halt", halt: "wait_limit" };
    }
    this.state.lastResponseId = next.id;
    return { kind: "continue", response: next };
  }

  private shouldHaltOnImage(turn: TurnContext, actionType: unknown): boolean {
    if (this.settings.strict || !turn.assistantImage) return false;
    switch (this.settings.imageHaltPolicy) {
      case "off":
        return false;
      case "any":
        return true;
      case "screenshot":
        return typeof actionType === "string" && resolveKind(actionType) === "screenshot";
    }
  }

  /**
   * Adjusts the model's action using what the user asked for. The returned
   * result, when present, replaces executing the action.
   */
  private async precondition(
    turn: TurnContext,
    action: Action
  ): Promise<{ action: Action } | { action: Action; result: ActionResult }> {
    const { executor } = this.deps;
    const kind = resolveKind(action.type);
    let prepared = action;

    if (kind === "screenshot" && action.parameters.url === undefined) {
      const derived = deriveUrlFromMessage(turn.userText);
      if (derived) {
        this.log.info({ url: derived }, "attaching derived url to screenshot");
        prepared = { type: action.type, parameters: { ...action.parameters, url: derived } };
      }
    }

    if (kind === "click" && executor.isOnBlankPage()) {
      const derived = deriveUrlFromMessage(turn.userText);
      if (derived) {
        this.log.info({ url: derived }, "surface blank before click, navigating to derived url");
        try {
          await executor.execute({ type: "navigate", parameters: { url: derived } });
        } catch (err) {
          this.log.warn({ err: errorMessage(err), url: derived }, "pre-click navigation failed");
        }
      }
    }

    if (!turn.searchOverrideUsed) {
      const query = extractExplicitSearchQuery(turn.userText);
      if (query) {
        turn.searchOverrideUsed = true;
        const refined = refineSearchPhrase(query);
        try {
          await executor.submitSearch(refined);
        } catch (err) {
          this.log.warn({ err: errorMessage(err), query: refined }, "search override failed");
        }
      }
    }

    if (kind === "click") {
      const target = extractExplicitClickTarget(turn.userText);
      if (target) {
        const x = coerceNumber(action.parameters.x);
        const y = coerceNumber(action.parameters.y);
        const hint = x !== null && y !== null ? { x, y } : undefined;
        const result = await executor.clickByVisibleText(target, hint);
        if (result) {
          this.log.info({ target }, "click replaced by visible-text match");
          return { action: prepared, result };
        }
        this.log.warn({ target }, "no element matched click target, using model coordinates");
      }
    }
    return { action: prepared };
  }

  private clear(reason: string): void {
    if (this.state.lastResponseId !== null) {
      this.log.info({ reason, lastResponseId: this.state.lastResponseId }, "clearing pending response");
    }
    this.state.lastResponseId = null;
  }

  private notice(text: string): void {
    this.deps.notify?.(text);
    this.emit("notice", { text });
  }

  private emit(type: string, payload: Record<string, unknown>): void {
    this.deps.emit?.({ type, payload });
  }
}
