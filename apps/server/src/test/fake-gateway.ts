import type { ModelResponse } from "@surfloop/shared";
import type { ChatRequest, ComputerCallOutput, ModelGateway, StreamEvent } from "../agent/model-gateway.js";

export type Submission = { model: string; previousResponseId: string; output: ComputerCallOutput };

type Scripted = ModelResponse | Error;

/**
 * Scripted stand-in for the Responses API. Submissions and chat requests
 * consume their queues in order; every response handed out becomes fetchable.
 */
export class FakeGateway implements ModelGateway {
  readonly responses = new Map<string, ModelResponse>();
  readonly fetched: string[] = [];
  readonly submissions: Submission[] = [];
  readonly chatRequests: ChatRequest[] = [];
  readonly submitQueue: Scripted[] = [];
  readonly chatQueue: Scripted[] = [];
  readonly streamQueue: StreamEvent[][] = [];
  fetchError: Error | null = null;
  /** Runs inside getResponse, before the lookup. */
  beforeFetch: (() => void) | null = null;

  add(...responses: ModelResponse[]): void {
    for (const r of responses) this.responses.set(r.id, r);
  }

  private take(queue: Scripted[], what: string): ModelResponse {
    const next = queue.shift();
    if (!next) throw new Error(`no scripted ${what}`);
    if (next instanceof Error) throw next;
    this.responses.set(next.id, next);
    return next;
  }

  async getResponse(responseId: string): Promise<ModelResponse> {
    this.fetched.push(responseId);
    this.beforeFetch?.();
    if (this.fetchError) throw this.fetchError;
    const found = this.responses.get(responseId);
    if (!found) throw new Error(`unknown response ${responseId}`);
    return found;
  }

  async sendComputerCallOutput(req: Submission): Promise<ModelResponse> {
    this.submissions.push(req);
    return this.take(this.submitQueue, "submission response");
  }

  async sendChatRequest(req: ChatRequest): Promise<ModelResponse> {
    this.chatRequests.push(req);
    return this.take(this.chatQueue, "chat response");
  }

  async *streamChatRequest(req: ChatRequest): AsyncIterable<StreamEvent> {
    this.chatRequests.push(req);
    const events = this.streamQueue.shift();
    if (!events) throw new Error("no scripted stream");
    for (const event of events) {
      if (event.type === "completed") this.responses.set(event.response.id, event.response);
      yield event;
    }
  }
}

export function computerCallResponse(
  id: string,
  action: Record<string, unknown>,
  options: { callId?: string | null; checks?: { id: string; code: string; message: string }[] } = {}
): ModelResponse {
  const callId = options.callId === undefined ? `call_${id}` : options.callId;
  return {
    id,
    status: "completed",
    output: [
      {
        type: "computer_call",
        id: `cu_${id}`,
        ...(callId === null ? {} : { call_id: callId }),
        action,
        pending_safety_checks: options.checks ?? [],
        status: "completed",
      },
    ],
  };
}

export function textResponse(id: string, text: string): ModelResponse {
  return {
    id,
    status: "completed",
    output: [{ type: "message", id: `msg_${id}`, content: [{ type: "output_text", text }] }],
    output_text: text,
  };
}
