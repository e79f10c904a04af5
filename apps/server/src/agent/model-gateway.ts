import OpenAI from "openai";
import {
  ComputerCallItemSchema,
  MessageItemSchema,
  ModelResponseSchema,
  type ComputerCallItem,
  type ModelResponse,
  type SafetyCheck,
} from "@surfloop/shared";
import { config } from "../config.js";

export type ComputerCallOutput = {
  type: "computer_call_output";
  call_id: string;
  output: { type: "computer_screenshot"; image_url: string };
  acknowledged_safety_checks?: SafetyCheck[];
  current_url?: string;
};

export type ChatRequest = {
  model: string;
  input: string;
  previousResponseId?: string;
};

export type StreamEvent =
  | { type: "created"; responseId: string }
  | { type: "text_delta"; delta: string }
  | { type: "computer_call"; itemId: string }
  | { type: "completed"; response: ModelResponse }
  | { type: "failed"; message: string };

export interface ModelGateway {
  sendChatRequest(req: ChatRequest): Promise<ModelResponse>;
  streamChatRequest(req: ChatRequest, signal?: AbortSignal): AsyncIterable<StreamEvent>;
  getResponse(responseId: string, signal?: AbortSignal): Promise<ModelResponse>;
  sendComputerCallOutput(
    req: { model: string; previousResponseId: string; output: ComputerCallOutput },
    signal?: AbortSignal
  ): Promise<ModelResponse>;
}

export function parseModelResponse(raw: unknown): ModelResponse {
  const parsed = ModelResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Unexpected response shape: ${parsed.error.message}`);
  }
  return parsed.data;
}

export type ComputerCallLookup =
  | { kind: "none" }
  | { kind: "call"; item: ComputerCallItem }
  | { kind: "malformed"; itemId?: string; reason: string };

/** The most recent computer_call in a response, validated. */
export function lastComputerCall(response: ModelResponse): ComputerCallLookup {
  const raw = [...response.output].reverse().find((item) => item.type === "computer_call");
  if (!raw) return { kind: "none" };
  const parsed = ComputerCallItemSchema.safeParse(raw);
  if (!parsed.success) {
    return { kind: "malformed", itemId: raw.id, reason: parsed.error.issues[0]?.message ?? "invalid computer_call" };
  }
  return { kind: "call", item: parsed.data };
}

/** Assistant text of a response; falls back to the message items when output_text is absent. */
export function outputText(response: ModelResponse): string {
  if (response.output_text) return response.output_text;
  const parts: string[] = [];
  for (const item of response.output) {
    const message = MessageItemSchema.safeParse(item);
    if (!message.success) continue;
    for (const content of message.data.content) {
      if (content.type === "output_text" && content.text) parts.push(content.text);
    }
  }
  return parts.join("");
}

export type OpenAIGatewayOptions = {
  apiKey?: string;
  baseURL?: string;
  displayWidth: number;
  displayHeight: number;
};

export class OpenAIGateway implements ModelGateway {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIGatewayOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
  }

  static fromConfig(): OpenAIGateway {
    return new OpenAIGateway({
      apiKey: config.OPENAI_API_KEY,
      baseURL: config.OPENAI_BASE_URL,
      displayWidth: config.DISPLAY_WIDTH,
      displayHeight: config.DISPLAY_HEIGHT,
    });
  }

  private get tools() {
    return [
      {
        type: "computer_use_preview" as const,
        display_width: this.options.displayWidth,
        display_height: this.options.displayHeight,
        environment: "browser" as const,
      },
    ];
  }

  async sendChatRequest(req: ChatRequest): Promise<ModelResponse> {
    const response = await this.client.responses.create({
      model: req.model,
      input: req.input,
      previous_response_id: req.previousResponseId,
      tools: this.tools,
      truncation: "auto",
    });
    return parseModelResponse(response);
  }

  async *streamChatRequest(req: ChatRequest, signal?: AbortSignal): AsyncIterable<StreamEvent> {
    const stream = await this.client.responses.create(
      {
        model: req.model,
        input: req.input,
        previous_response_id: req.previousResponseId,
        tools: this.tools,
        truncation: "auto",
        stream: true,
      },
      { signal }
    );
    for await (const event of stream) {
      switch (event.type) {
        case "response.created":
          yield { type: "created", responseId: event.response.id };
          break;
        case "response.output_text.delta":
          yield { type: "text_delta", delta: event.delta };
          break;
        case "response.output_item.done":
          if (event.item.type === "computer_call") yield { type: "computer_call", itemId: event.item.id };
          break;
        case "response.completed":
          yield { type: "completed", response: parseModelResponse(event.response) };
          break;
        case "response.failed":
          yield { type: "failed", message: event.response.error?.message ?? "response failed" };
          break;
        case "error":
          yield { type: "failed", message: event.message };
          break;
        default:
          break;
      }
    }
  }

  async getResponse(responseId: string, signal?: AbortSignal): Promise<ModelResponse> {
    const response = await this.client.responses.retrieve(responseId, {}, { signal });
    return parseModelResponse(response);
  }

  async sendComputerCallOutput(
    req: { model: string; previousResponseId: string; output: ComputerCallOutput },
    signal?: AbortSignal
  ): Promise<ModelResponse> {
    const item = req.output;
    const response = await this.client.responses.create(
      {
        model: req.model,
        previous_response_id: req.previousResponseId,
        input: [item],
        tools: this.tools,
        truncation: "auto",
      },
      { signal }
    );
    return parseModelResponse(response);
  }
}
