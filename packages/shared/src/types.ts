/** A model-issued action as it arrived: a type and its raw parameters. */
export type Action = {
  readonly type: string;
  readonly parameters: Readonly<Record<string, unknown>>;
};

export type ActionResult = {
  /** Base64 PNG; absent only when the surface cannot be captured at all. */
  screenshot?: string;
  currentURL?: string;
  output?: string;
};

export type Point = { x: number; y: number };

export type PendingToolCall = {
  callId: string;
  itemId: string;
  action: Action;
  pendingSafetyChecks: { id: string; code: string; message: string }[];
};

export type ImageHaltPolicy = "off" | "screenshot" | "any";
export type SafetyCheckPolicy = "auto" | "confirm";

export type HaltReason =
  | "complete"
  | "cancelled"
  | "busy"
  | "fetch_failed"
  | "image_present"
  | "missing_call_id"
  | "invalid_action"
  | "awaiting_approval"
  | "denied"
  | "executor_failed"
  | "wait_limit"
  | "no_screenshot"
  | "submit_failed"
  | "iteration_limit";
