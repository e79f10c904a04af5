import { config } from "./config.js";
import { childLogger } from "./logger.js";

type OpInput = Record<string, unknown>;
type WeaveOp = (input: OpInput) => Promise<unknown>;

interface WeaveModule {
  init: (project: string) => Promise<unknown>;
  op: (fn: WeaveOp, options?: { name?: string }) => WeaveOp;
}

const log = childLogger("weave");

let weave: WeaveModule | null = null;
let initialized = false;
let opsBound = false;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isWeaveModule(value: unknown): value is WeaveModule {
  return isRecord(value) && typeof value.init === "function" && typeof value.op === "function";
}

async function loadWeave(): Promise<WeaveModule | null> {
  if (weave) return weave;
  try {
    const w: unknown = await import("weave");
    if (isWeaveModule(w)) weave = w;
    else if (isRecord(w) && isWeaveModule(w.default)) weave = w.default;
    return weave;
  } catch (err) {
    log.debug({ err }, "weave module unavailable");
    return null;
  }
}

export async function initWeave(): Promise<void> {
  if (initialized) return;
  if (!config.WANDB_API_KEY) return;
  try {
    const w = await loadWeave();
    if (w) {
      await w.init(config.WEAVE_PROJECT);
      initialized = true;
      log.info({ project: config.WEAVE_PROJECT }, "weave initialized");
    }
  } catch (err) {
    log.warn({ err }, "weave init skipped");
  }
}

export function isWeaveInitialized(): boolean {
  return initialized;
}

const noop: WeaveOp = (input) => Promise.resolve(input);

async function resolveChainOp(input: OpInput) {
  return input;
}
async function executeActionOp(input: OpInput) {
  return input;
}
async function submitOutputOp(input: OpInput) {
  return input;
}

let _resolveChainWeave: WeaveOp = noop;
let _executeActionWeave: WeaveOp = noop;
let _submitOutputWeave: WeaveOp = noop;

async function bindWeaveOps(): Promise<void> {
  if (opsBound || !initialized) return;
  const w = await loadWeave();
  if (!w) return;
  // Names must match what's selected in Weave monitors
  _resolveChainWeave = w.op(resolveChainOp, { name: "resolveChainOp" });
  _executeActionWeave = w.op(executeActionOp, { name: "executeActionOp" });
  _submitOutputWeave = w.op(submitOutputOp, { name: "submitOutputOp" });
  opsBound = true;
}

/** Tracing never fails the caller. */
function traced(op: () => WeaveOp, name: string) {
  return async (input: OpInput): Promise<void> => {
    try {
      await op()(input);
    } catch (err) {
      log.debug({ err, op: name }, "weave op failed");
    }
  };
}

export const resolveChainWeave = traced(() => _resolveChainWeave, "resolveChainOp");
export const executeActionWeave = traced(() => _executeActionWeave, "executeActionOp");
export const submitOutputWeave = traced(() => _submitOutputWeave, "submitOutputOp");

export async function ensureWeaveOps(): Promise<void> {
  await bindWeaveOps();
}
