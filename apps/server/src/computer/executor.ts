import { z } from "zod";
import type { Action, ActionResult, Point } from "@surfloop/shared";
import { childLogger, type Logger } from "../logger.js";
import { normalizeUrl, toVariant, type ActionVariant } from "./action.js";
import { interpolate, isInTopLeftCorner, normalizePoint, type Viewport } from "./coordinates.js";
import { ComputerUseError, errorMessage, isComputerUseError } from "./errors.js";
import {
  clickScript,
  doubleClickScript,
  dragScript,
  keypressScript,
  moveScript,
  paintScript,
  readinessScript,
  scrollScript,
  searchSubmitScript,
  textClickScript,
  typeScript,
  viewportScript,
} from "./page-scripts.js";
import { captureWithRetry } from "./screenshot.js";
import type { BrowsingSurface } from "./surface.js";

export type ExecutorTimings = {
  /** Settle delay before capture after any non-click action. */
  settleMs: number;
  /** Settle delay before capture after a click. */
  clickSettleMs: number;
  /** Wait right after click events are dispatched, for page handlers to run. */
  clickDispatchWaitMs: number;
  /** Pause after loading the blank document into an empty surface. */
  readyDelayMs: number;
  domReadyTimeoutMs: number;
  domReadyPollMs: number;
  /** Cap on the two-frame paint wait once the document is ready. */
  paintTimeoutMs: number;
  captureAttempts: number;
  captureMinBytes: number;
  captureBackoffMs: number;
  /** How long model clicks are ignored after a programmatic interaction. */
  suppressionMs: number;
  /** Wait after a programmatic search submit before polling readiness. */
  searchSettleMs: number;
};

export const DEFAULT_TIMINGS: ExecutorTimings = {
  settleMs: 150,
  clickSettleMs: 500,
  clickDispatchWaitMs: 300,
  readyDelayMs: 120,
  domReadyTimeoutMs: 3000,
  domReadyPollMs: 100,
  paintTimeoutMs: 500,
  captureAttempts: 5,
  captureMinBytes: 1000,
  captureBackoffMs: 200,
  suppressionMs: 500,
  searchSettleMs: 700,
};

export type ExecutorOptions = {
  timings?: Partial<ExecutorTimings>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
};

/** Minimal white document loaded into a surface that has none, so captures have content. */
export const BLANK_DOCUMENT_URL =
  "data:text/html," +
  encodeURIComponent(
    "<html><head><meta name=viewport content=\"initial-scale=1.0\"></head><body style=\"background:#ffffff;height:100vh;\"></body></html>"
  );

export function isBlankUrl(url: string | null): boolean {
  return url === null || url === "" || url === "about:blank" || url === BLANK_DOCUMENT_URL;
}

const ViewportSchema = z.object({
  width: z.number(),
  height: z.number(),
  devicePixelRatio: z.number(),
});

const ClickTargetSchema = z.object({
  tag: z.string(),
  id: z.string(),
  className: z.string(),
  href: z.string(),
  x: z.number(),
  y: z.number(),
});

export const ClickOutcomeSchema = z.object({
  status: z.enum(["clicked", "refused", "no_element", "not_found"]),
  message: z.string(),
  target: ClickTargetSchema.optional(),
  consent: z.boolean().optional(),
  score: z.number().optional(),
});
export type ClickOutcome = z.infer<typeof ClickOutcomeSchema>;

export const SearchOutcomeSchema = z.object({
  status: z.enum(["submitted", "not_found"]),
  message: z.string(),
});
export type SearchOutcome = z.infer<typeof SearchOutcomeSchema>;

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Runs one model action at a time against a browsing surface and always ends
 * with a capture of the resulting page.
 */
export class ActionExecutor {
  private readonly timings: ExecutorTimings;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly log: Logger;
  private suppressClicksUntil = 0;

  constructor(
    private readonly surface: BrowsingSurface,
    options: ExecutorOptions = {}
  ) {
    this.timings = { ...DEFAULT_TIMINGS, ...options.timings };
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? childLogger("executor");
  }

  isOnBlankPage(): boolean {
    return isBlankUrl(this.surface.currentURL());
  }

  isClickSuppressed(): boolean {
    return this.now() < this.suppressClicksUntil;
  }

  private suppressClicks(): void {
    this.suppressClicksUntil = this.now() + this.timings.suppressionMs;
  }

  private assertAttached(): void {
    if (!this.surface.isAttached()) {
      throw new ComputerUseError("SurfaceUnavailable", "The browsing surface is not attached");
    }
  }

  async execute(action: Action): Promise<ActionResult> {
    this.assertAttached();
    const variant = toVariant(action);
    this.log.info({ type: action.type, kind: variant.kind }, "executing action");

    let output: string;
    try {
      output = await this.perform(variant);
    } catch (err) {
      if (isComputerUseError(err) && err.code === "ScriptExecutionError") {
        this.log.warn({ type: action.type, error: err.message }, "action script failed");
        output = `Action '${action.type}' script error: ${err.message}`;
      } else {
        throw err;
      }
    }
    return this.finish(variant.kind === "click" ? this.timings.clickSettleMs : this.timings.settleMs, output);
  }

  private async perform(variant: ActionVariant): Promise<string> {
    switch (variant.kind) {
      case "navigate":
        await this.surface.navigate(variant.url);
        return `Navigated to ${variant.url}`;
      case "click": {
        if (this.isClickSuppressed()) {
          this.log.info({ point: variant.point }, "click suppressed");
          return "Click suppressed: a programmatic interaction just ran on this page.";
        }
        const point = normalizePoint(variant.point, await this.readViewport());
        const outcome = await this.runJson(clickScript(point, isInTopLeftCorner(point)), ClickOutcomeSchema);
        this.log.info({ status: outcome.status, target: outcome.target, consent: outcome.consent }, "click resolved");
        if (outcome.status === "clicked") await this.sleep(this.timings.clickDispatchWaitMs);
        return outcome.message;
      }
      case "double_click": {
        const point = normalizePoint(variant.point, await this.readViewport());
        return this.runText(doubleClickScript(point));
      }
      case "move": {
        const point = normalizePoint(variant.point, await this.readViewport());
        return this.runText(moveScript(point));
      }
      case "type":
        return this.runText(typeScript(variant.text));
      case "keypress":
        return this.runText(keypressScript(variant.keys));
      case "drag": {
        const viewport = await this.readViewport();
        const path = variant.path.map((p) => normalizePoint(p, viewport));
        const start = path[0];
        const end = path[path.length - 1];
        if (!start || !end) throw ComputerUseError.invalidParameters("drag needs a path of at least two points");
        return this.runText(dragScript(start, interpolate(start, end, 5)));
      }
      case "scroll":
        return this.runText(scrollScript(variant.deltaX, variant.deltaY));
      case "screenshot":
        if (variant.url && this.isOnBlankPage()) {
          const url = normalizeUrl(variant.url);
          await this.surface.navigate(url);
          return `Navigated to ${url} before capture`;
        }
        return "Captured current state";
      case "wait":
        await this.sleep(variant.ms);
        return `Waited ${variant.ms}ms`;
      case "unknown":
        this.log.warn({ type: variant.type }, "unsupported action type, capturing current state");
        return `Unsupported action type '${variant.type}'; captured current state.`;
    }
  }

  /**
   * Fills and submits the page's search box. A successful submit opens the
   * click suppression window so a stale model click cannot land on the results.
   */
  async submitSearch(query: string): Promise<SearchOutcome> {
    this.assertAttached();
    const site = hostOf(this.surface.currentURL())?.includes("amazon.") ? "amazon" : null;
    const outcome = await this.runJson(searchSubmitScript(query, site), SearchOutcomeSchema);
    this.log.info({ query, status: outcome.status, message: outcome.message }, "programmatic search");
    if (outcome.status === "submitted") {
      this.suppressClicks();
      await this.sleep(this.timings.searchSettleMs);
      await this.waitForDomReadyAndPaint();
    }
    return outcome;
  }

  /**
   * Clicks the element whose visible text best matches `text`, then captures.
   * Returns null when nothing on the page matches.
   */
  async clickByVisibleText(text: string, hint?: Point): Promise<ActionResult | null> {
    this.assertAttached();
    const outcome = await this.runJson(textClickScript(text, hint), ClickOutcomeSchema);
    if (outcome.status !== "clicked") {
      this.log.info({ text, message: outcome.message }, "no element matched click target");
      return null;
    }
    this.suppressClicks();
    await this.sleep(this.timings.clickDispatchWaitMs);
    return this.finish(this.timings.clickSettleMs, outcome.message);
  }

  private async finish(settleMs: number, output: string): Promise<ActionResult> {
    await this.ensureDocument();
    await this.waitForDomReadyAndPaint();
    await this.sleep(settleMs);
    const currentURL = this.surface.currentURL() ?? undefined;
    if (!this.surface.isAttached()) {
      this.log.warn("surface detached before capture, no screenshot");
      return { currentURL, output };
    }
    const capture = await captureWithRetry(this.surface, {
      attempts: this.timings.captureAttempts,
      minBytes: this.timings.captureMinBytes,
      backoffMs: this.timings.captureBackoffMs,
      sleep: this.sleep,
      log: this.log,
    });
    return { screenshot: capture.png, currentURL, output };
  }

  private async ensureDocument(): Promise<void> {
    if (this.surface.currentURL() !== null || !this.surface.isAttached()) return;
    await this.surface.navigate(BLANK_DOCUMENT_URL);
    await this.sleep(this.timings.readyDelayMs);
  }

  /** Polls until the document is interactive with a non-empty body, then waits for a paint. Gives up quietly on timeout. */
  async waitForDomReadyAndPaint(): Promise<void> {
    const start = this.now();
    while (this.now() - start < this.timings.domReadyTimeoutMs) {
      if (!this.surface.isAttached()) return;
      try {
        const ready = await this.runJson(readinessScript(), z.boolean());
        if (ready) {
          await this.surface.evaluateScript(paintScript(this.timings.paintTimeoutMs));
          return;
        }
      } catch (err) {
        this.log.debug({ error: errorMessage(err) }, "readiness probe failed");
      }
      await this.sleep(this.timings.domReadyPollMs);
    }
    this.log.debug({ timeoutMs: this.timings.domReadyTimeoutMs }, "page not ready before timeout, continuing");
  }

  private async readViewport(): Promise<Viewport> {
    return this.runJson(viewportScript(), ViewportSchema);
  }

  private async evaluate(script: string): Promise<unknown> {
    try {
      return await this.surface.evaluateScript(script);
    } catch (err) {
      if (isComputerUseError(err)) throw err;
      throw new ComputerUseError("ScriptExecutionError", errorMessage(err), { cause: err });
    }
  }

  private async runText(script: string): Promise<string> {
    const raw = await this.evaluate(script);
    if (typeof raw === "string") return raw;
    return raw === undefined || raw === null ? "" : JSON.stringify(raw);
  }

  private async runJson<T>(script: string, schema: z.ZodType<T>): Promise<T> {
    const raw = await this.evaluate(script);
    if (typeof raw !== "string") {
      throw new ComputerUseError("ScriptExecutionError", "page script returned no result");
    }
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      throw new ComputerUseError("ScriptExecutionError", `page script returned malformed JSON: ${errorMessage(err)}`);
    }
    const parsed = schema.safeParse(decoded);
    if (!parsed.success) {
      throw new ComputerUseError("ScriptExecutionError", `unexpected page script result: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}

function hostOf(url: string | null): string | null {
  if (!url) return null;
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}
