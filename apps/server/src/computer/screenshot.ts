import sharp from "sharp";
import type { Logger } from "../logger.js";
import { errorMessage } from "./errors.js";
import type { BrowsingSurface } from "./surface.js";

export type CaptureOptions = {
  attempts: number;
  /** Captures smaller than this are treated as blank and retried. */
  minBytes: number;
  backoffMs: number;
  sleep: (ms: number) => Promise<void>;
  log: Logger;
};

export type Capture = {
  /** Base64 PNG. */
  png: string;
  placeholder: boolean;
};

// 1x1 red PNG, used only if the placeholder itself cannot be rendered.
const LAST_RESORT_PNG =
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mP8z8BQDwAEhQGAhKmMIQAAAABJRU5ErkJggg==";

const PLACEHOLDER_WIDTH = 440;
const PLACEHOLDER_HEIGHT = 100;

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max - 1)}…` : value;
}

/** Renders the red diagnostic card sent in place of a failed capture. */
export async function renderPlaceholder(url: string | null, reason: string): Promise<Buffer> {
  const lines = [
    "Screenshot capture failed",
    `URL: ${truncate(url ?? "None", 56)}`,
    `Reason: ${truncate(reason, 52)}`,
  ];
  const text = lines
    .map((line, i) => `<text x="10" y="${28 + i * 22}">${escapeXml(line)}</text>`)
    .join("");
  const svg =
    `<svg xmlns="http://www.w3.org/2000/svg" width="${PLACEHOLDER_WIDTH}" height="${PLACEHOLDER_HEIGHT}">` +
    `<rect width="100%" height="100%" fill="#d32f2f"/>` +
    `<g fill="#ffffff" font-family="sans-serif" font-size="14">${text}</g></svg>`;
  return sharp(Buffer.from(svg)).png().toBuffer();
}

/**
 * Captures the surface, retrying blank or failed captures with a fixed backoff.
 * Once attempts run out the result is a placeholder PNG describing the failure.
 */
export async function captureWithRetry(surface: BrowsingSurface, options: CaptureOptions): Promise<Capture> {
  let lastError = "capture produced no image";
  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      const bytes = await surface.snapshot();
      if (bytes.byteLength >= options.minBytes) {
        return { png: Buffer.from(bytes).toString("base64"), placeholder: false };
      }
      lastError = `capture too small (${bytes.byteLength} bytes)`;
    } catch (err) {
      lastError = errorMessage(err);
    }
    options.log.debug({ attempt, error: lastError }, "screenshot attempt failed");
    if (attempt < options.attempts) await options.sleep(options.backoffMs);
  }

  options.log.warn({ attempts: options.attempts, error: lastError }, "screenshot failed, sending placeholder");
  try {
    const png = await renderPlaceholder(surface.currentURL(), lastError);
    return { png: png.toString("base64"), placeholder: true };
  } catch (err) {
    options.log.error({ err }, "placeholder render failed");
    return { png: LAST_RESORT_PNG, placeholder: true };
  }
}
