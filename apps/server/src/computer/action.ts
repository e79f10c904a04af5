import type { Action, Point } from "@surfloop/shared";
import { ComputerUseError } from "./errors.js";

export type ActionVariant =
  | { kind: "navigate"; url: string }
  | { kind: "click"; point: Point }
  | { kind: "double_click"; point: Point }
  | { kind: "move"; point: Point }
  | { kind: "type"; text: string }
  | { kind: "keypress"; keys: string[] }
  | { kind: "drag"; path: Point[] }
  | { kind: "scroll"; deltaX: number; deltaY: number }
  | { kind: "screenshot"; url?: string }
  | { kind: "wait"; ms: number }
  | { kind: "unknown"; type: string; action: Action };

export type ActionKind = ActionVariant["kind"];

const TYPE_ALIASES: Record<string, ActionKind> = {
  doubleclick: "double_click",
  "double-click": "double_click",
  hover: "move",
  mouse_move: "move",
  mousemove: "move",
};

const KNOWN_KINDS: ReadonlySet<string> = new Set<ActionKind>([
  "navigate",
  "click",
  "double_click",
  "move",
  "type",
  "keypress",
  "drag",
  "scroll",
  "screenshot",
  "wait",
]);

const WAIT_MS_KEYS = ["ms", "milliseconds", "duration", "timeout", "time"] as const;
const WAIT_SECONDS_KEYS = ["seconds", "secs", "s"] as const;
export const DEFAULT_WAIT_MS = 1000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Builds an Action from a raw `action` object of a computer_call. Accepts the
 * flattened wire form (`{type, x, y}`) and the nested one (`{type, parameters}`);
 * nested keys win on conflict. Returns null when there is no usable type.
 */
export function parseAction(raw: unknown): Action | null {
  if (!isRecord(raw)) return null;
  const type = raw.type;
  if (typeof type !== "string" || type.trim() === "") return null;
  const { type: _type, parameters, ...flat } = raw;
  const nested = isRecord(parameters) ? parameters : {};
  return { type: type.trim(), parameters: { ...flat, ...nested } };
}

/** Number, or a string that parses fully as a finite number. */
export function coerceNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") return null;
    const n = Number(trimmed);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function coercePoint(source: Readonly<Record<string, unknown>>, what: string): Point {
  const x = coerceNumber(source.x);
  const y = coerceNumber(source.y);
  if (x === null || y === null) {
    throw ComputerUseError.invalidParameters(`${what} needs numeric x and y coordinates`);
  }
  return { x, y };
}

function firstNumber(params: Readonly<Record<string, unknown>>, keys: readonly string[]): number | null {
  for (const key of keys) {
    const n = coerceNumber(params[key]);
    if (n !== null) return n;
  }
  return null;
}

function isKnownKind(type: string): type is Exclude<ActionKind, "unknown"> {
  return KNOWN_KINDS.has(type);
}

/** Exact kinds first, then case-insensitive aliases; anything else is `unknown`. */
export function resolveKind(type: string): ActionKind {
  if (isKnownKind(type)) return type;
  return TYPE_ALIASES[type.toLowerCase()] ?? "unknown";
}

/**
 * Prefixes `https://` when the input has no scheme, then validates it.
 * `example.com` becomes `https://example.com/`.
 */
export function normalizeUrl(input: string): string {
  const trimmed = input.trim();
  if (trimmed === "") throw ComputerUseError.invalidParameters("navigate needs a non-empty url");
  const hasScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) || /^(about|data|file|javascript):/i.test(trimmed);
  const candidate = hasScheme ? trimmed : `https://${trimmed}`;
  try {
    return new URL(candidate).href;
  } catch {
    throw ComputerUseError.invalidParameters(`navigate got an unparseable url: ${input}`);
  }
}

/** Narrows an Action into its typed variant. Throws InvalidParameters on bad shapes. */
export function toVariant(action: Action): ActionVariant {
  const p = action.parameters;
  switch (resolveKind(action.type)) {
    case "navigate": {
      if (typeof p.url !== "string") throw ComputerUseError.invalidParameters("navigate needs a url string");
      return { kind: "navigate", url: normalizeUrl(p.url) };
    }
    case "click":
      return { kind: "click", point: coercePoint(p, "click") };
    case "double_click":
      return { kind: "double_click", point: coercePoint(p, "double_click") };
    case "move":
      return { kind: "move", point: coercePoint(p, "move") };
    case "type": {
      if (typeof p.text !== "string") throw ComputerUseError.invalidParameters("type needs a text string");
      return { kind: "type", text: p.text };
    }
    case "keypress": {
      const keys = p.keys;
      if (!Array.isArray(keys) || keys.length === 0 || !keys.every((k): k is string => typeof k === "string")) {
        throw ComputerUseError.invalidParameters("keypress needs a non-empty keys array of strings");
      }
      return { kind: "keypress", keys };
    }
    case "drag": {
      const path = p.path;
      if (!Array.isArray(path) || path.length < 2) {
        throw ComputerUseError.invalidParameters("drag needs a path of at least two points");
      }
      return {
        kind: "drag",
        path: path.map((point, i) => {
          if (!isRecord(point)) throw ComputerUseError.invalidParameters(`drag path point ${i} is not an object`);
          return coercePoint(point, `drag path point ${i}`);
        }),
      };
    }
    case "scroll":
      return {
        kind: "scroll",
        deltaX: firstNumber(p, ["scroll_x", "scrollX", "x"]) ?? 0,
        deltaY: firstNumber(p, ["scroll_y", "scrollY", "y"]) ?? 0,
      };
    case "screenshot":
      return typeof p.url === "string" && p.url.trim() !== ""
        ? { kind: "screenshot", url: p.url }
        : { kind: "screenshot" };
    case "wait": {
      const ms = firstNumber(p, WAIT_MS_KEYS);
      const seconds = ms === null ? firstNumber(p, WAIT_SECONDS_KEYS) : null;
      const resolved = ms ?? (seconds !== null ? seconds * 1000 : DEFAULT_WAIT_MS);
      return { kind: "wait", ms: Math.max(0, resolved) };
    }
    case "unknown":
      return { kind: "unknown", type: action.type, action };
  }
}
