import type { TurnEvent } from "@surfloop/shared";
import { childLogger } from "./logger.js";

const log = childLogger("emitter");

const subscribers = new Map<string, Set<(e: TurnEvent) => void>>();

export function subscribe(conversationId: string, send: (e: TurnEvent) => void): () => void {
  let set = subscribers.get(conversationId);
  if (!set) {
    set = new Set();
    subscribers.set(conversationId, set);
  }
  set.add(send);
  return () => {
    set?.delete(send);
    if (set?.size === 0) subscribers.delete(conversationId);
  };
}

export function emit(conversationId: string, event: TurnEvent): void {
  const set = subscribers.get(conversationId);
  if (!set) return;
  const e = { ...event, ts: event.ts ?? new Date().toISOString() };
  for (const send of set) {
    try {
      send(e);
    } catch (err) {
      log.warn({ err, conversationId, type: e.type }, "subscriber failed");
    }
  }
}

export function subscriberCount(conversationId: string): number {
  return subscribers.get(conversationId)?.size ?? 0;
}
