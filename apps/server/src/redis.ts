import { createClient } from "redis";
import { ConversationMetaSchema, type ConversationMeta, type TurnEvent } from "@surfloop/shared";
import { config } from "./config.js";
import { childLogger } from "./logger.js";

type RedisClient = ReturnType<typeof createClient>;

const P = config.REDIS_PREFIX;
const CONVERSATION_TTL = config.REDIS_TTL_SECONDS;
const EVENTS_TTL = 24 * 60 * 60; // 1 day

const log = childLogger("redis");

let client: RedisClient | null = null;
let redisAvailable = false;
let connectionAttempted = false;

export async function getRedis(): Promise<RedisClient | null> {
  if (connectionAttempted && !redisAvailable) return null;
  if (client && redisAvailable) return client;

  connectionAttempted = true;
  if (config.APP_ENV === "test") return null;
  try {
    const isCloudRedis = config.REDIS_URL.startsWith("rediss://");
    log.info({ url: config.REDIS_URL.replace(/:[^:@]+@/, ":***@") }, "connecting to redis");

    // rediss:// URLs handle TLS
    const next = createClient({
      url: config.REDIS_URL,
      socket: {
        connectTimeout: 10000,
        reconnectStrategy: false,
      },
    });
    next.on("error", (err: unknown) => {
      log.error({ err }, "redis error");
    });

    await next.connect();
    await next.ping();

    client = next;
    redisAvailable = true;
    log.info({ cloud: isCloudRedis }, "redis connected");
    return client;
  } catch (err) {
    log.warn({ err: err instanceof Error ? err.message : String(err) }, "redis connection failed, running in memory-only mode");
    redisAvailable = false;
    client = null;
    return null;
  }
}

export function keyConversation(conversationId: string): string {
  return `${P}:conversation:${conversationId}`;
}

export function keyConversationEvents(conversationId: string): string {
  return `${P}:conversation_events:${conversationId}`;
}

// In-memory fallback storage
const memoryStore = new Map<string, { value: string; expires?: number }>();
const memoryLists = new Map<string, { items: string[]; expires?: number }>();

function live<T extends { expires?: number }>(entry: T | undefined): T | null {
  if (!entry || (entry.expires && Date.now() > entry.expires)) return null;
  return entry;
}

function parseMeta(raw: string): ConversationMeta | null {
  try {
    const parsed = ConversationMetaSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch (err) {
    log.warn({ err }, "unreadable conversation meta");
    return null;
  }
}

export async function getConversation(conversationId: string): Promise<ConversationMeta | null> {
  const r = await getRedis();
  const key = keyConversation(conversationId);
  if (r) {
    const raw = await r.get(key);
    return raw ? parseMeta(raw) : null;
  }
  const entry = live(memoryStore.get(key));
  return entry ? parseMeta(entry.value) : null;
}

export async function setConversation(meta: ConversationMeta): Promise<void> {
  const r = await getRedis();
  const key = keyConversation(meta.conversation_id);
  const value = JSON.stringify(meta);
  if (r) {
    await r.setEx(key, CONVERSATION_TTL, value);
  } else {
    memoryStore.set(key, { value, expires: Date.now() + CONVERSATION_TTL * 1000 });
  }
}

export async function updateConversation(
  conversationId: string,
  patch: Partial<Omit<ConversationMeta, "conversation_id" | "created_at">>
): Promise<ConversationMeta | null> {
  const meta = await getConversation(conversationId);
  if (!meta) return null;
  const next: ConversationMeta = { ...meta, ...patch, updated_at: new Date().toISOString() };
  await setConversation(next);
  return next;
}

export async function appendConversationEvent(conversationId: string, event: TurnEvent): Promise<void> {
  const r = await getRedis();
  const k = keyConversationEvents(conversationId);
  const eventStr = JSON.stringify({ ...event, ts: event.ts ?? new Date().toISOString() });
  if (r) {
    await r.rPush(k, eventStr);
    await r.expire(k, EVENTS_TTL);
    return;
  }
  const entry = live(memoryLists.get(k));
  const items = entry ? entry.items : [];
  items.push(eventStr);
  memoryLists.set(k, { items, expires: Date.now() + EVENTS_TTL * 1000 });
}

export async function getConversationEvents(conversationId: string): Promise<string[]> {
  const r = await getRedis();
  const k = keyConversationEvents(conversationId);
  if (r) {
    return r.lRange(k, 0, -1);
  }
  return live(memoryLists.get(k))?.items.slice() ?? [];
}

export async function getRecentConversationIds(limit: number = 50): Promise<string[]> {
  const prefix = `${P}:conversation:`;
  const r = await getRedis();
  if (r) {
    const keys = await r.keys(`${prefix}*`);
    return keys.map((k) => k.slice(prefix.length)).slice(0, limit);
  }
  const ids: string[] = [];
  for (const [key, entry] of memoryStore) {
    if (key.startsWith(prefix) && live(entry)) ids.push(key.slice(prefix.length));
  }
  return ids.slice(0, limit);
}

export type StoreHealth = "connected" | "memory" | "disconnected";

export async function healthCheck(): Promise<StoreHealth> {
  try {
    const r = await getRedis();
    if (!r) return "memory";
    await r.ping();
    return "connected";
  } catch (err) {
    log.warn({ err }, "redis health check failed");
    return "disconnected";
  }
}
