/**
 * Reads navigation and search intent out of the user's message. The loop uses
 * these to precondition model actions: a screenshot with no page, a click on a
 * blank surface, an explicit search the model would otherwise type by hand.
 */

// Checked in order; the first key present as a whole word wins.
const SITE_KEYWORDS: ReadonlyArray<readonly [string, string]> = [
  ["google", "https://google.com"],
  ["youtube", "https://youtube.com"],
  ["amazon", "https://amazon.com"],
  ["openai", "https://openai.com"],
  ["bing", "https://bing.com"],
  ["github", "https://github.com"],
  ["x", "https://x.com"],
  ["twitter", "https://twitter.com"],
  ["reddit", "https://reddit.com"],
  ["wikipedia", "https://wikipedia.org"],
  ["apple", "https://apple.com"],
  ["facebook", "https://facebook.com"],
  ["instagram", "https://instagram.com"],
  ["linkedin", "https://linkedin.com"],
  ["nytimes", "https://nytimes.com"],
  ["acer", "https://acer.com"],
  ["asus", "https://asus.com"],
  ["lenovo", "https://lenovo.com"],
  ["dell", "https://dell.com"],
  ["hp", "https://hp.com"],
  ["microsoft", "https://microsoft.com"],
  ["samsung", "https://samsung.com"],
];

const TLDS = [
  "com", "org", "net", "io", "co", "ai", "app", "dev", "info", "biz",
  "me", "gg", "xyz", "us", "uk", "de", "ca", "au", "edu", "gov",
];

const UI_NOUNS = new Set(["bar", "box", "field", "icon", "button", "tab", "area", "input"]);

const FIELD_SUFFIXES = [
  " in the search bar", " in that search bar", " into the search bar",
  " in the search box", " in that search box", " into the search box",
  " in the search field", " in that search field", " into the search field",
  " in the bar", " in that bar", " into the bar",
  " in the box", " in that box", " into the box",
  " in the field", " in that field", " into the field",
  " in search", " into search",
];

const TYPE_IN_SUFFIXES = [...FIELD_SUFFIXES, " and press enter", " then press enter"];

const FILL_PREFIXES = ["put ", "enter ", "input ", "write ", "key in ", "paste "];

function toHref(candidate: string): string | null {
  try {
    const url = new URL(candidate);
    return url.protocol === "http:" || url.protocol === "https:" ? url.href : null;
  } catch {
    return null;
  }
}

function wordsOf(lower: string): string[] {
  return lower.split(/[^a-z0-9-]+/).filter(Boolean);
}

/** Single-letter and two-letter keys ("x", "hp") only count when they are the whole destination. */
function keywordUrl(words: string[], allowShort: boolean): string | null {
  const present = new Set(words);
  for (const [key, url] of SITE_KEYWORDS) {
    if (!allowShort && key.length < 3) continue;
    if (present.has(key)) return toHref(url);
  }
  return null;
}

/** "strykercom" -> https://stryker.com/ */
function concatenatedDomain(token: string): string | null {
  if (!/^[a-z0-9-]+$/.test(token)) return null;
  for (const tld of TLDS) {
    if (!token.endsWith(tld) || token.length <= tld.length) continue;
    const prefix = token.slice(0, -tld.length);
    if (/[a-z0-9]$/.test(prefix)) return toHref(`https://${prefix}.${tld}`);
  }
  return null;
}

/** First explicit URL or bare domain in `text`, with https defaulted and the host lowercased. */
export function findUrlInText(text: string): string | null {
  const explicit = /\bhttps?:\/\/[^\s<>"'`]+/i.exec(text);
  if (explicit) {
    const href = toHref(explicit[0].replace(/[.,;:!?)]+$/, ""));
    if (href) return href;
  }
  const domain = /(?:^|[\s(])((?:[a-z0-9-]+\.)+[a-z]{2,})(\/[^\s]*)?/i.exec(text);
  if (domain?.[1]) {
    const path = (domain[2] ?? "").replace(/[.,;:!?)]+$/, "");
    return toHref(`https://${domain[1].toLowerCase()}${path}`);
  }
  return null;
}

export function deriveUrlFromMessage(text: string): string | null {
  const lower = text.toLowerCase();

  const goTo = /\b(?:go to|open)\s+/.exec(lower);
  if (goTo) {
    const tail = text.slice(goTo.index + goTo[0].length).trim();
    const inTail = findUrlInText(tail);
    if (inTail) return inTail;
    const token = (tail.split(/[\s,.;:!?]+/)[0] ?? "").toLowerCase();
    if (token) {
      const mapped = keywordUrl([token], true) ?? concatenatedDomain(token);
      if (mapped) return mapped;
      if (/^[a-z0-9-]+$/.test(token)) return toHref(`https://${token}.com`);
    }
  }

  const searchOrFind = /\bsearch\s+/.exec(lower) ?? /\bfind\s+/.exec(lower);
  if (searchOrFind) {
    const query = cleanQuery(lower.slice(searchOrFind.index + searchOrFind[0].length));
    if (query) return `https://www.google.com/search?q=${encodeURIComponent(query)}`;
  }

  const inText = findUrlInText(text);
  if (inText) return inText;

  const mapped = keywordUrl(wordsOf(lower), false);
  if (mapped) return mapped;

  const trimmed = lower.trim();
  if (trimmed.length > 1 && /^[a-z0-9-]+$/.test(trimmed)) {
    return concatenatedDomain(trimmed) ?? toHref(`https://${trimmed}.com`);
  }

  if (lower.includes("search")) return toHref("https://google.com");
  return null;
}

function cleanQuery(raw: string): string | null {
  let q = raw.trim();
  if (q.toLowerCase().startsWith("for ")) q = q.slice(4).trim();
  q = q.replace(/^["'`\s]+|["'`\s]+$/g, "");
  return q === "" ? null : q;
}

/** Index in `lower` of the earliest suffix at or after `from`, or -1. */
function earliestSuffix(lower: string, suffixes: string[], from: number): number {
  let best = -1;
  for (const sfx of suffixes) {
    const at = lower.indexOf(sfx, from);
    if (at !== -1 && (best === -1 || at < best)) best = at;
  }
  return best;
}

function queryAfterVerb(text: string, lower: string, verb: RegExp): string | null {
  const m = verb.exec(lower);
  if (!m) return null;
  const start = m.index + m[0].length;
  const firstWord = (lower.slice(start).trim().split(/\s+/)[0] ?? "").replace(/[^a-z0-9-]/g, "");
  if (UI_NOUNS.has(firstWord)) return null;
  return cleanQuery(text.slice(start));
}

/**
 * Search terms the user spelled out: "search for potato chips",
 * "type rtx 5090 in the search bar", "find best laptops".
 */
export function extractExplicitSearchQuery(text: string): string | null {
  const lower = text.toLowerCase();

  const typeIn = /\btype in\s+/.exec(lower);
  if (typeIn) {
    const start = typeIn.index + typeIn[0].length;
    const end = earliestSuffix(lower, TYPE_IN_SUFFIXES, start);
    const q = cleanQuery(text.slice(start, end === -1 ? undefined : end));
    if (q) return q;
  }

  const type = /\btype\s+/.exec(lower);
  if (type) {
    const start = type.index + type[0].length;
    const end = earliestSuffix(lower, FIELD_SUFFIXES, start);
    if (end !== -1) {
      const q = cleanQuery(text.slice(start, end));
      if (q) return q;
    }
  }

  const searched = queryAfterVerb(text, lower, /\bsearch\s+/) ?? queryAfterVerb(text, lower, /\bfind\s+/);
  if (searched) return searched;

  for (const prefix of FILL_PREFIXES) {
    const m = new RegExp(`\\b${prefix}`).exec(lower);
    if (!m) continue;
    const start = m.index + prefix.length;
    const end = earliestSuffix(lower, FIELD_SUFFIXES, start);
    if (end === -1) continue;
    const q = cleanQuery(text.slice(start, end));
    if (q) return q;
  }
  return null;
}

/** A named click target: `click "Sign in"`, `click 'Cart'`, `click the item named Blue Backpack`. */
export function extractExplicitClickTarget(text: string): string | null {
  const lower = text.toLowerCase();
  const click = /\bclick\s+/.exec(lower);
  if (!click) return null;
  const start = click.index + click[0].length;
  const tail = text.slice(start);

  const doubleQuoted = /["“]([^"”]+)["”]/.exec(tail);
  const dq = doubleQuoted?.[1]?.trim();
  if (dq) return dq;

  const singleQuoted = /(?:^|\s)'([^']+)'(?=$|[\s,.;:!?])/.exec(tail);
  const sq = singleQuoted?.[1]?.trim();
  if (sq) return sq;

  const named = /\bnamed\s+/.exec(lower.slice(start));
  if (named) {
    const fragment = tail.slice(named.index + named[0].length).split(/[,.;:!?\n]/)[0] ?? "";
    const value = fragment.trim();
    if (value) return value;
  }
  return null;
}

const LEADING_FILLER = [
  "find me some ", "find me ", "find some ", "find ",
  "show me some ", "show me ", "show ",
  "look for ", "search for ", "search ", "get me ", "get ",
];
const TRAILING_FILLER = [" please", " thanks", ".", ",", "!"];

/** "find me some pencils please" -> "pencils" */
export function refineSearchPhrase(raw: string): string {
  let q = raw.trim();
  const lower = q.toLowerCase();
  const lead = LEADING_FILLER.find((p) => lower.startsWith(p));
  if (lead) q = q.slice(lead.length).trim();
  for (const t of TRAILING_FILLER) {
    if (q.toLowerCase().endsWith(t)) q = q.slice(0, -t.length);
  }
  return q.trim();
}
