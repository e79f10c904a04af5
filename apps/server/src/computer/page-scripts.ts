import type { Point } from "@surfloop/shared";

// Scripts are plain source strings evaluated inside the page. Arguments are
// spliced in through JSON.stringify, and every script returns a string
// (structured results are JSON-encoded) so any surface can carry them back.

const lit = (value: unknown): string => JSON.stringify(value);

export const INTERACTIVE_SELECTOR =
  'a,button,input,textarea,select,[role="button"],[onclick],[tabindex],label';

const TEXT_CANDIDATE_SELECTOR =
  'a,button,[role="button"],input[type="submit"],input[type="button"],[onclick],[tabindex],div,span,h1,h2,h3,h4,h5,h6,li,article,section';

/** Shared in-page helpers, spliced at the top of scripts that need them. */
const HELPERS = `
  var INTERACTIVE = ${lit(INTERACTIVE_SELECTOR)};
  function norm(s){ return String(s || '').trim().replace(/\\s+/g, ' ').toLowerCase(); }
  function rawText(el){ return (typeof el.innerText === 'string' && el.innerText) ? el.innerText : (el.textContent || ''); }
  function textOf(el){
    var t = rawText(el).trim();
    if (!t && typeof el.value === 'string') t = el.value.trim();
    if (!t) t = ((el.getAttribute && el.getAttribute('aria-label')) || (el.getAttribute && el.getAttribute('title')) || '').trim();
    return t;
  }
  function isVisible(el){
    if (!el || !el.getBoundingClientRect) return false;
    var r = el.getBoundingClientRect();
    if (r.width <= 0 || r.height <= 0) return false;
    var s = window.getComputedStyle(el);
    if (s.visibility === 'hidden' || s.display === 'none' || s.pointerEvents === 'none') return false;
    if (parseFloat(s.opacity || '1') === 0) return false;
    return true;
  }
  function centerOf(el){
    var r = el.getBoundingClientRect();
    return { x: r.left + r.width / 2, y: r.top + r.height / 2 };
  }
  function viewportSize(){
    return {
      w: window.innerWidth || document.documentElement.clientWidth || 0,
      h: window.innerHeight || document.documentElement.clientHeight || 0
    };
  }
  function describe(el, x, y){
    var cls = typeof el.className === 'string' ? el.className : '';
    var href = (el.tagName === 'A' && el.href) ? String(el.href) : '';
    return { tag: el.tagName, id: el.id || '', className: cls, href: href, x: x, y: y };
  }
  function label(t){
    return 'Clicked element: ' + t.tag + (t.className ? '.' + t.className : '') + (t.id ? '#' + t.id : '') +
      ' at (' + t.x + ', ' + t.y + ')' + (t.href ? ' (Link: ' + t.href + ')' : '');
  }
  function pressOn(el){
    var c = centerOf(el);
    var vp = viewportSize();
    var cx = Math.round(Math.max(0, Math.min(Math.max(0, vp.w - 1), c.x)));
    var cy = Math.round(Math.max(0, Math.min(Math.max(0, vp.h - 1), c.y)));
    try { if (typeof el.focus === 'function') el.focus(); } catch (e) {}
    ['mousedown', 'mouseup', 'click'].forEach(function(type){
      el.dispatchEvent(new MouseEvent(type, {
        bubbles: true, cancelable: true, view: window,
        clientX: cx, clientY: cy, button: 0, buttons: type === 'mousedown' ? 1 : 0
      }));
    });
    return describe(el, cx, cy);
  }
  function elementsAt(x, y){
    var list = [];
    if (typeof document.elementsFromPoint === 'function') list = Array.from(document.elementsFromPoint(x, y) || []);
    if (!list.length && typeof document.elementFromPoint === 'function') {
      var one = document.elementFromPoint(x, y);
      if (one) list = [one];
    }
    return list;
  }
`;

export function viewportScript(): string {
  return `(function(){
  return JSON.stringify({
    width: window.innerWidth || document.documentElement.clientWidth || 0,
    height: window.innerHeight || document.documentElement.clientHeight || 0,
    devicePixelRatio: window.devicePixelRatio || 1
  });
})()`;
}

export function readinessScript(): string {
  return `(function(){
  try { if (document.visibilityState === 'prerender') return 'false'; } catch (e) {}
  var rs = document.readyState;
  var painted = false;
  try {
    painted = window.innerWidth > 0 && window.innerHeight > 0 && !!document.body &&
      document.body.getBoundingClientRect().height > 0;
  } catch (e) { painted = false; }
  return JSON.stringify((rs === 'interactive' || rs === 'complete') && painted);
})()`;
}

/**
 * Resolves after two animation frames, so at least one paint has happened.
 * Hidden tabs may never fire them; after `timeoutMs` it resolves anyway.
 */
export function paintScript(timeoutMs: number): string {
  return `new Promise(function(resolve){
  var done = false;
  function finish(how){ if (!done) { done = true; resolve(how); } }
  setTimeout(function(){ finish('timeout'); }, ${lit(timeoutMs)});
  var raf = typeof window.requestAnimationFrame === 'function'
    ? window.requestAnimationFrame.bind(window)
    : function(cb){ return setTimeout(cb, 16); };
  raf(function(){ raf(function(){ finish('painted'); }); });
})`;
}

/**
 * Resolves what a click at `point` (CSS px) should hit and clicks it once.
 * Corner clicks must land on a menu-like control or are refused.
 * Clicks inside a cookie/consent banner go to its accept control, if it has one.
 */
export function clickScript(point: Point, inCorner: boolean): string {
  return `(function(){
  ${HELPERS}
  var px = ${lit(point.x)};
  var py = ${lit(point.y)};
  var inCorner = ${lit(inCorner)};

  function findMenuNearTopLeft(x, y){
    var candidates = Array.from(document.querySelectorAll('button, a, [role="button"], [aria-label]')).filter(function(el){
      if (!isVisible(el)) return false;
      var r = el.getBoundingClientRect();
      var c = centerOf(el);
      var near = c.x < 120 && c.y < 120;
      var iconSized = r.width <= 64 && r.height <= 64;
      var txt = norm(rawText(el));
      var lab = norm(el.getAttribute('aria-label'));
      var title = norm(el.getAttribute('title'));
      var menuLike = lab.indexOf('menu') >= 0 || lab.indexOf('hamburger') >= 0 ||
        title.indexOf('menu') >= 0 || title.indexOf('hamburger') >= 0 || txt === '';
      return near && iconSized && menuLike;
    });
    if (!candidates.length) return null;
    function d(el){ var c = centerOf(el); var dx = c.x - x, dy = c.y - y; return dx * dx + dy * dy; }
    candidates.sort(function(a, b){ return d(a) - d(b); });
    return candidates[0];
  }

  function pickFromPoint(x, y){
    var list = elementsAt(x, y);
    for (var i = 0; i < list.length; i++) {
      var hit = list[i].closest ? list[i].closest(INTERACTIVE) : null;
      if (hit) return hit;
    }
    return list[0] || null;
  }

  function looksLikeConsentOverlay(node){
    if (!node || node === document.body || node === document.documentElement) return false;
    var BANNER = /cookie|consent|privacy|onetrust|gdpr/;
    var cls = typeof node.className === 'string' ? node.className : '';
    var named = BANNER.test((cls + ' ' + (node.id || '')).toLowerCase());
    if (!named) {
      // Text alone also matches any wrapper with a privacy link; it must float over the page too.
      var pos = window.getComputedStyle(node).position;
      if (pos !== 'fixed' && pos !== 'sticky') return false;
      if (!BANNER.test(rawText(node).toLowerCase())) return false;
    }
    return node.getBoundingClientRect().height > 120 && isVisible(node);
  }

  function findOverlay(el){
    var cur = el;
    while (cur && cur !== document.body) {
      if (looksLikeConsentOverlay(cur)) return cur;
      cur = cur.parentElement;
    }
    return null;
  }

  function findConsentControl(root, x, y){
    var candidates = Array.from(root.querySelectorAll('button, [role="button"], a, input[type="button"], input[type="submit"]')).filter(isVisible);
    if (!candidates.length) return null;
    var PRIORITY = [/\\baccept all\\b/i, /\\baccept\\b/i, /\\bagree\\b/i, /\\ballow\\b/i, /\\bok(ay)?\\b/i, /\\bgot it\\b/i, /\\bcontinue\\b/i];
    function rank(el){
      var t = textOf(el);
      for (var i = 0; i < PRIORITY.length; i++) {
        if (PRIORITY[i].test(t)) return i;
      }
      return -1;
    }
    function dist(el){
      var c = centerOf(el);
      var dx = c.x - x, dy = c.y - y;
      return dx * dx + dy * dy;
    }
    var labelled = candidates.filter(function(el){ return rank(el) >= 0; });
    if (!labelled.length) return null;
    labelled.sort(function(a, b){ return (rank(a) - rank(b)) || (dist(a) - dist(b)); });
    return labelled[0];
  }

  var el = null;
  var consent = false;
  if (inCorner) {
    el = findMenuNearTopLeft(px, py);
    if (!el) {
      return JSON.stringify({ status: 'refused', message: 'Refused click: no menu-like control visible near top-left.' });
    }
  } else {
    el = pickFromPoint(px, py);
    var overlay = el ? findOverlay(el) : null;
    if (overlay) {
      var control = findConsentControl(overlay, px, py);
      if (control) { el = control; consent = true; }
    }
  }
  if (!el) {
    return JSON.stringify({ status: 'no_element', message: 'No element found at point (' + px + ', ' + py + ').' });
  }
  try { el.scrollIntoView({ block: 'center', inline: 'center', behavior: 'auto' }); } catch (e) {}
  var target = pressOn(el);
  return JSON.stringify({ status: 'clicked', message: label(target), target: target, consent: consent });
})()`;
}

/**
 * Finds the visible element whose text best matches `text` and clicks it.
 * Exact match beats containment beats word overlap; ties go to natively
 * interactive elements, then to the one nearest `hint`.
 */
export function textClickScript(text: string, hint?: Point): string {
  return `(function(){
  ${HELPERS}
  var target = norm(${lit(text)});
  var hint = ${lit(hint ?? null)};
  if (!target) return JSON.stringify({ status: 'not_found', message: 'Empty click target' });
  var vp = viewportSize();
  function onScreen(el){
    if (!isVisible(el)) return false;
    var r = el.getBoundingClientRect();
    if (r.width <= 1 || r.height <= 1) return false;
    return !(r.bottom < -10 || r.right < -10 || r.top > vp.h + 10 || r.left > vp.w + 10);
  }
  function score(el){
    var t = norm(textOf(el));
    if (!t) return -1;
    if (t === target) return 100;
    if (t.indexOf(target) >= 0) return 60 + Math.min(20, Math.floor((target.length / Math.max(1, t.length)) * 20));
    var words = {};
    t.split(' ').forEach(function(w){ words[w] = true; });
    var shared = 0;
    var seen = {};
    target.split(' ').forEach(function(w){ if (words[w] && !seen[w]) { seen[w] = true; shared++; } });
    return shared > 0 ? 30 + shared : -1;
  }
  function interactive(el){ return el.matches && el.matches(INTERACTIVE) ? 1 : 0; }
  function distance(el){
    if (!hint) return 0;
    var c = centerOf(el);
    var dx = c.x - hint.x, dy = c.y - hint.y;
    return dx * dx + dy * dy;
  }
  var best = null, bestScore = -1;
  Array.from(document.querySelectorAll(${lit(TEXT_CANDIDATE_SELECTOR)})).filter(onScreen).forEach(function(el){
    var s = score(el);
    if (s < 0) return;
    if (!best || s > bestScore) { best = el; bestScore = s; return; }
    if (s === bestScore) {
      var ia = interactive(el), ib = interactive(best);
      if (ia > ib || (ia === ib && distance(el) < distance(best))) { best = el; }
    }
  });
  if (!best) return JSON.stringify({ status: 'not_found', message: 'No visible element matches "' + target + '"' });
  var t = pressOn(best);
  return JSON.stringify({ status: 'clicked', message: label(t), target: t, score: bestScore });
})()`;
}

export function doubleClickScript(point: Point): string {
  return `(function(){
  ${HELPERS}
  var px = ${lit(point.x)}, py = ${lit(point.y)};
  var el = elementsAt(px, py)[0];
  if (!el) return 'No element found at point for double-click.';
  try { if (typeof el.focus === 'function') el.focus(); } catch (e) {}
  el.dispatchEvent(new MouseEvent('dblclick', { bubbles: true, cancelable: true, view: window, clientX: px, clientY: py, button: 0 }));
  return 'Double-clicked element: ' + el.tagName;
})()`;
}

export function moveScript(point: Point): string {
  return `(function(){
  ${HELPERS}
  var px = ${lit(point.x)}, py = ${lit(point.y)};
  var el = elementsAt(px, py)[0];
  if (!el) return 'No element found at point for mouse move.';
  ['mouseover', 'mousemove'].forEach(function(type){
    el.dispatchEvent(new MouseEvent(type, { bubbles: true, cancelable: true, view: window, clientX: px, clientY: py }));
  });
  return 'Moved mouse to element: ' + el.tagName;
})()`;
}

export function typeScript(text: string): string {
  return `(function(){
  var text = ${lit(text)};
  var el = document.activeElement;
  if (!el || el === document.body) return 'No active editable element found.';
  if (el.tagName === 'INPUT' || el.tagName === 'TEXTAREA') {
    el.value = (el.value || '') + text;
  } else if (el.isContentEditable || (el.getAttribute && el.getAttribute('contenteditable') === 'true')) {
    el.textContent = (el.textContent || '') + text;
  } else {
    return 'No active editable element found.';
  }
  el.dispatchEvent(new Event('input', { bubbles: true }));
  return 'Typed text into ' + el.tagName;
})()`;
}

const EDITABLE_CHECK =
  "el && (el.isContentEditable || el.tagName === 'INPUT' || el.tagName === 'TEXTAREA' || (el.getAttribute && el.getAttribute('contenteditable') === 'true'))";

function keyEventScript(key: string, keyCode: number, requireEditable: boolean): string {
  return `(function(){
  var el = document.activeElement;
  ${
    requireEditable
      ? `if (!(${EDITABLE_CHECK})) return ${lit(`No active editable element for ${key}`)};`
      : "if (!el) el = document.body || document;"
  }
  el.dispatchEvent(new KeyboardEvent('keydown', { key: ${lit(key)}, keyCode: ${keyCode}, which: ${keyCode}, bubbles: true, cancelable: true }));
  el.dispatchEvent(new KeyboardEvent('keyup', { key: ${lit(key)}, keyCode: ${keyCode}, which: ${keyCode}, bubbles: true, cancelable: true }));
  return ${lit(`${key} pressed on `)} + (el.tagName || 'document');
})()`;
}

function execCommandScript(command: string, done: string, editableOnly: boolean): string {
  return `(function(){
  var el = document.activeElement;
  ${editableOnly ? `if (!(${EDITABLE_CHECK})) return ${lit(`No active editable element for ${command}`)};` : ""}
  try {
    document.execCommand(${lit(command)});
    return ${lit(done)};
  } catch (e) {
    return ${lit(`${command} failed: `)} + (e && e.message ? e.message : String(e));
  }
})()`;
}

/** Maps a key combination onto the page-level effect it should have. */
export function keypressScript(keys: string[]): string {
  const upper = keys.map((k) => k.trim().toUpperCase());
  const combo = upper.join("+");
  switch (combo) {
    case "CTRL+A":
    case "CMD+A":
    case "META+A":
      return `(function(){
  var el = document.activeElement;
  if (${EDITABLE_CHECK}) {
    if (typeof el.select === 'function') { el.select(); return 'Selected all text in ' + el.tagName; }
  }
  try { document.execCommand('selectAll'); } catch (e) {}
  return 'Selected all content on page';
})()`;
    case "CTRL+C":
    case "CMD+C":
    case "META+C":
      return execCommandScript("copy", "Copied selected content", false);
    case "CTRL+V":
    case "CMD+V":
    case "META+V":
      return execCommandScript("paste", "Pasted into focused element", true);
    case "CTRL+Z":
    case "CMD+Z":
    case "META+Z":
      return execCommandScript("undo", "Undo executed", false);
    case "ENTER":
    case "RETURN":
      return keyEventScript("Enter", 13, false);
    case "ESCAPE":
    case "ESC":
      return keyEventScript("Escape", 27, false);
    case "TAB":
      return keyEventScript("Tab", 9, false);
    case "BACKSPACE":
      return keyEventScript("Backspace", 8, true);
    case "DELETE":
      return keyEventScript("Delete", 46, true);
  }
  const has = (...names: string[]) => upper.some((k) => names.includes(k));
  const primary = keys[keys.length - 1] ?? "";
  return `(function(){
  var el = document.activeElement || document.body;
  el.dispatchEvent(new KeyboardEvent('keydown', {
    key: ${lit(primary)}, bubbles: true, cancelable: true,
    ctrlKey: ${has("CTRL", "CONTROL")}, metaKey: ${has("CMD", "META")},
    altKey: ${has("ALT", "OPTION")}, shiftKey: ${has("SHIFT")}
  }));
  return ${lit(`Key combination '${combo}' executed on `)} + el.tagName;
})()`;
}

/** Presses at `start`, moves through `moves`, releases at the last move. */
export function dragScript(start: Point, moves: Point[]): string {
  return `(function(){
  ${HELPERS}
  var start = ${lit(start)};
  var moves = ${lit(moves)};
  var end = moves.length ? moves[moves.length - 1] : start;
  var first = elementsAt(start.x, start.y)[0];
  if (!first) return 'No element found at start point (' + start.x + ', ' + start.y + ')';
  function ev(type, p){ return new MouseEvent(type, { bubbles: true, cancelable: true, view: window, clientX: p.x, clientY: p.y, button: 0, buttons: type === 'mouseup' ? 0 : 1 }); }
  first.dispatchEvent(ev('mousedown', start));
  moves.forEach(function(p){ (elementsAt(p.x, p.y)[0] || document).dispatchEvent(ev('mousemove', p)); });
  (elementsAt(end.x, end.y)[0] || document).dispatchEvent(ev('mouseup', end));
  return 'Drag from (' + start.x + ', ' + start.y + ') to (' + end.x + ', ' + end.y + ') completed';
})()`;
}

export function scrollScript(deltaX: number, deltaY: number): string {
  return `(function(){
  window.scrollBy(${lit(deltaX)}, ${lit(deltaY)});
  return 'Scrolled by (' + ${lit(deltaX)} + ', ' + ${lit(deltaY)} + ')';
})()`;
}

const AMAZON_FIELD =
  '#twotabsearchtextbox, input[name="field-keywords"], input[aria-label="Search Amazon"], input[type="search"][name="k"]';
const AMAZON_SUBMIT = '#nav-search-submit-button, input[type="submit"][value], input[type="submit"]';

const GENERIC_FIELDS = [
  'input[name="q"]',
  'textarea[name="q"]',
  'input[type="search"]',
  'textarea[type="search"]',
  'input[aria-label="Search"]',
  'textarea[aria-label="Search"]',
  'input[placeholder*="Search"]',
  'textarea[placeholder*="Search"]',
  'input[placeholder*="search"]',
  'textarea[placeholder*="search"]',
];
const GENERIC_SUBMIT =
  'button[type="submit"], input[type="submit"], [aria-label="Search"][role="button"], [type="image"][name="btnG"]';

/**
 * Fills the page's search box with `query` and submits it: button first, then
 * the form, then an Enter keypress. Amazon hosts get their own selectors.
 */
export function searchSubmitScript(query: string, siteSpecific: "amazon" | null): string {
  const fields = siteSpecific === "amazon" ? [AMAZON_FIELD] : GENERIC_FIELDS;
  const submit = siteSpecific === "amazon" ? AMAZON_SUBMIT : GENERIC_SUBMIT;
  return `(function(){
  ${HELPERS}
  var query = ${lit(query)};
  var fields = ${lit(fields)};
  var field = null;
  for (var i = 0; i < fields.length && !field; i++) {
    var found = Array.from(document.querySelectorAll(fields[i]));
    field = found.find(isVisible) || null;
  }
  if (!field) return JSON.stringify({ status: 'not_found', message: 'No search box found' });
  try { if (typeof field.focus === 'function') field.focus(); } catch (e) {}
  field.value = query;
  try { field.setSelectionRange(field.value.length, field.value.length); } catch (e) {}
  field.dispatchEvent(new Event('input', { bubbles: true }));
  var root = field.form || document;
  var button = root.querySelector(${lit(submit)});
  if (button && isVisible(button)) {
    button.click();
    return JSON.stringify({ status: 'submitted', message: 'Search submitted via button' });
  }
  if (field.form) {
    try {
      if (typeof field.form.requestSubmit === 'function') field.form.requestSubmit(); else field.form.submit();
      return JSON.stringify({ status: 'submitted', message: 'Search submitted via form' });
    } catch (e) {}
  }
  field.dispatchEvent(new KeyboardEvent('keydown', { key: 'Enter', keyCode: 13, which: 13, bubbles: true }));
  field.dispatchEvent(new KeyboardEvent('keyup', { key: 'Enter', keyCode: 13, which: 13, bubbles: true }));
  return JSON.stringify({ status: 'submitted', message: 'Search submitted via Enter' });
})()`;
}
