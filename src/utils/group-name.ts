/**
 * Window-title text helpers shared by the Foreground and Background signals.
 * Titles look like "(12) Chat Name – (3043)" or "Chat Name - Telegram".
 */

import { DEFAULT_SOURCE_APP, UNSORTED } from "../types.js";
import type { SourceApp } from "../types.js";

const UNREAD_PREFIX = /^\(\d+\)\s*/;
const MESSAGE_COUNT_SUFFIX = /\s*[–—-]\s*\(\d+\)$/;
const TRAILING_COUNT = /\s*\(\d+\)$/;
// Arabic blocks, ASCII letters and digits, whitespace, - _ .
const DECORATION = /[^\u0600-\u06FF\u0750-\u077F\uFB50-\uFDFF\uFE70-\uFEFFa-zA-Z0-9\s\-_.]+/g;
const EDGE_PUNCTUATION = /^[ \-_.]+|[ \-_.]+$/g;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function appSuffix(app: SourceApp): RegExp {
  return new RegExp(`\\s*[–—-]\\s*${escapeRegExp(app.name)}$`, "i");
}

/**
 * Map a raw window title to a chat name, or UNSORTED when nothing
 * meaningful is left.
 */
export function extractGroupName(windowTitle: string, app: SourceApp = DEFAULT_SOURCE_APP): string {
  if (!windowTitle || windowTitle.trim().length === 0) return UNSORTED;

  let title = windowTitle.trim();
  title = title.replace(UNREAD_PREFIX, "");
  title = title.replace(MESSAGE_COUNT_SUFFIX, "");
  title = title.replace(TRAILING_COUNT, "");
  title = title.replace(appSuffix(app), "");
  title = title.replace(DECORATION, "");
  title = title.replace(/\s+/g, " ").trim();
  title = title.replace(EDGE_PUNCTUATION, "");

  if (title.length === 0 || title.toLowerCase() === app.name.toLowerCase()) return UNSORTED;
  return title;
}

/** True when the window belongs to the source application. */
export function isSourceWindow(
  windowTitle: string,
  processName: string,
  app: SourceApp = DEFAULT_SOURCE_APP,
): boolean {
  if (!windowTitle || windowTitle.trim().length === 0) return false;

  const proc = processName.toLowerCase();
  if (app.processNames.some(p => p.toLowerCase() === proc)) return true;

  const title = windowTitle.toLowerCase();
  const name = app.name.toLowerCase();
  if (title.endsWith(` - ${name}`) || title.endsWith(` – ${name}`)) return true;

  return title === name;
}
