/**
 * Error Message Utility
 * Turns raw downloader/storage errors into bounded, matchable text.
 */

/** Longest detail string returned to clients. */
export const MAX_DETAIL_LENGTH = 500;

/**
 * Phrases yt-dlp prints when a site wants a signed-in session.
 * Matched against the normalized, lower-cased message.
 */
const BOT_CHECK_PATTERNS = [
  "confirm you're not a bot",
  "confirm you are not a bot",
  "confirm that you're not a bot",
];

/**
 * Cuts a message to `max` characters, marking the cut with an ellipsis.
 */
export function truncateDetail(message: string, max: number = MAX_DETAIL_LENGTH): string {
  const trimmed = message.trim();
  if (trimmed.length <= max) {
    return trimmed;
  }
  return `${trimmed.slice(0, max - 1)}…`;
}

/**
 * Folds curly quotes, backticks and the UTF-8-read-as-cp1252 apostrophe
 * ("â€™") into a plain apostrophe.
 */
export function normalizeQuotes(message: string): string {
  return message.replace(/â€™|â€˜/g, "'").replace(/[‘’‛′`´]/g, "'");
}

/**
 * Best-effort detection of a "sign in to confirm you're not a bot" failure.
 * Wording changes upstream will slip past this.
 */
export function isBotCheckMessage(message: string): boolean {
  const normalized = normalizeQuotes(message).toLowerCase();
  return BOT_CHECK_PATTERNS.some((pattern) => normalized.includes(pattern));
}
