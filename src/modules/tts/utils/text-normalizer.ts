/**
 * Synthesis text normalization and cache keys
 *
 * Normalization: Unicode NFC, whitespace runs collapsed to one space,
 * control/format characters and emoji removed, trimmed. Length limits are
 * enforced by the caller; text is never cut. Case is preserved, so "Hello"
 * and "hello" are distinct keys.
 */

// Emoji and pictograph blocks (U+1F000 - U+1FAFF) plus Unicode "Other" categories
const UNSPEAKABLE_CHARS = /[\p{C}\u{1F000}-\u{1FAFF}]/gu;
const WHITESPACE_RUN = /\s+/g;

export function normalizeSynthesisText(text: string): string {
  return text
    .normalize('NFC')
    .replace(WHITESPACE_RUN, ' ')
    .replace(UNSPEAKABLE_CHARS, '')
    .replace(WHITESPACE_RUN, ' ')
    .trim();
}

/**
 * Deterministic composite key of (language, voice, normalized text)
 */
export function buildCacheKey(text: string, voiceId: string, language: string): string {
  return JSON.stringify([language, voiceId, text]);
}
