/**
 * Narration text helpers
 *
 * Model output arrives as markdown-ish prose. These helpers flatten it for
 * speech and split it into sentence-level detail sections.
 *
 * @module services/narration-text
 */

const MARKUP_PATTERN = /[*_`#]+/g;
const WHITESPACE_PATTERN = /\s+/g;
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

/**
 * Strip markup characters and collapse whitespace
 */
export function normalizeForSpeech(text: string): string {
  return text
    .replace(/\n/g, " ")
    .replace(MARKUP_PATTERN, " ")
    .replace(WHITESPACE_PATTERN, " ")
    .trim();
}

function sentences(normalized: string): string[] {
  return normalized
    .split(SENTENCE_BOUNDARY)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Split a description into navigable detail sections (one per sentence).
 * Never returns an empty list.
 */
export function splitSections(text: string): string[] {
  const normalized = normalizeForSpeech(text);
  const parts = sentences(normalized);
  if (parts.length === 0) {
    return [normalized || "No details available."];
  }
  return parts;
}

/**
 * Short summary: the first one or two sentences
 */
export function buildSummary(text: string): string {
  const normalized = normalizeForSpeech(text);
  const parts = sentences(normalized);
  if (parts.length === 0) {
    return normalized || "No description returned.";
  }
  return parts.slice(0, 2).join(" ");
}
