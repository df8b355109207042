import { DEFAULTS } from "../config.js";
import type { KeywordRole, WordList } from "../types.js";

// Words are quoted as-is: a `"` or `\` inside a word is not escaped.
export function formatEntry(word: string): string {
  return `${DEFAULTS.indent}"${word}"${DEFAULTS.entrySuffix}`;
}

export function formatBlock(role: KeywordRole, words: WordList): string[] {
  return [
    `${DEFAULTS.labels[role]}: ${DEFAULTS.open}`,
    ...words.map(formatEntry),
    DEFAULTS.close
  ];
}
