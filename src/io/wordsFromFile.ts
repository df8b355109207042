import { readFileSync } from "node:fs";
import { TextDecoder } from "node:util";
import { DEFAULTS } from "../config.js";
import type { WordList } from "../types.js";

// fatal: invalid byte sequences throw instead of becoming U+FFFD
const decoder = new TextDecoder(DEFAULTS.encoding, { fatal: true });

// Unicode whitespace plus the C0 separators U+001C-U+001F and NEL; U+FEFF is not a separator
const WHITESPACE = /[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/;

export function splitWords(text: string): WordList {
  return text.split(WHITESPACE).filter(Boolean);
}

export function wordsFromFile(path: string): WordList {
  return splitWords(decoder.decode(readFileSync(path)));
}
