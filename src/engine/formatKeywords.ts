import { DEFAULTS } from "../config.js";
import { wordsFromFile } from "../io/wordsFromFile.js";
import { formatBlock } from "./keywordBlock.js";
import type { KeywordSource } from "../types.js";

export type Printer = (line: string) => void;

/**
 * Reads every source before printing anything: a failing secondary file
 * leaves stdout empty.
 */
export function formatKeywords(
  primaryPath: string,
  secondaryPath: string,
  print: Printer = console.log
): void {
  const sources: KeywordSource[] = [
    { role: "primary", path: primaryPath },
    { role: "secondary", path: secondaryPath }
  ];
  const lists = sources.map(({ role, path }) => ({ role, words: wordsFromFile(path) }));

  for (const { role, words } of lists) {
    formatBlock(role, words).forEach(line => print(line));
  }
  print(DEFAULTS.doneMessage);
}
