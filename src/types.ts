export type KeywordRole = "primary" | "secondary";

export type WordList = string[];

export type KeywordSource = {
  role: KeywordRole;
  path: string;
};
