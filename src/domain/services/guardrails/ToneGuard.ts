const SHAMING_PATTERNS: readonly RegExp[] = [
  /\byou(?:'|’)?re overspending\b/i,
  /\bbad financial habits?\b/i,
  /\birresponsible\b/i,
  /\bcareless\b/i,
  /\bwasting money\b/i,
  /\bpoor choices?\b/i,
  /\bfinancial mistakes?\b/i,
  /\bbad decisions?\b/i,
  /\bfoolish\b/i,
  /\bstupid\b/i,
  /\breckless\b/i,
];

/** Returns each shaming phrase found, lower-cased, in pattern order. */
export const findShamingLanguage = (texts: readonly string[]): string[] => {
  const found: string[] = [];

  for (const pattern of SHAMING_PATTERNS) {
    for (const text of texts) {
      const match = pattern.exec(text);
      if (match) {
        found.push(match[0].toLowerCase());
        break;
      }
    }
  }

  return found;
};
