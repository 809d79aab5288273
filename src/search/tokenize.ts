const TOKEN_RE = /[a-z0-9]+/g;

/**
 * Lowercase, then take runs of ASCII letters and digits at least `minLength` long
 */
export function tokenize(text: string, minLength: number): string[] {
  if (!text) {
    return [];
  }
  const matches = text.toLowerCase().match(TOKEN_RE) ?? [];
  return matches.filter((token) => token.length >= minLength);
}

export function countTokens(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}
