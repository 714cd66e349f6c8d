// A hyphenated key may carry digits anywhere after the first letter of its project key ("AB2-7").
// Without a hyphen the project key must end in a letter, so "ABC123" reads as ABC-123.
const ISSUE_KEY_PATTERN = /\b(?:([A-Z][A-Z0-9]+)-(\d+)|([A-Z][A-Z0-9]*[A-Z])\s?(\d+))\b/gi;

export function normalizeKeyPrefixes(prefixes: readonly string[]): Set<string> {
  return new Set(prefixes.map((prefix) => prefix.trim().toUpperCase()).filter(Boolean));
}

/**
 * Finds issue keys such as `ABC-123`, `abc 123` or `ABC123` in free text.
 * Keys come back upper-cased, hyphenated and de-duplicated in order of first appearance.
 */
export function extractIssueKeys(text: string | null | undefined, allowedPrefixes: readonly string[] = []): string[] {
  if (!text) return [];
  const allowed = normalizeKeyPrefixes(allowedPrefixes);

  const keys: string[] = [];
  const seen = new Set<string>();
  for (const match of text.matchAll(ISSUE_KEY_PATTERN)) {
    const prefix = (match[1] ?? match[3] ?? '').toUpperCase();
    const digits = match[2] ?? match[4] ?? '';
    if (!prefix || !digits) continue;
    if (allowed.size > 0 && !allowed.has(prefix)) continue;
    const key = `${prefix}-${digits}`;
    if (seen.has(key)) continue;
    seen.add(key);
    keys.push(key);
  }
  return keys;
}

/** Scans each text on its own so no key spans two of them; merged in order without duplicates. */
export function extractIssueKeysFromTexts(
  texts: readonly (string | null | undefined)[],
  allowedPrefixes: readonly string[] = [],
): string[] {
  const keys: string[] = [];
  for (const text of texts) {
    for (const key of extractIssueKeys(text, allowedPrefixes)) {
      if (!keys.includes(key)) keys.push(key);
    }
  }
  return keys;
}

export function projectKeyOf(issueKey: string): string {
  const idx = issueKey.lastIndexOf('-');
  return idx > 0 ? issueKey.slice(0, idx) : issueKey;
}
