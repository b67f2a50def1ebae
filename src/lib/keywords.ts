/**
 * Combines a client's base keywords with comma-separated extras typed into the form.
 *
 * Matching is case-insensitive. Base keywords keep their casing and come first; extras are
 * lower-cased and appended in the order given.
 */
export function mergeKeywords(baseKeywords: readonly string[], extraKeywords?: string | null): string[] {
  const merged: string[] = [];
  const seen = new Set<string>();

  const push = (keyword: string) => {
    const normalized = keyword.replace(/\s+/g, ' ').trim();
    if (!normalized) return;
    const key = normalized.toLowerCase();
    if (seen.has(key)) return;
    seen.add(key);
    merged.push(normalized);
  };

  baseKeywords.forEach(push);

  if (extraKeywords) {
    extraKeywords
      .split(',')
      .map((keyword) => keyword.trim().toLowerCase())
      .forEach(push);
  }

  return merged;
}
