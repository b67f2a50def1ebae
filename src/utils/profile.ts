import type { ClientProfile } from '../types/article';

const PROFILE_NAME_PATTERN = /^[a-z0-9_-]+$/i;

function toStringArray(value: unknown): string[] {
  const seen = new Set<string>();
  const items: string[] = [];
  const push = (entry: string | null | undefined) => {
    if (!entry) return;
    const normalized = entry.replace(/\s+/g, ' ').trim();
    if (!normalized) return;
    const key = normalized.toLowerCase();
    if (seen.has(key)) return;
    seen.add(key);
    items.push(normalized);
  };

  if (Array.isArray(value)) {
    for (const item of value) {
      if (typeof item === 'string') {
        push(item);
      } else if (item != null) {
        push(String(item));
      }
    }
    return items;
  }

  if (typeof value === 'string') {
    value
      .split(/[,\n]/)
      .map((part) => part.trim())
      .filter(Boolean)
      .forEach(push);
  }

  return items;
}

export function isValidProfileName(name: string): boolean {
  return PROFILE_NAME_PATTERN.test(name);
}

export function normalizeClientProfile(raw: unknown, fallbackName: string): ClientProfile {
  const source: Record<string, unknown> = raw && typeof raw === 'object' && !Array.isArray(raw) ? { ...raw } : {};

  return {
    name: typeof source.name === 'string' && source.name.trim() ? source.name.trim() : fallbackName,
    tone: typeof source.tone === 'string' ? source.tone.trim() : '',
    baseKeywords: toStringArray(source.keywords ?? source.baseKeywords ?? source.base_keywords),
  };
}
