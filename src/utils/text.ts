const SPACE_PATTERN = /\s+/g;
const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

export function normalizeWhitespace(value: string): string {
  return value.replace(SPACE_PATTERN, ' ').trim();
}

export function normalizeKeyword(value: string): string | null {
  const collapsed = normalizeWhitespace(value);
  if (!collapsed) {
    return null;
  }
  return collapsed.normalize('NFKC').toLowerCase();
}

// https://www.Example.co.uk/path -> example.co.uk
export function normalizeDomain(value: string): string {
  const trimmed = value.trim().toLowerCase().replace(SCHEME_PATTERN, '');
  const host = trimmed.split(/[/?#]/, 1)[0] ?? '';
  return host.replace(/^www\./, '').replace(/\.$/, '');
}

export function urlMatchesDomain(url: string, domain: string): boolean {
  const target = normalizeDomain(domain);
  if (!target) {
    return false;
  }
  const host = normalizeDomain(url);
  return host === target || host.endsWith(`.${target}`);
}

export function uniqueKeywords(values: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const normalized = normalizeKeyword(value);
    if (!normalized || seen.has(normalized)) {
      continue;
    }
    seen.add(normalized);
    result.push(normalized);
  }
  return result;
}
