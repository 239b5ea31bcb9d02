export interface DetectedLink {
  raw: string;
  domain: string | null;
}

const HTTP_URL_REGEX = /\b(https?:\/\/[^\s<>()]+)/gi;
const WWW_HOST_REGEX = /(^|[^\p{L}\p{N}_.\/-])(www\.[^\s<>()]+)/giu;
const SHARE_LINK_REGEX = /(^|[^\p{L}\p{N}_.\/-])((?:t\.me|telegram\.me|discord\.gg|discord\.com\/invite|vk\.me|max\.ru\/join)\/[A-Za-z0-9_-]+)/giu;

function stripTrailingPunctuation(value: string): string {
  return value.replace(/[),.!?;:]+$/g, '');
}

function normalizeUrlCandidate(rawCandidate: string): string {
  let normalized = rawCandidate.trim();
  normalized = normalized.replace(/^[<([{"'`]+/g, '');
  normalized = normalized.replace(/[>\])}"'`]+$/g, '');
  return stripTrailingPunctuation(normalized);
}

export function normalizeDomain(input: string): string | null {
  const raw = input.trim().toLowerCase().replace(/\.+$/, '');
  if (!raw) return null;

  try {
    const withProtocol = raw.includes('://') ? raw : `http://${raw}`;
    const hostname = new URL(withProtocol).hostname.toLowerCase().replace(/\.+$/, '');
    if (!hostname) return null;
    return hostname.startsWith('www.') ? hostname.slice(4) : hostname;
  } catch {
    return null;
  }
}

export function isDomainAllowed(domain: string, allowList: string[]): boolean {
  const normalizedDomain = domain.toLowerCase();
  return allowList.some((allowed) => {
    const normalizedAllowed = allowed.toLowerCase();
    return normalizedDomain === normalizedAllowed || normalizedDomain.endsWith(`.${normalizedAllowed}`);
  });
}

function canonicalKey(candidate: string): string {
  const domain = normalizeDomain(candidate);
  if (!domain) {
    return candidate.toLowerCase();
  }

  try {
    const withProtocol = candidate.includes('://') ? candidate : `http://${candidate}`;
    const parsed = new URL(withProtocol);
    const pathname = parsed.pathname === '/' ? '' : parsed.pathname;
    return `${domain}${pathname}${parsed.search}`;
  } catch {
    return `${domain}:${candidate.toLowerCase()}`;
  }
}

function collectMatches(text: string, regex: RegExp, captureIndex: number, out: string[]): void {
  regex.lastIndex = 0;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(text)) !== null) {
    const rawCandidate = match[captureIndex];
    if (!rawCandidate) continue;

    const candidate = normalizeUrlCandidate(rawCandidate);
    if (candidate) {
      out.push(candidate);
    }
  }
}

export function detectLinks(text: string): DetectedLink[] {
  const normalizedText = text.trim();
  if (!normalizedText) return [];

  const candidates: string[] = [];
  collectMatches(normalizedText, HTTP_URL_REGEX, 1, candidates);
  collectMatches(normalizedText, WWW_HOST_REGEX, 2, candidates);
  collectMatches(normalizedText, SHARE_LINK_REGEX, 2, candidates);

  const seen = new Set<string>();
  const links: DetectedLink[] = [];
  for (const raw of candidates) {
    const key = canonicalKey(raw);
    if (seen.has(key)) continue;
    seen.add(key);
    links.push({ raw, domain: normalizeDomain(raw) });
  }

  return links;
}

export function getForbiddenLinks(text: string, allowList: string[]): DetectedLink[] {
  return detectLinks(text).filter((link) => {
    if (!link.domain) return true;
    return !isDomainAllowed(link.domain, allowList);
  });
}

export function stripLinks(text: string): string {
  let stripped = text;
  for (const link of detectLinks(text)) {
    stripped = stripped.split(link.raw).join(' ');
  }
  return stripped;
}
