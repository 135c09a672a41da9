const WRAPPED_BASE64_PARAM = "u";
const WRAPPED_PERCENT_PARAM = "uddg";

/**
 * Resolves a search-engine redirect wrapper to the destination it carries.
 *
 * `?u=` holds a base64 (or base64url) encoded URL, optionally behind an
 * `a1` marker; `?uddg=` holds a percent-encoded one. The decoded value is
 * used only when it is an absolute http(s) URL; anything else returns
 * `url` unchanged. Never throws.
 */
export function canonicalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  const percentEncoded = parsed.searchParams.get(WRAPPED_PERCENT_PARAM);
  if (percentEncoded && isAbsoluteHttpUrl(percentEncoded)) {
    return percentEncoded;
  }

  const encoded = parsed.searchParams.get(WRAPPED_BASE64_PARAM);
  if (!encoded) {
    return url;
  }

  for (const candidate of base64Candidates(encoded)) {
    const decoded = decodeBase64(candidate);
    if (decoded && isAbsoluteHttpUrl(decoded)) {
      return decoded;
    }
  }
  return url;
}

/**
 * Canonicalizes every URL and keeps the first occurrence of each, in
 * discovery order.
 */
export function dedupeUrls(urls: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const url of urls) {
    const canonical = canonicalizeUrl(url);
    if (seen.has(canonical)) {
      continue;
    }
    seen.add(canonical);
    out.push(canonical);
  }
  return out;
}

export function isAbsoluteHttpUrl(value: string): boolean {
  if (!/^https?:\/\//i.test(value) || /\s/.test(value)) {
    return false;
  }
  try {
    const parsed = new URL(value);
    return (parsed.protocol === "http:" || parsed.protocol === "https:") && parsed.hostname.length > 0;
  } catch {
    return false;
  }
}

function base64Candidates(encoded: string): string[] {
  const candidates = [encoded];
  if (encoded.startsWith("a1")) {
    candidates.push(encoded.slice(2));
  }
  return candidates;
}

function decodeBase64(value: string): string | undefined {
  const normalized = value.replace(/ /g, "+").replace(/-/g, "+").replace(/_/g, "/");
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(normalized)) {
    return undefined;
  }
  const padded = normalized.padEnd(normalized.length + ((4 - (normalized.length % 4)) % 4), "=");
  const decoded = Buffer.from(padded, "base64").toString("utf-8");
  if (decoded.includes("�")) {
    return undefined;
  }
  return decoded;
}
