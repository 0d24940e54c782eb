/**
 * General-purpose utility functions used across every module.
 * All functions are pure (no side effects, no I/O).
 */

// ---------------------------------------------------------------------------
// String utilities
// ---------------------------------------------------------------------------

/**
 * Turns an identifier slug into a display title.
 * Example: "many_aplusb" -> "Many Aplusb", "point-add-range-sum" -> "Point Add Range Sum"
 */
export function titleFromSlug(slug: string): string {
  return slug
    .split(/[-_\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

// ---------------------------------------------------------------------------
// URL utilities
// ---------------------------------------------------------------------------

/**
 * Parses a URL, accepting inputs without a scheme ("codeforces.com/contest/1").
 * Returns null for anything that is not a host-bearing URL.
 */
export function parseUrl(url: string): URL | null {
  const trimmed = url.trim();
  if (!trimmed) {
    return null;
  }
  const candidate = /^[a-z][a-z\d+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  if (!URL.canParse(candidate)) {
    return null;
  }
  const parsed = new URL(candidate);
  // "invalid" parses as https://invalid/, a host without a dot is not a judge
  return parsed.hostname.includes('.') ? parsed : null;
}

/**
 * Extracts the bare domain from a URL. Example: "https://www.example.com/path" -> "example.com"
 */
export function extractDomain(url: string): string {
  const parsed = parseUrl(url);
  if (!parsed) {
    return url;
  }
  return parsed.hostname.toLowerCase().replace(/^www\./, '');
}

/**
 * True when `host` is `domain` itself or one of its subdomains.
 */
export function hostMatches(host: string, domain: string): boolean {
  const normalised = host.toLowerCase();
  return normalised === domain || normalised.endsWith(`.${domain}`);
}
