import { readFileSync } from 'node:fs';

/**
 * A cookie-jar entry, as read from a Netscape-format cookie file.
 */
export interface Cookie {
  domain: string;
  includeSubdomains: boolean;
  path: string;
  secure: boolean;
  /** Unix seconds; 0 marks a session cookie. */
  expiry: number;
  name: string;
  value: string;
}

/**
 * Load cookies from a Netscape-format cookie file.
 *
 * Format: domain\tTRUE\tpath\tTRUE\texpiry\tname\tvalue
 * Lines starting with '#' or blank lines are ignored, except for the
 * `#HttpOnly_` prefix curl writes in front of HttpOnly cookies.
 *
 * @param filePath - Path to the cookie file
 * @returns Array of parsed cookies
 */
export function loadCookieFile(filePath: string): Cookie[] {
  return parseCookieFile(readFileSync(filePath, 'utf-8'));
}

/**
 * Parse the contents of a Netscape-format cookie file.
 */
export function parseCookieFile(content: string): Cookie[] {
  const cookies: Cookie[] = [];

  for (const line of content.split('\n')) {
    let trimmed = line.trim();
    if (trimmed.startsWith('#HttpOnly_')) {
      trimmed = trimmed.slice('#HttpOnly_'.length);
    }

    if (trimmed === '' || trimmed.startsWith('#')) {
      continue;
    }

    const fields = trimmed.split('\t');
    if (fields.length < 7) {
      continue;
    }
    const [domain, includeSubdomains, path, secure, expiry, name, value] = fields;

    cookies.push({
      domain,
      includeSubdomains: includeSubdomains.toUpperCase() === 'TRUE',
      path,
      secure: secure.toUpperCase() === 'TRUE',
      expiry: parseInt(expiry, 10) || 0,
      name,
      value,
    });
  }

  return cookies;
}

/**
 * Select the jar entries that apply to a request URL.
 *
 * @param cookies - Parsed cookies from loadCookieFile
 * @param url - The request URL to match against
 * @param now - Unix seconds used for the expiry check
 */
export function matchCookies(
  cookies: readonly Cookie[],
  url: string,
  now: number = Math.floor(Date.now() / 1000),
): Cookie[] {
  const parsed = new URL(url);
  const isSecure = parsed.protocol === 'https:';

  return cookies.filter((cookie) => {
    if (!domainMatches(parsed.hostname, cookie.domain, cookie.includeSubdomains)) {
      return false;
    }
    if (!parsed.pathname.startsWith(cookie.path)) {
      return false;
    }
    if (cookie.secure && !isSecure) {
      return false;
    }
    // Session cookies never expire
    return cookie.expiry === 0 || cookie.expiry >= now;
  });
}

/**
 * Build the `Cookie` request header for a URL from explicit name/value
 * pairs plus the jar entries that apply to it. Explicit pairs win over
 * jar entries of the same name.
 *
 * @returns The header value (e.g. "a=1; b=2"), or undefined when empty
 */
export function buildCookieHeader(
  url: string,
  cookies?: Readonly<Record<string, string>>,
  jar?: readonly Cookie[],
): string | undefined {
  const pairs = new Map<string, string>();

  for (const cookie of jar ? matchCookies(jar, url) : []) {
    pairs.set(cookie.name, cookie.value);
  }
  for (const [name, value] of Object.entries(cookies ?? {})) {
    pairs.set(name, value);
  }

  if (pairs.size === 0) {
    return undefined;
  }
  return [...pairs].map(([name, value]) => `${name}=${value}`).join('; ');
}

/**
 * Check if a hostname matches a cookie domain.
 */
function domainMatches(
  hostname: string,
  cookieDomain: string,
  includeSubdomains: boolean,
): boolean {
  const domain = cookieDomain.startsWith('.')
    ? cookieDomain.substring(1)
    : cookieDomain;

  if (hostname === domain) {
    return true;
  }

  return includeSubdomains && hostname.endsWith('.' + domain);
}
