/** Schemes the engine will fetch. */
const ALLOWED_PROTOCOLS = ['http:', 'https:'];

/**
 * Pure syntactic check that a string is an absolute http(s) URL with a host.
 * Performs no I/O.
 */
export function isValidUrl(url: string): boolean {
  if (typeof url !== 'string' || url.trim() === '') {
    return false;
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }

  return ALLOWED_PROTOCOLS.includes(parsed.protocol) && parsed.hostname !== '';
}
