// A URL scheme: a letter followed by letters, digits, "+", "-" or ".", then ":"
const SCHEME = /^([A-Za-z][A-Za-z0-9+.-]*):/;
// "localhost:5000/path" looks like scheme "localhost" to the regex above,
// but a run of digits after the colon is a port, not the rest of a URL.
const HOST_WITH_PORT = /^[^:/?#]+:\d+(?:[/?#]|$)/;

const ALLOWED_SCHEMES = new Set(["http", "https"]);

// Takes user input like "example.com" or "https://example.com/page" and
// returns the absolute URL to store, or "" when the input is not acceptable.
// The accepted string is returned as typed (plus "https://" when no scheme was
// given), so normalizing an already-normalized URL gives the same string back.
export function normalizeUrl(raw: string): string {
  let cleaned = raw.trim();
  if (!cleaned || /\s/.test(cleaned)) {
    return "";
  }

  if (!SCHEME.test(cleaned) || HOST_WITH_PORT.test(cleaned)) {
    cleaned = `https://${cleaned}`;
  }

  const scheme = SCHEME.exec(cleaned)?.[1].toLowerCase();
  if (!scheme || !ALLOWED_SCHEMES.has(scheme)) {
    return "";
  }

  // Network location: everything between "//" and the first "/", "?" or "#"
  const rest = cleaned.slice(scheme.length + 1);
  if (!rest.startsWith("//")) {
    return "";
  }
  const netloc = rest.slice(2).split(/[/?#]/, 1)[0];
  if (!netloc) {
    return "";
  }

  try {
    new URL(cleaned);
  } catch {
    return "";
  }

  return cleaned;
}
