const TRACKING_PARAMS = new Set([
  "gclid",
  "fbclid",
  "msclkid",
]);

/**
 * Canonical form used for dedupe and for every emitted JobRecord.
 *
 * - http is upgraded to https
 * - host is lower-cased, default ports and fragments are dropped
 * - utm_* and common click-id parameters are removed
 * - a trailing slash is dropped, except for the root path
 *
 * Returns null for anything that is not an absolute http(s) URL.
 */
export function normalizeUrl(input: string, base?: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(input.trim(), base);
  } catch {
    return null;
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return null;

  parsed.protocol = "https:";
  parsed.hash = "";
  if (parsed.port === "80" || parsed.port === "443") parsed.port = "";

  // The query is only re-serialized when a parameter is dropped.
  let stripped = false;
  for (const key of Array.from(parsed.searchParams.keys())) {
    const lower = key.toLowerCase();
    if (lower.startsWith("utm_") || TRACKING_PARAMS.has(lower)) {
      parsed.searchParams.delete(key);
      stripped = true;
    }
  }
  if (stripped || parsed.search === "") {
    const search = parsed.searchParams.toString();
    parsed.search = search ? `?${search}` : "";
  }

  if (parsed.pathname !== "/" && parsed.pathname.endsWith("/")) {
    parsed.pathname = parsed.pathname.replace(/\/+$/, "");
  }

  return parsed.href;
}
