export interface SelectArticleLinksArgs {
  pageUrl: string;
  candidates: Iterable<string>;
  /** Tested against the path (plus query) of each resolved link. */
  articlePattern?: RegExp;
  /** Hosts besides the page's own that count as the same site. */
  allowedHosts?: readonly string[];
}

/**
 * Select which links on a listing page point at articles.
 *
 * - Only http(s)
 * - Only the page's host (or an allowed alias host)
 * - Drops fragment-only differences and the listing page itself
 * - Keeps first-seen order
 */
export function selectArticleLinks({
  pageUrl,
  candidates,
  articlePattern,
  allowedHosts = [],
}: SelectArticleLinksArgs): string[] {
  const page = new URL(pageUrl);
  page.hash = "";
  const hosts = new Set([page.host, ...allowedHosts.map((host) => host.toLowerCase())]);

  const selected: string[] = [];
  const seen = new Set<string>();

  for (const u of candidates) {
    let parsed: URL;
    try {
      parsed = new URL(u, page);
    } catch {
      continue;
    }

    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") continue;
    if (!hosts.has(parsed.host)) continue;

    parsed.hash = "";
    if (parsed.href === page.href) continue;
    if (articlePattern && !articlePattern.test(parsed.pathname + parsed.search)) continue;

    if (seen.has(parsed.href)) continue;
    seen.add(parsed.href);
    selected.push(parsed.href);
  }

  return selected;
}
