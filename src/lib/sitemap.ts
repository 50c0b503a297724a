export interface SitemapEntry {
  loc: string;
  lastmod?: string;
  imageLoc?: string;
}

const XML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&apos;": "'",
};

function decodeXmlText(value: string): string {
  return value
    .trim()
    .replace(/^<!\[CDATA\[([\s\S]*)\]\]>$/, "$1")
    .replace(/&(?:amp|lt|gt|quot|apos);/g, (entity) => XML_ENTITIES[entity] ?? entity);
}

function firstTagText(block: string, tag: string): string | undefined {
  const match = block.match(new RegExp(`<${tag}>([^<]+|<!\\[CDATA\\[[\\s\\S]*?\\]\\]>)</${tag}>`, "i"));
  if (!match) return undefined;
  const text = decodeXmlText(match[1]);
  return text || undefined;
}

export function extractSitemapUrlsFromRobotsTxt(robotsTxt: string): string[] {
  const sitemapUrls: string[] = [];

  for (const line of robotsTxt.split("\n")) {
    const match = line.match(/^Sitemap:\s*(.+)$/i);
    if (match) sitemapUrls.push(match[1].trim());
  }

  return sitemapUrls;
}

export function extractSitemapEntriesFromXml(xml: string): {
  childSitemaps: string[];
  entries: SitemapEntry[];
} {
  // Sitemap index
  const childSitemaps: string[] = [];
  for (const match of xml.matchAll(/<sitemap>([\s\S]*?)<\/sitemap>/gi)) {
    const loc = firstTagText(match[1], "loc");
    if (loc) childSitemaps.push(loc);
  }

  if (childSitemaps.length > 0) {
    return { childSitemaps, entries: [] };
  }

  const entries: SitemapEntry[] = [];
  for (const match of xml.matchAll(/<url>([\s\S]*?)<\/url>/gi)) {
    const block = match[1];
    const loc = firstTagText(block, "loc");
    if (!loc) continue;

    const entry: SitemapEntry = { loc };
    const lastmod = firstTagText(block, "lastmod");
    if (lastmod) entry.lastmod = lastmod;
    const imageLoc = firstTagText(block, "image:loc");
    if (imageLoc) entry.imageLoc = imageLoc;
    entries.push(entry);
  }

  return { childSitemaps: [], entries };
}
