import { DocumentFormatError } from '../errors.js';

export interface Anchor {
  href: string;
  text: string;
}

const ANCHOR_PATTERN = /<a\b([^>]*)>([\s\S]*?)<\/a\s*>/gi;
const HREF_PATTERN = /\bhref\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/i;

function decodeHtmlEntities(value: string): string {
  return value
    .replace(/&nbsp;/g, ' ')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&#(\d+);/g, (match, decimal: string) => {
      const codepoint = Number(decimal);
      return Number.isFinite(codepoint) ? String.fromCodePoint(codepoint) : match;
    })
    .replace(/&#x([0-9a-fA-F]+);/g, (match, hex: string) => {
      const codepoint = Number.parseInt(hex, 16);
      return Number.isFinite(codepoint) ? String.fromCodePoint(codepoint) : match;
    })
    .replace(/&amp;/g, '&');
}

function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Every `<a href>` on a page, in document order, with hrefs resolved against `baseUrl`.
 * Anchors whose href cannot form a URL are left out.
 */
export function extractAnchors(html: string, baseUrl: string): Anchor[] {
  const anchors: Anchor[] = [];

  for (const match of html.matchAll(ANCHOR_PATTERN)) {
    const hrefMatch = match[1].match(HREF_PATTERN);
    if (!hrefMatch) {
      continue;
    }
    const rawHref = decodeHtmlEntities((hrefMatch[1] ?? hrefMatch[2] ?? hrefMatch[3] ?? '').trim());
    if (rawHref.length === 0 || rawHref.startsWith('#') || /^(?:javascript|mailto):/i.test(rawHref)) {
      continue;
    }
    const href = resolveUrl(rawHref, baseUrl);
    if (!href) {
      continue;
    }
    const text = decodeHtmlEntities(match[2].replace(/<[^>]+>/g, ' ')).replace(/\s+/g, ' ').trim();
    anchors.push({ href, text });
  }

  return anchors;
}

/** First anchor whose href mentions XML. */
export function findUnXmlLink(html: string, baseUrl: string): string {
  const anchor = extractAnchors(html, baseUrl).find((candidate) => candidate.href.toLowerCase().includes('xml'));
  if (!anchor) {
    throw new DocumentFormatError(`no XML link found on ${baseUrl}`);
  }
  return anchor.href;
}

/** First anchor pointing at the ministry list PDF, skipping the XML rendition that shares its name. */
export function findKdnPdfLink(html: string, baseUrl: string): string {
  const anchor = extractAnchors(html, baseUrl).find(({ href }) => {
    const path = href.split(/[?#]/)[0];
    return href.includes('SENARAI_KDN') && href.includes('.pdf') && !path.endsWith('.xml');
  });
  if (!anchor) {
    throw new DocumentFormatError(`no list PDF link found on ${baseUrl}`);
  }
  return anchor.href;
}
