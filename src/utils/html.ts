import { JSDOM } from 'jsdom';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

const SKIP_TAGS = new Set(['script', 'style', 'noscript', 'template', 'svg', 'iframe']);

const BLOCK_TAGS = new Set([
  'address',
  'article',
  'aside',
  'br',
  'dd',
  'div',
  'dl',
  'dt',
  'footer',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'header',
  'hr',
  'li',
  'nav',
  'ol',
  'p',
  'section',
  'table',
  'tbody',
  'thead',
  'tr',
  'ul',
]);

const CELL_TAGS = new Set(['td', 'th']);

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function parseHtml(html: string, url?: string): Document {
  if (url) {
    try {
      return new JSDOM(html, { url }).window.document;
    } catch {
      // unparseable base URL; relative links then stay unresolved
    }
  }
  return new JSDOM(html).window.document;
}

/**
 * Visible text with block boundaries kept as newlines, one trimmed line per
 * block. Table cells on one row stay on one line.
 */
export function blockText(node: Node): string {
  const parts: string[] = [];

  const walk = (current: Node) => {
    if (current.nodeType === TEXT_NODE) {
      parts.push(current.textContent ?? '');
      return;
    }
    if (!isElement(current)) return;
    const tag = current.tagName.toLowerCase();
    if (SKIP_TAGS.has(tag)) return;
    const separator = BLOCK_TAGS.has(tag) ? '\n' : CELL_TAGS.has(tag) ? ' ' : '';
    parts.push(separator);
    current.childNodes.forEach(walk);
    parts.push(separator);
  };

  walk(node);

  return parts
    .join('')
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter(Boolean)
    .join('\n');
}

export function flatText(node: Node): string {
  return blockText(node).replace(/\n/g, ' ');
}

/** Text of a node whose only descendant chain ends in one text node, else null. */
export function singleString(node: Node): string | null {
  if (node.nodeType === TEXT_NODE) return node.textContent;
  if (node.childNodes.length !== 1 || !node.firstChild) return null;
  return singleString(node.firstChild);
}

function firstWithMarker(doc: Document, tag: string, marker: string): Element | null {
  for (const el of Array.from(doc.querySelectorAll(tag))) {
    const cls = (el.getAttribute('class') ?? '').toLowerCase();
    const id = (el.getAttribute('id') ?? '').toLowerCase();
    if (cls.includes(marker) || id.includes(marker)) return el;
  }
  return null;
}

export function findFooter(doc: Document): Element | null {
  return doc.querySelector('footer') ?? firstWithMarker(doc, 'div', 'footer');
}

export function findHeader(doc: Document): Element | null {
  return (
    doc.querySelector('header') ?? firstWithMarker(doc, 'div', 'header') ?? doc.querySelector('nav')
  );
}

export function pageTitle(doc: Document): string | null {
  const title = doc.title.replace(/\s+/g, ' ').trim();
  return title || null;
}

export type PageLink = {
  href: string;
  /** Absolute http(s) URL, or null when the href does not resolve to one. */
  absolute: string | null;
  text: string;
  className: string;
};

export function collectLinks(doc: Document, baseUrl: string): PageLink[] {
  const links: PageLink[] = [];
  for (const anchor of Array.from(doc.querySelectorAll('a[href]'))) {
    const href = (anchor.getAttribute('href') ?? '').trim();
    if (!href) continue;
    links.push({
      href,
      absolute: resolveHttpUrl(href, baseUrl),
      text: flatText(anchor),
      className: anchor.getAttribute('class') ?? '',
    });
  }
  return links;
}

export function resolveHttpUrl(href: string, baseUrl: string): string | null {
  try {
    const url = new URL(href, baseUrl);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
    return url.toString();
  } catch {
    return null;
  }
}
