/**
 * Resolve a documentation site's page list from its index page.
 *
 * The index HTML is parsed into a HAST tree (rehype-parse) and the
 * sidebar is walked in document order.  Every navigation item holding a
 * link becomes one `PageLink`; items without a link (part titles,
 * section headings) are skipped.  Depth is the number of lists enclosing
 * the item inside the sidebar, minus one.
 */

import { unified } from 'unified';
import rehypeParse from 'rehype-parse';
import type { Element, ElementContent, Root, RootContent } from 'hast';

import type { PageLink, TocBounds } from '../types.js';
import { fetchText, type RetryConfig } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';
import {
  defaultSelectors,
  getProperty,
  mergeSelectors,
  parseCssSelector,
  type ElementMatcher,
  type TocSelectors,
} from './selectors.js';

const logger = createLogger('toc');

type HastParent = Root | Element;

const LIST_TAGS = new Set(['ol', 'ul']);

export interface FetchTocOptions {
  selectors?: Partial<TocSelectors>;
  bounds?: TocBounds;
  retry?: Partial<RetryConfig>;
}

// ── Public API ───────────────────────────────────────────────────────

/**
 * Fetch `indexUrl` and return its page list, sliced to `bounds`.
 */
export async function fetchTocLinks(
  indexUrl: string,
  options: FetchTocOptions = {},
): Promise<PageLink[]> {
  logger.info(`Fetching table of contents from ${indexUrl}`);
  const html = await fetchText(indexUrl, options.retry);

  const links = extractTocLinks(html, indexUrl, mergeSelectors(options.selectors ?? {}));
  logger.debug(`Sidebar lists ${links.length} page(s)`);

  return sliceByTitle(links, options.bounds ?? {});
}

/**
 * Extract the ordered page list from an index page's HTML.
 *
 * @param html - Full HTML of the index page.
 * @param indexUrl - URL the HTML was fetched from; relative links resolve
 *   against it as a directory (`/docs` + `intro.html` → `/docs/intro.html`).
 * @throws Error when no element matches the sidebar selector.
 */
export function extractTocLinks(
  html: string,
  indexUrl: string,
  selectors: TocSelectors = defaultSelectors,
): PageLink[] {
  const tree: Root = unified().use(rehypeParse).parse(html);

  const sidebar = findFirst(tree, parseCssSelector(selectors.sidebar));
  if (!sidebar) {
    throw new Error(`Could not find navigation menu (selector "${selectors.sidebar}")`);
  }

  const base = directoryBase(indexUrl);
  const isItem = parseCssSelector(selectors.item);
  const seenHrefs = new Set<string>();
  const links: PageLink[] = [];

  walkSidebar(sidebar, 0, (item, listDepth) => {
    if (!isItem(item)) return;

    const anchor = findItemAnchor(item);
    if (!anchor) return;

    const href = getProperty(anchor, 'href');
    const title = collapseWhitespace(textContent(anchor));
    if (!href || !title || seenHrefs.has(href)) return;

    let url: string;
    try {
      url = new URL(href, base).href;
    } catch {
      logger.warn(`Skipping "${title}": malformed link ${href}`);
      return;
    }

    seenHrefs.add(href);
    links.push({ title, url, depth: Math.max(0, listDepth - 1) });
  });

  return links;
}

/**
 * Keep the links from the one titled `startAt` (inclusive) up to the one
 * titled `stopBefore` (exclusive).  Either bound may be omitted.
 *
 * @throws Error when a given bound matches no link.
 */
export function sliceByTitle(links: PageLink[], bounds: TocBounds): PageLink[] {
  let start = 0;
  if (bounds.startAt !== undefined) {
    start = links.findIndex((link) => link.title === bounds.startAt);
    if (start < 0) {
      throw new Error(`No page titled "${bounds.startAt}" in the table of contents`);
    }
  }

  let end = links.length;
  if (bounds.stopBefore !== undefined) {
    const stopTitle = bounds.stopBefore;
    const offset = links.slice(start).findIndex((link) => link.title === stopTitle);
    if (offset < 0) {
      throw new Error(`No page titled "${stopTitle}" in the table of contents`);
    }
    end = start + offset;
  }

  return links.slice(start, end);
}

// ── Tree walking ─────────────────────────────────────────────────────

function findFirst(node: HastParent, matcher: ElementMatcher): Element | undefined {
  for (const child of node.children) {
    if (child.type !== 'element') continue;
    if (matcher(child)) return child;

    const found = findFirst(child, matcher);
    if (found) return found;
  }
  return undefined;
}

/**
 * Visit every element below `node` in document order, with the number
 * of `<ol>`/`<ul>` lists enclosing it.
 */
function walkSidebar(
  node: Element,
  listDepth: number,
  visit: (el: Element, listDepth: number) => void,
): void {
  for (const child of node.children) {
    if (child.type !== 'element') continue;

    const childDepth = LIST_TAGS.has(child.tagName) ? listDepth + 1 : listDepth;
    visit(child, childDepth);
    walkSidebar(child, childDepth, visit);
  }
}

/**
 * First `<a href>` belonging to the item itself, not to a nested list.
 */
function findItemAnchor(item: Element): Element | undefined {
  for (const child of item.children) {
    if (child.type !== 'element' || LIST_TAGS.has(child.tagName)) continue;
    if (child.tagName === 'a' && getProperty(child, 'href')) return child;

    const nested = findItemAnchor(child);
    if (nested) return nested;
  }
  return undefined;
}

function textContent(node: RootContent | ElementContent): string {
  if (node.type === 'text') return node.value;
  if (node.type === 'element') {
    return node.children.map(textContent).join('');
  }
  return '';
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Base URL for resolving sidebar links.  A path whose last segment has
 * no extension is treated as a directory.
 */
function directoryBase(indexUrl: string): string {
  const url = new URL(indexUrl);
  const lastSegment = url.pathname.split('/').pop() ?? '';
  if (!url.pathname.endsWith('/') && !lastSegment.includes('.')) {
    url.pathname += '/';
  }
  url.search = '';
  url.hash = '';
  return url.href;
}
