import { afterEach, describe, it, expect, vi } from 'vitest';
import { extractTocLinks, fetchTocLinks, sliceByTitle } from '../scraper/toc-extractor.js';
import type { PageLink } from '../types.js';

const SIDEBAR_HTML = `<!DOCTYPE html>
<html>
<body>
<nav id="sidebar" class="sidebar">
  <div class="sidebar-scrollbox">
    <ol class="chapter">
      <li class="chapter-item expanded"><a href="getting-started.html">Getting   Started</a></li>
      <li class="part-title">Configuration</li>
      <li class="chapter-item expanded"><a href="configuring.html"><strong aria-hidden="true">2.</strong> Configuring</a>
        <a class="toggle"><div>❱</div></a>
      </li>
      <li>
        <ol class="section">
          <li class="chapter-item"><a href="themes.html">Themes</a></li>
          <li class="chapter-item"><a href="key-bindings.html">Key Bindings</a></li>
          <li>
            <ol class="section">
              <li class="chapter-item"><a href="vim.html">Vim Mode</a></li>
            </ol>
          </li>
        </ol>
      </li>
      <li class="chapter-item"><a href="themes.html">Themes (again)</a></li>
      <li class="chapter-item"><a href="">Empty href</a></li>
      <li class="chapter-item"><a href="blank.html">   </a></li>
      <li class="chapter-item"><a href="https://example.org/external">External</a></li>
      <li class="chapter-item"><a href="developing.html">Developing</a></li>
    </ol>
  </div>
</nav>
<main><a class="chapter-item" href="body-link.html">Not in sidebar</a></main>
</body>
</html>`;

function titles(links: PageLink[]): string[] {
  return links.map((l) => l.title);
}

describe('toc-extractor', () => {
  it('should list linked sidebar items in order with nesting depth', () => {
    const links = extractTocLinks(SIDEBAR_HTML, 'https://docs.example.com/docs');

    expect(links).toEqual([
      { title: 'Getting Started', url: 'https://docs.example.com/docs/getting-started.html', depth: 0 },
      { title: '2. Configuring', url: 'https://docs.example.com/docs/configuring.html', depth: 0 },
      { title: 'Themes', url: 'https://docs.example.com/docs/themes.html', depth: 1 },
      { title: 'Key Bindings', url: 'https://docs.example.com/docs/key-bindings.html', depth: 1 },
      { title: 'Vim Mode', url: 'https://docs.example.com/docs/vim.html', depth: 2 },
      { title: 'External', url: 'https://example.org/external', depth: 0 },
      { title: 'Developing', url: 'https://docs.example.com/docs/developing.html', depth: 0 },
    ]);
  });

  it('should resolve links beside an index file rather than below it', () => {
    const links = extractTocLinks(SIDEBAR_HTML, 'https://docs.example.com/docs/index.html');
    expect(links[0].url).toBe('https://docs.example.com/docs/getting-started.html');
  });

  it('should honour custom selectors', () => {
    const html = `<aside data-nav="docs"><ul>
      <li class="entry"><a href="/a">A</a><ul><li class="entry"><a href="/b">B</a></li></ul></li>
    </ul></aside>`;
    const links = extractTocLinks(html, 'https://site.test/', {
      sidebar: 'aside[data-nav="docs"]',
      item: 'li.entry',
    });
    expect(links).toEqual([
      { title: 'A', url: 'https://site.test/a', depth: 0 },
      { title: 'B', url: 'https://site.test/b', depth: 1 },
    ]);
  });

  it('should throw when the sidebar is missing', () => {
    expect(() => extractTocLinks('<html><body></body></html>', 'https://x.test/')).toThrow(
      'Could not find navigation menu (selector "#sidebar")',
    );
  });
});

describe('sliceByTitle', () => {
  const links: PageLink[] = ['Intro', 'Getting Started', 'Config', 'Developing', 'Licenses'].map(
    (title, i) => ({ title, url: `https://x.test/${i}`, depth: 0 }),
  );

  it('should keep everything without bounds', () => {
    expect(sliceByTitle(links, {})).toEqual(links);
  });

  it('should start inclusive and stop exclusive', () => {
    expect(titles(sliceByTitle(links, { startAt: 'Getting Started', stopBefore: 'Developing' }))).toEqual([
      'Getting Started',
      'Config',
    ]);
  });

  it('should throw for an unknown bound', () => {
    expect(() => sliceByTitle(links, { startAt: 'Nope' })).toThrow(
      'No page titled "Nope" in the table of contents',
    );
    expect(() => sliceByTitle(links, { startAt: 'Config', stopBefore: 'Intro' })).toThrow(
      'No page titled "Intro" in the table of contents',
    );
  });
});

describe('fetchTocLinks', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should fetch the index page and apply bounds', async () => {
    const fetchMock = vi.fn(async () => new Response(SIDEBAR_HTML, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const links = await fetchTocLinks('https://docs.example.com/docs', {
      bounds: { startAt: 'Themes', stopBefore: 'Developing' },
    });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(titles(links)).toEqual(['Themes', 'Key Bindings', 'Vim Mode', 'External']);
  });

  it('should fail on a non-success response', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('gone', { status: 404 })));

    await expect(fetchTocLinks('https://docs.example.com/docs')).rejects.toThrow(
      'GET https://docs.example.com/docs failed: HTTP 404',
    );
  });
});
