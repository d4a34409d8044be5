import { join } from 'node:path';

import type { PageLink, RenderJob } from '../types.js';

/**
 * Remove characters that are invalid in file names on common platforms.
 *
 * Examples:
 *   "Getting Started"      → "Getting Started"
 *   "C/C++ Support"        → "CC++ Support"
 *   "What's new? <beta>"   → "What's new beta"
 */
export function sanitizeFilename(name: string): string {
  return name.replace(/[<>:"/\\|?*]/g, '');
}

/**
 * File name of the PDF rendered for the page at `position` (1-based),
 * e.g. `007. Key Bindings.pdf`.  The numeric prefix keeps directory
 * listings in page-list order.
 */
export function pagePdfFilename(position: number, title: string): string {
  return `${String(position).padStart(3, '0')}. ${sanitizeFilename(title)}.pdf`;
}

/**
 * Pair every link with the file it renders to inside `outputDir`.
 */
export function planRenderJobs(links: PageLink[], outputDir: string): RenderJob[] {
  return links.map((link, index) => ({
    link,
    position: index + 1,
    outputPath: join(outputDir, pagePdfFilename(index + 1, link.title)),
  }));
}

/**
 * Default file name of the merged document for a given title.
 */
export function mergedPdfFilename(title: string): string {
  const cleaned = sanitizeFilename(title).trim();
  return `${cleaned || 'merged'}.pdf`;
}
