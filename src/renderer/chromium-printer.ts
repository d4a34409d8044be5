/**
 * Playwright-backed `PagePrinter`.
 *
 * One headless Chromium is launched for the whole run; each URL gets a
 * fresh page that loads, receives the print stylesheet and is printed
 * with the configured paper format and margins.
 *
 * Playwright is loaded with a dynamic `import('playwright')` so that the
 * merge engine and resolver can be used without a browser installed.
 */

import type { Browser } from 'playwright';

import type { RenderSettings } from '../types.js';
import { createLogger } from '../utils/logger.js';
import type { PagePrinter } from './page-renderer.js';

const logger = createLogger('render');

export type PrinterSettings = Omit<RenderSettings, 'overwrite'>;

export async function createChromiumPrinter(settings: PrinterSettings): Promise<PagePrinter> {
  const { chromium } = await import('playwright');
  const browser: Browser = await chromium.launch({ headless: true });
  logger.debug(`Launched Chromium ${browser.version()}`);

  return {
    async print(url: string, outputPath: string): Promise<void> {
      const page = await browser.newPage();
      try {
        await page.goto(url, { waitUntil: settings.waitUntil, timeout: settings.timeoutMs });

        if (settings.customCss.trim()) {
          await page.addStyleTag({ content: settings.customCss });
        }

        await page.pdf({
          path: outputPath,
          format: settings.format,
          margin: settings.margin,
          printBackground: settings.printBackground,
        });
      } finally {
        await page.close();
      }
    },

    async close(): Promise<void> {
      await browser.close();
    },
  };
}
