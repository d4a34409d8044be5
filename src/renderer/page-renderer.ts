import { access } from 'node:fs/promises';

import type { RenderJob, RenderOutcome } from '../types.js';
import { createLogger, describeError } from '../utils/logger.js';

const logger = createLogger('render');

/**
 * Prints one URL to a PDF file.  Backed by Chromium in production
 * (see `createChromiumPrinter`).
 */
export interface PagePrinter {
  print(url: string, outputPath: string): Promise<void>;
  close(): Promise<void>;
}

export interface RenderPagesOptions {
  /** Re-render pages whose PDF already exists.  Default: false. */
  overwrite?: boolean;
  /** Called after each job settles. */
  onProgress?: (outcome: RenderOutcome, done: number, total: number) => void;
}

/**
 * Render every job in order through `printer`.
 *
 * Existing files are kept unless `overwrite` is set.  A page that fails
 * to render is logged and reported as `failed`; the remaining pages are
 * still rendered.
 */
export async function renderPages(
  jobs: RenderJob[],
  printer: PagePrinter,
  options: RenderPagesOptions = {},
): Promise<RenderOutcome[]> {
  const outcomes: RenderOutcome[] = [];

  for (const job of jobs) {
    const label = `[${job.position}/${jobs.length}] ${job.link.title}`;
    let outcome: RenderOutcome;

    if (!options.overwrite && (await fileExists(job.outputPath))) {
      logger.debug(`${label}: skipped, ${job.outputPath} already exists`);
      outcome = { job, status: 'skipped' };
    } else {
      logger.debug(`${label}: ${job.link.url} -> ${job.outputPath}`);
      try {
        await printer.print(job.link.url, job.outputPath);
        outcome = { job, status: 'rendered' };
      } catch (error: unknown) {
        const message = describeError(error);
        logger.warn(`${label}: ${message}`);
        outcome = { job, status: 'failed', error: message };
      }
    }

    outcomes.push(outcome);
    options.onProgress?.(outcome, outcomes.length, jobs.length);
  }

  return outcomes;
}

/**
 * Tally outcomes by status.
 */
export function summarizeOutcomes(
  outcomes: RenderOutcome[],
): Record<RenderOutcome['status'], number> {
  const summary = { rendered: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) {
    summary[outcome.status]++;
  }
  return summary;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
