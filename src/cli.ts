#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { readFile, mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import { fetchTocLinks } from './scraper/toc-extractor.js';
import { createChromiumPrinter } from './renderer/chromium-printer.js';
import { renderPages, summarizeOutcomes } from './renderer/page-renderer.js';
import { mergedPdfFilename, planRenderJobs } from './output/file-naming.js';
import { mergeToFile } from './output/pdf-writer.js';
import { readOutline } from './merge/outline-writer.js';
import { countOutlineNodes } from './merge/outline-builder.js';
import { logger, createSpinner, setVerbose, describeError } from './utils/logger.js';
import { loadConfig } from './utils/config.js';
import type { DocumentEntry, ExportConfig, RenderJob, RenderOutcome } from './types.js';

// ─── CLI setup ───────────────────────────────────────────────────────

const program = new Command();

program
  .name('docs-to-pdf')
  .description('Render a documentation site page by page and merge it into one bookmarked PDF')
  .version('1.0.0')
  .option('--url <url>', 'Documentation index URL whose sidebar lists the pages')
  .option('--output-dir <path>', 'Directory for the per-page PDFs')
  .option('--output <file>', 'Path of the merged PDF')
  .option('--title <title>', 'Title of the merged document')
  .option('--config <path>', 'Path to a docs-to-pdf.json config file')
  .option('--css <file>', 'Print stylesheet injected into every page')
  .option('--start-at <title>', 'First page to include (by sidebar title)')
  .option('--stop-before <title>', 'First page to leave out (by sidebar title)')
  .option('--overwrite', 'Re-render pages whose PDF already exists')
  .option('--no-merge', 'Only render the per-page PDFs')
  .option('--verbose', 'Enable debug logging');

interface CliOptions {
  url?: string;
  outputDir?: string;
  output?: string;
  title?: string;
  config?: string;
  css?: string;
  startAt?: string;
  stopBefore?: string;
  overwrite?: boolean;
  merge: boolean; // commander stores --no-merge as opts.merge = false
  verbose?: boolean;
}

program.action(async (opts: CliOptions) => {
  try {
    await run(opts);
  } catch (error: unknown) {
    logger.error(describeError(error));
    if (error instanceof Error && error.stack && opts.verbose) {
      logger.debug(error.stack);
    }
    process.exitCode = 1;
  }
});

await program.parseAsync();

// ─── Pipeline ────────────────────────────────────────────────────────

async function run(opts: CliOptions): Promise<void> {
  if (opts.verbose) {
    setVerbose(true);
  }

  const config = await resolveConfig(opts);
  if (!config.url) {
    throw new Error('A documentation URL is required: pass --url or set DOCS_TO_PDF_URL');
  }

  const outputDir = resolve(config.outputDir);
  logger.debug(`Resolved config: ${JSON.stringify({ ...config, render: { ...config.render, customCss: '…' } }, null, 2)}`);

  // ── Page list ──────────────────────────────────────────────────────
  const links = await fetchTocLinks(config.url, {
    selectors: config.toc.selectors,
    bounds: { startAt: config.toc.startAt, stopBefore: config.toc.stopBefore },
  });
  if (links.length === 0) {
    throw new Error(`No pages found in the sidebar of ${config.url}`);
  }
  logger.info(`Found ${links.length} page(s)`);

  // ── Render ─────────────────────────────────────────────────────────
  await mkdir(outputDir, { recursive: true });
  const jobs = planRenderJobs(links, outputDir);
  await renderAll(jobs, config);

  if (!config.merge) {
    logger.success(`All PDFs saved to ${outputDir}`);
    return;
  }

  // ── Merge ──────────────────────────────────────────────────────────
  const destination = resolve(config.output ?? join(outputDir, '..', mergedPdfFilename(config.title)));
  await mergeAll(jobs, destination, config.title);
}

async function resolveConfig(opts: CliOptions): Promise<ExportConfig> {
  const customCss = opts.css ? await readFile(resolve(opts.css), 'utf-8') : undefined;

  return loadConfig(opts.config, {
    url: opts.url ?? process.env.DOCS_TO_PDF_URL,
    outputDir: opts.outputDir,
    output: opts.output,
    title: opts.title,
    toc: { startAt: opts.startAt, stopBefore: opts.stopBefore },
    render: { customCss, overwrite: opts.overwrite },
    // Only an explicit --no-merge overrides the file value.
    merge: opts.merge === false ? false : undefined,
  });
}

async function renderAll(jobs: RenderJob[], config: ExportConfig): Promise<void> {
  const printer = await createChromiumPrinter(config.render);
  const spinner = createSpinner(`Rendering ${jobs.length} page(s)`).start();

  let outcomes: RenderOutcome[];
  try {
    outcomes = await renderPages(jobs, printer, {
      overwrite: config.render.overwrite,
      onProgress: (outcome, done, total) => {
        spinner.text = `Rendering [${done}/${total}] ${outcome.job.link.title}`;
      },
    });
  } catch (error: unknown) {
    spinner.fail('Rendering failed');
    throw error;
  } finally {
    await printer.close();
  }

  const summary = summarizeOutcomes(outcomes);
  const line =
    `${chalk.green(summary.rendered)} rendered, ` +
    `${chalk.gray(summary.skipped)} skipped (already exist), ` +
    `${chalk.red(summary.failed)} failed`;

  if (summary.failed > 0) {
    spinner.fail(line);
    const failed = outcomes.flatMap((o) =>
      o.status === 'failed' ? [`  ${o.job.position}. ${o.job.link.title}: ${o.error}`] : [],
    );
    throw new Error(`Some pages could not be rendered; not merging.\n${failed.join('\n')}`);
  }

  spinner.succeed(line);
}

async function mergeAll(
  jobs: RenderJob[],
  destination: string,
  title: string,
): Promise<void> {
  const entries: DocumentEntry[] = jobs.map((job) => ({
    title: job.link.title,
    source: job.outputPath,
    depth: job.link.depth,
  }));

  const spinner = createSpinner(`Merging ${entries.length} document(s)`).start();
  try {
    const merged = await mergeToFile(entries, destination, {
      title,
      createDirectory: true,
      onEntryMerged: (progress) => {
        spinner.text = `Merging [${progress.entryIndex + 1}/${progress.entryCount}] ${progress.title}`;
      },
    });
    spinner.succeed(
      `Merged ${merged.pageCount} page(s) with ${countOutlineNodes(merged.outline)} bookmark(s)`,
    );
    logger.debug(`Outline roots: ${readOutline(merged.pdf).map((node) => node.label).join(', ')}`);
  } catch (error: unknown) {
    spinner.fail('Merge failed');
    throw error;
  }

  logger.success(`Merged PDF written to ${destination}`);
}
