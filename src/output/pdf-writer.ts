import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import type { DocumentEntry, MergeOptions } from '../types.js';
import { WriteFailureError } from '../merge/errors.js';
import { mergeDocuments, type MergedDocument } from '../merge/merge-engine.js';
import { createLogger, describeError } from '../utils/logger.js';

const logger = createLogger('write');

/**
 * Serialize a merged document.  pdf-lib would otherwise add a blank page
 * to a document that has none, so an all-empty merge stays empty.
 */
export function serializeMergedPdf(merged: MergedDocument): Promise<Uint8Array> {
  return merged.pdf.save({ addDefaultPage: false });
}

export interface WriteMergedPdfOptions {
  /** Create the destination directory when missing.  Default: false. */
  createDirectory?: boolean;
}

/**
 * Serialize `merged` and write it to `destination`.
 *
 * The bytes go to a temporary sibling first and are renamed over the
 * destination, so a reader never sees a half-written file and an
 * existing destination stays intact when writing fails.
 *
 * @returns Number of bytes written.
 * @throws WriteFailureError when serializing, writing or renaming fails.
 */
export async function writeMergedPdf(
  merged: MergedDocument,
  destination: string,
  options: WriteMergedPdfOptions = {},
): Promise<number> {
  const dir = dirname(destination);
  const tempPath = join(dir, `.${basename(destination)}.${process.pid}.tmp`);

  try {
    if (options.createDirectory) {
      await mkdir(dir, { recursive: true });
    }
    const bytes = await serializeMergedPdf(merged);
    await writeFile(tempPath, bytes);
    await rename(tempPath, destination);
    logger.debug(`Wrote ${bytes.length} bytes to ${destination}`);
    return bytes.length;
  } catch (error: unknown) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn(`Could not remove ${tempPath}: ${describeError(cleanupError)}`);
    });
    throw new WriteFailureError(destination, error);
  }
}

/**
 * Merge `entries` and write the result to `destination`.  When the merge
 * fails nothing is written.
 */
export async function mergeToFile(
  entries: readonly DocumentEntry[],
  destination: string,
  options: MergeOptions & WriteMergedPdfOptions = {},
): Promise<MergedDocument> {
  const merged = await mergeDocuments(entries, options);
  await writeMergedPdf(merged, destination, options);
  return merged;
}
