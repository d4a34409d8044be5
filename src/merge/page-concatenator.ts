import { readFile } from 'node:fs/promises';
import { PDFDocument } from 'pdf-lib';

import type { DocumentEntry } from '../types.js';
import { SourceUnreadableError } from './errors.js';

/**
 * Read one entry's source PDF and append all of its pages, in their own
 * order, to `output`.
 *
 * @returns The number of pages appended (0 for an empty source).
 * @throws SourceUnreadableError when the file is missing, unreadable or
 *   not a PDF pdf-lib can parse.
 */
export async function appendSourcePages(
  output: PDFDocument,
  entry: DocumentEntry,
  entryIndex: number,
): Promise<number> {
  try {
    const bytes = await readFile(entry.source);
    const source = await PDFDocument.load(bytes, { updateMetadata: false });

    const indices = source.getPageIndices();
    if (indices.length === 0) {
      return 0;
    }

    const copiedPages = await output.copyPages(source, indices);
    copiedPages.forEach((page) => output.addPage(page));
    return copiedPages.length;
  } catch (error: unknown) {
    throw new SourceUnreadableError(entryIndex, entry, error);
  }
}
