/**
 * Merge orchestrator.
 *
 * Concatenates single-document PDFs in entry order and builds one
 * bookmark per entry, nested by depth, each targeting the first page the
 * entry contributed.  Entries are processed strictly one after another;
 * the offset and the open-ancestor stack are local to each call.
 *
 * Any failure rejects the whole run.  No partially merged document is
 * ever returned.
 */

import { PDFDocument } from 'pdf-lib';

import type {
  DocumentEntry,
  MergedPage,
  MergeOptions,
  OutlineNode,
} from '../types.js';
import { EmptyInputSequenceError, InvalidEntryError } from './errors.js';
import { OffsetTracker } from './offset-tracker.js';
import { OutlineTreeBuilder } from './outline-builder.js';
import { appendSourcePages } from './page-concatenator.js';
import { writeOutline } from './outline-writer.js';

export interface MergedDocument {
  /** Assembled document, outline already attached. */
  pdf: PDFDocument;
  pages: MergedPage[];
  pageCount: number;
  outline: OutlineNode[];
}

/**
 * Merge `entries` into one PDF with a nested outline.
 *
 * @throws EmptyInputSequenceError when `entries` is empty.
 * @throws InvalidEntryError when an entry's depth is not a non-negative integer.
 * @throws SourceUnreadableError when a source cannot be read or parsed.
 */
export async function mergeDocuments(
  entries: readonly DocumentEntry[],
  options: MergeOptions = {},
): Promise<MergedDocument> {
  if (entries.length === 0) {
    throw new EmptyInputSequenceError();
  }

  entries.forEach(validateEntry);

  const updateMetadata = options.updateMetadata ?? false;
  const pdf = await PDFDocument.create({ updateMetadata });
  const offsets = new OffsetTracker();
  const outline = new OutlineTreeBuilder();
  const pages: MergedPage[] = [];

  for (const [entryIndex, entry] of entries.entries()) {
    const targetPage = offsets.currentOffset();

    outline.insert({
      label: entry.title,
      depth: entry.depth,
      targetPage,
      entryIndex,
    });

    const pagesAppended = await appendSourcePages(pdf, entry, entryIndex);
    for (let sourcePageIndex = 0; sourcePageIndex < pagesAppended; sourcePageIndex++) {
      pages.push({ entryIndex, sourcePageIndex });
    }

    offsets.record(pagesAppended);

    options.onEntryMerged?.({
      entryIndex,
      entryCount: entries.length,
      title: entry.title,
      pagesAppended,
      targetPage,
    });
  }

  const forest = outline.build();
  writeOutline(pdf, forest);

  if (options.title) {
    pdf.setTitle(options.title, { showInWindowTitleBar: true });
  }

  return { pdf, pages, pageCount: pages.length, outline: forest };
}

function validateEntry(entry: DocumentEntry, entryIndex: number): void {
  if (!Number.isInteger(entry.depth) || entry.depth < 0) {
    throw new InvalidEntryError(
      entryIndex,
      entry,
      `depth must be a non-negative integer, got ${entry.depth}`,
    );
  }
}
