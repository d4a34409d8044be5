export { mergeDocuments, type MergedDocument } from './merge/merge-engine.js';
export { OffsetTracker } from './merge/offset-tracker.js';
export { OutlineTreeBuilder, countOutlineNodes, type OutlineInsert } from './merge/outline-builder.js';
export { appendSourcePages } from './merge/page-concatenator.js';
export {
  writeOutline,
  readOutline,
  resolveDestinationIndex,
  type WrittenOutlineNode,
} from './merge/outline-writer.js';
export {
  SourceUnreadableError,
  EmptyInputSequenceError,
  InvalidEntryError,
  WriteFailureError,
} from './merge/errors.js';
export { writeMergedPdf, mergeToFile, serializeMergedPdf, type WriteMergedPdfOptions } from './output/pdf-writer.js';
export { extractTocLinks, fetchTocLinks, sliceByTitle, type FetchTocOptions } from './scraper/toc-extractor.js';
export { defaultSelectors, mergeSelectors, type TocSelectors } from './scraper/selectors.js';
export { renderPages, summarizeOutcomes, type PagePrinter, type RenderPagesOptions } from './renderer/page-renderer.js';
export { createChromiumPrinter, type PrinterSettings } from './renderer/chromium-printer.js';
export { planRenderJobs, sanitizeFilename, pagePdfFilename, mergedPdfFilename } from './output/file-naming.js';
export type {
  DocumentEntry,
  OutlineNode,
  MergedPage,
  MergeOptions,
  MergeProgress,
  PageLink,
  TocBounds,
  RenderJob,
  RenderOutcome,
  RenderSettings,
  ExportConfig,
} from './types.js';
