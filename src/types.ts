// ─── Merge Engine Types ───

/**
 * One source document handed to the merge engine.  Entries are merged in
 * the order they are given; that order is also the output page order.
 */
export interface DocumentEntry {
  /** Bookmark text. */
  title: string;
  /** Path of a single-document PDF already rendered to disk. */
  source: string;
  /** Outline nesting level, 0 = top level. */
  depth: number;
}

export interface OutlineNode {
  label: string;
  /** Index into `MergedDocument.pages` of the entry's first page. */
  targetPage: number;
  /** Position of the originating entry in the input sequence. */
  entryIndex: number;
  children: OutlineNode[];
}

/** Provenance of one page of the merged output. */
export interface MergedPage {
  entryIndex: number;
  sourcePageIndex: number;
}

export interface MergeProgress {
  entryIndex: number;
  entryCount: number;
  title: string;
  pagesAppended: number;
  targetPage: number;
}

export interface MergeOptions {
  /** Document info title of the merged PDF. */
  title?: string;
  /**
   * Stamp producer, creator and creation/modification dates.  Off by
   * default so that identical input serializes to identical bytes.
   */
  updateMetadata?: boolean;
  onEntryMerged?: (progress: MergeProgress) => void;
}

// ─── Page List Types ───

/** One link of the documentation site's navigation tree. */
export interface PageLink {
  title: string;
  /** Absolute URL of the page. */
  url: string;
  depth: number;
}

export interface TocBounds {
  /** Title of the first link to keep (inclusive). */
  startAt?: string;
  /** Title of the first link to drop (exclusive). */
  stopBefore?: string;
}

// ─── Render Types ───

export interface PdfMargin {
  top: string;
  right: string;
  bottom: string;
  left: string;
}

export type PageLoadState = 'load' | 'domcontentloaded' | 'networkidle';

export interface RenderSettings {
  format: string;
  margin: PdfMargin;
  printBackground: boolean;
  waitUntil: PageLoadState;
  timeoutMs: number;
  /** Stylesheet injected into every page before printing. */
  customCss: string;
  overwrite: boolean;
}

export interface RenderJob {
  link: PageLink;
  /** 1-based position in the page list. */
  position: number;
  outputPath: string;
}

export type RenderOutcome =
  | { job: RenderJob; status: 'rendered' }
  | { job: RenderJob; status: 'skipped' }
  | { job: RenderJob; status: 'failed'; error: string };

// ─── Configuration Types ───

export interface ExportConfig {
  /** Documentation index URL whose sidebar lists the pages. */
  url?: string;
  /** Directory receiving the per-page PDFs. */
  outputDir: string;
  /** Merged PDF path.  Defaults to `<outputDir>/<title>.pdf`. */
  output?: string;
  /** Title of the merged document. */
  title: string;
  toc: TocBounds & {
    selectors: {
      sidebar: string;
      item: string;
    };
  };
  render: RenderSettings;
  merge: boolean;
}
