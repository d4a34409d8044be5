/**
 * Serialize an outline forest into a pdf-lib document's catalog, and read
 * one back.
 *
 * Items are written as standard outline item dictionaries (Title, Parent,
 * Prev/Next, First/Last, Count, Dest) with every item open.  Each Dest is
 * `[page /Fit]`.
 */

import {
  PDFArray,
  PDFDict,
  PDFHexString,
  PDFName,
  PDFNumber,
  PDFRef,
  PDFString,
  type PDFContext,
  type PDFDocument,
  type PDFObject,
} from 'pdf-lib';

import type { OutlineNode } from '../types.js';
import { countOutlineNodes } from './outline-builder.js';

/** An outline item as found in a saved PDF. */
export interface WrittenOutlineNode {
  label: string;
  /** Destination page index, absent when the item has no page target. */
  pageIndex?: number;
  children: WrittenOutlineNode[];
}

/**
 * Page index a bookmark should jump to.  A target past the end (a
 * trailing zero-page source) points at the last page; with no pages at
 * all there is no destination.
 */
export function resolveDestinationIndex(
  targetPage: number,
  pageCount: number,
): number | undefined {
  if (pageCount === 0) return undefined;
  return Math.min(targetPage, pageCount - 1);
}

/**
 * Attach `forest` to `pdf` as its document outline and ask viewers to
 * open the outline pane.  An empty forest leaves the catalog untouched.
 */
export function writeOutline(pdf: PDFDocument, forest: OutlineNode[]): void {
  if (forest.length === 0) return;

  const context = pdf.context;
  const pageRefs = pdf.getPages().map((page) => page.ref);
  const rootRef = context.nextRef();

  const { first, last } = writeSiblings(context, forest, rootRef, pageRefs);

  context.assign(
    rootRef,
    context.obj({
      Type: 'Outlines',
      First: first,
      Last: last,
      Count: countOutlineNodes(forest),
    }),
  );

  pdf.catalog.set(PDFName.of('Outlines'), rootRef);
  pdf.catalog.set(PDFName.of('PageMode'), PDFName.of('UseOutlines'));
}

function writeSiblings(
  context: PDFContext,
  nodes: OutlineNode[],
  parentRef: PDFRef,
  pageRefs: PDFRef[],
): { first: PDFRef; last: PDFRef } {
  const refs = nodes.map(() => context.nextRef());

  nodes.forEach((node, i) => {
    const item = context.obj({
      Title: PDFHexString.fromText(node.label),
      Parent: parentRef,
    });

    if (i > 0) {
      item.set(PDFName.of('Prev'), refs[i - 1]);
    }
    if (i < refs.length - 1) {
      item.set(PDFName.of('Next'), refs[i + 1]);
    }

    if (node.children.length > 0) {
      const { first, last } = writeSiblings(context, node.children, refs[i], pageRefs);
      item.set(PDFName.of('First'), first);
      item.set(PDFName.of('Last'), last);
      item.set(PDFName.of('Count'), PDFNumber.of(countOutlineNodes(node.children)));
    }

    const pageIndex = resolveDestinationIndex(node.targetPage, pageRefs.length);
    if (pageIndex !== undefined) {
      item.set(PDFName.of('Dest'), context.obj([pageRefs[pageIndex], PDFName.of('Fit')]));
    }

    context.assign(refs[i], item);
  });

  return { first: refs[0], last: refs[refs.length - 1] };
}

// ── Reading ──────────────────────────────────────────────────────────

/**
 * Walk the document outline of `pdf`.  Returns an empty forest when the
 * document has none.
 */
export function readOutline(pdf: PDFDocument): WrittenOutlineNode[] {
  const root = pdf.catalog.lookup(PDFName.of('Outlines'));
  if (!(root instanceof PDFDict)) return [];

  const pageIndexByRef = new Map<string, number>();
  pdf.getPages().forEach((page, index) => {
    pageIndexByRef.set(page.ref.toString(), index);
  });

  return readSiblings(root, pageIndexByRef, new Set());
}

function readSiblings(
  parent: PDFDict,
  pageIndexByRef: Map<string, number>,
  visited: Set<PDFDict>,
): WrittenOutlineNode[] {
  const nodes: WrittenOutlineNode[] = [];
  let current = parent.lookup(PDFName.of('First'));

  while (current instanceof PDFDict && !visited.has(current)) {
    visited.add(current);

    const node: WrittenOutlineNode = {
      label: decodeTitle(current.lookup(PDFName.of('Title'))),
      children: readSiblings(current, pageIndexByRef, visited),
    };
    const pageIndex = destinationPageIndex(current, pageIndexByRef);
    if (pageIndex !== undefined) {
      node.pageIndex = pageIndex;
    }
    nodes.push(node);

    current = current.lookup(PDFName.of('Next'));
  }

  return nodes;
}

function decodeTitle(title: PDFObject | undefined): string {
  if (title instanceof PDFHexString || title instanceof PDFString) {
    return title.decodeText();
  }
  return '';
}

function destinationPageIndex(
  item: PDFDict,
  pageIndexByRef: Map<string, number>,
): number | undefined {
  let dest = item.lookup(PDFName.of('Dest'));

  // GoTo actions carry the destination under /A /D.
  if (!dest) {
    const action = item.lookup(PDFName.of('A'));
    if (action instanceof PDFDict) {
      dest = action.lookup(PDFName.of('D'));
    }
  }

  if (!(dest instanceof PDFArray) || dest.size() === 0) return undefined;

  const page = dest.get(0);
  if (!(page instanceof PDFRef)) return undefined;
  return pageIndexByRef.get(page.toString());
}
