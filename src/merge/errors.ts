import type { DocumentEntry } from '../types.js';

/**
 * A source PDF could not be read or parsed.  Aborts the whole merge so
 * that later bookmark offsets never drift from the page list.
 */
export class SourceUnreadableError extends Error {
  public readonly name = 'SourceUnreadableError';

  constructor(
    public readonly entryIndex: number,
    public readonly entry: DocumentEntry,
    cause: unknown,
  ) {
    super(
      `Cannot read source of entry #${entryIndex + 1} "${entry.title}" ` +
        `(${entry.source}): ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

/**
 * `mergeDocuments` was called with no entries.
 */
export class EmptyInputSequenceError extends Error {
  public readonly name = 'EmptyInputSequenceError';

  constructor() {
    super('Nothing to merge: the entry list is empty');
  }
}

/**
 * An entry carries a depth that is not a non-negative integer.
 */
export class InvalidEntryError extends Error {
  public readonly name = 'InvalidEntryError';

  constructor(
    public readonly entryIndex: number,
    public readonly entry: DocumentEntry,
    reason: string,
  ) {
    super(`Invalid entry #${entryIndex + 1} "${entry.title}": ${reason}`);
  }
}

/**
 * The merged PDF could not be written to its destination.
 */
export class WriteFailureError extends Error {
  public readonly name = 'WriteFailureError';

  constructor(
    public readonly destination: string,
    cause: unknown,
  ) {
    super(
      `Failed to write ${destination}: ` +
        (cause instanceof Error ? cause.message : String(cause)),
      { cause },
    );
  }
}
