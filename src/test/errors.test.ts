import { describe, it, expect } from 'vitest';
import {
  EmptyInputSequenceError,
  InvalidEntryError,
  SourceUnreadableError,
  WriteFailureError,
} from '../merge/errors.js';
import { resolveDestinationIndex } from '../merge/outline-writer.js';

const entry = { title: 'Themes', source: '/tmp/003. Themes.pdf', depth: 1 };

describe('merge errors', () => {
  it('should name the entry position, title and path in SourceUnreadableError', () => {
    const cause = new Error('ENOENT: no such file or directory');
    const error = new SourceUnreadableError(2, entry, cause);

    expect(error.name).toBe('SourceUnreadableError');
    expect(error.message).toBe(
      'Cannot read source of entry #3 "Themes" (/tmp/003. Themes.pdf): ENOENT: no such file or directory',
    );
    expect(error.cause).toBe(cause);
    expect(error).toBeInstanceOf(Error);
  });

  it('should stringify non-Error causes', () => {
    expect(new WriteFailureError('/out/x.pdf', 'disk full').message).toBe(
      'Failed to write /out/x.pdf: disk full',
    );
  });

  it('should carry distinct names', () => {
    expect(new EmptyInputSequenceError().name).toBe('EmptyInputSequenceError');
    expect(new InvalidEntryError(0, entry, 'bad').message).toBe('Invalid entry #1 "Themes": bad');
  });
});

describe('resolveDestinationIndex', () => {
  it('should clamp targets past the end to the last page', () => {
    expect(resolveDestinationIndex(0, 3)).toBe(0);
    expect(resolveDestinationIndex(2, 3)).toBe(2);
    expect(resolveDestinationIndex(3, 3)).toBe(2);
  });

  it('should have no destination in an empty document', () => {
    expect(resolveDestinationIndex(0, 0)).toBeUndefined();
  });
});
