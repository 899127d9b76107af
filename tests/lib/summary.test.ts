import { describe, expect, it } from 'vitest';

import { pluralize, summarize } from '../../src/lib/summary.js';

describe('summarize', () => {
  it('counts outcomes by status', () => {
    const summary = summarize([
      { status: 'done', file: 'a.nef', target: 'b.nef' },
      { status: 'unchanged', file: 'c.nef' },
      { status: 'skipped', file: 'd.nef', reason: 'Could not extract EXIF timestamp' },
      { status: 'done', file: 'e.nef', target: 'f.nef' }
    ]);

    expect(summary).toMatchObject({ done: 2, unchanged: 1, skipped: 1, failed: 0 });
    expect(summary.outcomes).toHaveLength(4);
  });

  it('pluralizes counts', () => {
    expect(pluralize('file', 1)).toBe('file');
    expect(pluralize('file', 0)).toBe('files');
    expect(pluralize('mismatch', 2, 'mismatches')).toBe('mismatches');
  });
});
