import { describe, expect, it } from 'vitest';

import {
  MAX_FILENAME_LENGTH,
  alternateFilename,
  filenameFromUrl,
  sanitizeFilename,
  truncateFilename,
} from '../src/util/filename.js';

describe('filenameFromUrl', () => {
  it('takes the last path segment without the query string', () => {
    expect(filenameFromUrl('http://example.com/dir/My%20File%281%29.zip?session=1')).toBe('My File(1).zip');
  });

  it('keeps escapes it does not know', () => {
    expect(filenameFromUrl('http://example.com/a%7Eb.txt')).toBe('a%7Eb.txt');
  });

  it('has no name for directory URLs', () => {
    expect(filenameFromUrl('http://example.com/dir/')).toBeUndefined();
  });
});

describe('sanitizeFilename', () => {
  it('replaces path separators', () => {
    expect(sanitizeFilename('../etc\\passwd')).toBe('.._etc_passwd');
  });

  it('replaces names made of dots only', () => {
    expect(sanitizeFilename('..')).toBe('_');
  });
});

describe('truncateFilename', () => {
  it('cuts long names', () => {
    expect(truncateFilename('x'.repeat(300))).toHaveLength(MAX_FILENAME_LENGTH);
    expect(truncateFilename('short.bin')).toBe('short.bin');
  });
});

describe('alternateFilename', () => {
  it('picks the first free numbered suffix', async () => {
    const taken = new Set(['/out/a.bin.1', '/out/a.bin.2']);
    expect(await alternateFilename('/out/a.bin', async (path) => taken.has(path))).toBe('/out/a.bin.3');
  });

  it('falls back to the original path when every suffix is taken', async () => {
    expect(await alternateFilename('/out/a.bin', async () => true)).toBe('/out/a.bin');
  });
});
