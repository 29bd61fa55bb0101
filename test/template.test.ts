import { describe, expect, it } from 'vitest';

import {
  DOWNLOAD_SEQUENCES,
  LIST_SEQUENCES,
  PROBE_SEQUENCES,
  renderListingLine,
  renderTemplate,
  validateTemplate,
} from '../src/util/template.js';

describe('validateTemplate', () => {
  it('accepts the sequences of each command', () => {
    expect(() => validateTemplate('%m %f %F %u %c %C %d%n%t%%', DOWNLOAD_SEQUENCES)).not.toThrow();
    expect(() => validateTemplate('%F%u %h %s', PROBE_SEQUENCES)).not.toThrow();
    expect(() => validateTemplate('%m:%f:%u', LIST_SEQUENCES)).not.toThrow();
  });

  it('rejects the first unknown sequence', () => {
    expect(() => validateTemplate('%f %z %y', DOWNLOAD_SEQUENCES)).toThrow(
      'Bad format string: unknown sequence << %z >>',
    );
    expect(() => validateTemplate('%h', LIST_SEQUENCES)).toThrow('unknown sequence << %h >>');
  });

  it('ignores a trailing lone percent sign', () => {
    expect(() => validateTemplate('100%', DOWNLOAD_SEQUENCES)).not.toThrow();
  });
});

describe('renderTemplate', () => {
  it('substitutes values and control sequences', () => {
    expect(renderTemplate('%f%t%u%n%%', { f: 'a.bin', u: 'http://example.com/a' })).toBe(
      'a.bin\thttp://example.com/a\n%',
    );
  });

  it('does not re-interpret substituted values', () => {
    expect(renderTemplate('[%f]', { f: '%u' })).toBe('[%u]');
  });

  it('renders unknown values as empty and keeps a trailing percent sign', () => {
    expect(renderTemplate('%x-50%', {})).toBe('-50%');
  });
});

describe('renderListingLine', () => {
  it('prefixes the name line when a name is known', () => {
    expect(renderListingLine('%F%u', { f: 'a.bin', u: 'http://example.com/a' })).toBe(
      '# a.bin\nhttp://example.com/a\n',
    );
  });

  it('drops the name line when the name is unknown', () => {
    expect(renderListingLine('%F%u', { f: '', u: 'http://example.com/a' })).toBe('http://example.com/a\n');
  });

  it('does not double a newline the format ends with', () => {
    expect(renderListingLine('%m %u%n', { m: 'filedrop', u: 'http://example.com/a' })).toBe(
      'filedrop http://example.com/a\n',
    );
  });

  it('renders nothing for a format that expands to nothing', () => {
    expect(renderListingLine('%F', { f: '', u: 'http://example.com/a' })).toBe('');
  });
});
