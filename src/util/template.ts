import { createConfigurationError } from '../errors.js';

/** Sequences understood by every command; the rest are per command. */
const COMMON_SEQUENCES = 'nt%';

export const DOWNLOAD_SEQUENCES = `cCdfFmu${COMMON_SEQUENCES}`;
export const PROBE_SEQUENCES = `cfFhmsu${COMMON_SEQUENCES}`;
export const LIST_SEQUENCES = `fFmu${COMMON_SEQUENCES}`;

/** Probe and list default: `# name` line (when known) followed by the URL. */
export const DEFAULT_LISTING_FORMAT = '%F%u';

export type TemplateValues = Readonly<Record<string, string>>;

/** Rejects the first `%x` sequence not in `allowed`. */
export function validateTemplate(format: string, allowed: string): void {
  for (let index = 0; index < format.length - 1; index += 1) {
    if (format[index] !== '%') {
      continue;
    }
    const sequence = format[index + 1];
    if (!allowed.includes(sequence)) {
      throw createConfigurationError(`Bad format string: unknown sequence << %${sequence} >>`, {
        format,
      });
    }
    index += 1;
  }
}

/**
 * Single left-to-right pass, so substituted values are never re-interpreted.
 * A trailing lone `%` is kept as is.
 */
export function renderTemplate(format: string, values: TemplateValues): string {
  let output = '';
  for (let index = 0; index < format.length; index += 1) {
    const char = format[index];
    if (char !== '%' || index === format.length - 1) {
      output += char;
      continue;
    }

    const sequence = format[index + 1];
    index += 1;
    switch (sequence) {
      case 'n':
        output += '\n';
        break;
      case 't':
        output += '\t';
        break;
      case '%':
        output += '%';
        break;
      default:
        output += values[sequence] ?? '';
    }
  }
  return output;
}

/**
 * Probe/list rendering: `%F` stands for `# %f%n` when a name is known and for
 * nothing otherwise. Every entry ends with a newline; a format that expands to
 * nothing renders nothing.
 */
export function renderListingLine(format: string, values: TemplateValues): string {
  const name = values.f ?? '';
  const expanded = format.replace(/%(.)/g, (sequence: string, char: string) =>
    char === 'F' ? (name.length > 0 ? '# %f%n' : '') : sequence,
  );
  if (expanded.length === 0) {
    return '';
  }
  const rendered = renderTemplate(expanded, values);
  return rendered.endsWith('\n') ? rendered : `${rendered}\n`;
}
