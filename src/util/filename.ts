import { access } from 'node:fs/promises';

/** Longest name most filesystems accept is 255 bytes; one is kept in reserve. */
export const MAX_FILENAME_LENGTH = 254;
export const MAX_ALTERNATE_SUFFIX = 99;

const URI_ESCAPES: ReadonlyArray<[string, string]> = [
  ['%20', ' '],
  ['%26', '&'],
  ['%2C', ','],
  ['%28', '('],
  ['%29', ')'],
  ['%2B', '+'],
  ['%3D', '='],
  ['%5B', '['],
  ['%5D', ']'],
  ['%3A', ':'],
  ['%2F', '/'],
  ['%40', '@'],
];

/** Last path segment of the URL without its query string, lightly unescaped. */
export function filenameFromUrl(url: string): string | undefined {
  const withoutQuery = url.split('?', 1)[0] ?? '';
  if (withoutQuery.endsWith('/')) {
    return undefined;
  }

  const segment = withoutQuery.slice(withoutQuery.lastIndexOf('/') + 1).replace(/[\r\n]/g, '');
  if (segment.length === 0) {
    return undefined;
  }
  return URI_ESCAPES.reduce((name, [escape, plain]) => name.split(escape).join(plain), segment);
}

export function truncateFilename(name: string): string {
  return name.length > MAX_FILENAME_LENGTH ? name.slice(0, MAX_FILENAME_LENGTH) : name;
}

/** Path separators would escape the output directory. */
export function sanitizeFilename(name: string): string {
  return name.replace(/[/\\]/g, '_').replace(/^\.+$/, '_');
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * First of `path.1` … `path.99` that does not exist yet; `path` itself when all
 * of them are taken.
 */
export async function alternateFilename(
  path: string,
  exists: (candidate: string) => Promise<boolean> = fileExists,
): Promise<string> {
  for (let count = 1; count <= MAX_ALTERNATE_SUFFIX; count += 1) {
    const candidate = `${path}.${count}`;
    if (!(await exists(candidate))) {
      return candidate;
    }
  }
  return path;
}
