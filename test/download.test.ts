import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

import { finalizeLink, runDownload } from '../src/commands/download.js';
import { fail, succeed } from '../src/engine/outcome.js';
import { resolveDownloadOptions } from '../src/index.js';
import { DEFAULT_CAPABILITIES, type SiteModule } from '../src/modules/contract.js';
import { ModuleRegistry } from '../src/modules/registry.js';
import type { FetchLike } from '../src/network/http.js';
import type { Runtime } from '../src/types.js';
import { fileExists } from '../src/util/filename.js';
import { resetOutputConfig } from '../src/util/output.js';
import { captureOutput, type CapturedOutput } from './support/captureOutput.js';

const FINAL_LINK = 'http://cdn.example/drop.bin';

const download = vi.fn<NonNullable<SiteModule['download']>>(async (ctx, url) => {
  if (url.endsWith('/dead')) {
    return fail('link-dead');
  }
  if (url.endsWith('/locked') && ctx.options.linkPassword !== 'test-secret') {
    return fail('link-password-required');
  }
  return succeed({ url: FINAL_LINK });
});

const filedrop: SiteModule = {
  name: 'filedrop',
  urlPattern: /^http:\/\/filedrop\.example\//,
  capabilities: DEFAULT_CAPABILITIES,
  download,
};

const resumedrop: SiteModule = {
  name: 'resumedrop',
  urlPattern: /^http:\/\/resumedrop\.example\//,
  capabilities: { resume: true, finalLinkNeedsCookie: false },
  download,
};

let dir: string;
let out: string;
let output: CapturedOutput;
let http: Mock<FetchLike>;
let sleep: Mock<(ms: number) => Promise<void>>;
let runtime: Runtime;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'hostkit-download-'));
  out = join(dir, 'out');
  output = captureOutput();
  download.mockClear();
  http = vi.fn<FetchLike>(async (url) =>
    url === FINAL_LINK ? new Response('payload') : new Response('not here', { status: 404 }),
  );
  sleep = vi.fn<(ms: number) => Promise<void>>(async () => {});
  runtime = { registry: new ModuleRegistry([filedrop]), http, sleep, interactive: false };
});

afterEach(async () => {
  vi.restoreAllMocks();
  resetOutputConfig();
  await rm(dir, { recursive: true, force: true });
});

describe('runDownload', () => {
  it('saves the final link in the output directory', async () => {
    const batch = await runDownload(
      ['http://filedrop.example/f/1'],
      resolveDownloadOptions({ outputDirectory: out }),
      runtime,
    );

    expect(batch.exitCode).toBe(0);
    expect(await readFile(join(out, 'drop.bin'), 'utf8')).toBe('payload');
    expect(output.stdout).toEqual([`${join(out, 'drop.bin')}\n`]);
    expect(output.stderr).toEqual([
      `Output directory: ${out}\n`,
      'Starting download (filedrop): http://filedrop.example/f/1\n',
      `File URL: ${FINAL_LINK}\n`,
      'Filename: drop.bin\n',
    ]);
  });

  it('moves the file out of the temporary directory', async () => {
    const temp = join(dir, 'tmp');

    await runDownload(
      ['http://filedrop.example/f/1'],
      resolveDownloadOptions({ outputDirectory: out, tempDirectory: temp }),
      runtime,
    );

    expect(await readFile(join(out, 'drop.bin'), 'utf8')).toBe('payload');
    expect(await fileExists(join(temp, 'drop.bin'))).toBe(false);
    expect(output.stderr).toContain(`Moving file to output directory: ${out}\n`);
  });

  it('keeps existing files with --no-overwrite', async () => {
    await mkdir(out);
    await writeFile(join(out, 'drop.bin'), 'older');

    await runDownload(
      ['http://filedrop.example/f/1'],
      resolveDownloadOptions({ outputDirectory: out, noOverwrite: true }),
      runtime,
    );

    expect(await readFile(join(out, 'drop.bin'), 'utf8')).toBe('older');
    expect(await readFile(join(out, 'drop.bin.1'), 'utf8')).toBe('payload');
  });

  it('marks the links of a links file', async () => {
    const links = join(dir, 'links.txt');
    await writeFile(links, 'http://filedrop.example/f/1\nhttp://filedrop.example/dead\nhttp://nowhere.example/x\n');

    const batch = await runDownload([links], resolveDownloadOptions({ outputDirectory: out, markDownloaded: true }), runtime);

    expect(batch.codes).toEqual([0, 13, 2]);
    expect(batch.exitCode).toBe(113);
    expect(await readFile(links, 'utf8')).toBe(
      `#OK http://filedrop.example/f/1|${join(out, 'drop.bin')}\n` +
        '#NOTFOUND http://filedrop.example/dead\n' +
        '#NOMODULE http://nowhere.example/x\n',
    );
    expect(output.stderr).toContain('Link is not alive: file not found\n');
    expect(output.stderr).toContain('Skip: no module for URL (http://nowhere.example/x)\n');
  });

  it('prints the final link instead of downloading it', async () => {
    await runDownload(
      ['http://filedrop.example/f/1'],
      resolveDownloadOptions({ printf: '%m %f %u %d' }),
      runtime,
    );

    expect(output.stdout).toEqual([`filedrop drop.bin http://filedrop.example/f/1 ${FINAL_LINK}\n`]);
    expect(http).not.toHaveBeenCalled();
  });

  it('hands the final link to a command', async () => {
    const runCommand = vi.fn(async () => 0);
    runtime.runCommand = runCommand;

    const batch = await runDownload(
      ['http://filedrop.example/f/1'],
      resolveDownloadOptions({ exec: 'fetch %d -o %F', outputDirectory: out }),
      runtime,
    );

    expect(runCommand).toHaveBeenCalledWith(`fetch ${FINAL_LINK} -o ${join(out, 'drop.bin')}`);
    expect(batch.exitCode).toBe(0);
  });

  it('fails when the command fails', async () => {
    runtime.runCommand = vi.fn(async () => 2);

    const batch = await runDownload(['http://filedrop.example/f/1'], resolveDownloadOptions({ exec: 'false' }), runtime);

    expect(output.stderr).toContain('Command exited with retcode: 2\n');
    expect(batch.exitCode).toBe(1);
  });

  it('only checks links with --check-link', async () => {
    const batch = await runDownload(
      ['http://filedrop.example/f/1', 'http://filedrop.example/dead'],
      resolveDownloadOptions({ checkLink: true }),
      runtime,
    );

    expect(output.stdout).toEqual(['http://filedrop.example/f/1\n']);
    expect(output.stderr).toContain('Link active: http://filedrop.example/f/1\n');
    expect(batch.codes).toEqual([0, 13]);
    expect(http).not.toHaveBeenCalled();
  });

  it('waits once after a 503 on the final link', async () => {
    http.mockResolvedValueOnce(new Response('busy', { status: 503 }));

    const batch = await runDownload(
      ['http://filedrop.example/f/1'],
      resolveDownloadOptions({ outputDirectory: out }),
      runtime,
    );

    expect(batch.exitCode).toBe(0);
    expect(sleep).toHaveBeenCalledWith(120_000);
    expect(download).toHaveBeenCalledTimes(2);
    expect(output.stderr).toContain('Unexpected HTTP code 503, retry after a safety wait\n');
    expect(output.stderr).toContain('Waiting 120 seconds (2m)...\n');
  });

  it('gives up on a 503 when the wait budget is too small', async () => {
    http.mockResolvedValueOnce(new Response('busy', { status: 503 }));

    const batch = await runDownload(
      ['http://filedrop.example/f/1'],
      resolveDownloadOptions({ outputDirectory: out, timeout: 60 }),
      runtime,
    );

    expect(batch.exitCode).toBe(5);
    expect(sleep).not.toHaveBeenCalled();
    expect(output.stderr).toContain('Delay limit reached (filedrop.download)\n');
  });

  it('gives up after repeated unexpected answers', async () => {
    http.mockImplementation(async () => new Response('gone', { status: 500 }));

    const batch = await runDownload(
      ['http://filedrop.example/f/1'],
      resolveDownloadOptions({ outputDirectory: out }),
      runtime,
    );

    expect(batch.exitCode).toBe(3);
    expect(download).toHaveBeenCalledTimes(4);
    expect(output.stderr).toContain('Unexpected HTTP code 500, giving up\n');
  });

  it('counts a bad range on a resumable module as already downloaded', async () => {
    const temp = join(dir, 'tmp');
    await mkdir(temp);
    await writeFile(join(temp, 'drop.bin'), 'payload');
    runtime.registry = new ModuleRegistry([filedrop, resumedrop]);
    http.mockResolvedValueOnce(new Response('', { status: 416 }));

    const batch = await runDownload(
      ['http://resumedrop.example/f/1'],
      resolveDownloadOptions({ outputDirectory: out, tempDirectory: temp }),
      runtime,
    );

    expect(batch.exitCode).toBe(0);
    expect(new Headers(http.mock.calls[0]?.[1]?.headers).get('range')).toBe('bytes=7-');
    expect(download).toHaveBeenCalledTimes(1);
    expect(await readFile(join(out, 'drop.bin'), 'utf8')).toBe('payload');
    expect(output.stdout).toEqual([`${join(out, 'drop.bin')}\n`]);
    expect(output.stderr).toContain('Resume error (bad range), skip download\n');
  });

  it('restarts from scratch after a bad range on a module without resume', async () => {
    http.mockResolvedValueOnce(new Response('', { status: 416 }));

    const batch = await runDownload(
      ['http://filedrop.example/f/1'],
      resolveDownloadOptions({ outputDirectory: out }),
      runtime,
    );

    expect(batch.exitCode).toBe(0);
    expect(download).toHaveBeenCalledTimes(2);
    expect(http).toHaveBeenCalledTimes(2);
    expect(await readFile(join(out, 'drop.bin'), 'utf8')).toBe('payload');
    expect(output.stderr).toContain('Resume error (bad range), restart download\n');
  });

  it('calls the module again to finish a partial transfer', async () => {
    runtime.registry = new ModuleRegistry([filedrop, resumedrop]);
    http
      .mockResolvedValueOnce(new Response('pay', { headers: { 'content-length': '7' } }))
      .mockResolvedValueOnce(new Response('load', { status: 206 }));

    const batch = await runDownload(
      ['http://resumedrop.example/f/1'],
      resolveDownloadOptions({ outputDirectory: out }),
      runtime,
    );

    expect(batch.exitCode).toBe(0);
    expect(download).toHaveBeenCalledTimes(2);
    expect(new Headers(http.mock.calls[1]?.[1]?.headers).get('range')).toBe('bytes=3-');
    expect(await readFile(join(out, 'drop.bin'), 'utf8')).toBe('payload');
    expect(output.stderr).toContain('Partial content downloaded, recall download function\n');
  });

  it('keeps going when one item throws', async () => {
    const temp = join(dir, 'tmp');
    const cookieCopy = join(temp, `hostkit.cookies.${process.pid}.txt`);
    download
      .mockImplementationOnce(async () => {
        await rm(temp, { recursive: true, force: true });
        await writeFile(temp, 'not a directory');
        return succeed({ url: FINAL_LINK });
      })
      .mockImplementationOnce(async () => {
        await rm(temp, { force: true });
        await mkdir(temp);
        return succeed({ url: FINAL_LINK });
      });

    const batch = await runDownload(
      ['http://filedrop.example/f/1', 'http://filedrop.example/f/2'],
      resolveDownloadOptions({ printf: '%c %u', tempDirectory: temp }),
      runtime,
    );

    expect(batch.codes).toEqual([8, 0]);
    expect(batch.exitCode).toBe(108);
    expect(output.stdout).toEqual([`${cookieCopy} http://filedrop.example/f/2\n`]);
    expect(output.stderr).toContain(
      `[system/fatal] can't write cookies file (path=${JSON.stringify(cookieCopy)} stage="item" url="http://filedrop.example/f/1")\n`,
    );
  });

  it('asks for the link password once', async () => {
    const ask = vi.fn(async () => 'test-secret\n');
    runtime.ask = ask;
    runtime.interactive = true;

    const batch = await runDownload(
      ['http://filedrop.example/locked'],
      resolveDownloadOptions({ outputDirectory: out }),
      runtime,
    );

    expect(ask).toHaveBeenCalledWith('Enter link password: ');
    expect(batch.exitCode).toBe(0);
    expect(await readFile(join(out, 'drop.bin'), 'utf8')).toBe('payload');
  });

  it('reports protected links when nobody can answer', async () => {
    const batch = await runDownload(
      ['http://filedrop.example/locked'],
      resolveDownloadOptions({ outputDirectory: out }),
      runtime,
    );

    expect(batch.exitCode).toBe(11);
    expect(output.stderr).toContain('You must provide a valid password\n');
  });

  it('downloads unknown links with --fallback', async () => {
    http.mockImplementation(async (url, init) => {
      if (init?.redirect === 'manual') {
        return new Response(null, { status: 204 });
      }
      return url === 'http://plain.example/file.zip' ? new Response('zipped') : new Response('', { status: 404 });
    });

    const batch = await runDownload(
      ['http://plain.example/file.zip'],
      resolveDownloadOptions({ outputDirectory: out, fallback: true }),
      runtime,
    );

    expect(batch.exitCode).toBe(0);
    expect(await readFile(join(out, 'file.zip'), 'utf8')).toBe('zipped');
    expect(output.stderr).toContain('No module found, do a simple HTTP GET as requested\n');
  });

  it('prints the module name with --get-module', async () => {
    await runDownload(['http://filedrop.example/f/1'], resolveDownloadOptions({ getModule: true }), runtime);

    expect(output.stdout).toEqual(['filedrop\n']);
    expect(download).not.toHaveBeenCalled();
  });

  it('requires an existing cookies file', async () => {
    await expect(
      runDownload(
        ['http://filedrop.example/f/1'],
        resolveDownloadOptions({ cookies: join(dir, 'cookies.txt') }),
        runtime,
      ),
    ).rejects.toMatchObject({ kind: 'system', message: "can't find cookies file" });
  });
});

describe('finalizeLink', () => {
  it('derives the filename from the URL', () => {
    expect(finalizeLink({ url: 'http://cdn.example/a%20b.bin?x=1' })).toEqual({
      ok: true,
      value: { url: 'http://cdn.example/a%20b.bin?x=1', filename: 'a b.bin' },
    });
  });

  it('cleans names given by the module', () => {
    expect(finalizeLink({ url: FINAL_LINK, filename: 'dir/name.bin' })).toEqual({
      ok: true,
      value: { url: FINAL_LINK, filename: 'dir_name.bin' },
    });
  });

  it('discards a filename equal to the URL', () => {
    expect(finalizeLink({ url: FINAL_LINK, filename: FINAL_LINK })).toEqual({
      ok: true,
      value: { url: FINAL_LINK, filename: 'drop.bin' },
    });
    expect(output.stderr).toEqual(['Output filename is wrong, check module download function\n']);
  });

  it('requires a URL', () => {
    expect(finalizeLink({ url: '' })).toEqual({ ok: false, kind: 'fatal' });
  });
});
