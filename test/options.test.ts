import { describe, expect, it } from 'vitest';

import {
  parseModuleOptionPairs,
  resolveDownloadOptions,
  resolveListOptions,
  resolveProbeOptions,
  resolveUploadOptions,
} from '../src/index.js';

describe('resolveDownloadOptions', () => {
  it('applies defaults', () => {
    expect(resolveDownloadOptions()).toEqual({
      moduleOptions: { extra: {} },
      perModule: {},
      getModule: false,
      noExtraWait: false,
      checkLink: false,
      markDownloaded: false,
      noOverwrite: false,
      fallback: false,
      captcha: {},
    });
  });

  it('prefers command-line values over the configuration file', () => {
    const options = resolveDownloadOptions({
      timeout: 90.7,
      outputDirectory: '/cli',
      captchaMethod: 'none',
      file: {
        timeout: 600,
        maxRetries: 3,
        outputDirectory: '/file',
        fallback: true,
        captcha: { method: 'prompt', antigate: 'test-secret' },
        modules: { filedrop: { authFree: 'guest:test-secret' } },
      },
    });

    expect(options).toMatchObject({
      timeout: 90,
      maxRetries: 3,
      outputDirectory: '/cli',
      fallback: true,
      captcha: { method: 'none', antigateKey: 'test-secret' },
      perModule: { filedrop: { authFree: 'guest:test-secret' } },
    });
  });

  it('rejects conflicting switches', () => {
    expect(() => resolveDownloadOptions({ printf: '%u', exec: 'echo %u' })).toThrow(
      '--printf and --exec cannot be used together',
    );
    expect(() => resolveDownloadOptions({ checkLink: true, printf: '%u' })).toThrow(
      '--check-link cannot be used with --printf or --exec',
    );
  });

  it('validates numbers and accounts', () => {
    expect(() => resolveDownloadOptions({ timeout: 0 })).toThrow('timeout must be a positive integer.');
    expect(() => resolveDownloadOptions({ maxRetries: -1 })).toThrow('max-retries must be zero or a positive integer.');
    expect(resolveDownloadOptions({ maxRetries: 0 }).maxRetries).toBe(0);
    expect(() => resolveDownloadOptions({ auth: 'nopassword' })).toThrow('auth must look like user:password');
    expect(() => resolveDownloadOptions({ deathByCaptcha: 'user' })).toThrow(
      'deathbycaptcha must look like user:password',
    );
    expect(() => resolveDownloadOptions({ captchaMethod: 'psychic' })).toThrow('unknown captcha method: psychic');
  });
});

describe('parseModuleOptionPairs', () => {
  it('splits on the first equals sign', () => {
    expect(parseModuleOptionPairs(['premium=1', 'filter=a=b'])).toEqual({ premium: '1', filter: 'a=b' });
  });

  it('rejects pairs without a name', () => {
    expect(() => parseModuleOptionPairs(['=1'])).toThrow('module option must look like name=value: =1');
    expect(() => parseModuleOptionPairs(['premium'])).toThrow('module option must look like name=value: premium');
  });
});

describe('other commands', () => {
  it('resolves probe, list and upload options', () => {
    expect(resolveProbeOptions({ follow: true }).follow).toBe(true);
    expect(resolveListOptions({ file: { fallback: true } })).toMatchObject({ recursive: false, fallback: true });
    expect(resolveUploadOptions({ name: 'remote.bin', maxRetries: 2 })).toMatchObject({
      name: 'remote.bin',
      maxRetries: 2,
      captcha: {},
    });
  });
});
