import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createFatalError, createHosterError, createNetworkError } from '../src/errors.js';
import { formatHosterError, reportHosterError } from '../src/util/errorHandler.js';
import { resetOutputConfig, setOutputConfig } from '../src/util/output.js';
import { captureOutput, type CapturedOutput } from './support/captureOutput.js';

let output: CapturedOutput;

beforeEach(() => {
  resetOutputConfig();
  output = captureOutput();
});

afterEach(() => {
  resetOutputConfig();
  vi.restoreAllMocks();
});

describe('formatHosterError', () => {
  it('sorts the details and drops undefined values', () => {
    const error = createHosterError('link-dead', 'file removed');
    expect(formatHosterError(error, { url: 'http://example.com/f', module: 'filedrop', attempt: undefined })).toBe(
      '[link-dead/fatal] file removed (module="filedrop" url="http://example.com/f")',
    );
  });

  it('omits the parentheses without details', () => {
    expect(formatHosterError(createNetworkError('timeout'))).toBe('[network/recoverable] timeout');
  });
});

describe('reportHosterError', () => {
  it('prints recoverable errors as notices', () => {
    const error = createNetworkError('connection reset by peer', { url: 'http://example.com/f' });

    expect(reportHosterError(error, { stage: 'transfer', attempt: 2 })).toBe(error);
    expect(output.stderr).toEqual([
      '[network/recoverable] connection reset by peer (attempt=2 stage="transfer" url="http://example.com/f")\n',
    ]);
  });

  it('rethrows fatal errors unless told otherwise', () => {
    const error = createFatalError('unexpected page');

    expect(() => reportHosterError(error, { module: 'filedrop' })).toThrow(error);
    expect(reportHosterError(error, { module: 'filedrop' }, { throwOnFatal: false })).toBe(error);
    expect(output.stderr).toEqual([
      '[fatal/fatal] unexpected page (module="filedrop")\n',
      '[fatal/fatal] unexpected page (module="filedrop")\n',
    ]);
  });

  it('wraps foreign values with the default kind', () => {
    const reported = reportHosterError(new Error('EACCES: permission denied'), { stage: 'cli' }, {
      defaultKind: 'system',
      throwOnFatal: false,
    });

    expect(reported.kind).toBe('system');
    expect(reported.exitCode).toBe(8);
    expect(output.stderr).toEqual(['[system/fatal] EACCES: permission denied (stage="cli")\n']);
  });

  it('hides notices at verbosity 1 but keeps errors', () => {
    setOutputConfig({ verbosity: 1 });

    reportHosterError(createNetworkError('down'));
    reportHosterError(createFatalError('broken'), {}, { throwOnFatal: false });

    expect(output.stderr).toEqual(['[fatal/fatal] broken\n']);
  });
});
