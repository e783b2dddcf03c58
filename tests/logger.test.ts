import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { closeLogger, initLogger, logError, logInfo, logVerbose } from '../src/logger';

import type { MockInstance } from 'vitest';
import type { TransferConfig } from '../src/types';

function makeConfig(verbose: boolean): TransferConfig {
  return {
    source: { provider: 'gcs', bucket: 'media-archive' },
    target: { folderName: 'Backup' },
    concurrency: 1,
    verbose,
  };
}

describe('logger', () => {
  let consoleLog: MockInstance;

  beforeEach(() => {
    consoleLog = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    closeLogger();
    vi.restoreAllMocks();
  });

  it('hides debug lines unless verbose', () => {
    initLogger(makeConfig(false));
    logVerbose('folder cache miss');
    expect(consoleLog).not.toHaveBeenCalled();

    closeLogger();
    initLogger(makeConfig(true));
    logVerbose('folder cache miss');
    expect(consoleLog).toHaveBeenCalledTimes(1);
    expect(consoleLog).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] folder cache miss'));
  });

  it('prints info lines with their level', () => {
    initLogger(makeConfig(false));
    logInfo('Workers: 4');
    expect(consoleLog).toHaveBeenCalledWith(expect.stringContaining('[INFO] Workers: 4'));
  });

  it('prints error stacks only in verbose mode', () => {
    initLogger(makeConfig(false));
    logError('Upload failed', new Error('quota exceeded'));
    expect(consoleLog).toHaveBeenCalledTimes(1);

    closeLogger();
    consoleLog.mockClear();
    initLogger(makeConfig(true));
    logError('Upload failed', new Error('quota exceeded'));
    expect(consoleLog).toHaveBeenCalledTimes(2);
    expect(consoleLog).toHaveBeenLastCalledWith(expect.stringContaining('Error: quota exceeded'));
  });

  it('keeps skipped lines off the console', () => {
    initLogger(makeConfig(true));
    logError('file only', new Error('details'), true);
    expect(consoleLog).not.toHaveBeenCalled();
  });
});
