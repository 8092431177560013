import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createConsoleLogger, logTableInfo } from '../src/logger';
import { createTestLogger } from './helpers';

describe('Console Logger', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'picking-logger-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(workDir, { recursive: true, force: true });
  });

  it('should route levels to the matching console method', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createConsoleLogger({ level: 'info' });

    logger.debug('hidden');
    logger.info('loaded');
    logger.warn('careful');
    logger.error('broken');

    expect(log.mock.calls).toEqual([['[INFO] loaded']]);
    expect(warn.mock.calls).toEqual([['[WARN] careful']]);
    expect(error.mock.calls).toEqual([['[ERROR] broken']]);
  });

  it('should print nothing when silent', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createConsoleLogger({ level: 'silent' });

    logger.info('loaded');
    logger.error('broken');

    expect(log).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });

  it('should append every record to the log file', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const file = join(workDir, 'picking.log');
    const logger = createConsoleLogger({
      level: 'warn',
      file,
      now: () => new Date(2024, 2, 28, 9, 5, 7),
    });

    logger.debug('columns');
    logger.warn('careful');

    expect(readFileSync(file, 'utf8')).toBe(
      '2024-03-28 09:05:07 [DEBUG] columns\n2024-03-28 09:05:07 [WARN] careful\n'
    );
  });

  it('should log table shape and columns', () => {
    const { logger, messages } = createTestLogger();

    logTableInfo(logger, 'CM Picking', { headers: ['No', 'Part Number'], rows: [{}, {}, {}] });

    expect(messages('info')).toEqual(['CM Picking - rows: 3, columns: 2']);
    expect(messages('debug')).toEqual(['CM Picking - columns: No, Part Number']);
  });
});
