/**
 * Unit Tests: Logger
 *
 * Tests level filtering, bound context, and secret redaction in
 * context objects and free text.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Logger, redactString, redactPatterns, redactContext, type LogLevel } from '../../src/utils/logger.js';

function capture(level: LogLevel = 'info', extra: { json?: boolean; filePath?: string } = {}) {
  const lines: string[] = [];
  const logger = new Logger({ level, timestamps: false, sink: (line) => lines.push(line), ...extra });
  return { lines, logger };
}

describe('Logger', () => {
  it('drops entries below the level', () => {
    const { lines, logger } = capture('info');

    logger.debug('hidden');
    logger.info('shown');

    expect(lines).toEqual(['[INFO] shown']);
  });

  it('redacts sensitive context keys', () => {
    const { lines, logger } = capture();

    logger.info('registering node', { node: 'node-a', token: 'test-secret-value', password: 'pw' });

    expect(lines).toEqual(['[INFO] registering node {"node":"node-a","token":"test...alue","password":"[REDACTED]"}']);
  });

  it('carries bound context into child loggers', () => {
    const { lines, logger } = capture();

    logger.child({ component: 'probe' }).warn('slow host', { address: '10.0.0.1' });

    expect(lines).toEqual(['[WARN] slow host {"component":"probe","address":"10.0.0.1"}']);
  });

  it('writes JSON lines in json mode', () => {
    const { lines, logger } = capture('info', { json: true });

    logger.error('apply failed', new Error('exit 1'));

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? '');
    expect(entry).toMatchObject({ level: 'error', message: 'apply failed', error: { name: 'Error', message: 'exit 1' } });
  });

  describe('file log', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'fleet-log-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('appends every level to the file', async () => {
      const filePath = join(dir, 'logs', 'run.log');
      const { lines, logger } = capture('warn', { filePath });

      logger.debug('detail');
      logger.warn('careful');

      expect(lines).toEqual(['[WARN] careful']);
      const written = (await readFile(filePath, 'utf-8')).trim().split('\n').map((l): unknown => JSON.parse(l));
      expect(written).toMatchObject([
        { level: 'debug', message: 'detail' },
        { level: 'warn', message: 'careful' },
      ]);
    });
  });
});

describe('redaction helpers', () => {
  it('keeps the ends of long values only', () => {
    expect(redactString('test-secret-value')).toBe('test...alue');
    expect(redactString('short')).toBe('[REDACTED]');
  });

  it('masks key=value secrets in free text', () => {
    expect(redactPatterns('login password=abc&user=x')).toBe('login password=[REDACTED]&user=x');
  });

  it('masks bearer tokens', () => {
    expect(redactPatterns('Authorization: Bearer placeholder')).toBe('Authorization: Bear...lder');
  });

  it('walks nested objects and arrays', () => {
    expect(redactContext({ vars: { panel_password: 'pw', hosts: ['a'] }, list: [{ secret: 42 }] })).toEqual({
      vars: { panel_password: '[REDACTED]', hosts: ['a'] },
      list: [{ secret: '[REDACTED]' }],
    });
  });
});
