/**
 * Logger tests: level filtering, entry fields, child loggers and the
 * console line format.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Writable } from 'stream';
import chalk from 'chalk';
import { ConsoleTransport, Logger, isLogLevel } from '../logger.js';
import type { LogEntry, Transport } from '../logger.js';
import { ValidationError } from '../../errors.js';

class CaptureTransport implements Transport {
  entries: LogEntry[] = [];
  write(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

function captureStream(): { stream: Writable; chunks: string[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, chunks };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Logger levels', () => {
  it('drops debug entries by default', () => {
    const cap = new CaptureTransport();
    const log = new Logger({ transports: [cap] });
    log.debug('d');
    log.warn('w');
    log.error('e');
    expect(cap.entries.map((entry) => entry.level)).toEqual(['warn', 'error']);
  });

  it('level=error keeps errors only', () => {
    const cap = new CaptureTransport();
    const log = new Logger({ level: 'error', transports: [cap] });
    log.debug('d');
    log.warn('w');
    log.error('e');
    expect(cap.entries.map((entry) => entry.message)).toEqual(['e']);
  });

  it('recognises level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('info')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

describe('Logger entries', () => {
  it('carries the plugin, pipeline and context fields', () => {
    const cap = new CaptureTransport();
    const log = new Logger({ level: 'debug', transports: [cap] });
    log.debug('enabled', { plugin: 'minio', pipeline: 'config:base', context: 'plugins:minio' });

    const [entry] = cap.entries;
    expect(entry).toMatchObject({
      level: 'debug',
      message: 'enabled',
      plugin: 'minio',
      pipeline: 'config:base',
      context: 'plugins:minio',
    });
    expect(entry?.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    expect(entry?.error).toBeUndefined();
  });

  it('records error name, message and code', () => {
    const cap = new CaptureTransport();
    const log = new Logger({ transports: [cap] });
    const err = ValidationError.forPlugin('minio', 'patches', 'mapping', 'list');
    log.error('enable failed', { plugin: 'minio', error: err });

    const [entry] = cap.entries;
    expect(entry?.plugin).toBe('minio');
    expect(entry?.error).toMatchObject({
      name: 'ValidationError',
      message: 'Invalid patches in plugin minio: expected mapping, got list',
      code: 'VALIDATION_ERROR',
    });
  });

  it('records a thrown value that is not an Error', () => {
    const cap = new CaptureTransport();
    const log = new Logger({ transports: [cap] });
    log.error('callback failed', { error: 'boom' });
    expect(cap.entries[0]?.error).toEqual({ name: 'string', message: 'boom' });
  });

  it('keeps writing to other transports when one throws', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const failing: Transport = {
      write() {
        throw new Error('disk full');
      },
    };
    const cap = new CaptureTransport();
    new Logger({ transports: [failing, cap] }).warn('still here');

    expect(cap.entries).toHaveLength(1);
    expect(stderr).toHaveBeenCalledWith('Log transport failed: disk full\n');
  });
});

describe('Logger.child', () => {
  it('joins nested component names with a dot', () => {
    const cap = new CaptureTransport();
    const log = new Logger({ transports: [cap] });
    log.child('kernel').child('plugins').warn('ready');
    expect(cap.entries[0]?.component).toBe('kernel.plugins');
  });

  it('keeps the level of its parent', () => {
    const cap = new CaptureTransport();
    const log = new Logger({ level: 'debug', transports: [cap] });
    log.child('cli').debug('hello');
    expect(cap.entries).toHaveLength(1);
  });
});

describe('ConsoleTransport', () => {
  it('writes one line with level, component, message and fields', () => {
    const level = chalk.level;
    chalk.level = 0;
    try {
      const { stream, chunks } = captureStream();
      new ConsoleTransport(stream).write({
        level: 'warn',
        message: 'skipped plugin',
        timestamp: '2024-01-01T00:00:00.000Z',
        component: 'kernel.plugins',
        plugin: 'minio',
        source: 'a.yml',
      });
      expect(chunks).toEqual(['2024-01-01T00:00:00.000Z  WARN [kernel.plugins] skipped plugin plugin=minio source=a.yml\n']);
    } finally {
      chalk.level = level;
    }
  });

  it('appends the error after the fields', () => {
    const level = chalk.level;
    chalk.level = 0;
    try {
      const { stream, chunks } = captureStream();
      new ConsoleTransport(stream).write({
        level: 'error',
        message: "Error applying explode for filter 'total'",
        timestamp: '2024-01-01T00:00:00.000Z',
        pipeline: 'total',
        callback: 'explode',
        error: { name: 'TypeError', message: 'bad input' },
      });
      expect(chunks).toEqual([
        "2024-01-01T00:00:00.000Z ERROR Error applying explode for filter 'total' pipeline=total callback=explode | TypeError: bad input\n",
      ]);
    } finally {
      chalk.level = level;
    }
  });
});
