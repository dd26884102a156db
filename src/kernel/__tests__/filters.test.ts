import { describe, it, expect, beforeEach } from 'vitest';
import { Logger } from '../../logging/logger.js';
import type { LogEntry } from '../../logging/logger.js';
import { NotInstalledError, PipelineError } from '../../errors.js';
import { ContextStack } from '../contexts.js';
import { FilterRegistry } from '../filters.js';

interface TestFilters {
  numbers: { value: number[]; args: [] };
  total: { value: number; args: [step: number] };
  text: { value: string; args: [] };
}

describe('FilterRegistry', () => {
  let contexts: ContextStack;
  let entries: LogEntry[];
  let filters: FilterRegistry<TestFilters>;

  beforeEach(() => {
    contexts = new ContextStack();
    entries = [];
    const logger = new Logger({ level: 'debug', transports: [{ write: (entry) => entries.push(entry) }] });
    filters = new FilterRegistry<TestFilters>(contexts, logger);
  });

  // ---- Folding ---------------------------------------------------------------

  it('returns the value unchanged when nothing is registered', () => {
    expect(filters.apply('text', 'hello')).toBe('hello');
  });

  it('folds callbacks in registration order, whatever their context', () => {
    filters.add('text', (value) => value + 'a');
    contexts.enter('c1', () => filters.add('text', (value) => value + 'b'));
    filters.add('text', (value) => value + 'c', 'c2');
    contexts.enter('c1', () => contexts.enter('c3', () => filters.add('text', (value) => value + 'd')));
    filters.add('text', (value) => value + 'e');

    expect(filters.apply('text', '')).toBe('abcde');
  });

  it('passes extra arguments to every callback', () => {
    filters.add('total', (value, step) => value + step);
    filters.add('total', (value, step) => value * step);
    expect(filters.apply('total', 1, 3)).toBe(12);
  });

  it('does not run entries added while a fold is in progress', () => {
    filters.add('text', function grow(value) {
      filters.add('text', (inner) => inner + '!');
      return value + 'x';
    });
    expect(filters.apply('text', '')).toBe('x');
    expect(filters.count('text')).toBe(2);
  });

  // ---- Items -----------------------------------------------------------------

  it('addItems concatenates without touching the list passed in', () => {
    filters.addItems('numbers', [1, 2]);
    filters.addItem('numbers', 3);
    const list = [0];
    const result = filters.apply('numbers', list);
    expect(result).toEqual([0, 1, 2, 3]);
    expect(result).not.toBe(list);
    expect(list).toEqual([0]);
  });

  it('addItems keeps its own copy of the items', () => {
    const items = [1];
    filters.addItems('numbers', items);
    items.push(2);
    expect(filters.apply('numbers', [])).toEqual([1]);
  });

  // ---- Contexts --------------------------------------------------------------

  it('tags entries with the current context unless one is given', () => {
    contexts.enter('c', () => {
      filters.addItem('numbers', 1);
      filters.addItem('numbers', 2, 'explicit');
    });
    expect(filters.applyScoped('numbers', { context: 'c' }, [])).toEqual([1]);
    expect(filters.applyScoped('numbers', { context: 'explicit' }, [])).toEqual([2]);
  });

  it('a scoped apply excludes entries of other contexts and keeps unscoped ones', () => {
    filters.addItem('numbers', 1);
    filters.addItem('numbers', 2, 'c');
    filters.addItem('numbers', 3, 'other');

    expect(filters.apply('numbers', [])).toEqual([1, 2, 3]);
    expect(filters.applyScoped('numbers', { context: 'other' }, [])).toEqual([1, 3]);
  });

  it('a scoped apply with descendants includes nested contexts', () => {
    filters.addItem('numbers', 1, 'plugins:a');
    filters.addItem('numbers', 2, 'plugins:a:sub');
    filters.addItem('numbers', 3, 'plugins:b');

    expect(filters.applyScoped('numbers', { context: 'plugins:a', descendants: true }, [])).toEqual([1, 2]);
    expect(filters.applyScoped('numbers', { context: 'plugins:a' }, [])).toEqual([1]);
  });

  // ---- Clearing --------------------------------------------------------------

  it('clearing a context removes exactly its entries', () => {
    filters.addItem('numbers', 1);
    filters.addItem('numbers', 2, 'c');
    filters.addItem('numbers', 3, 'c:nested');
    filters.addItem('numbers', 4, 'other');

    filters.clear('numbers', { context: 'c' });
    expect(filters.apply('numbers', [])).toEqual([1, 3, 4]);
  });

  it('clearing with descendants removes the whole subtree', () => {
    filters.addItem('numbers', 1, 'plugins');
    filters.addItem('numbers', 2, 'plugins:a');
    filters.addItem('numbers', 3, 'plugins:a:sub');

    filters.clearAll({ context: 'plugins:a', descendants: true });
    expect(filters.apply('numbers', [])).toEqual([1]);
  });

  it('clearing without a context removes every entry', () => {
    filters.addItem('numbers', 1);
    filters.addItem('numbers', 2, 'c');
    filters.clear('numbers');
    expect(filters.apply('numbers', [])).toEqual([]);
  });

  it('reports names and counts', () => {
    filters.addItem('numbers', 1, 'c');
    filters.add('text', (value) => value);
    expect(filters.names()).toEqual(['numbers', 'text']);
    expect(filters.count('numbers', { context: 'other' })).toBe(0);

    filters.reset();
    expect(filters.names()).toEqual([]);
  });

  // ---- Errors ----------------------------------------------------------------

  it('wraps a callback error in a PipelineError and logs it', () => {
    const explode = (): number => {
      throw new TypeError('bad input');
    };
    filters.add('total', (value) => value + 1);
    filters.add('total', explode, 'c');
    filters.add('total', (value) => value + 100);

    let caught: unknown;
    try {
      filters.apply('total', 0, 1);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(PipelineError);
    const err = caught instanceof PipelineError ? caught : undefined;
    expect(err?.message).toBe("Error in explode for pipeline 'total': bad input");
    expect(err?.cause).toBeInstanceOf(TypeError);

    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe('error');
    expect(entries[0]?.message).toBe("Error applying explode for filter 'total'");
    expect(entries[0]).toMatchObject({ pipeline: 'total', callback: 'explode', context: 'c' });
    expect(entries[0]?.error).toMatchObject({ name: 'TypeError', message: 'bad input' });
  });

  it('re-raises kernel errors as they are', () => {
    const original = new NotInstalledError('minio');
    filters.add('text', () => {
      throw original;
    });
    expect(() => filters.apply('text', '')).toThrow(original);
  });
});
