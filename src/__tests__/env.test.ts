import os from 'os';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { DEFAULT_PLUGINS_ROOT, expandHome, resolvePluginsRoot, resolveProjectRoot } from '../env.js';

describe('env', () => {
  it('defaults the plugins root to the home directory', () => {
    expect(resolvePluginsRoot({})).toBe(DEFAULT_PLUGINS_ROOT);
    expect(DEFAULT_PLUGINS_ROOT).toBe(path.join(os.homedir(), '.deckhand', 'plugins'));
  });

  it('reads the plugins root from DECKHAND_PLUGINS_ROOT', () => {
    expect(resolvePluginsRoot({ DECKHAND_PLUGINS_ROOT: '/srv/plugins' })).toBe('/srv/plugins');
    expect(resolvePluginsRoot({ DECKHAND_PLUGINS_ROOT: '~/plugins' })).toBe(path.join(os.homedir(), 'plugins'));
  });

  it('expands only a leading tilde', () => {
    expect(expandHome('~', '/home/test')).toBe('/home/test');
    expect(expandHome('~/a', '/home/test')).toBe(path.join('/home/test', 'a'));
    expect(expandHome('a/~', '/home/test')).toBe('a/~');
  });

  it('resolves the project root against the working directory', () => {
    expect(resolveProjectRoot({}, '/work')).toBe(path.resolve('/work'));
    expect(resolveProjectRoot({ DECKHAND_ROOT: 'site' }, '/work')).toBe(path.resolve('/work', 'site'));
  });
});
