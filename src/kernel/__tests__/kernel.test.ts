import { describe, it, expect, vi } from 'vitest';
import { Logger } from '../../logging/logger.js';
import { enableTrigger } from '../catalog.js';
import { createKernel } from '../kernel.js';

describe('Kernel', () => {
  const quiet = (): Logger => new Logger({ transports: [] });

  it('clear removes matching entries from both registries', () => {
    const kernel = createKernel({ logger: quiet() });
    const trigger = vi.fn();
    kernel.filters.addItem('env:templates:roots', '/kept');
    kernel.filters.addItem('env:templates:roots', '/dropped', 'plugins:a');
    kernel.actions.add(enableTrigger('a'), trigger, 'plugins:a');

    kernel.clear({ context: 'plugins:a' });

    expect(kernel.filters.apply('env:templates:roots', [])).toEqual(['/kept']);
    kernel.actions.do(enableTrigger('a'));
    expect(trigger).not.toHaveBeenCalled();
  });

  it('reset returns to a fresh state', () => {
    const kernel = createKernel({ logger: quiet() });
    kernel.filters.addItem('env:templates:roots', '/root');
    kernel.actions.do('plugins:install');

    kernel.contexts.enter('plugins', () => kernel.reset());

    expect(kernel.filters.names()).toEqual([]);
    expect(kernel.actions.isDone('plugins:install')).toBe(false);
    expect(kernel.contexts.current()).toBeUndefined();
  });

  it('kernels do not share state', () => {
    const first = createKernel({ logger: quiet() });
    const second = createKernel({ logger: quiet() });
    first.filters.addItem('env:templates:roots', '/root');
    expect(second.filters.apply('env:templates:roots', [])).toEqual([]);
  });
});
