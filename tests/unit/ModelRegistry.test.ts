import { describe, it, expect, vi } from 'vitest';
import { ModelRegistry } from '../../src/core/ModelRegistry.js';
import { UnknownModelError } from '../../src/utils/errors.js';
import { FakeAdapter } from '../fixtures/fakeAdapter.js';

describe('ModelRegistry', () => {
  it('resolves a model to the first adapter that serves it', () => {
    const first = new FakeAdapter({ models: ['gpt-4'] });
    const second = new FakeAdapter({ models: ['gpt-4', 'claude-2'] });
    const registry = new ModelRegistry([first, second]);

    expect(registry.resolve('gpt-4')).toBe(first);
    expect(registry.resolve('claude-2')).toBe(second);
    expect(registry.size).toBe(2);
  });

  it('raises UnknownModelError for a model no adapter serves', () => {
    const registry = new ModelRegistry([new FakeAdapter()]);
    expect(() => registry.resolve('llama')).toThrow(UnknownModelError);
    expect(() => registry.resolve('llama')).toThrow('Unknown model: llama');
  });

  it('lists every model with its owner', async () => {
    const registry = new ModelRegistry([new FakeAdapter({ models: ['gpt-4', 'gpt-3.5-turbo'] })]);

    expect(await registry.listModels()).toEqual([
      { id: 'gpt-4', object: 'model', owned_by: 'openai' },
      { id: 'gpt-3.5-turbo', object: 'model', owned_by: 'openai' },
    ]);
  });

  it('skips and logs an adapter whose listing fails', async () => {
    const broken = new FakeAdapter({ models: ['x'] });
    vi.spyOn(broken, 'listModels').mockRejectedValue(new Error('cache unreadable'));
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const registry = new ModelRegistry([broken, new FakeAdapter({ models: ['gpt-4'] })], logger);

    expect((await registry.listModels()).map((m) => m.id)).toEqual(['gpt-4']);
    expect(logger.warn).toHaveBeenCalledWith({ provider: 'openai', err: 'cache unreadable' }, 'list models failed');
  });
});
