// tests/unit/adapterRegistry.test.ts

import { describe, it, expect, vi } from 'vitest';
import { AdapterRegistry } from '../../src/scrapers/adapterRegistry';
import { GenericAdapter } from '../../src/scrapers/genericAdapter';
import { ConfigurationError } from '../../src/core/errors';
import type { SiteAdapter } from '../../src/scrapers/baseAdapter';

function stubAdapter(id: string): SiteAdapter {
  return {
    id,
    classifyPage: () => 'generic',
    extractGeneric: async (_content, url) => ({ url }),
  };
}

describe('AdapterRegistry', () => {
  it('should ship with the generic adapter', () => {
    const registry = AdapterRegistry.withDefaults();

    expect(registry.list()).toEqual(['generic']);
    expect(registry.create('generic')).toBeInstanceOf(GenericAdapter);
  });

  it('should register adapters and pass config to their factories', () => {
    const factory = vi.fn((config: Record<string, unknown>) => stubAdapter(String(config.site)));
    const registry = new AdapterRegistry().register('shop', factory).register('blog', () => stubAdapter('blog'));

    const adapter = registry.create('shop', { site: 'shop.test' });

    expect(adapter.id).toBe('shop.test');
    expect(factory).toHaveBeenCalledWith({ site: 'shop.test' });
    expect(registry.list()).toEqual(['shop', 'blog']);
    expect(registry.has('blog')).toBe(true);
  });

  it('should replace an existing registration', () => {
    const registry = new AdapterRegistry()
      .register('shop', () => stubAdapter('first'))
      .register('shop', () => stubAdapter('second'));

    expect(registry.create('shop').id).toBe('second');
  });

  it('should reject empty ids', () => {
    expect(() => new AdapterRegistry().register('  ', () => stubAdapter('x'))).toThrow(ConfigurationError);
  });

  it('should fail on unknown ids', () => {
    expect(() => AdapterRegistry.withDefaults().create('unknown')).toThrow('No adapter registered for site "unknown"');
  });

  it('should resolve unknown ids to the fallback', () => {
    const registry = AdapterRegistry.withDefaults().register('shop', () => stubAdapter('shop'));

    expect(registry.resolve('shop').id).toBe('shop');
    expect(registry.resolve('unknown').id).toBe('generic');
    expect(() => registry.resolve('unknown', 'missing')).toThrow(ConfigurationError);
  });
});
