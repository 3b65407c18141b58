/**
 * Tests for KnowledgeSourceRegistry
 */

import { describe, it, expect, vi } from 'vitest';
import { KnowledgeSourceRegistry, createSource } from './registry.js';
import type { KnowledgeSource, SourceKind } from './types.js';
import type { SourceName } from '../../types/index.js';

function fakeSource(
  name: SourceName,
  kind: SourceKind,
  search: (query: string, topK: number) => Promise<string[]>
): KnowledgeSource {
  return { name, kind, search: vi.fn(search) };
}

describe('KnowledgeSourceRegistry', () => {
  it('should merge results in the order the names are given', async () => {
    const registry = new KnowledgeSourceRegistry([
      fakeSource('wikipedia', 'text', async () => ['from wikipedia']),
      fakeSource('duckduckgo', 'text', async () => ['from web', '  ']),
    ]);

    const items = await registry.searchMany(['duckduckgo', 'wikipedia'], 'query', 3);

    expect(items).toEqual([
      { content: 'from web', source: 'duckduckgo' },
      { content: 'from wikipedia', source: 'wikipedia' },
    ]);
  });

  it('should skip sources that reject or time out', async () => {
    const registry = new KnowledgeSourceRegistry(
      [
        fakeSource('wikipedia', 'text', async () => {
          throw new Error('boom');
        }),
        fakeSource('duckduckgo', 'text', () => new Promise<string[]>(() => undefined)),
        fakeSource('wikidata_sparql', 'structured', async () => ['item: Q90']),
      ],
      20
    );

    const items = await registry.searchMany(['wikipedia', 'duckduckgo', 'wikidata_sparql'], 'query', 3);

    expect(items).toEqual([{ content: 'item: Q90', source: 'wikidata_sparql' }]);
  });

  it('should ignore names that are not registered', async () => {
    const registry = new KnowledgeSourceRegistry([fakeSource('wikipedia', 'text', async () => ['x'])]);
    expect(await registry.searchMany(['duckduckgo'], 'query', 3)).toEqual([]);
  });

  it('should group searchAll results by source', async () => {
    const registry = new KnowledgeSourceRegistry([
      fakeSource('wikipedia', 'text', async () => ['a', 'b']),
      fakeSource('duckduckgo', 'text', async () => []),
    ]);

    expect(await registry.searchAll('query', 2)).toEqual({ wikipedia: ['a', 'b'], duckduckgo: [] });
  });

  it('should list names in registration order and look sources up', () => {
    const wiki = fakeSource('wikipedia', 'text', async () => []);
    const registry = new KnowledgeSourceRegistry([wiki]);
    registry.register(fakeSource('wikidata_sparql', 'structured', async () => []));

    expect(registry.names()).toEqual(['wikipedia', 'wikidata_sparql']);
    expect(registry.get('wikipedia')).toBe(wiki);
    expect(registry.get('duckduckgo')).toBeUndefined();
  });
});

describe('createSource', () => {
  it('should build each known source with its kind', () => {
    expect(createSource('wikipedia').kind).toBe('text');
    expect(createSource('wikidata_sparql').kind).toBe('structured');
    expect(createSource('duckduckgo').name).toBe('duckduckgo');
  });
});
