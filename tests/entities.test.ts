import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { EntityRegistry, loadRegistries } from '../src/services/entities.js';
import { PROJECT_ROOT } from '../src/config.js';
import { makeRegistry } from './helpers.js';

describe('EntityRegistry', () => {
  it('resolves ids, display names and aliases regardless of case and punctuation', () => {
    const registry = makeRegistry();
    expect(registry.resolve('Labor')?.id).toBe('Labor');
    expect(registry.resolve('alp')?.id).toBe('Labor');
    expect(registry.resolve('ONE NATION')?.id).toBe('OneNation');
    expect(registry.resolve('one-nation')?.id).toBe('OneNation');
    expect(registry.resolve('liberal party')?.id).toBe('Coalition');
    expect(registry.resolve('Teals')).toBeUndefined();
    expect(registry.resolve('')).toBeUndefined();
  });

  it('falls back to the id when asked for the name of an unknown entity', () => {
    const registry = makeRegistry();
    expect(registry.nameOf('OneNation')).toBe('One Nation');
    expect(registry.nameOf('Teals')).toBe('Teals');
  });

  it('lists entities in configuration order', () => {
    expect(makeRegistry().list().map((e) => e.id)).toEqual(['Labor', 'Coalition', 'Greens', 'OneNation']);
  });

  it('loads one registry per region from the bundled entity file', () => {
    const registries = loadRegistries(path.join(PROJECT_ROOT, 'config', 'entities.json'));
    expect(Array.from(registries.keys())).toEqual(['national', 'victoria']);

    const national = registries.get('national');
    expect(national?.list().map((e) => e.id)).toEqual(['Labor', 'Coalition', 'Greens', 'OneNation']);
    expect(national?.resolve("Pauline Hanson's One Nation")?.id).toBe('OneNation');
    expect(national?.resolve('Liberal Party')?.id).toBe('Coalition');
    expect(national?.resolve('Greens')).toEqual({ id: 'Greens', name: 'Greens', color: '#10C25B' });

    const victoria = registries.get('victoria');
    expect(victoria?.list().map((e) => e.id)).toEqual(['Labor', 'Liberal', 'Nationals', 'Greens']);
    expect(victoria?.resolve('Liberal Party')?.id).toBe('Liberal');
    expect(victoria?.resolve('The Nationals')?.id).toBe('Nationals');
    expect(victoria?.resolve('One Nation')).toBeUndefined();
  });

  it('refuses a region that shadows the top-level set', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'party-pulse-entities-'));
    try {
      const file = path.join(dir, 'entities.json');
      const set = { entities: [{ id: 'Labor', name: 'Labor' }] };
      await fs.writeFile(file, JSON.stringify({ ...set, regions: { national: set } }));
      expect(() => loadRegistries(file)).toThrow('"national" is the top-level entity set');
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('rejects duplicate ids and aliases to unknown ids', () => {
    expect(
      () =>
        new EntityRegistry([
          { id: 'Labor', name: 'Labor' },
          { id: 'Labor', name: 'ALP' },
        ]),
    ).toThrow('Duplicate entity id: Labor');
    expect(() => new EntityRegistry([{ id: 'Labor', name: 'Labor' }], { Teals: 'Independents' })).toThrow(
      'Alias "Teals" points at unknown entity id: Independents',
    );
  });

  it('rejects names and aliases that collide with another entity after normalization', () => {
    expect(
      () =>
        new EntityRegistry(
          [
            { id: 'Labor', name: 'Labor' },
            { id: 'Greens', name: 'Greens' },
          ],
          { "GREEN'S": 'Labor' },
        ),
    ).toThrow('Alias "GREEN\'S" for Labor collides with the lookup key of Greens');
    expect(
      () =>
        new EntityRegistry([
          { id: 'OneNation', name: 'One Nation' },
          { id: 'Other', name: 'one-nation' },
        ]),
    ).toThrow('Entity name "one-nation" for Other collides with the lookup key of OneNation');
  });

  it('accepts an alias that repeats its own entity name', () => {
    const registry = new EntityRegistry([{ id: 'OneNation', name: 'One Nation' }], { 'ONE NATION': 'OneNation' });
    expect(registry.resolve('one nation')?.id).toBe('OneNation');
  });
});
