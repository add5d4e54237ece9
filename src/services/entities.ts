import { readFileSync } from 'node:fs';
import type { Entity, EntityId } from '../types.js';
import { DEFAULT_REGION } from '../constants/pipeline.js';
import { EntitiesFileSchema } from '../schemas/reports.js';
import { toLookupKey } from '../utils/normalize.js';

/**
 * The configured entity list plus the alias table (raw name -> canonical id).
 * Passed explicitly to the ingestor; there is no process-wide instance.
 */
export class EntityRegistry {
  private readonly byId = new Map<EntityId, Entity>();
  private readonly byKey = new Map<string, EntityId>();

  constructor(entities: readonly Entity[], aliases: Record<string, EntityId> = {}) {
    for (const entity of entities) {
      if (this.byId.has(entity.id)) {
        throw new Error(`Duplicate entity id: ${entity.id}`);
      }
      this.byId.set(entity.id, Object.freeze({ ...entity }));
    }
    for (const entity of entities) {
      this.claim(entity.id, entity.id, 'Entity id');
      this.claim(entity.name, entity.id, 'Entity name');
    }
    for (const [alias, id] of Object.entries(aliases)) {
      if (!this.byId.has(id)) {
        throw new Error(`Alias "${alias}" points at unknown entity id: ${id}`);
      }
      this.claim(alias, id, 'Alias');
    }
  }

  // one lookup key per entity; a name that normalizes onto another entity's key is a config error
  private claim(raw: string, id: EntityId, what: string) {
    const key = toLookupKey(raw);
    const owner = this.byKey.get(key);
    if (owner !== undefined && owner !== id) {
      throw new Error(`${what} "${raw}" for ${id} collides with the lookup key of ${owner}`);
    }
    this.byKey.set(key, id);
  }

  /** Resolve free text from a report to an entity, or undefined if unknown. */
  resolve(name: string): Entity | undefined {
    const id = this.byKey.get(toLookupKey(name));
    return id === undefined ? undefined : this.byId.get(id);
  }

  nameOf(id: EntityId): string {
    return this.byId.get(id)?.name ?? id;
  }

  list(): Entity[] {
    return Array.from(this.byId.values());
  }
}

/**
 * One registry per region in the entities file, the top-level set under `national`.
 */
export function loadRegistries(filePath: string): Map<string, EntityRegistry> {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  const parsed = EntitiesFileSchema.parse(raw);
  if (DEFAULT_REGION in parsed.regions) {
    throw new Error(`"${DEFAULT_REGION}" is the top-level entity set and cannot be listed under regions`);
  }

  const registries = new Map([[DEFAULT_REGION, new EntityRegistry(parsed.entities, parsed.aliases)]]);
  for (const [region, set] of Object.entries(parsed.regions)) {
    registries.set(region, new EntityRegistry(set.entities, set.aliases));
  }
  return registries;
}
