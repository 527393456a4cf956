// src/lookups.ts

export interface NamedEntity {
  id: number;
  name: string;
}

export type NameLookup = ReadonlyMap<number, string>;

/**
 * id -> name. Ids are unique upstream; if they are not, the last one wins.
 */
export function buildLookup(entities: readonly NamedEntity[]): NameLookup {
  const lookup = new Map<number, string>();
  for (const entity of entities) {
    lookup.set(entity.id, entity.name);
  }
  return lookup;
}

export function resolveName(lookup: NameLookup, id: number | null | undefined): string {
  if (id === null || id === undefined) return "";
  return lookup.get(id) ?? "";
}
