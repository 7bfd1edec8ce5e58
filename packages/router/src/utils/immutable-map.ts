/**
 * Copy-on-write helpers for ReadonlyMap snapshots.
 *
 * Readers hold on to the snapshot they looked up; writers swap in a new Map.
 */

export function mapSet<K, V>(map: ReadonlyMap<K, V>, key: K, value: V): ReadonlyMap<K, V> {
  const next = new Map(map);
  next.set(key, value);
  return next;
}

export function mapDelete<K, V>(map: ReadonlyMap<K, V>, key: K): ReadonlyMap<K, V> {
  if (!map.has(key)) return map;
  const next = new Map(map);
  next.delete(key);
  return next;
}

/**
 * Apply a value update to one entry. Unknown keys leave the map unchanged.
 */
export function mapUpdate<K, V>(
  map: ReadonlyMap<K, V>,
  key: K,
  update: (value: V) => V,
): ReadonlyMap<K, V> {
  const current = map.get(key);
  if (current === undefined) return map;
  return mapSet(map, key, update(current));
}
