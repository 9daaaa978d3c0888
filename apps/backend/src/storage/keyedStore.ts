import type { Hex } from 'viem';
import { z } from 'zod';
import { normalizeId } from '../lib/hex.js';
import { readStateFile, writeStateFile, StateFileError } from './stateFile.js';

const StoreFileSchema = z.object({
  version: z.literal(1),
  entries: z.array(z.unknown()),
});

/**
 * bytes32-keyed record store. In memory, optionally mirrored to a JSON file.
 * `put` is all-or-nothing: if the file write fails the previous value is restored.
 */
export interface KeyedStore<V> {
  get(id: Hex): V | undefined;
  has(id: Hex): boolean;
  list(): V[];
  put(value: V): void;
}

export interface KeyedStoreOptions<V, E> {
  file?: string;
  entrySchema: z.ZodType<E, z.ZodTypeDef, unknown>;
  keyOf: (value: V) => Hex;
  encode: (value: V) => unknown;
  decode: (entry: E) => V;
}

export function createKeyedStore<V, E>(options: KeyedStoreOptions<V, E>): KeyedStore<V> {
  const records = new Map<Hex, V>();

  if (options.file) {
    const file = options.file;
    const loaded = readStateFile(file, StoreFileSchema);
    (loaded?.entries ?? []).forEach((raw, index) => {
      const parsed = options.entrySchema.safeParse(raw);
      if (!parsed.success) {
        throw new StateFileError(file, `entry ${index}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      }
      let value: V;
      try {
        value = options.decode(parsed.data);
      } catch (err) {
        throw new StateFileError(file, `entry ${index} failed validation`, { cause: err });
      }
      records.set(normalizeId(options.keyOf(value)), value);
    });
  }

  function persist(): void {
    if (!options.file) return;
    writeStateFile(options.file, {
      version: 1,
      entries: [...records.values()].map(options.encode),
    });
  }

  return {
    get: (id) => records.get(normalizeId(id)),
    has: (id) => records.has(normalizeId(id)),
    list: () => [...records.values()],
    put(value) {
      const key = normalizeId(options.keyOf(value));
      const previous = records.get(key);
      records.set(key, value);
      try {
        persist();
      } catch (err) {
        if (previous === undefined) records.delete(key);
        else records.set(key, previous);
        throw err;
      }
    },
  };
}
