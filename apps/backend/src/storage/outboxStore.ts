import { z } from 'zod';
import { zUint64 } from '@crossvote/shared';
import { readStateFile, writeStateFile } from './stateFile.js';

const OutboxFileSchema = z.object({
  version: z.literal(1),
  counters: z.record(zUint64),
});

/**
 * Per-destination sequence numbers for outgoing votes. A nonce is consumed
 * even when the send fails, so no two messages ever share one.
 *
 * Destinations without a stored counter start at `epoch`. Receivers key
 * vote dedup on the nonce, so a node that does not persist its counters
 * must start each boot above every nonce it issued before.
 */
export interface OutboxStore {
  next(destination: number): bigint;
  peek(destination: number): bigint;
}

export function createOutboxStore(options: { file?: string; epoch?: bigint } = {}): OutboxStore {
  const epoch = options.epoch ?? 0n;
  const counters = new Map<number, bigint>();
  if (options.file) {
    const loaded = readStateFile(options.file, OutboxFileSchema);
    for (const [destination, last] of Object.entries(loaded?.counters ?? {})) {
      counters.set(Number(destination), last);
    }
  }

  function persist(): void {
    if (!options.file) return;
    const out: Record<string, string> = {};
    for (const [destination, last] of counters) out[String(destination)] = last.toString();
    writeStateFile(options.file, { version: 1, counters: out });
  }

  return {
    next(destination) {
      const previous = counters.get(destination);
      const nonce = (previous ?? epoch) + 1n;
      counters.set(destination, nonce);
      try {
        persist();
      } catch (err) {
        if (previous === undefined) counters.delete(destination);
        else counters.set(destination, previous);
        throw err;
      }
      return nonce;
    },
    peek: (destination) => counters.get(destination) ?? epoch,
  };
}
