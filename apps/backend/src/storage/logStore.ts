import { existsSync, mkdirSync, appendFileSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import crypto from 'node:crypto';
import { LogEventSchema, type LogEvent, type LogEventType, type LogLevel } from '@crossvote/shared';

// ─── Config ──────────────────────────────────────────────

/** Events kept in memory for GET /api/events; the JSONL file keeps everything. */
const MAX_BUFFERED = Number(process.env.EVENT_BUFFER_MAX ?? '5000');

export type EventListener = (event: LogEvent) => void;

/**
 * Audit trail of one chain node. Every accepted state change and every
 * cross-chain hand-off is appended here; indexers subscribe instead of
 * polling the stores.
 */
export interface EventLog {
  append(type: LogEventType, payload: Record<string, unknown>, level?: LogLevel): LogEvent;
  readLatest(limit?: number): LogEvent[];
  readByType(type: LogEventType): LogEvent[];
  subscribe(listener: EventListener): () => void;
}

export function createLogEvent(
  chainId: number,
  type: LogEventType,
  payload: Record<string, unknown>,
  level: LogLevel = 'INFO',
): LogEvent {
  return {
    id: crypto.randomUUID(),
    timestamp: Date.now(),
    chainId,
    type,
    payload,
    level,
  };
}

function loadExisting(file: string): LogEvent[] {
  if (!existsSync(file)) return [];
  const lines = readFileSync(file, 'utf-8').split('\n').filter(Boolean);
  const events: LogEvent[] = [];
  let skipped = 0;
  for (const line of lines.slice(-MAX_BUFFERED)) {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      skipped++;
      continue;
    }
    const parsed = LogEventSchema.safeParse(raw);
    if (parsed.success) events.push(parsed.data);
    else skipped++;
  }
  if (skipped > 0) {
    console.warn(`[logStore] skipped ${skipped} malformed line(s) in ${file}`);
  }
  return events;
}

export function createEventLog(options: { chainId: number; file?: string }): EventLog {
  const { chainId, file } = options;
  const buffer: LogEvent[] = file ? loadExisting(file) : [];
  const listeners = new Set<EventListener>();

  if (file && !existsSync(dirname(file))) {
    mkdirSync(dirname(file), { recursive: true });
  }

  return {
    append(type, payload, level = 'INFO') {
      const event = createLogEvent(chainId, type, payload, level);
      // The state change this event records is already committed; a failed
      // append must not turn it into an error for the caller.
      if (file) {
        try {
          appendFileSync(file, JSON.stringify(event) + '\n', 'utf-8');
        } catch (err) {
          console.error(`[logStore] failed to append ${type} to ${file}:`, err);
        }
      }
      buffer.push(event);
      if (buffer.length > MAX_BUFFERED) buffer.shift();
      for (const listener of listeners) {
        try {
          listener(event);
        } catch (err) {
          console.error(`[logStore] listener failed on ${type}:`, err);
        }
      }
      return event;
    },

    readLatest(limit = 100) {
      return buffer.slice(Math.max(0, buffer.length - limit));
    },

    readByType(type) {
      return buffer.filter((e) => e.type === type);
    },

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
