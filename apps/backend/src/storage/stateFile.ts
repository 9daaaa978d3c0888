/**
 * JSON state files under STATE_DIR.
 * Writes go to a temp file and are renamed into place, so a crash never
 * leaves a half-written file behind.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';

export class StateFileError extends Error {
  public readonly file: string;
  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super(`${file}: ${message}`, options);
    this.name = 'StateFileError';
    this.file = file;
  }
}

function ensureDir(file: string): void {
  const dir = dirname(file);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
}

/** Returns undefined when the file does not exist yet. */
export function readStateFile<S extends z.ZodTypeAny>(file: string, schema: S): z.output<S> | undefined {
  if (!existsSync(file)) return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new StateFileError(file, 'not valid JSON', { cause: err });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new StateFileError(file, `unexpected shape at ${first?.path.join('.') || '<root>'}: ${first?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

export function writeStateFile(file: string, data: unknown): void {
  try {
    ensureDir(file);
    const tmp = `${file}.tmp`;
    writeFileSync(tmp, JSON.stringify(data, null, 2), 'utf-8');
    renameSync(tmp, file);
  } catch (err) {
    throw new StateFileError(file, 'write failed', { cause: err });
  }
}
