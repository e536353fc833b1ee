import { createHash } from 'crypto';
import * as path from 'path';
import type { ObjectNaming } from './config';
import type { ObjectLocation } from './object-store';
import type { ResultVariant } from './results';

export interface NamingContext {
  readonly source: ObjectLocation;
  readonly now: Date;
  /** Returns a float in [0, 1), like Math.random. */
  readonly random: () => number;
}

const pad3 = (value: number): string => String(value).padStart(3, '0');

/**
 * `random`: `{variant}/{NNN}-{ISO timestamp}.json` with NNN drawn from 000-999,
 * which spreads keys across S3 partitions and makes collisions unlikely.
 *
 * `deterministic`: `{variant}/{NNN}-{chunk name}-{hash}.json` with NNN and the
 * eight hex digit hash both taken from a SHA-256 of the source location, so a
 * redelivered chunk overwrites its own output while chunks sharing a file name
 * in different folders or buckets do not.
 */
export function resultKey(variant: ResultVariant, naming: ObjectNaming, context: NamingContext): string {
  if (naming === 'deterministic') {
    const digest = createHash('sha256')
      .update(`${context.source.bucket}/${context.source.key}`)
      .digest();
    const prefix = pad3(digest.readUInt16BE(0) % 1000);
    const chunkName = path.posix.basename(context.source.key).replace(/\.[^.]*$/, '');
    return `${variant}/${prefix}-${chunkName}-${digest.toString('hex', 2, 6)}.json`;
  }

  const prefix = pad3(Math.floor(context.random() * 1000));
  return `${variant}/${prefix}-${context.now.toISOString()}.json`;
}
