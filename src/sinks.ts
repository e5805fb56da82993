/**
 * Append-mode split file handles, cached per (date, user).
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { splitPathFor } from './classify.js';
import { MAX_OPEN_SINKS } from './constants.js';
import { OutputError } from './errors.js';
import type { SplitKey } from './types.js';
import { ensureDirectory } from './utils/fileio.js';

interface Sink {
  path: string;
  fd: number;
}

/**
 * Owns every open split file for a run.
 *
 * Handles are opened lazily in append mode and reused for later lines of the
 * same pair. At most `maxOpen` are held; the least recently used handle is
 * closed to make room. Closing and reopening in append mode keeps per-pair
 * order intact.
 */
export class SinkPool {
  private readonly sinks = new Map<string, Sink>();
  private readonly knownDirs = new Set<string>();

  constructor(
    readonly outputRoot: string,
    readonly maxOpen: number = MAX_OPEN_SINKS
  ) {
    if (!Number.isInteger(maxOpen) || maxOpen < 1) {
      throw new RangeError(`maxOpen must be a positive integer, got ${maxOpen}`);
    }
  }

  /** Number of handles currently open. */
  get openCount(): number {
    return this.sinks.size;
  }

  /** Append a line verbatim to the split file for `key`. */
  append(key: SplitKey, line: string): void {
    const sink = this.acquire(key);
    const bytes = Buffer.from(line, 'utf8');
    let offset = 0;
    while (offset < bytes.length) {
      let written: number;
      try {
        written = fs.writeSync(sink.fd, bytes, offset, bytes.length - offset);
      } catch (error) {
        throw OutputError.writeFailed(sink.path, error);
      }
      if (written === 0) {
        throw OutputError.writeFailed(sink.path, new Error(`wrote ${offset} of ${bytes.length} bytes`));
      }
      offset += written;
    }
  }

  /**
   * Close every open handle. Keeps going past failures and throws the first.
   */
  closeAll(): void {
    let firstError: OutputError | null = null;
    for (const sink of this.sinks.values()) {
      try {
        fs.closeSync(sink.fd);
      } catch (error) {
        if (!firstError) {
          firstError = OutputError.closeFailed(sink.path, error);
        }
      }
    }
    this.sinks.clear();
    if (firstError) {
      throw firstError;
    }
  }

  private acquire(key: SplitKey): Sink {
    const id = `${key.date}/${key.user}`;
    const cached = this.sinks.get(id);
    if (cached) {
      // Re-insert to mark as most recently used.
      this.sinks.delete(id);
      this.sinks.set(id, cached);
      return cached;
    }

    if (this.sinks.size >= this.maxOpen) {
      this.evictOldest();
    }

    const filePath = splitPathFor(this.outputRoot, key);
    const dir = path.dirname(filePath);
    if (!this.knownDirs.has(dir)) {
      ensureDirectory(dir);
      this.knownDirs.add(dir);
    }

    let fd: number;
    try {
      fd = fs.openSync(filePath, 'a');
    } catch (error) {
      throw OutputError.writeFailed(filePath, error);
    }

    const sink: Sink = { path: filePath, fd };
    this.sinks.set(id, sink);
    return sink;
  }

  private evictOldest(): void {
    const oldest = this.sinks.entries().next();
    if (oldest.done) return;

    const [id, sink] = oldest.value;
    this.sinks.delete(id);
    try {
      fs.closeSync(sink.fd);
    } catch (error) {
      throw OutputError.closeFailed(sink.path, error);
    }
  }
}
