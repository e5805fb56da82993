/**
 * File I/O utilities for line-oriented reading and directory setup.
 */

import * as fs from 'node:fs';
import { READ_CHUNK_SIZE } from '../constants.js';
import { InputFileError, OutputError } from '../errors.js';

const NEWLINE = 0x0a;

/**
 * Reads a file line by line with synchronous I/O and bounded memory.
 *
 * Lines are split on the `\n` byte and yielded with their own terminator
 * (`\n` or `\r\n`); a last line without one is yielded as is. Each line is
 * decoded as UTF-8 on its own, so invalid byte sequences become U+FFFD
 * without affecting neighbouring characters or lines. Splitting on the byte
 * is safe because `\n` never occurs inside a multi-byte UTF-8 sequence.
 *
 * Open and read failures surface as {@link InputFileError}. The descriptor is
 * closed when the generator finishes, throws or is abandoned by the caller.
 */
export function* readLines(filePath: string, chunkSize: number = READ_CHUNK_SIZE): Generator<string> {
  let fd: number;
  try {
    fd = fs.openSync(filePath, 'r');
  } catch (error) {
    throw InputFileError.unreadable(filePath, error);
  }

  try {
    const buffer = Buffer.alloc(chunkSize);
    let pending: Buffer[] = [];

    for (;;) {
      let bytesRead: number;
      try {
        bytesRead = fs.readSync(fd, buffer, 0, chunkSize, null);
      } catch (error) {
        throw InputFileError.unreadable(filePath, error);
      }
      if (bytesRead === 0) break;

      const chunk = buffer.subarray(0, bytesRead);
      let start = 0;
      let newline = chunk.indexOf(NEWLINE, start);
      while (newline !== -1) {
        pending.push(chunk.subarray(start, newline + 1));
        const line = Buffer.concat(pending).toString('utf8');
        pending = [];
        yield line;
        start = newline + 1;
        newline = chunk.indexOf(NEWLINE, start);
      }
      if (start < bytesRead) {
        // The buffer is reused by the next read; keep a copy of the partial line.
        pending.push(Buffer.from(chunk.subarray(start)));
      }
    }

    if (pending.length > 0) {
      yield Buffer.concat(pending).toString('utf8');
    }
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Creates a directory and its parents. Existing directories are not an error.
 * @throws OutputError if the directory cannot be created
 */
export function ensureDirectory(dir: string): void {
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (error) {
    throw OutputError.directoryFailed(dir, error);
  }
}

/**
 * Verifies that a directory exists (creating it if needed) and is writable.
 * @throws OutputError otherwise
 */
export function ensureWritableDirectory(dir: string): void {
  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.accessSync(dir, fs.constants.W_OK);
  } catch (error) {
    throw OutputError.rootUnwritable(dir, error);
  }
}
