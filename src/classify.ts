/**
 * Line classification: two independent matchers for the date and the user.
 */

import * as path from 'node:path';
import { DATE_PATTERN, SPLIT_FILE_EXTENSION, USER_PATTERN } from './constants.js';
import type { DateKey, LineClass, SplitKey, UserKey } from './types.js';

/** Extract the date from a line that starts with `YYYY-MM-DD HH:MM:SS.fff`. */
export function extractDate(line: string): DateKey | null {
  const match = DATE_PATTERN.exec(line);
  return match ? match[1] : null;
}

/** Extract the token of the first `[User: TOKEN]` marker in a line. */
export function extractUser(line: string): UserKey | null {
  const match = USER_PATTERN.exec(line);
  return match ? match[1] : null;
}

/** Classify a raw line as assigned to a (date, user) pair or skipped. */
export function classifyLine(line: string): LineClass {
  const date = extractDate(line);
  const user = extractUser(line);

  if (date !== null && user !== null) {
    return { kind: 'assigned', date, user };
  }
  if (date === null && user === null) {
    return { kind: 'skipped', reason: 'missing-date-and-user' };
  }
  return { kind: 'skipped', reason: date === null ? 'missing-date' : 'missing-user' };
}

/** Path of the split file for a key: `<root>/<date>/<user>.log`. */
export function splitPathFor(outputRoot: string, key: SplitKey): string {
  return path.join(outputRoot, key.date, `${key.user}${SPLIT_FILE_EXTENSION}`);
}
