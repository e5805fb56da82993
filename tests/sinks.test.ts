import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { SinkPool } from '../src/sinks.js';
import { OutputError } from '../src/errors.js';

describe('SinkPool', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'portal-sinks-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function readSplit(date: string, user: string): string {
    return fs.readFileSync(path.join(tempDir, date, `${user}.log`), 'utf-8');
  }

  it('reuses one handle per (date, user) pair', () => {
    const pool = new SinkPool(tempDir);

    pool.append({ date: '2025-09-10', user: 'A1' }, 'one\n');
    pool.append({ date: '2025-09-10', user: 'A1' }, 'two\n');
    expect(pool.openCount).toBe(1);

    pool.closeAll();
    expect(readSplit('2025-09-10', 'A1')).toBe('one\ntwo\n');
  });

  it('keeps per-pair order when handles are evicted and reopened', () => {
    const pool = new SinkPool(tempDir, 2);

    pool.append({ date: '2025-09-10', user: 'A1' }, 'a1\n');
    pool.append({ date: '2025-09-10', user: 'B2' }, 'b1\n');
    pool.append({ date: '2025-09-11', user: 'C3' }, 'c1\n');
    expect(pool.openCount).toBe(2);

    pool.append({ date: '2025-09-10', user: 'A1' }, 'a2\n');
    pool.append({ date: '2025-09-10', user: 'B2' }, 'b2\n');
    expect(pool.openCount).toBe(2);

    pool.closeAll();
    expect(readSplit('2025-09-10', 'A1')).toBe('a1\na2\n');
    expect(readSplit('2025-09-10', 'B2')).toBe('b1\nb2\n');
    expect(readSplit('2025-09-11', 'C3')).toBe('c1\n');
  });

  it('appends to files left by an earlier pool', () => {
    const first = new SinkPool(tempDir);
    first.append({ date: '2025-09-10', user: 'A1' }, 'run 1\n');
    first.closeAll();

    const second = new SinkPool(tempDir);
    second.append({ date: '2025-09-10', user: 'A1' }, 'run 2\n');
    second.closeAll();

    expect(readSplit('2025-09-10', 'A1')).toBe('run 1\nrun 2\n');
  });

  it('closes every handle', () => {
    const pool = new SinkPool(tempDir);
    pool.append({ date: '2025-09-10', user: 'A1' }, 'x\n');
    pool.append({ date: '2025-09-10', user: 'B2' }, 'y\n');

    pool.closeAll();

    expect(pool.openCount).toBe(0);
  });

  it('rejects a non-positive handle limit', () => {
    expect(() => new SinkPool(tempDir, 0)).toThrow(RangeError);
  });

  it('raises OutputError when the date directory cannot be created', () => {
    fs.writeFileSync(path.join(tempDir, '2025-09-10'), 'in the way');
    const pool = new SinkPool(tempDir);

    expect(() => pool.append({ date: '2025-09-10', user: 'A1' }, 'x\n')).toThrow(OutputError);
    expect(pool.openCount).toBe(0);
  });
});
