import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import { Writable } from 'stream';
import winston from 'winston';
import mainLogger, { getLogger, setLogLevel } from '../../src/cursor/logger';
import { IndexedLongCursor } from '../../src/cursor/indexedCursor';
import { ConcurrentModificationError } from '../../src/errors';
import { LongListSimulator } from '../support/LongListSimulator';

describe('logger', () => {
  let entries: Record<string, unknown>[];
  let capture: winston.transport;

  beforeEach(() => {
    entries = [];
    capture = new winston.transports.Stream({
      stream: new Writable({
        objectMode: true,
        write(entry: Record<string, unknown>, _encoding, callback) {
          entries.push(entry);
          callback();
        },
      }),
    });
    mainLogger.add(capture);
  });

  afterEach(() => {
    mainLogger.remove(capture);
    setLogLevel('warn');
  });

  it('child loggers follow the level set on the root logger', () => {
    const logger = getLogger({ cursor: 'test' });
    expect(logger.isLevelEnabled('debug')).toBe(false);
    setLogLevel('debug');
    expect(logger.isLevelEnabled('debug')).toBe(true);
  });

  it('cursors log removals and foreign changes under their label', async () => {
    setLogLevel('debug');
    const list = new LongListSimulator([1n, 2n, 3n]);
    const cursor = new IndexedLongCursor(list, { label: 'audit' });
    cursor.next();
    cursor.remove();
    cursor.next();
    list.append(9n);
    expect(() => cursor.next()).toThrow(ConcurrentModificationError);

    await vi.waitFor(() => expect(entries).toHaveLength(2));
    expect(entries[0]).toMatchObject({
      level: 'debug',
      message: 'Removed element from backing structure',
      cursor: 'audit',
      module: 'long-cursor',
      modCount: 1,
    });
    expect(entries[1]).toMatchObject({
      level: 'debug',
      message: 'Backing structure changed during traversal',
      cursor: 'audit',
      operation: 'next',
      expected: 1,
      actual: 2,
    });
  });

  it('stays quiet at the default level', async () => {
    const list = new LongListSimulator([1n]);
    const cursor = new IndexedLongCursor(list, { label: 'quiet' });
    cursor.next();
    cursor.remove();
    await new Promise((resolve) => setImmediate(resolve));
    expect(entries).toEqual([]);
  });
});
