import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { FileReadError } from '../src/errors';
import { openFilePart, readTextFile } from '../src/file-part';
import { createNodeIO } from '../src/runtime/node-io';
import type { BodyEvent } from '../src/runtime/types';
import { type TempDir, tmpdir } from './utils/tmpdir';

describe('openFilePart', () => {
  let tmp: TempDir;
  const io = createNodeIO();

  beforeEach(() => {
    tmp = tmpdir();
  });

  afterEach(() => {
    tmp.remove();
  });

  test('opens a file with its size and base name', async () => {
    tmp.writeFile('docs/readme.md', '# Title\n');
    const part = openFilePart('docs/readme.md', { io, basePath: tmp.path });

    expect(part.path).toBe('docs/readme.md');
    expect(part.fileName).toBe('readme.md');
    expect(part.size).toBe(8);
    expect(part.contentType).toBeUndefined();

    const chunks: Buffer[] = [];
    for await (const chunk of part.stream) {
      chunks.push(Buffer.from(chunk));
    }
    expect(Buffer.concat(chunks).toString('utf8')).toBe('# Title\n');
  });

  test('accepts absolute paths', () => {
    const absolute = tmp.writeFile('a.txt', 'abc');
    const part = openFilePart(absolute, { io, basePath: '/' });

    expect(part.size).toBe(3);
    part.stream.destroy();
  });

  test('emits an event with the size', () => {
    tmp.writeFile('a.txt', 'abc');
    const events: BodyEvent[] = [];
    const part = openFilePart('a.txt', {
      io,
      basePath: tmp.path,
      onEvent: (event) => events.push(event)
    });
    part.stream.destroy();

    expect(events).toEqual([{ type: 'filePartOpened', path: 'a.txt', size: 3 }]);
  });

  test('fails for a missing file', () => {
    const events: BodyEvent[] = [];

    expect(() =>
      openFilePart('missing.png', {
        io,
        basePath: tmp.path,
        onEvent: (event) => events.push(event)
      })
    ).toThrow(FileReadError);
    expect(events).toHaveLength(1);
    expect(events[0]?.type).toBe('error');
  });
});

describe('readTextFile', () => {
  let tmp: TempDir;
  const io = createNodeIO();

  beforeEach(() => {
    tmp = tmpdir();
  });

  afterEach(() => {
    tmp.remove();
  });

  test('reads UTF-8 text', () => {
    tmp.writeFile('note.txt', 'café');

    expect(readTextFile('note.txt', { io, basePath: tmp.path })).toBe('café');
  });

  test('wraps read failures with the path as written', () => {
    expect(() => readTextFile('nope.txt', { io, basePath: tmp.path })).toThrow(
      /^Failed to read "nope\.txt": ENOENT/
    );
  });
});
