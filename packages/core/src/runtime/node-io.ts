import { closeSync, createReadStream, fstatSync, openSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import type { IO, OpenedFile } from './types';

function open(p: string): OpenedFile {
  const fd = openSync(p, 'r');
  let size: number;
  try {
    // Length comes from metadata so the file is never buffered here.
    const stats = fstatSync(fd);
    // Only a regular file has a size that matches what it streams.
    if (stats.isDirectory()) {
      throw Object.assign(
        new Error(`EISDIR: illegal operation on a directory, open '${p}'`),
        { code: 'EISDIR' }
      );
    }
    if (!stats.isFile()) {
      throw Object.assign(new Error(`EINVAL: not a regular file, open '${p}'`), {
        code: 'EINVAL'
      });
    }
    size = stats.size;
  } catch (err) {
    closeSync(fd);
    throw err;
  }
  return { size, stream: createReadStream(p, { fd, autoClose: true }) };
}

/**
 * Node IO adapter (fs + path) for field-from-file items and file uploads.
 */
export function createNodeIO(): IO {
  return {
    cwd: () => process.cwd(),
    path: {
      resolve: (...parts) => path.resolve(...parts),
      basename: (p) => path.basename(p)
    },
    readText: (p) => readFileSync(p, 'utf8'),
    open
  };
}
