import type { Readable } from 'node:stream';
import { FileReadError } from './errors';
import type { EventSink, IO, OpenedFile } from './runtime/types';

/**
 * A local file exposed as a length-known, streamable multipart part.
 */
export interface FilePart {
  /** Path the file was opened from */
  path: string;
  /** Base name sent as the part's filename, when the path has one */
  fileName?: string;
  /** Byte length from the file's metadata */
  size: number;
  /** Declared media type for the part */
  contentType?: string;
  stream: Readable;
}

export interface OpenFilePartOptions {
  io: IO;
  /** Directory relative paths resolve against */
  basePath: string;
  onEvent?: EventSink;
}

/**
 * Open a file for upload without reading it into memory.
 *
 * @throws FileReadError if the file cannot be opened or its size read
 */
export function openFilePart(filePath: string, options: OpenFilePartOptions): FilePart {
  const { io } = options;
  const resolved = io.path.resolve(options.basePath, filePath);

  let opened: OpenedFile;
  try {
    opened = io.open(resolved);
  } catch (err) {
    const error = new FileReadError(filePath, err);
    options.onEvent?.({ type: 'error', stage: 'openFilePart', message: error.message });
    throw error;
  }
  options.onEvent?.({ type: 'filePartOpened', path: filePath, size: opened.size });

  const part: FilePart = { path: filePath, size: opened.size, stream: opened.stream };
  const fileName = io.path.basename(filePath);
  if (fileName !== '') part.fileName = fileName;
  return part;
}

/**
 * Read a referenced file as UTF-8 text.
 *
 * @throws FileReadError naming the path as written in the item
 */
export function readTextFile(filePath: string, options: OpenFilePartOptions): string {
  const resolved = options.io.path.resolve(options.basePath, filePath);
  let text: string;
  try {
    text = options.io.readText(resolved);
  } catch (err) {
    const error = new FileReadError(filePath, err);
    options.onEvent?.({ type: 'error', stage: 'readTextFile', message: error.message });
    throw error;
  }
  options.onEvent?.({ type: 'fileRead', path: filePath, bytes: Buffer.byteLength(text) });
  return text;
}
