import { randomBytes } from 'node:crypto';
import { Readable } from 'node:stream';
import type { FilePart } from '../file-part';

export type MultipartPart =
  | { kind: 'text'; name: string; value: string }
  | { kind: 'file'; name: string; file: FilePart };

const CRLF = '\r\n';

export function generateBoundary(): string {
  return `----ReqItemsBoundary${randomBytes(12).toString('hex')}`;
}

/**
 * Percent-encode the characters that would break a quoted
 * Content-Disposition parameter, the way browsers encode form data.
 */
export function escapeDispositionValue(value: string): string {
  return value.replace(/"/g, '%22').replace(/\r/g, '%0D').replace(/\n/g, '%0A');
}

function partHeader(boundary: string, part: MultipartPart): string {
  let header = `--${boundary}${CRLF}`;
  header += `Content-Disposition: form-data; name="${escapeDispositionValue(part.name)}"`;
  if (part.kind === 'file') {
    if (part.file.fileName !== undefined) {
      header += `; filename="${escapeDispositionValue(part.file.fileName)}"`;
    }
    header += CRLF;
    if (part.file.contentType !== undefined) {
      header += `Content-Type: ${part.file.contentType}${CRLF}`;
    }
  } else {
    header += CRLF;
  }
  return header + CRLF;
}

/**
 * An ordered multipart/form-data body.
 *
 * The boundary is fixed when the form is created, so the Content-Type
 * header it reports always matches what `stream()` writes. File parts are
 * piped from their streams; nothing but part headers and text values is
 * held in memory.
 */
export class MultipartForm {
  readonly boundary: string;
  private readonly _parts: MultipartPart[] = [];

  constructor(boundary: string = generateBoundary()) {
    this.boundary = boundary;
  }

  text(name: string, value: string): this {
    this._parts.push({ kind: 'text', name, value });
    return this;
  }

  file(name: string, file: FilePart): this {
    this._parts.push({ kind: 'file', name, file });
    return this;
  }

  get parts(): readonly MultipartPart[] {
    return this._parts;
  }

  contentType(): string {
    return `multipart/form-data; boundary=${this.boundary}`;
  }

  contentLength(): number {
    let length = 0;
    for (const part of this._parts) {
      length += Buffer.byteLength(partHeader(this.boundary, part));
      length += part.kind === 'file' ? part.file.size : Buffer.byteLength(part.value);
      length += CRLF.length;
    }
    return length + Buffer.byteLength(this.closingDelimiter());
  }

  /**
   * Encode the form. Each file stream can only be consumed once, so neither
   * can the returned stream be recreated for forms with file parts.
   *
   * Destroying the returned stream, or a file part failing, destroys every
   * file part's stream.
   */
  stream(): Readable {
    const chunks = this.chunks();
    const files = this._parts.flatMap((part) => (part.kind === 'file' ? [part.file.stream] : []));

    return new Readable({
      read() {
        void chunks.next().then(
          (result) => {
            this.push(result.done === true ? null : result.value);
          },
          (err: unknown) => {
            this.destroy(err instanceof Error ? err : new Error(String(err)));
          }
        );
      },
      destroy(err, callback) {
        for (const file of files) file.destroy();
        callback(err);
      }
    });
  }

  private closingDelimiter(): string {
    return `--${this.boundary}--${CRLF}`;
  }

  private async *chunks(): AsyncGenerator<Buffer> {
    for (const part of this._parts) {
      yield Buffer.from(partHeader(this.boundary, part));
      if (part.kind === 'file') {
        for await (const chunk of part.file.stream) {
          yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        }
      } else {
        yield Buffer.from(part.value);
      }
      yield Buffer.from(CRLF);
    }
    yield Buffer.from(this.closingDelimiter());
  }
}
