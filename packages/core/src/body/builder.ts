import type { ResolvedBodyOptions } from '../config';
import { HeaderSyntaxError, IncompatibleModeError } from '../errors';
import { openFilePart, readTextFile } from '../file-part';
import { parseJsonLiteral } from '../items/classify';
import type { JsonValue, RequestItem, RequestMode } from '../items/types';
import { guessMimeType } from '../mime';
import type { Body } from './body';
import { MultipartForm } from './multipart';

// ============================================================================
// Utilities
// ============================================================================

const TOKEN = "[!#$%&'*+.^_`|~0-9A-Za-z-]+";
const MEDIA_TYPE_PATTERN = new RegExp(`^${TOKEN}/${TOKEN}(\\s*;.*)?$`);

/**
 * Check a declared `;type=` media type before it ends up in a header.
 *
 * @throws HeaderSyntaxError if the value is not `type/subtype[; params]`
 */
export function validateMediaType(mediaType: string): string {
  if (!MEDIA_TYPE_PATTERN.test(mediaType) || /[\r\n\0]/.test(mediaType)) {
    throw new HeaderSyntaxError(`Invalid media type: ${JSON.stringify(mediaType)}`);
  }
  return mediaType;
}

/**
 * Check a declared `;type=` that is sent as a Content-Type header as-is.
 * Only header-value syntax applies; the value need not be a media type.
 *
 * @throws HeaderSyntaxError for values the fetch Headers API rejects
 */
export function validateContentTypeValue(value: string): string {
  try {
    new Headers().set('content-type', value);
  } catch (err) {
    throw new HeaderSyntaxError(`Invalid content type: ${JSON.stringify(value)}`, err);
  }
  return value;
}

export function hasFormFiles(items: readonly RequestItem[]): boolean {
  return items.some((item) => item.type === 'formFile');
}

// ============================================================================
// Body Builders
// ============================================================================

export function buildJsonBody(items: readonly RequestItem[], options: ResolvedBodyOptions): Body {
  // A Map keeps keys like "__proto__" as plain data and integer-like keys in
  // insertion order.
  const fields = new Map<string, JsonValue>();

  for (const item of items) {
    switch (item.type) {
      case 'jsonField':
        fields.set(item.name, item.value);
        break;
      case 'jsonFieldFromFile':
        fields.set(item.name, parseJsonLiteral(readTextFile(item.path, options), item.path));
        break;
      case 'dataField':
        fields.set(item.name, item.value);
        break;
      case 'dataFieldFromFile':
        fields.set(item.name, readTextFile(item.path, options));
        break;
      case 'formFile':
        throw new Error('Internal error: file fields must be routed to the file or multipart body');
      case 'httpHeader':
      case 'httpHeaderToUnset':
      case 'urlParam':
        break;
    }
  }

  return { kind: 'json', value: fields };
}

export function buildFormBody(items: readonly RequestItem[], options: ResolvedBodyOptions): Body {
  const fields: Array<[string, string]> = [];

  for (const item of items) {
    switch (item.type) {
      case 'jsonField':
      case 'jsonFieldFromFile':
        throw new IncompatibleModeError('JSON values are not supported in form fields');
      case 'dataField':
        fields.push([item.name, item.value]);
        break;
      case 'dataFieldFromFile':
        fields.push([item.name, readTextFile(item.path, options)]);
        break;
      case 'formFile':
        throw new Error('Internal error: file fields must be routed to the multipart body');
      case 'httpHeader':
      case 'httpHeaderToUnset':
      case 'urlParam':
        break;
    }
  }

  return { kind: 'form', fields };
}

export function buildMultipartBody(
  items: readonly RequestItem[],
  options: ResolvedBodyOptions
): Body {
  // Reject JSON values before any file gets opened.
  if (items.some((item) => item.type === 'jsonField' || item.type === 'jsonFieldFromFile')) {
    throw new IncompatibleModeError('JSON values are not supported in multipart fields');
  }

  const form = new MultipartForm(options.boundary);

  try {
    for (const item of items) {
      switch (item.type) {
        case 'dataField':
          form.text(item.name, item.value);
          break;
        case 'dataFieldFromFile':
          form.text(item.name, readTextFile(item.path, options));
          break;
        case 'formFile': {
          const contentType =
            item.fileType !== undefined ? validateMediaType(item.fileType) : undefined;
          const part = openFilePart(item.fileName, options);
          if (contentType !== undefined) part.contentType = contentType;
          form.file(item.key, part);
          break;
        }
        case 'jsonField':
        case 'jsonFieldFromFile':
        case 'httpHeader':
        case 'httpHeaderToUnset':
        case 'urlParam':
          break;
      }
    }
  } catch (err) {
    // Release the files opened so far; the form is never handed out.
    for (const part of form.parts) {
      if (part.kind === 'file') part.file.stream.destroy();
    }
    throw err;
  }

  return { kind: 'multipart', form };
}

/**
 * Build a body streamed from a single file given as `@path`.
 */
export function buildFileBody(items: readonly RequestItem[]): Body {
  if (items.some((item) => item.type === 'formFile' && item.key !== '')) {
    throw new IncompatibleModeError(
      "Can't use file fields in JSON mode (perhaps you meant --form?)"
    );
  }

  let body: Body | undefined;
  for (const item of items) {
    switch (item.type) {
      case 'dataField':
      case 'dataFieldFromFile':
      case 'jsonField':
      case 'jsonFieldFromFile':
        throw new IncompatibleModeError(
          'Request body (from a file) and request data (key=value) cannot be mixed'
        );
      case 'formFile': {
        if (body !== undefined) {
          throw new IncompatibleModeError("Can't read request body from multiple files");
        }
        const contentType =
          item.fileType !== undefined
            ? validateContentTypeValue(item.fileType)
            : guessMimeType(item.fileName);
        const fileBody: Extract<Body, { kind: 'file' }> = { kind: 'file', path: item.fileName };
        if (contentType !== undefined) fileBody.contentType = contentType;
        body = fileBody;
        break;
      }
      case 'httpHeader':
      case 'httpHeaderToUnset':
      case 'urlParam':
        break;
    }
  }

  if (body === undefined) {
    throw new Error('Internal error: file body requested without a file field');
  }
  return body;
}

function dispatchBody(
  items: readonly RequestItem[],
  mode: RequestMode,
  options: ResolvedBodyOptions
): Body {
  switch (mode) {
    case 'multipart':
      return buildMultipartBody(items, options);
    case 'form':
      return hasFormFiles(items)
        ? buildMultipartBody(items, options)
        : buildFormBody(items, options);
    case 'json':
      return hasFormFiles(items) ? buildFileBody(items) : buildJsonBody(items, options);
  }
}

/**
 * Dispatch request items to the body their mode calls for. Files force a
 * multipart body in form mode and a whole-file body in JSON mode.
 */
export function buildBody(
  items: readonly RequestItem[],
  mode: RequestMode,
  options: ResolvedBodyOptions
): Body {
  const body = dispatchBody(items, mode, options);
  options.onEvent?.({ type: 'bodyBuilt', mode, kind: body.kind });
  return body;
}
