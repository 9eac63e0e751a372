import { JsonValueError, RequestItemSyntaxError } from '../errors';
import { type Separator, splitEmptyHeader, splitRequestItem } from './tokenize';
import type { JsonValue, RequestItem } from './types';

const TYPE_SUFFIX = ';type=';

export function parseJsonLiteral(text: string, source: string): JsonValue {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new JsonValueError(source, err);
  }
}

/**
 * Split a file upload value on the last `;type=`. Filenames that contain
 * the suffix themselves are split at their last occurrence too.
 */
export function splitFileType(value: string): { fileName: string; fileType?: string } {
  const index = value.lastIndexOf(TYPE_SUFFIX);
  if (index === -1) {
    return { fileName: value };
  }
  return {
    fileName: value.slice(0, index),
    fileType: value.slice(index + TYPE_SUFFIX.length)
  };
}

/**
 * Map a split token onto its request item.
 *
 * @param raw - The original token, used in error messages
 */
export function classifyRequestItem(
  key: string,
  separator: Separator,
  value: string,
  raw: string
): RequestItem {
  switch (separator) {
    case '==':
      return { type: 'urlParam', name: key, value };
    case '=':
      return { type: 'dataField', name: key, value };
    case ':=':
      return { type: 'jsonField', name: key, value: parseJsonLiteral(value, raw) };
    case '@':
      return { type: 'formFile', key, ...splitFileType(value) };
    case ':':
      return value === ''
        ? { type: 'httpHeaderToUnset', name: key }
        : { type: 'httpHeader', name: key, value };
    case '=@':
      return { type: 'dataFieldFromFile', name: key, path: value };
    case ':=@':
      return { type: 'jsonFieldFromFile', name: key, path: value };
  }
}

/**
 * Parse one shorthand token into a request item.
 *
 * @throws RequestItemSyntaxError when the token has no separator and no trailing `;`
 * @throws JsonValueError when a `:=` value is not a JSON literal
 *
 * @example
 * ```typescript
 * parseRequestItem('page==2');   // { type: 'urlParam', name: 'page', value: '2' }
 * parseRequestItem('tags:=[1]'); // { type: 'jsonField', name: 'tags', value: [1] }
 * parseRequestItem('Accept:');   // { type: 'httpHeaderToUnset', name: 'Accept' }
 * parseRequestItem('Accept;');   // { type: 'httpHeader', name: 'Accept', value: '' }
 * ```
 */
export function parseRequestItem(raw: string): RequestItem {
  const split = splitRequestItem(raw);
  if (split) {
    return classifyRequestItem(split.key, split.separator, split.value, raw);
  }

  const emptyHeader = splitEmptyHeader(raw);
  if (emptyHeader !== undefined) {
    return { type: 'httpHeader', name: emptyHeader, value: '' };
  }

  throw new RequestItemSyntaxError(raw);
}

export function parseRequestItems(raw: readonly string[]): RequestItem[] {
  return raw.map(parseRequestItem);
}
