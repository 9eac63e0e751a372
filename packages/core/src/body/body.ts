import type { HttpMethod, JsonValue } from '../items/types';
import type { MultipartForm } from './multipart';

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';
export const JSON_CONTENT_TYPE = 'application/json';
export const JSON_ACCEPT = 'application/json, */*;q=0.5';

/**
 * The outgoing payload of a request. Exactly one is built per request.
 */
export type Body =
  | { kind: 'json'; value: Map<string, JsonValue> }
  | { kind: 'form'; fields: Array<[string, string]> }
  | { kind: 'multipart'; form: MultipartForm }
  | { kind: 'raw'; data: Uint8Array }
  | { kind: 'file'; path: string; contentType?: string };

export type BodyKind = Body['kind'];

/**
 * Multipart and whole-file bodies are never empty: a multipart body has to
 * match the boundary in its header, and a file body is streamed rather than
 * inspected.
 */
export function isBodyEmpty(body: Body): boolean {
  switch (body.kind) {
    case 'json':
      return body.value.size === 0;
    case 'form':
      return body.fields.length === 0;
    case 'raw':
      return body.data.length === 0;
    case 'multipart':
    case 'file':
      return false;
  }
}

/**
 * Serialize JSON body fields as an object, keeping insertion order.
 *
 * `JSON.stringify` on a plain object would move integer-like keys to the
 * front, so the top level is written entry by entry.
 *
 * @example
 * ```typescript
 * stringifyJsonFields(new Map([['b', 1], ['10', 2]])); // '{"b":1,"10":2}'
 * ```
 */
export function stringifyJsonFields(fields: ReadonlyMap<string, JsonValue>): string {
  const members: string[] = [];
  for (const [name, value] of fields) {
    members.push(`${JSON.stringify(name)}:${JSON.stringify(value)}`);
  }
  return `{${members.join(',')}}`;
}

export function pickBodyMethod(body: Body): HttpMethod {
  return isBodyEmpty(body) ? 'GET' : 'POST';
}

export function isMultipartBody(body: Body): body is Extract<Body, { kind: 'multipart' }> {
  return body.kind === 'multipart';
}
