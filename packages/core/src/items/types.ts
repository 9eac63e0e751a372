// ============================================================================
// JSON Values
// ============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ============================================================================
// Request Items
// ============================================================================

/**
 * One classified unit parsed from a single shorthand token.
 *
 * @example
 * ```typescript
 * parseRequestItem('name=John');           // { type: 'dataField', name: 'name', value: 'John' }
 * parseRequestItem('X-Api-Key:test-key');   // { type: 'httpHeader', ... }
 * parseRequestItem('avatar@me.png;type=image/png');
 * // { type: 'formFile', key: 'avatar', fileName: 'me.png', fileType: 'image/png' }
 * ```
 */
export type RequestItem =
  | { readonly type: 'httpHeader'; readonly name: string; readonly value: string }
  | { readonly type: 'httpHeaderToUnset'; readonly name: string }
  | { readonly type: 'urlParam'; readonly name: string; readonly value: string }
  | { readonly type: 'dataField'; readonly name: string; readonly value: string }
  | { readonly type: 'dataFieldFromFile'; readonly name: string; readonly path: string }
  | { readonly type: 'jsonField'; readonly name: string; readonly value: JsonValue }
  | { readonly type: 'jsonFieldFromFile'; readonly name: string; readonly path: string }
  | {
      readonly type: 'formFile';
      /** Empty when the file is the whole request body */
      readonly key: string;
      readonly fileName: string;
      readonly fileType?: string;
    };

export type RequestItemType = RequestItem['type'];

export type FormFileItem = Extract<RequestItem, { type: 'formFile' }>;

// ============================================================================
// Request Mode
// ============================================================================

export type RequestMode = 'json' | 'form' | 'multipart';

export type HttpMethod = 'GET' | 'POST';
