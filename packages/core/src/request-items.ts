import type { Body } from './body/body';
import { buildBody, hasFormFiles } from './body/builder';
import { type BodyOptions, resolveBodyOptions } from './config';
import { HeaderSyntaxError, ItemsConsumedError } from './errors';
import { parseRequestItems } from './items/classify';
import type { HttpMethod, RequestItem, RequestMode } from './items/types';

export interface RequestHeaders {
  /**
   * Headers to set, later items overriding earlier ones. Names come back
   * lowercased and values lose leading and trailing whitespace, as fetch
   * `Headers` stores them.
   */
  headers: Headers;
  /** Lowercased names to drop from the caller's default headers */
  unset: Set<string>;
}

/**
 * The ordered request items of one request.
 *
 * Header and query views can be taken any number of times; `body()` takes
 * ownership of the items and leaves the collection unusable.
 *
 * @example
 * ```typescript
 * const items = RequestItems.parse(['X-Trace:abc', 'page==2', 'name=John']);
 * const { headers } = items.headers();
 * const query = items.query();          // [['page', '2']]
 * const body = items.body('json');      // { kind: 'json', value: Map { 'name' => 'John' } }
 * ```
 */
export class RequestItems {
  private _items: RequestItem[] | undefined;

  constructor(items: readonly RequestItem[]) {
    this._items = [...items];
  }

  /**
   * @throws RequestItemSyntaxError or JsonValueError for the first bad token
   */
  static parse(raw: readonly string[]): RequestItems {
    return new RequestItems(parseRequestItems(raw));
  }

  get items(): readonly RequestItem[] {
    return this.take();
  }

  hasFormFiles(): boolean {
    return hasFormFiles(this.take());
  }

  /**
   * @throws HeaderSyntaxError for names or values the fetch Headers API rejects
   */
  headers(): RequestHeaders {
    const headers = new Headers();
    const unset = new Set<string>();

    for (const item of this.take()) {
      switch (item.type) {
        case 'httpHeader':
          try {
            headers.set(item.name, item.value);
          } catch (err) {
            throw new HeaderSyntaxError(
              `Invalid header ${JSON.stringify(`${item.name}:${item.value}`)}`,
              err
            );
          }
          break;
        case 'httpHeaderToUnset':
          try {
            // has() validates the name without touching the map.
            headers.has(item.name);
          } catch (err) {
            throw new HeaderSyntaxError(`Invalid header name ${JSON.stringify(item.name)}`, err);
          }
          unset.add(item.name.toLowerCase());
          break;
        case 'urlParam':
        case 'dataField':
        case 'dataFieldFromFile':
        case 'jsonField':
        case 'jsonFieldFromFile':
        case 'formFile':
          break;
      }
    }

    return { headers, unset };
  }

  query(): Array<[string, string]> {
    const query: Array<[string, string]> = [];
    for (const item of this.take()) {
      if (item.type === 'urlParam') {
        query.push([item.name, item.value]);
      }
    }
    return query;
  }

  /**
   * Whether `body(mode)` would produce a multipart body, without building it.
   */
  isMultipart(mode: RequestMode): boolean {
    switch (mode) {
      case 'multipart':
        return true;
      case 'form':
        return this.hasFormFiles();
      case 'json':
        return false;
    }
  }

  /**
   * Method that fits the body `body(mode)` would produce, computed from the
   * items alone. Prefer `pickBodyMethod` when the body already exists.
   */
  pickMethod(mode: RequestMode): HttpMethod {
    if (mode === 'multipart') {
      return 'POST';
    }
    for (const item of this.take()) {
      switch (item.type) {
        case 'httpHeader':
        case 'httpHeaderToUnset':
        case 'urlParam':
          continue;
        case 'dataField':
        case 'dataFieldFromFile':
        case 'jsonField':
        case 'jsonFieldFromFile':
        case 'formFile':
          return 'POST';
      }
    }
    return 'GET';
  }

  /**
   * Assemble the request body. Consumes the collection, whether or not
   * assembly succeeds.
   *
   * @throws IncompatibleModeError when the items cannot form a body in this mode
   * @throws FileReadError when a referenced file cannot be read
   * @throws JsonValueError when a `:=@` file does not hold JSON
   * @throws HeaderSyntaxError when a declared `;type=` is not a media type
   */
  body(mode: RequestMode, options?: BodyOptions): Body {
    const items = this.take();
    this._items = undefined;
    return buildBody(items, mode, resolveBodyOptions(options));
  }

  private take(): RequestItem[] {
    if (this._items === undefined) {
      throw new ItemsConsumedError();
    }
    return this._items;
  }
}
