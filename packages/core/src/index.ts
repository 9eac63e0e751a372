// Body assembly
export {
  type Body,
  type BodyKind,
  FORM_CONTENT_TYPE,
  isBodyEmpty,
  isMultipartBody,
  JSON_ACCEPT,
  JSON_CONTENT_TYPE,
  pickBodyMethod,
  stringifyJsonFields
} from './body/body';
export {
  buildBody,
  buildFileBody,
  buildFormBody,
  buildJsonBody,
  buildMultipartBody,
  hasFormFiles,
  validateContentTypeValue,
  validateMediaType
} from './body/builder';
export { generateBoundary, MultipartForm, type MultipartPart } from './body/multipart';
// Configuration
export {
  type BodyOptions,
  BodyOptionsSchema,
  parseRequestMode,
  RequestModeSchema,
  type ResolvedBodyOptions,
  resolveBodyOptions
} from './config';
// Errors
export {
  FileReadError,
  HeaderSyntaxError,
  IncompatibleModeError,
  InvalidOptionsError,
  ItemsConsumedError,
  JsonValueError,
  RequestItemError,
  RequestItemSyntaxError
} from './errors';
// File parts
export { type FilePart, type OpenFilePartOptions, openFilePart, readTextFile } from './file-part';
// Parsing
export {
  classifyRequestItem,
  parseJsonLiteral,
  parseRequestItem,
  parseRequestItems,
  splitFileType
} from './items/classify';
export { isSpecialChar, SPECIAL_CHARS, unescape } from './items/escape';
export {
  matchSeparator,
  SEPARATORS,
  type Separator,
  type SplitItem,
  splitEmptyHeader,
  splitRequestItem
} from './items/tokenize';
export type {
  FormFileItem,
  HttpMethod,
  JsonValue,
  RequestItem,
  RequestItemType,
  RequestMode
} from './items/types';
export { guessMimeType } from './mime';
// Request item collection
export { type RequestHeaders, RequestItems } from './request-items';
// Runtime adapters
export { createNodeIO } from './runtime';
export type { BodyEvent, EventSink, IO, OpenedFile, PathApi } from './runtime/types';
