// ============================================================================
// Error Taxonomy
// ============================================================================

/**
 * Base error class for everything raised while parsing request items or
 * assembling a body from them.
 */
export class RequestItemError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RequestItemError';
  }

  toObject() {
    return { error: { code: this.code, message: this.message } };
  }
}

// ============================================================================
// Specific Error Types
// ============================================================================

export class RequestItemSyntaxError extends RequestItemError {
  constructor(item: string) {
    super('SYNTAX_ERROR', `${JSON.stringify(item)} is not a valid request item`);
    this.name = 'RequestItemSyntaxError';
  }
}

/**
 * `source` is the token for `key:=value` items and the file path for
 * `key:=@path` items.
 */
export class JsonValueError extends RequestItemError {
  constructor(
    public readonly source: string,
    cause: unknown
  ) {
    super('INVALID_JSON', `${JSON.stringify(source)}: ${describeCause(cause)}`, { cause });
    this.name = 'JsonValueError';
  }
}

export class IncompatibleModeError extends RequestItemError {
  constructor(message: string) {
    super('INCOMPATIBLE_MODE', message);
    this.name = 'IncompatibleModeError';
  }
}

export class HeaderSyntaxError extends RequestItemError {
  constructor(message: string, cause?: unknown) {
    super('INVALID_HEADER', message, { cause });
    this.name = 'HeaderSyntaxError';
  }
}

export class FileReadError extends RequestItemError {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super('FILE_READ_ERROR', `Failed to read ${JSON.stringify(path)}: ${describeCause(cause)}`, {
      cause
    });
    this.name = 'FileReadError';
  }
}

export class InvalidOptionsError extends RequestItemError {
  constructor(message: string) {
    super('INVALID_OPTIONS', message);
    this.name = 'InvalidOptionsError';
  }
}

export class ItemsConsumedError extends RequestItemError {
  constructor() {
    super('ITEMS_CONSUMED', 'Request items were already consumed by body()');
    this.name = 'ItemsConsumedError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
