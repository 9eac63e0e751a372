import { z } from 'zod';
import { InvalidOptionsError } from './errors';
import type { RequestMode } from './items/types';
import { createNodeIO } from './runtime/node-io';
import type { EventSink, IO } from './runtime/types';

// ============================================================================
// Request Mode
// ============================================================================

export const RequestModeSchema = z.enum(['json', 'form', 'multipart']);

/**
 * Validate a request mode coming from the command line layer.
 *
 * @throws InvalidOptionsError for anything but `json`, `form` or `multipart`
 */
export function parseRequestMode(value: string): RequestMode {
  const parsed = RequestModeSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidOptionsError(
      `mode: expected one of json, form, multipart, got ${JSON.stringify(value)}`
    );
  }
  return parsed.data;
}

// ============================================================================
// Body Options
// ============================================================================

/**
 * Options for turning request items into a body.
 */
export interface BodyOptions {
  /**
   * Directory that relative file paths in items resolve against.
   * @default io.cwd()
   */
  basePath?: string;

  /**
   * Fixed multipart boundary. A random one is generated when omitted.
   */
  boundary?: string;

  /**
   * IO adapter for reading referenced files.
   * @default createNodeIO()
   */
  io?: IO;

  /**
   * Receives file and body events while the body is assembled.
   */
  onEvent?: EventSink;
}

export interface ResolvedBodyOptions {
  basePath: string;
  boundary?: string;
  io: IO;
  onEvent?: EventSink;
}

// RFC 2046 bchars, without a trailing space.
const BOUNDARY_PATTERN = /^[0-9A-Za-z'()+_,\-./:=? ]{0,69}[0-9A-Za-z'()+_,\-./:=?]$/;

export const BodyOptionsSchema = z.object({
  basePath: z.string().min(1).optional(),
  boundary: z
    .string()
    .regex(BOUNDARY_PATTERN, 'must be 1-70 boundary characters without a trailing space')
    .optional()
});

export function resolveBodyOptions(options: BodyOptions = {}): ResolvedBodyOptions {
  const parsed = BodyOptionsSchema.safeParse({
    basePath: options.basePath,
    boundary: options.boundary
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidOptionsError(
      issue ? `${issue.path.join('.') || 'options'}: ${issue.message}` : 'Invalid body options.'
    );
  }

  const io = options.io ?? createNodeIO();
  const resolved: ResolvedBodyOptions = {
    basePath: parsed.data.basePath ?? io.cwd(),
    io
  };
  if (parsed.data.boundary !== undefined) resolved.boundary = parsed.data.boundary;
  if (options.onEvent) resolved.onEvent = options.onEvent;
  return resolved;
}
