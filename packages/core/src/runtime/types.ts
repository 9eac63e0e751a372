// Runtime adapter interfaces for portability.
// Keep these small and capability-driven so the core logic stays centralized.

import type { Readable } from 'node:stream';

export type PathApi = {
  resolve: (...parts: string[]) => string;
  basename: (p: string) => string;
};

/**
 * A file opened for streaming. `size` comes from the file's metadata,
 * the contents are only read once `stream` is consumed.
 */
export type OpenedFile = {
  size: number;
  stream: Readable;
};

export type IO = {
  readText: (path: string) => string;
  open: (path: string) => OpenedFile;
  cwd: () => string;
  path: PathApi;
};

// ============================================================================
// Body Events
// Emitted while request items are turned into a body. Nothing is logged
// unless the caller passes a sink.
// ============================================================================

export type BodyEvent =
  | { type: 'fileRead'; path: string; bytes: number }
  | { type: 'filePartOpened'; path: string; size: number }
  | { type: 'bodyBuilt'; mode: string; kind: string }
  | { type: 'error'; stage: string; message: string };

export type EventSink = (event: BodyEvent) => void;
