export { createNodeIO } from './node-io';
export type { BodyEvent, EventSink, IO, OpenedFile, PathApi } from './types';
