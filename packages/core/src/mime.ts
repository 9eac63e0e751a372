import mimeTypes from './mime-types.json';

const EXTENSION_MIME_MAP: Record<string, string> = mimeTypes;

function extname(p: string): string {
  const base = p.split(/[\\/]/).pop() ?? '';
  const idx = base.lastIndexOf('.');
  if (idx <= 0) return '';
  return base.slice(idx);
}

/**
 * Best-effort media type for a file, based on its extension.
 *
 * @returns the media type, or undefined when the extension is unknown
 *
 * @example
 * ```typescript
 * guessMimeType('./data.json'); // 'application/json'
 * guessMimeType('./LOGO.PNG');  // 'image/png'
 * guessMimeType('./Makefile');  // undefined
 * ```
 */
export function guessMimeType(filePath: string): string | undefined {
  const ext = extname(filePath).toLowerCase();
  if (ext === '') return undefined;
  return EXTENSION_MIME_MAP[ext];
}
