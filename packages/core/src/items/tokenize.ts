import { unescape } from './escape';

/**
 * Separators in probe order. Compound separators come before their
 * single-character prefixes so `:=` is never read as `:`.
 */
export const SEPARATORS = ['=@', ':=@', '==', ':=', '=', '@', ':'] as const;

export type Separator = (typeof SEPARATORS)[number];

export type SplitItem = {
  key: string;
  separator: Separator;
  value: string;
};

/**
 * Return the separator starting at `index`, trying each candidate in
 * probe order.
 */
export function matchSeparator(text: string, index: number): Separator | undefined {
  for (const separator of SEPARATORS) {
    if (text.startsWith(separator, index)) {
      return separator;
    }
  }
  return undefined;
}

/**
 * Split a raw token at the first unescaped separator.
 *
 * A backslash protects whatever follows it, special or not, so the scan
 * skips two characters on every backslash. Key and value are unescaped
 * independently.
 *
 * @returns the split item, or undefined when the token has no separator
 *
 * @example
 * ```typescript
 * splitRequestItem('a\\=b==c'); // { key: 'a=b', separator: '==', value: 'c' }
 * splitRequestItem('foo');      // undefined
 * ```
 */
export function splitRequestItem(raw: string): SplitItem | undefined {
  let i = 0;
  while (i < raw.length) {
    if (raw.charAt(i) === '\\') {
      i += 2;
      continue;
    }

    const separator = matchSeparator(raw, i);
    if (separator !== undefined) {
      return {
        key: unescape(raw.slice(0, i)),
        separator,
        value: unescape(raw.slice(i + separator.length))
      };
    }
    i += 1;
  }
  return undefined;
}

/**
 * Header name for a `name;` token, or undefined when the token does not end
 * with an unescaped semicolon.
 */
export function splitEmptyHeader(raw: string): string | undefined {
  let i = 0;
  while (i < raw.length) {
    if (raw.charAt(i) === '\\') {
      i += 2;
      continue;
    }
    if (i === raw.length - 1 && raw.charAt(i) === ';') {
      return unescape(raw.slice(0, i));
    }
    i += 1;
  }
  return undefined;
}
