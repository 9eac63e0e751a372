/**
 * Characters that a backslash turns into literals inside request items.
 */
export const SPECIAL_CHARS = '=@:;\\';

export function isSpecialChar(char: string): boolean {
  return char.length === 1 && SPECIAL_CHARS.includes(char);
}

/**
 * Resolve backslash escapes in one side of a request item.
 *
 * Only the special characters can be escaped. A backslash in front of
 * anything else stays, so Windows paths like `C:\temp` survive untouched.
 *
 * @example
 * ```typescript
 * unescape('f\\=oo');  // 'f=oo'
 * unescape('\\temp');  // '\\temp'
 * ```
 */
export function unescape(text: string): string {
  let out = '';
  let i = 0;

  while (i < text.length) {
    const char = text.charAt(i);
    if (char !== '\\') {
      out += char;
      i += 1;
      continue;
    }

    const next = text.charAt(i + 1);
    if (next === '') {
      out += char;
    } else if (isSpecialChar(next)) {
      out += next;
    } else {
      out += char + next;
    }
    i += 2;
  }

  return out;
}
