import { describe, expect, test } from 'vitest';
import { isSpecialChar, unescape } from '../src/items/escape';
import { matchSeparator, splitEmptyHeader, splitRequestItem } from '../src/items/tokenize';

describe('unescape', () => {
  test('resolves escaped special characters', () => {
    expect(unescape(String.raw`\=\@\:\;\\`)).toBe('=@:;\\');
  });

  test('copies other escapes through', () => {
    expect(unescape(String.raw`\n\t\q`)).toBe(String.raw`\n\t\q`);
  });

  test('keeps a trailing backslash', () => {
    expect(unescape('abc\\')).toBe('abc\\');
  });

  test('leaves plain text alone', () => {
    expect(unescape('plain text')).toBe('plain text');
  });
});

describe('isSpecialChar', () => {
  test('recognizes exactly the five special characters', () => {
    expect(['=', '@', ':', ';', '\\'].every(isSpecialChar)).toBe(true);
    expect(isSpecialChar('a')).toBe(false);
    expect(isSpecialChar('')).toBe(false);
  });
});

describe('matchSeparator', () => {
  test('prefers compound separators at the same position', () => {
    expect(matchSeparator('a:=@b', 1)).toBe(':=@');
    expect(matchSeparator('a:=b', 1)).toBe(':=');
    expect(matchSeparator('a:b', 1)).toBe(':');
    expect(matchSeparator('a=@b', 1)).toBe('=@');
    expect(matchSeparator('a==b', 1)).toBe('==');
  });

  test('returns undefined for ordinary characters', () => {
    expect(matchSeparator('abc', 1)).toBeUndefined();
  });
});

describe('splitRequestItem', () => {
  test('splits at the first unescaped separator', () => {
    expect(splitRequestItem('key=a=b')).toEqual({ key: 'key', separator: '=', value: 'a=b' });
  });

  test('a backslash protects the next character even when it is ordinary', () => {
    // The "\:" pair is skipped as a unit, so "=" is the first separator.
    expect(splitRequestItem(String.raw`a\:b=c`)).toEqual({ key: 'a:b', separator: '=', value: 'c' });
    expect(splitRequestItem(String.raw`a\b:c`)).toEqual({
      key: String.raw`a\b`,
      separator: ':',
      value: 'c'
    });
  });

  test('an escaped backslash does not protect the separator after it', () => {
    expect(splitRequestItem(String.raw`a\\:b`)).toEqual({ key: 'a\\', separator: ':', value: 'b' });
  });

  test('returns undefined when nothing matches', () => {
    expect(splitRequestItem('nothing')).toBeUndefined();
    expect(splitRequestItem(String.raw`all\=escaped`)).toBeUndefined();
    expect(splitRequestItem('')).toBeUndefined();
  });
});

describe('splitEmptyHeader', () => {
  test('takes the unescaped prefix before a trailing semicolon', () => {
    expect(splitEmptyHeader('X-Empty;')).toBe('X-Empty');
    expect(splitEmptyHeader(';')).toBe('');
  });

  test('ignores an escaped trailing semicolon', () => {
    expect(splitEmptyHeader(String.raw`X-Empty\;`)).toBeUndefined();
  });

  test('ignores a semicolon that is not last', () => {
    expect(splitEmptyHeader('X;Empty')).toBeUndefined();
  });
});
