import { describe, expect, test } from 'vitest';
import { parseRequestMode, resolveBodyOptions } from '../src/config';
import { InvalidOptionsError } from '../src/errors';
import { createMemoryIO } from './utils/memory-io';

describe('parseRequestMode', () => {
  test('accepts the three modes', () => {
    expect(parseRequestMode('json')).toBe('json');
    expect(parseRequestMode('form')).toBe('form');
    expect(parseRequestMode('multipart')).toBe('multipart');
  });

  test('rejects anything else', () => {
    expect(() => parseRequestMode('xml')).toThrow(InvalidOptionsError);
    expect(() => parseRequestMode('JSON')).toThrow(
      'mode: expected one of json, form, multipart, got "JSON"'
    );
  });
});

describe('resolveBodyOptions', () => {
  test('defaults basePath to the IO working directory', () => {
    const io = createMemoryIO({});
    const resolved = resolveBodyOptions({ io });

    expect(resolved.basePath).toBe('/work');
    expect(resolved.io).toBe(io);
    expect(resolved.boundary).toBeUndefined();
    expect(resolved.onEvent).toBeUndefined();
  });

  test('falls back to the Node adapter', () => {
    expect(resolveBodyOptions().basePath).toBe(process.cwd());
  });

  test('keeps a valid boundary', () => {
    expect(resolveBodyOptions({ boundary: 'abc-123' }).boundary).toBe('abc-123');
  });

  test('rejects a boundary with a trailing space', () => {
    expect(() => resolveBodyOptions({ boundary: 'abc ' })).toThrow(
      'boundary: must be 1-70 boundary characters without a trailing space'
    );
  });

  test('rejects a boundary longer than 70 characters', () => {
    expect(() => resolveBodyOptions({ boundary: 'x'.repeat(71) })).toThrow(InvalidOptionsError);
  });

  test('rejects an empty basePath', () => {
    expect(() => resolveBodyOptions({ basePath: '' })).toThrow(/^basePath: /);
  });
});
