import { describe, expect, it } from 'vitest';
import { Readable } from 'node:stream';
import { utf8ByteCompare } from './utf8.js';
import { EPOCH_INSTANT, latestInstant } from './time.js';
import { nextPage } from './pagination.js';
import { readStreamToBuffer } from './streams.js';

describe('utf8ByteCompare', () => {
  it('orders by UTF-8 bytes rather than UTF-16 code units', () => {
    expect(utf8ByteCompare('B', 'a')).toBeLessThan(0);
    expect(utf8ByteCompare('a', 'ab')).toBeLessThan(0);
    expect(utf8ByteCompare('～', '\u{1F600}')).toBeLessThan(0);
    expect('～' < '\u{1F600}').toBe(false);
  });

  it('treats equal names as equal and lone surrogates as U+FFFD', () => {
    expect(utf8ByteCompare('dir/é', 'dir/é')).toBe(0);
    expect(utf8ByteCompare('\uD800', '\uFFFD')).toBe(0);
    expect(utf8ByteCompare('\uFFFD', '\u{10000}')).toBeLessThan(0);
  });
});

describe('latestInstant', () => {
  it('returns the later instant and prefers the first on ties', () => {
    const early = '2024-01-01T00:00:00.000Z';
    const late = '2024-06-01T00:00:00.000Z';
    expect(latestInstant(early, late)).toBe(late);
    expect(latestInstant(late, early)).toBe(late);
    expect(latestInstant(early, '2024-01-01T00:00:00Z')).toBe(early);
    expect(EPOCH_INSTANT).toBe('1970-01-01T00:00:00.000Z');
  });
});

describe('nextPage', () => {
  const items = ['a', 'b', 'c'];

  it('pages through items and signals end of stream', () => {
    expect(nextPage(items, 0, 2)).toEqual({ items: ['a', 'b'], nextOffset: 2 });
    expect(nextPage(items, 2, 2)).toEqual({ items: ['c'], nextOffset: 3 });
    expect(nextPage(items, 3, 2)).toBeNull();
  });

  it('returns everything left for non-positive limits', () => {
    expect(nextPage(items, 1, 0)).toEqual({ items: ['b', 'c'], nextOffset: 3 });
    expect(nextPage(items, 3, -1)).toEqual({ items: [], nextOffset: 3 });
  });
});

describe('readStreamToBuffer', () => {
  it('concatenates string and buffer chunks', async () => {
    const buffer = await readStreamToBuffer(Readable.from([Buffer.from('ab'), 'cd']));
    expect(buffer.toString('utf8')).toBe('abcd');
  });
});
