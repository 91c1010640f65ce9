import { describe, expect, it } from 'vitest';
import { mergeHeaderOptions } from './utils.js';

describe('mergeHeaderOptions', () => {
  it('merges record, tuple and Headers sources', () => {
    const merged = mergeHeaderOptions(
      { Accept: 'application/json' },
      [['X-Trace', '1']],
      new Headers({ 'X-Other': '2' }),
    );

    expect(merged.get('accept')).toBe('application/json');
    expect(merged.get('x-trace')).toBe('1');
    expect(merged.get('x-other')).toBe('2');
  });

  it('lets later sources override earlier ones', () => {
    const merged = mergeHeaderOptions({ Accept: 'application/json' }, { accept: 'text/plain' });

    expect(merged.get('Accept')).toBe('text/plain');
  });

  it('skips undefined sources', () => {
    const merged = mergeHeaderOptions(undefined, { 'User-Agent': 'xivapi-typed' }, undefined);

    expect([...merged.keys()]).toEqual(['user-agent']);
  });
});
