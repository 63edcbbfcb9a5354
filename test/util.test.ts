import { describe, expect, it } from 'vitest';

import { escapeHtml, nonce, truncate } from '../src/util/text';
import { formatClock, formatDuration } from '../src/util/time';

describe('text helpers', () => {
  it('truncates with an ellipsis within the limit', () => {
    expect(truncate('abcdefghij', 6)).toBe('abc...');
    expect(truncate('abc', 6)).toBe('abc');
    expect(truncate(undefined, 6)).toBe('');
  });

  it('escapes html', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });

  it('creates alphanumeric nonces', () => {
    expect(nonce()).toMatch(/^[A-Za-z0-9]{16}$/);
  });
});

describe('time helpers', () => {
  it('formats clock time', () => {
    expect(formatClock(new Date(2024, 5, 1, 7, 8, 9))).toBe('07:08:09');
  });

  it('formats durations', () => {
    expect(formatDuration(12.4)).toBe('12ms');
    expect(formatDuration(1530)).toBe('1.5s');
  });
});
