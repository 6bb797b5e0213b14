import { describe, expect, it } from 'vitest';
import { ANNOUNCEMENT_FOOTER, ANNOUNCEMENT_MARKER, formatAnnouncement, formatPairLine } from './formatter.js';

describe('formatAnnouncement', () => {
  it('returns null for an empty batch', () => {
    expect(formatAnnouncement([])).toBeNull();
  });

  it('renders header, numbered pairs and footer', () => {
    const message = formatAnnouncement([
      ['<@U01>', '<@U02>'],
      ['<@U03>', '<@U04>'],
    ]);
    expect(message).toBe([
      'This weeks random coffees are:',
      ' 1. <@U01> and <@U02>',
      ' 2. <@U03> and <@U04>',
      'If there are an uneven number of members one person will have two conversations',
    ].join('\n'));
  });

  it('starts with the marker and ends with the footer', () => {
    const message = formatAnnouncement([['@liam', '@emma']]) ?? '';
    const lines = message.split('\n');
    expect(lines[0]).toBe(ANNOUNCEMENT_MARKER);
    expect(lines[lines.length - 1]).toBe(ANNOUNCEMENT_FOOTER);
    expect(lines).toHaveLength(3);
  });

  it('numbers pairs from one', () => {
    const message = formatAnnouncement([['a', 'b'], ['c', 'd'], ['a', 'e']]) ?? '';
    expect(message.split('\n')[3]).toBe(' 3. a and e');
  });
});

describe('formatPairLine', () => {
  it('indents and numbers the pair', () => {
    expect(formatPairLine(12, '@x', '@y')).toBe(' 12. @x and @y');
  });
});
