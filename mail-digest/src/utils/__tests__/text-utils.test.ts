import { describe, it, expect } from 'vitest';
import { chunkText, fillTemplate, sanitizeMarkdown, truncateText, TRUNCATION_MARKER } from '../text-utils.js';

describe('truncateText', () => {
  it('leaves short text untouched', () => {
    expect(truncateText('short', 10)).toBe('short');
    expect(truncateText('exactly10!', 10)).toBe('exactly10!');
  });

  it('cuts long text and appends the marker', () => {
    expect(truncateText('abcdef', 3)).toBe(`abc\n\n${TRUNCATION_MARKER}`);
    expect(truncateText('abcdef', 3, '[cut]')).toBe('abc\n\n[cut]');
  });
});

describe('chunkText', () => {
  const words = Array.from({ length: 400 }, (_, i) => `word${String(i).padStart(3, '0')}`);
  const text = words.join(' ');

  it('returns short text as a single chunk', () => {
    expect(chunkText('a few words', 1500)).toEqual(['a few words']);
  });

  it('keeps every chunk within the limit', () => {
    const chunks = chunkText(text, 1500, 50);
    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.length).toBeLessThanOrEqual(1500);
    }
  });

  it('repeats the trailing words of a chunk at the start of the next one', () => {
    const [first, second] = chunkText(text, 1500, 50);
    const firstWords = first.split(' ');
    const overlap = firstWords.slice(-50).join(' ');
    expect(second.startsWith(overlap)).toBe(true);
  });

  it('covers every word', () => {
    const chunks = chunkText(text, 1500, 50);
    expect(chunks[0].startsWith('word000')).toBe(true);
    expect(chunks[chunks.length - 1].endsWith('word399')).toBe(true);
  });

  it('shrinks the overlap when it would not leave room for the next word', () => {
    const chunks = chunkText('aaaa bbbb cccc dddd', 10, 5);
    expect(chunks).toEqual(['aaaa bbbb', 'bbbb cccc', 'cccc dddd']);
  });
});

describe('sanitizeMarkdown', () => {
  it('removes bold, italic and headers', () => {
    expect(sanitizeMarkdown('## Summary\n**Deadline:** Friday\nThis is *important*')).toBe(
      'Summary\nDeadline: Friday\nThis is important'
    );
  });

  it('keeps bullet markers', () => {
    expect(sanitizeMarkdown('* first\n* second')).toBe('* first\n* second');
    expect(sanitizeMarkdown('- first\n- second')).toBe('- first\n- second');
  });
});

describe('fillTemplate', () => {
  it('replaces known placeholders and keeps unknown ones', () => {
    expect(fillTemplate('Email:\n{{email}}\n{{other}}', { email: 'hello' })).toBe('Email:\nhello\n{{other}}');
  });
});
