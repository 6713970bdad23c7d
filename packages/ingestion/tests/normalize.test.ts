import { describe, it, expect } from 'vitest';
import { normalizeText, stripUnsafeChars, stripWatermarks, truncate, unescapeLiterals } from '../src/normalize.js';

describe('stripWatermarks', () => {
  it('removes the full channel banner', () => {
    expect(stripWatermarks('**🔹 ****t.me/breachdetector**** 🔹**Database leak of 2M accounts')).toBe(
      'Database leak of 2M accounts',
    );
  });

  it('removes every occurrence of a watermark', () => {
    expect(stripWatermarks('t.me/breachdetector leak t.me/breachdetector')).toBe(' leak ');
  });

  it('is case-sensitive', () => {
    expect(stripWatermarks('T.ME/BREACHDETECTOR leak')).toBe('T.ME/BREACHDETECTOR leak');
  });

  it('accepts a custom watermark list', () => {
    expect(stripWatermarks('[promo] dump posted [promo]', ['[promo]'])).toBe(' dump posted ');
  });
});

describe('unescapeLiterals', () => {
  it('turns literal \\n sequences into spaces', () => {
    expect(unescapeLiterals('line one\\nline two')).toBe('line one line two');
  });

  it('turns literal \\" sequences into quotes', () => {
    expect(unescapeLiterals('say \\"hi\\"')).toBe('say "hi"');
  });

  it('leaves real newlines alone', () => {
    expect(unescapeLiterals('line one\nline two')).toBe('line one\nline two');
  });
});

describe('stripUnsafeChars', () => {
  it('removes angle brackets and quotes', () => {
    expect(stripUnsafeChars(`<script>alert("it's")</script>`)).toBe('scriptalert(its)/script');
  });
});

describe('normalizeText', () => {
  it('returns an empty string for non-text input', () => {
    expect(normalizeText(42)).toBe('');
    expect(normalizeText(null)).toBe('');
    expect(normalizeText(undefined)).toBe('');
    expect(normalizeText({ text: 'leak' })).toBe('');
  });

  it('returns an empty string for whitespace', () => {
    expect(normalizeText('   \n ')).toBe('');
  });

  it('keeps breach content intact after the watermark', () => {
    const raw = '**🔹 ****t.me/breachdetector**** 🔹** Stolen credentials from shop database';
    expect(normalizeText(raw)).toBe('Stolen credentials from shop database');
  });

  it('applies every cleanup step', () => {
    expect(normalizeText('  t.me/breachdetector <b>Leak</b>\\nfrom \\"shop\\"  ')).toBe('bLeak/b from shop');
  });

  it('is idempotent on already clean text', () => {
    const clean = normalizeText('Database leak: 10k emails (sample attached)');
    expect(normalizeText(clean)).toBe(clean);
  });
});

describe('truncate', () => {
  it('cuts text longer than the limit', () => {
    expect(truncate('abcdef', 3)).toBe('abc');
  });

  it('returns short text unchanged', () => {
    expect(truncate('abc', 3)).toBe('abc');
  });
});
