import { describe, it, expect } from 'vitest';
import { resolveIngestionConfig } from '../src/config.js';
import { attachMessage, createParsedRecord, restoreRecord, serializeRecord } from '../src/record.js';
import { computeContentHash } from '../src/fingerprint.js';
import { config } from './helpers.js';

describe('createParsedRecord', () => {
  it('applies defaults and derives the hash', () => {
    const record = createParsedRecord({ content: '  Database leak  ' }, config);

    expect(record).toEqual({
      source: 'Unknown',
      content: 'Database leak',
      breachType: 'Data leak',
      contentHash: computeContentHash('Database leak'),
    });
  });

  it('returns an immutable record', () => {
    const record = createParsedRecord({ content: 'Database leak' }, config);
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('rejects empty and whitespace-only content', () => {
    expect(createParsedRecord({ content: '' }, config)).toBeNull();
    expect(createParsedRecord({ content: '   ' }, config)).toBeNull();
  });

  it('caps content and source length', () => {
    const record = createParsedRecord({ content: 'a'.repeat(2500), source: 's'.repeat(600) }, config);

    expect(record?.content).toHaveLength(2000);
    expect(record?.source).toHaveLength(500);
  });

  it('keeps allowed breach types', () => {
    expect(createParsedRecord({ content: 'x', breachType: 'Ransomware' }, config)?.breachType).toBe('Ransomware');
  });

  it('coerces unknown breach types to Other', () => {
    expect(createParsedRecord({ content: 'x', breachType: 'Spam' }, config)?.breachType).toBe('Other');
    expect(createParsedRecord({ content: 'x', breachType: 42 }, config)?.breachType).toBe('Other');
    expect(createParsedRecord({ content: 'x', breachType: 'data leak' }, config)?.breachType).toBe('Other');
  });

  it('honors a narrowed breach type set', () => {
    const narrow = resolveIngestionConfig({ allowedBreachTypes: ['Data leak', 'Other'] });
    expect(createParsedRecord({ content: 'x', breachType: 'Malware' }, narrow)?.breachType).toBe('Other');
  });

  it('sanitizes and caps the author', () => {
    expect(createParsedRecord({ content: 'x', author: ' <b>"Eve"</b> ' }, config)?.author).toBe('bEve/b');
    expect(createParsedRecord({ content: 'x', author: 'a'.repeat(150) }, config)?.author).toHaveLength(100);
  });

  it('omits an author that sanitizes to nothing', () => {
    const record = createParsedRecord({ content: 'x', author: '<>' }, config);
    expect(record).not.toHaveProperty('author');
  });
});

describe('serializeRecord', () => {
  it('uses the legacy key casing', () => {
    const parsed = createParsedRecord({ content: 'Database leak', source: 'shop.example', author: 'analyst' }, config);
    if (!parsed) throw new Error('expected record');
    const record = attachMessage(parsed, { messageId: 42, timestamp: new Date('2024-05-01T12:00:00Z') });

    expect(serializeRecord(record)).toEqual({
      Content: 'Database leak',
      Source: 'shop.example',
      Type: 'Data leak',
      Author: 'analyst',
      message_id: 42,
      timestamp: '2024-05-01T12:00:00.000Z',
      hash_id: computeContentHash('Database leak'),
    });
  });
});

describe('restoreRecord', () => {
  const stored = {
    Content: 'Stolen passwords dump',
    Source: 'forum.example',
    Type: 'Data leak',
    message_id: 9,
    timestamp: '2023-06-01T08:00:00+00:00',
  };

  it('rebuilds a record from a legacy entry', () => {
    const restored = restoreRecord(stored, config);

    expect(restored?.hashMismatch).toBe(false);
    expect(restored?.record).toEqual({
      source: 'forum.example',
      content: 'Stolen passwords dump',
      breachType: 'Data leak',
      contentHash: computeContentHash('Stolen passwords dump'),
      messageId: 9,
      timestamp: new Date('2023-06-01T08:00:00Z'),
    });
  });

  it('flags a hash from another composition', () => {
    const restored = restoreRecord({ ...stored, hash_id: 'forum.example_0123456789abcdef' }, config);
    expect(restored?.hashMismatch).toBe(true);
    expect(restored?.record.contentHash).toBe(computeContentHash('Stolen passwords dump'));
  });

  it('accepts a matching hash', () => {
    const restored = restoreRecord({ ...stored, hash_id: computeContentHash('Stolen passwords dump') }, config);
    expect(restored?.hashMismatch).toBe(false);
  });

  it('coerces stored types outside the allowed set', () => {
    expect(restoreRecord({ ...stored, Type: 'Weird' }, config)?.record.breachType).toBe('Other');
  });

  it('drops entries without content', () => {
    expect(restoreRecord({ ...stored, Content: '  ' }, config)).toBeNull();
  });
});
