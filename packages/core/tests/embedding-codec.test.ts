import { describe, expect, it } from 'vitest';
import { AmenitySchema, decodeEmbedding, encodeEmbedding } from '../src/index';

const float32 = (...values: number[]): number[] => Array.from(Float32Array.from(values));

describe('embedding codec', () => {
  it('round-trips a vector through its text form as 32-bit floats', () => {
    const text = encodeEmbedding([0.1, 0.2, 0.3]);
    expect(text).toBe('[0.10000000149011612,0.20000000298023224,0.30000001192092896]');

    const decoded = decodeEmbedding(text);
    expect(decoded.ok).toBe(true);
    if (!decoded.ok) return;

    expect(decoded.value).toEqual(float32(0.1, 0.2, 0.3));
    expect(decoded.value[0]).toBeCloseTo(0.1, 6);
    expect(decoded.value[1]).toBeCloseTo(0.2, 6);
    expect(decoded.value[2]).toBeCloseTo(0.3, 6);
  });

  it('coerces a native list to float32 values', () => {
    const decoded = decodeEmbedding([0.5, 1, -2, 0.1]);
    expect(decoded).toEqual({ ok: true, value: float32(0.5, 1, -2, 0.1) });
  });

  it('accepts the spaced list literal databases emit', () => {
    const decoded = decodeEmbedding('[0.25, -0.75]');
    expect(decoded).toEqual({ ok: true, value: [0.25, -0.75] });
  });

  it.each([
    [42, 'Unsupported embedding type: number'],
    [null, 'Unsupported embedding type: null'],
    [{ values: [1] }, 'Unsupported embedding type: object'],
    ['not a list', 'Embedding text is not a valid list literal'],
    ['{"a":1}', 'Embedding text does not encode a list'],
    [['a', 1], 'Embedding element 0 is not a finite number'],
    ['[1, "2"]', 'Embedding element 1 is not a finite number'],
    [[], 'Embedding must not be empty']
  ])('rejects %j', (input, message) => {
    const decoded = decodeEmbedding(input);
    expect(decoded.ok).toBe(false);
    if (decoded.ok) return;
    expect(decoded.error.kind).toBe('embedding_parse');
    expect(decoded.error.message).toBe(message);
  });
});

describe('AmenitySchema', () => {
  const base = {
    id: 7,
    name: 'Gate B Coffee',
    description: 'Espresso bar',
    location: 'Near gate B4',
    terminal: 'Terminal 1',
    category: 'restaurant',
    hour: '05:00-22:00',
    content: 'Espresso bar near gate B4'
  };

  it('parses a record whose embedding is stored as text', () => {
    const parsed = AmenitySchema.parse({ ...base, embedding: '[0.5, 0.25]' });
    expect(parsed.embedding).toEqual([0.5, 0.25]);
  });

  it('allows records without an embedding', () => {
    const parsed = AmenitySchema.parse(base);
    expect(parsed.embedding).toBeUndefined();
  });

  it('reports an undecodable embedding as a validation issue', () => {
    const parsed = AmenitySchema.safeParse({ ...base, embedding: true });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    expect(parsed.error.issues[0]?.message).toBe('Unsupported embedding type: boolean');
    expect(parsed.error.issues[0]?.path).toEqual(['embedding']);
  });
});
