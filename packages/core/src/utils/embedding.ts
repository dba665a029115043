import { EmbeddingParseError } from '../errors';
import { err, ok, type Result } from '../result';

type RawEmbedding =
  | { kind: 'list'; values: unknown[] }
  | { kind: 'text'; text: string };

function classify(value: unknown): RawEmbedding | null {
  if (Array.isArray(value)) {
    return { kind: 'list', values: value };
  }
  if (typeof value === 'string') {
    return { kind: 'text', text: value };
  }
  return null;
}

function coerceFloat32(values: unknown[]): Result<number[], EmbeddingParseError> {
  if (values.length === 0) {
    return err(new EmbeddingParseError('Embedding must not be empty'));
  }

  const out: number[] = [];
  for (let i = 0; i < values.length; i += 1) {
    const value = values[i];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return err(new EmbeddingParseError(`Embedding element ${i} is not a finite number`));
    }
    out.push(Math.fround(value));
  }
  return ok(out);
}

/**
 * Decodes a stored embedding into 32-bit float values.
 * Tries the native list form first, then a string-encoded list.
 */
export function decodeEmbedding(value: unknown): Result<number[], EmbeddingParseError> {
  const raw = classify(value);
  if (!raw) {
    return err(new EmbeddingParseError(`Unsupported embedding type: ${value === null ? 'null' : typeof value}`));
  }

  if (raw.kind === 'list') {
    return coerceFloat32(raw.values);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.text);
  } catch (error) {
    return err(new EmbeddingParseError('Embedding text is not a valid list literal', { cause: error }));
  }

  if (!Array.isArray(parsed)) {
    return err(new EmbeddingParseError('Embedding text does not encode a list'));
  }
  return coerceFloat32(parsed);
}

export function encodeEmbedding(values: readonly number[]): string {
  return `[${values.map((value) => String(Math.fround(value))).join(',')}]`;
}
