/**
 * Parsers for the text output of the vector types.
 *
 * `pg` hands result columns to type parsers as strings, so this is the form
 * registered parsers see:
 *
 * ```
 * vector, halfvec   [1,-2.5,0]
 * sparsevec         {2:3.5,4:-2}/4      (indices are 1-based)
 * ```
 *
 * @module codec/text-format
 */

import { FormatError } from '../utils/errors.js';

export interface SparseText {
  dimensions: number;
  /** Zero-based */
  indices: number[];
  values: number[];
}

const SPARSE_PATTERN = /^\{(.*)\}\/(\d+)$/;

function parseNumber(token: string, text: string): number {
  const trimmed = token.trim();
  const value = Number(trimmed);
  if (trimmed.length === 0 || Number.isNaN(value)) {
    throw new FormatError(`malformed number "${token}" in ${text}`, 'INVALID_TEXT');
  }
  return value;
}

/**
 * Parse `[x1,x2,...]`.
 */
export function parseDenseText(text: string): number[] {
  const trimmed = text.trim();
  if (!trimmed.startsWith('[') || !trimmed.endsWith(']')) {
    throw new FormatError(`expected [...] but got ${text}`, 'INVALID_TEXT');
  }
  const body = trimmed.slice(1, -1);
  if (body.trim().length === 0) {
    return [];
  }
  return body.split(',').map((token) => parseNumber(token, text));
}

/**
 * Parse `{i1:v1,i2:v2,...}/dim`, converting indices to zero-based.
 */
export function parseSparseText(text: string): SparseText {
  const match = SPARSE_PATTERN.exec(text.trim());
  if (!match) {
    throw new FormatError(`expected {...}/dim but got ${text}`, 'INVALID_TEXT');
  }

  const dimensions = Number(match[2]);
  const indices: number[] = [];
  const values: number[] = [];
  if (match[1].trim().length > 0) {
    for (const entry of match[1].split(',')) {
      const separator = entry.indexOf(':');
      if (separator === -1) {
        throw new FormatError(`malformed entry "${entry}" in ${text}`, 'INVALID_TEXT');
      }
      const index = parseNumber(entry.slice(0, separator), text);
      if (!Number.isInteger(index) || index < 1) {
        throw new FormatError(`sparse index ${index} is not a positive integer`, 'INVALID_TEXT');
      }
      indices.push(index - 1);
      values.push(parseNumber(entry.slice(separator + 1), text));
    }
  }

  return { dimensions, indices, values };
}
