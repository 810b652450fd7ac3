/**
 * Shared CLI utilities.
 */

import { getVectorKind } from '../codec/registry.js';
import { VECTOR_TYPE_NAMES, isVectorTypeName, type VectorKind } from '../codec/types.js';
import { FormatError } from '../utils/errors.js';

/** Type names for usage messages */
export const KIND_CHOICES = VECTOR_TYPE_NAMES.join('|');

/**
 * Resolve a type name argument to its vector kind, or null if unknown.
 */
export function parseKindArg(arg: string | undefined): VectorKind | null {
  if (arg === undefined || !isVectorTypeName(arg)) {
    return null;
  }
  return getVectorKind(arg);
}

/**
 * Parse a hex string (whitespace and a leading 0x allowed) into bytes.
 */
export function parseHex(text: string): Buffer {
  const hex = text.replace(/\s+/g, '').replace(/^0x/i, '');
  if (!/^(?:[0-9a-fA-F]{2})*$/.test(hex)) {
    throw new FormatError('expected an even number of hex digits', 'INVALID_HEX');
  }
  return Buffer.from(hex, 'hex');
}

/**
 * Read the value following a flag, e.g. `--base64 <text>`.
 */
export function getFlagValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1 || index + 1 >= args.length) {
    return undefined;
  }
  return args[index + 1];
}
