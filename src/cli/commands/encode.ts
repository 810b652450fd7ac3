import type { Command } from '../types.js';
import { ExitCode } from '../types.js';
import { KIND_CHOICES, getFlagValue, parseKindArg } from '../utils.js';
import { createVectorCodec } from '../../adapter/codec-adapter.js';

const USAGE = `pgvector-wire encode <${KIND_CHOICES}> <json-list> | --base64 <text>`;

/**
 * Print the binary wire form of a value as hex.
 *
 * The value is either a JSON list of numbers or base64 text of big-endian
 * float32 values. JSON `null` prints `null`, the SQL NULL marker.
 */
export const encodeCommand: Command = {
  name: 'encode',
  description: 'Encode a float list to wire bytes (hex)',
  usage: USAGE,
  handler: async (args) => {
    const kind = parseKindArg(args[0]);
    if (!kind) {
      console.error('Error: Vector type required');
      console.log(`Usage: ${USAGE}`);
      process.exit(ExitCode.USAGE);
      return;
    }

    const base64 = getFlagValue(args, '--base64');
    if (base64 !== undefined) {
      console.log(kind.fromFloatBase64(base64).toDatabaseBinary().toString('hex'));
      return;
    }

    const text = args.slice(1).join(' ').trim();
    if (text.length === 0) {
      console.error('Error: Value required');
      console.log(`Usage: ${USAGE}`);
      process.exit(ExitCode.USAGE);
      return;
    }

    const value: unknown = JSON.parse(text);
    const bytes = createVectorCodec(kind).encode(value);
    console.log(bytes === null ? 'null' : bytes.toString('hex'));
  },
};
