import type { Command } from '../types.js';
import { ExitCode } from '../types.js';
import { KIND_CHOICES, parseHex, parseKindArg } from '../utils.js';
import { encodeFloatBase64 } from '../../codec/float-base64.js';

const USAGE = `pgvector-wire decode <${KIND_CHOICES}> <hex> [--summary|--base64]`;

export const decodeCommand: Command = {
  name: 'decode',
  description: 'Decode wire bytes (hex) to a float list',
  usage: USAGE,
  handler: async (args) => {
    const kind = parseKindArg(args[0]);
    const hex = args.slice(1).filter((arg) => !arg.startsWith('--')).join('');
    if (!kind || hex.length === 0) {
      console.error(kind ? 'Error: Hex bytes required' : 'Error: Vector type required');
      console.log(`Usage: ${USAGE}`);
      process.exit(ExitCode.USAGE);
      return;
    }

    const vector = kind.fromDatabaseBinary(parseHex(hex));

    if (args.includes('--summary')) {
      console.log(vector.toString());
    } else if (args.includes('--base64')) {
      console.log(encodeFloatBase64(vector.toFloatList()));
    } else {
      console.log(JSON.stringify(vector.toFloatList()));
    }
  },
};
