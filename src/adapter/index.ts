export {
  toCodecInput,
  encodeCodecInput,
  decodeCodecInput,
  createVectorCodec,
} from './codec-adapter.js';
export type { CodecInput, VectorCodec } from './codec-adapter.js';
