export { registerVectorTypes, prepareVectorParam, TYPE_OID_QUERY } from './register-types.js';
export type {
  TypeCodecClient,
  RegisterVectorTypesOptions,
  RegisteredVectorTypes,
} from './register-types.js';
