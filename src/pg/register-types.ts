/**
 * Bind the vector codecs to a PostgreSQL client.
 *
 * Looks up the OIDs of `vector`, `halfvec` and `sparsevec` in the schema the
 * extension lives in, then installs each kind's text parser for that OID.
 *
 * ## Usage
 *
 * ```typescript
 * import pg from 'pg';
 * import { registerVectorTypes, prepareVectorParam } from './register-types.js';
 * import { Vector } from '../codec/dense-vector.js';
 *
 * const client = new pg.Client();
 * await client.connect();
 * await registerVectorTypes(client);
 *
 * await client.query('INSERT INTO items (embedding) VALUES ($1)', [
 *   prepareVectorParam('vector', [0.5, 0.25]),
 * ]);
 * const { rows } = await client.query('SELECT embedding FROM items');
 * rows[0].embedding; // Vector
 *
 * // Byte-exact route: the binary send form as bytea, which pg returns as a Buffer
 * const { rows: raw } = await client.query('SELECT vector_send(embedding) AS wire FROM items');
 * Vector.fromDatabaseBinary(raw[0].wire);
 * ```
 *
 * Parameters go out in binary: `prepareVectorParam` returns the wire bytes and
 * `pg` sends a Buffer parameter in binary format. Vector objects do the same
 * through `toPostgres()`. Results come back as text, because `pg` decodes
 * every result field as UTF-8 before any parser runs, which mangles binary
 * float bytes; do not use `binary: true` with these types.
 *
 * @module pg/register-types
 */

import { createVectorCodec } from '../adapter/codec-adapter.js';
import { getVectorKind } from '../codec/registry.js';
import type { VectorKind, VectorTypeName } from '../codec/types.js';
import { loadConfig, validateExternalConfig } from '../config/loader.js';
import { ConfigError, RegistrationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('register-types');

/**
 * The part of a client that registration needs.
 * `pg.Client` and `pg.PoolClient` both provide it.
 */
export interface TypeCodecClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  setTypeParser(oid: number, format: 'text', parseFn: (value: string) => unknown): void;
}

export interface RegisterVectorTypesOptions {
  /** Schema the vector extension is installed in. Default: from config ('public') */
  schema?: string;
  /** Types to register. Default: from config (all three) */
  types?: readonly VectorTypeName[];
}

export interface RegisteredVectorTypes {
  schema: string;
  oids: Partial<Record<VectorTypeName, number>>;
}

export const TYPE_OID_QUERY = `
  SELECT t.oid, t.typname
  FROM pg_catalog.pg_type t
  JOIN pg_catalog.pg_namespace n ON n.oid = t.typnamespace
  WHERE n.nspname = $1 AND t.typname = ANY($2::text[])
`;

interface TypeRow {
  oid: number;
  typname: string;
}

function parseTypeRow(row: unknown): TypeRow {
  if (typeof row === 'object' && row !== null && 'oid' in row && 'typname' in row) {
    const { oid, typname } = row;
    const numericOid = typeof oid === 'number' ? oid : typeof oid === 'string' ? Number(oid) : NaN;
    if (Number.isInteger(numericOid) && numericOid > 0 && typeof typname === 'string') {
      return { oid: numericOid, typname };
    }
  }
  throw new RegistrationError(
    `unexpected row from type lookup: ${JSON.stringify(row)}`,
    'TYPE_LOOKUP_FAILED',
  );
}

async function lookupTypeOids(
  client: TypeCodecClient,
  schema: string,
  types: readonly VectorTypeName[],
): Promise<Map<string, number>> {
  let rows: unknown[];
  try {
    ({ rows } = await client.query(TYPE_OID_QUERY, [schema, [...types]]));
  } catch (error) {
    log.error('Type lookup failed', {
      schema,
      error: error instanceof Error ? error.message : String(error),
    });
    throw new RegistrationError(
      `failed to look up vector types in schema "${schema}"`,
      'TYPE_LOOKUP_FAILED',
      error,
    );
  }

  const oids = new Map<string, number>();
  for (const row of rows) {
    const { oid, typname } = parseTypeRow(row);
    oids.set(typname, oid);
  }
  return oids;
}

/**
 * Register text parsers for the vector types on a client.
 *
 * @throws ConfigError when the schema or type list is invalid, before any query runs
 */
export async function registerVectorTypes(
  client: TypeCodecClient,
  options: RegisterVectorTypesOptions = {},
): Promise<RegisteredVectorTypes> {
  const defaults =
    options.schema === undefined || options.types === undefined
      ? loadConfig().registration
      : undefined;
  const schema = options.schema ?? defaults?.schema ?? 'public';
  const types = options.types ?? defaults?.types ?? [];

  const errors = validateExternalConfig({ registration: { schema, types: [...types] } });
  if (errors.length > 0) {
    throw new ConfigError(
      `invalid registration settings: ${errors.join('; ')}`,
      'CONFIG_INVALID',
    );
  }

  const found = await lookupTypeOids(client, schema, types);

  const missing = types.filter((type) => !found.has(type));
  if (missing.length > 0) {
    throw new RegistrationError(
      `types not found in schema "${schema}": ${missing.join(', ')} ` +
        '(is the vector extension installed there?)',
      'TYPE_NOT_FOUND',
    );
  }

  const oids: Partial<Record<VectorTypeName, number>> = {};
  for (const type of types) {
    const oid = found.get(type);
    if (oid === undefined) continue;

    const kind: VectorKind = getVectorKind(type);
    const codec = createVectorCodec(kind);
    client.setTypeParser(oid, 'text', (value) => codec.parse(value));
    oids[type] = oid;
    log.debug(`Registered ${type}`, { schema, oid });
  }

  return { schema, oids };
}

/**
 * Encode a query parameter for a vector column.
 *
 * Accepts what the codec adapter accepts: a vector of the given kind, a list
 * of numbers, or null/undefined for SQL NULL.
 */
export function prepareVectorParam(typeName: VectorTypeName, value: unknown): Buffer | null {
  const kind: VectorKind = getVectorKind(typeName);
  return createVectorCodec(kind).encode(value);
}
