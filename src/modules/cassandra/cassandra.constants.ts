export const CASSANDRA_CLIENT = Symbol('CASSANDRA_CLIENT');

/** CQL `LIMIT` takes a signed 32-bit int. */
export const MAX_CQL_LIMIT = 2_147_483_647;

/** Largest finite value of the `vector<float, n>` column type. */
export const FLOAT32_MAX = 3.4028234663852886e38;
