import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';

export const VECTOR_BACKENDS = ['cassandra', 'postgres'] as const;
export const METRIC_NAMES = ['cosine', 'dot', 'euclidean'] as const;
export const RANKING_POLICIES = ['rerank', 'store'] as const;
export const EMBEDDING_SERVICES = ['huggingface'] as const;

export type VectorBackend = (typeof VECTOR_BACKENDS)[number];
export type MetricName = (typeof METRIC_NAMES)[number];
export type RankingPolicy = (typeof RANKING_POLICIES)[number];
export type EmbeddingServiceName = (typeof EMBEDDING_SERVICES)[number];

export const DEFAULT_CONFIG_FILE = 'config/similarity.json';

export interface EmbeddingConfig {
  service: EmbeddingServiceName;
  apiKey?: string;
  model: string;
}

export interface CassandraConfig {
  keyspace: string;
  table: string;
  username?: string;
  password?: string;
  /** Path to an Astra secure connect bundle; used only when the file exists. */
  secureConnectBundle?: string;
  host: string;
  port: number;
  localDataCenter: string;
  annEnabled: boolean;
  /**
   * `rerank` sorts the ANN candidates by the configured metric,
   * `store` keeps the order the store returned.
   */
  ranking: RankingPolicy;
}

export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  username: string;
  password?: string;
  synchronize: boolean;
}

export interface SimilarityConfig {
  backend: VectorBackend;
  metric: MetricName;
  defaultTopK: number;
  embedding: EmbeddingConfig;
  cassandra: CassandraConfig;
  postgres: PostgresConfig;
}

type FileSection = Record<string, unknown>;

function isRecord(value: unknown): value is FileSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sectionOf(file: FileSection, key: string): FileSection {
  const value = file[key];
  return isRecord(value) ? value : {};
}

function pickString(envValue: string | undefined, fileValue: unknown): string | undefined {
  if (envValue !== undefined && envValue !== '') return envValue;
  return typeof fileValue === 'string' && fileValue !== '' ? fileValue : undefined;
}

function pickNumber(envValue: string | undefined, fileValue: unknown): number | undefined {
  if (envValue !== undefined && envValue !== '') {
    const parsed = parseInt(envValue, 10);
    if (Number.isNaN(parsed)) {
      throw new Error(`Expected an integer but got "${envValue}"`);
    }
    return parsed;
  }
  return typeof fileValue === 'number' ? fileValue : undefined;
}

function pickBoolean(envValue: string | undefined, fileValue: unknown): boolean | undefined {
  if (envValue !== undefined && envValue !== '') return envValue.toLowerCase() === 'true';
  return typeof fileValue === 'boolean' ? fileValue : undefined;
}

function pickOneOf<T extends string>(
  allowed: readonly T[],
  name: string,
  envValue: string | undefined,
  fileValue: unknown,
  fallback: T,
): T {
  const value = pickString(envValue, fileValue);
  if (value === undefined) return fallback;
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new Error(`Unsupported ${name} "${value}" (expected one of: ${allowed.join(', ')})`);
  }
  return match;
}

/**
 * Reads the optional JSON config file. A missing file is an empty layer;
 * a file that exists but is not a JSON object is an error.
 */
export function readConfigFile(path: string): FileSection {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) return {};

  const parsed: unknown = JSON.parse(readFileSync(fullPath, 'utf8'));
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${fullPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Layered configuration: defaults < JSON file < environment variables.
 */
export function loadSimilarityConfig(env: NodeJS.ProcessEnv = process.env): SimilarityConfig {
  const file = readConfigFile(env.SIMILARITY_CONFIG_FILE || DEFAULT_CONFIG_FILE);
  const embedding = sectionOf(file, 'embedding');
  const cassandra = sectionOf(file, 'cassandra');
  const postgres = sectionOf(file, 'postgres');

  return {
    backend: pickOneOf(VECTOR_BACKENDS, 'backend', env.VECTOR_BACKEND, file.backend, 'postgres'),
    metric: pickOneOf(METRIC_NAMES, 'metric', env.SIMILARITY_METRIC, file.metric, 'cosine'),
    defaultTopK: pickNumber(env.DEFAULT_TOP_K, file.defaultTopK) ?? 5,
    embedding: {
      service: pickOneOf(
        EMBEDDING_SERVICES,
        'embedding service',
        env.EMBEDDING_SERVICE,
        embedding.service,
        'huggingface',
      ),
      apiKey: pickString(env.HF_API_KEY, embedding.apiKey),
      model:
        pickString(env.HF_EMBEDDING_MODEL, embedding.model) ??
        'sentence-transformers/all-MiniLM-L6-v2',
    },
    cassandra: {
      keyspace: pickString(env.ASTRADB_KEYSPACE, cassandra.keyspace) ?? 'vector_search',
      table: pickString(env.ASTRADB_TABLE, cassandra.table) ?? 'vectors',
      username: pickString(env.ASTRADB_USERNAME, cassandra.username),
      password: pickString(env.ASTRADB_PASSWORD, cassandra.password),
      secureConnectBundle: pickString(
        env.ASTRADB_SECURE_CONNECT_BUNDLE,
        cassandra.secureConnectBundle,
      ),
      host: pickString(env.ASTRADB_HOST, cassandra.host) ?? 'localhost',
      port: pickNumber(env.ASTRADB_PORT, cassandra.port) ?? 9042,
      localDataCenter:
        pickString(env.ASTRADB_LOCAL_DATACENTER, cassandra.localDataCenter) ?? 'datacenter1',
      annEnabled: pickBoolean(env.ASTRADB_ANN_ENABLED, cassandra.annEnabled) ?? true,
      ranking: pickOneOf(
        RANKING_POLICIES,
        'ranking policy',
        env.ASTRADB_RANKING,
        cassandra.ranking,
        'rerank',
      ),
    },
    postgres: {
      host: pickString(env.POSTGRESQL_HOST, postgres.host) ?? 'localhost',
      port: pickNumber(env.POSTGRESQL_PORT, postgres.port) ?? 5432,
      database: pickString(env.POSTGRESQL_DATABASE, postgres.database) ?? 'vector_search',
      username: pickString(env.POSTGRESQL_USERNAME, postgres.username) ?? 'postgres',
      password: pickString(env.POSTGRESQL_PASSWORD, postgres.password),
      synchronize: pickBoolean(env.POSTGRESQL_SYNCHRONIZE, postgres.synchronize) ?? false,
    },
  };
}

export default (): SimilarityConfig => loadSimilarityConfig();
