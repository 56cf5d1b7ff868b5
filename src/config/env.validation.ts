import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import {
  EMBEDDING_SERVICES,
  METRIC_NAMES,
  RANKING_POLICIES,
  VECTOR_BACKENDS,
} from './similarity.config';

class EnvironmentVariables {
  // Backend selection
  @IsIn(VECTOR_BACKENDS)
  @IsOptional()
  VECTOR_BACKEND?: string;

  @IsIn(METRIC_NAMES)
  @IsOptional()
  SIMILARITY_METRIC?: string;

  @IsInt()
  @IsOptional()
  DEFAULT_TOP_K?: number;

  @IsString()
  @IsOptional()
  SIMILARITY_CONFIG_FILE?: string;

  // Embedding
  @IsIn(EMBEDDING_SERVICES)
  @IsOptional()
  EMBEDDING_SERVICE?: string;

  @IsString()
  @IsOptional()
  HF_API_KEY?: string;

  @IsString()
  @IsOptional()
  HF_EMBEDDING_MODEL?: string;

  // Cassandra / Astra
  @IsString()
  @IsOptional()
  ASTRADB_KEYSPACE?: string;

  @IsString()
  @IsOptional()
  ASTRADB_TABLE?: string;

  @IsString()
  @IsOptional()
  ASTRADB_USERNAME?: string;

  @IsString()
  @IsOptional()
  ASTRADB_PASSWORD?: string;

  @IsString()
  @IsOptional()
  ASTRADB_SECURE_CONNECT_BUNDLE?: string;

  @IsString()
  @IsOptional()
  ASTRADB_HOST?: string;

  @IsInt()
  @Min(1)
  @Max(65535)
  @IsOptional()
  ASTRADB_PORT?: number;

  @IsString()
  @IsOptional()
  ASTRADB_LOCAL_DATACENTER?: string;

  @IsBooleanString()
  @IsOptional()
  ASTRADB_ANN_ENABLED?: string;

  @IsIn(RANKING_POLICIES)
  @IsOptional()
  ASTRADB_RANKING?: string;

  // PostgreSQL
  @IsString()
  @IsOptional()
  POSTGRESQL_HOST?: string;

  @IsInt()
  @Min(1)
  @Max(65535)
  @IsOptional()
  POSTGRESQL_PORT?: number;

  @IsString()
  @IsOptional()
  POSTGRESQL_DATABASE?: string;

  @IsString()
  @IsOptional()
  POSTGRESQL_USERNAME?: string;

  @IsString()
  @IsOptional()
  POSTGRESQL_PASSWORD?: string;

  @IsBooleanString()
  @IsOptional()
  POSTGRESQL_SYNCHRONIZE?: string;

  // General
  @IsString()
  @IsOptional()
  NODE_ENV?: string;

  @IsInt()
  @IsOptional()
  PORT?: number;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(
      `❌ Environment validation failed!\n\nInvalid variables:\n${errors
        .map((err) => `  - ${err.property}: ${Object.values(err.constraints || {}).join(', ')}`)
        .join('\n')}\n\nPlease check your .env file or environment.`,
    );
  }

  return validatedConfig;
}
