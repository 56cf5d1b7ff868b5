// modules/cassandra/cassandra-client.factory.ts
import { Logger } from '@nestjs/common';
import { Client, ClientOptions } from 'cassandra-driver';
import { existsSync } from 'fs';
import type { CassandraConfig } from '../../config/similarity.config';

const logger = new Logger('CassandraClientFactory');

const CQL_IDENTIFIER = /^[A-Za-z][A-Za-z0-9_]{0,47}$/;

/**
 * Keyspace and table names are interpolated into CQL, so only plain
 * identifiers are accepted.
 */
export function assertCqlIdentifier(name: string): string {
  if (!CQL_IDENTIFIER.test(name)) {
    throw new Error(`Invalid CQL identifier: "${name}"`);
  }
  return name;
}

/**
 * A secure connect bundle wins when it is configured and present on disk;
 * otherwise the client goes to host/port.
 */
export function buildClientOptions(
  config: CassandraConfig,
  fileExists: (path: string) => boolean = existsSync,
): ClientOptions {
  const credentials =
    config.username && config.password
      ? { username: config.username, password: config.password }
      : undefined;

  if (config.secureConnectBundle && fileExists(config.secureConnectBundle)) {
    return {
      cloud: { secureConnectBundle: config.secureConnectBundle },
      credentials,
    };
  }

  return {
    contactPoints: [config.host],
    localDataCenter: config.localDataCenter,
    protocolOptions: { port: config.port },
    credentials,
  };
}

export function createCassandraClient(config: CassandraConfig): Client {
  const options = buildClientOptions(config);

  if (options.cloud) {
    logger.log(`☁️ Using secure connect bundle ${config.secureConnectBundle}`);
  } else {
    if (config.secureConnectBundle) {
      logger.warn(`Secure connect bundle not found at ${config.secureConnectBundle}, using host/port`);
    }
    logger.log(`Using contact point ${config.host}:${config.port} (${config.localDataCenter})`);
  }

  return new Client(options);
}
