import neo4j, { type Driver } from 'neo4j-driver';

export interface DriverConfig {
  uri: string;
  username: string;
  password: string;
  database?: string;
  maxConnectionPoolSize?: number;
  /** Milliseconds to wait when establishing a connection. */
  connectionTimeoutMs?: number;
}

export function createDriver(config: DriverConfig): Driver {
  return neo4j.driver(config.uri, neo4j.auth.basic(config.username, config.password), {
    maxConnectionPoolSize: config.maxConnectionPoolSize ?? 50,
    connectionTimeout: config.connectionTimeoutMs ?? 30_000,
  });
}

function required(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (value === undefined || value.trim() === '') {
    throw new Error(`${name} is not set`);
  }
  return value;
}

/**
 * Reads NEO4J_URI, NEO4J_USERNAME, NEO4J_PASSWORD and the optional
 * NEO4J_DATABASE.
 */
export function driverConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DriverConfig {
  const database = env['NEO4J_DATABASE'];
  return {
    uri: required(env, 'NEO4J_URI'),
    username: required(env, 'NEO4J_USERNAME'),
    password: required(env, 'NEO4J_PASSWORD'),
    ...(database !== undefined && database !== '' ? { database } : {}),
  };
}
