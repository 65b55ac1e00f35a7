/**
 * Shared configuration utilities for services
 */

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
}

type Env = Record<string, string | undefined>;

/**
 * Database settings from DB_* variables; user and password default to the
 * service name, the database to `<service>_dev`.
 */
export function createDatabaseConfig(
  serviceName: string,
  env: Env = process.env
): DatabaseConfig {
  const port = Number(env.DB_PORT ?? 5432);
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`DB_PORT must be a positive integer, got "${env.DB_PORT}"`);
  }

  return {
    host: env.DB_HOST ?? "localhost",
    port,
    user: env.DB_USER ?? serviceName,
    password: env.DB_PASSWORD ?? serviceName,
    name: env.DB_NAME ?? `${serviceName}_dev`,
  };
}

/**
 * Build a postgres:// connection string from discrete settings
 */
export function toConnectionString(config: DatabaseConfig): string {
  const user = encodeURIComponent(config.user);
  const password = encodeURIComponent(config.password);
  return `postgres://${user}:${password}@${config.host}:${config.port}/${config.name}`;
}

/**
 * Split a comma-separated value into trimmed, non-empty items
 */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];

  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}
