import { ConfigError } from './errors';

export const DEFAULT_PORT = 8090;
export const DEFAULT_HOST = '0.0.0.0';

export interface ListenerConfig {
  port: number;
  host: string;
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_PORT;
  }

  const value = raw.trim();
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`PORT must be a whole number, got "${raw}"`);
  }

  const port = parseInt(value, 10);
  if (port > 65535) {
    throw new ConfigError(`PORT must be between 0 and 65535, got ${port}`);
  }
  return port;
}

/**
 * Reads listener settings from an environment object. Call `dotenv.config()`
 * first if `.env` values should be visible.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ListenerConfig {
  const host = env.HOST?.trim();

  return {
    port: parsePort(env.PORT),
    host: host ? host : DEFAULT_HOST,
  };
}
