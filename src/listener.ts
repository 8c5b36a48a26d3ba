import http from 'http';
import { EventEmitter } from 'events';
import { ListenerConfig, loadConfig } from './config';
import { ConfigError } from './errors';
import { createInspectServer } from './inspect-server';

export interface ProcessHooks {
  exit: (code: number) => void;
  log?: (message: string) => void;
  warn?: (message: string) => void;
  // Source of SIGINT/SIGTERM, normally `process`
  signals?: EventEmitter;
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

function warnOf(hooks: ProcessHooks): (message: string) => void {
  return hooks.warn ?? ((message: string) => console.error(message));
}

/**
 * Binds `server` to the configured address and wires startup failure and
 * signal shutdown to `hooks.exit`.
 */
export function startListener(config: ListenerConfig, server: http.Server, hooks: ProcessHooks): http.Server {
  const { port, host } = config;
  const log = hooks.log ?? ((message: string) => console.log(message));
  const warn = warnOf(hooks);
  const signals = hooks.signals ?? process;

  server.on('error', (error) => {
    warn(`Could not start listener on ${host}:${port}: ${error.message}`);
    hooks.exit(1);
  });

  log(`Starting server on port ${port}...`);
  server.listen(port, host, () => {
    log(`Listening on http://${host}:${port}`);
  });

  for (const signal of SHUTDOWN_SIGNALS) {
    signals.on(signal, () => {
      log(`Received ${signal}, shutting down`);
      server.close(() => {
        log('Server closed');
        hooks.exit(0);
      });
    });
  }

  return server;
}

/**
 * Reads the config from `env` and starts the diagnostic listener. Returns
 * undefined when the config is rejected.
 */
export function runListener(env: NodeJS.ProcessEnv, hooks: ProcessHooks): http.Server | undefined {
  let config: ListenerConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    warnOf(hooks)(`Invalid configuration: ${error.message}`);
    hooks.exit(1);
    return undefined;
  }

  return startListener(config, createInspectServer(), hooks);
}
