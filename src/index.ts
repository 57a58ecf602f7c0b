/**
 * @fileoverview OAuth callback server entry point.
 *
 * Loads and validates configuration, wires the runtime and serves the
 * Google authorization routes the connect tools link to.
 */

import { loadConfig, validateConfig } from './config.js';
import { createAssistantRuntime } from './runtime.js';
import { createApp } from './app.js';

const config = loadConfig();

// Fail fast if critical configuration is missing
validateConfig(config);

const runtime = createAssistantRuntime(config);
const log = runtime.logger.child({ domain: 'server' });
const app = createApp(runtime);

const server = app.listen(config.port, () => {
  log.info('server_started', {
    port: config.port,
    env: config.nodeEnv,
    baseUrl: config.baseUrl,
    memoryProvider: config.memory.provider,
    credentialProvider: config.credentials.provider,
  });
});

let isShuttingDown = false;

// Graceful shutdown
function shutdown(signal: string): void {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  log.info('shutdown_signal_received', { signal });

  const forceExitTimer = setTimeout(() => {
    log.warn('shutdown_forced');
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    runtime.close();
    log.info('server_closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
