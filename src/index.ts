/**
 * Account Desk: in-memory account management service.
 *
 * Entry point for the HTTP server. State lives only in this process and
 * resets to the demo accounts on every start.
 */

import { createApp, createAppContext } from './server';
import { loadConfig } from './config';
import { configureLogger, logger } from './logger';

export { createApp, createAppContext } from './server';
export * from './domain';
export * from './storage';
export * from './validation/account-validator';
export * from './stats/dashboard-stats';
export * from './services/account-service';
export { loadConfig, ConfigError } from './config';
export type { AppConfig } from './config';

function main(): void {
  const config = loadConfig();
  configureLogger(config);

  if (config.secretKeyGenerated) {
    logger.warn('SECRET_KEY is not set; using a random per-process key. Notices will not survive a restart.');
  }

  const app = createApp(createAppContext({ config }));
  const server = app.listen(config.port, () => {
    logger.info('Server listening', { port: config.port });
  });
  server.on('error', (err) => {
    logger.error('Server failed', { message: err.message });
    process.exitCode = 1;
  });
}

if (require.main === module) {
  main();
}
