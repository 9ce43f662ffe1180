/**
 * Express server configuration.
 *
 * Assembles the page and API surfaces with middleware and dependency
 * injection. Everything stateful hangs off one AppContext, built once per
 * process, so tests can build as many isolated apps as they like.
 */

import express from 'express';
import { AppConfig, loadConfig } from './config';
import { Store } from './storage/store';
import { Clock, createMemoryStore } from './storage/memory-store';
import { SEED_ACCOUNTS } from './storage/seed';
import { AccountService } from './services/account-service';
import { FlashCookie } from './web/flash';
import { createPageRoutes } from './web/pages';
import { createAccountApiRoutes } from './api/accounts';
import { asyncHandler, errorHandler, notFoundHandler, requestLogger } from './api/middleware';

/** Application context containing all services. */
export interface AppContext {
  config: AppConfig;
  store: Store;
  accountService: AccountService;
  flash: FlashCookie;
}

export interface AppContextOptions {
  config?: AppConfig;
  /** Defaults to an in-memory store loaded with the demo accounts. */
  store?: Store;
  clock?: Clock;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = options.config ?? loadConfig();
  const store = options.store ?? createMemoryStore({ seed: SEED_ACCOUNTS, clock: options.clock });

  return {
    config,
    store,
    accountService: new AccountService(store),
    flash: new FlashCookie(config.secretKey),
  };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.disable('x-powered-by');
  app.use(requestLogger());

  // Body parsing: JSON for clients, urlencoded for the HTML forms
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));

  app.get(
    '/health',
    asyncHandler(async (_req, res) => {
      res.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        accounts_count: await ctx.accountService.count(),
      });
    }),
  );

  app.use('/api', createAccountApiRoutes(ctx.accountService));
  app.use('/', createPageRoutes(ctx.accountService, ctx.flash));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
