/**
 * @fileoverview Express application for the OAuth callback server.
 */

import express, { type Express } from 'express';
import { createRequestId, withLogContext } from './utils/observability/index.js';
import { createAuthRouter } from './routes/auth.js';
import { healthHandler } from './routes/health.js';
import type { AssistantRuntime } from './runtime.js';

export function createApp(runtime: Pick<AssistantRuntime, 'credentials' | 'config' | 'logger'>): Express {
  const app = express();

  // Every log record written while handling a request carries its id
  app.use((_req, _res, next) => {
    withLogContext({ requestId: createRequestId() }, next);
  });

  // Health check endpoint
  app.get('/health', healthHandler);

  // OAuth routes
  app.use(
    createAuthRouter({
      credentials: runtime.credentials,
      assistantName: runtime.config.assistantName,
      logger: runtime.logger.child({ domain: 'oauth' }),
    })
  );

  return app;
}
