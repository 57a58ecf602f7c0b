/**
 * @fileoverview Google OAuth routes for voice-initiated authentication.
 *
 * Flow:
 * 1. User asks the assistant to connect email or calendar
 * 2. The connect tool speaks a link to /{integration}/auth?user_id=...
 * 3. We store a pending state and redirect to Google consent
 * 4. Google redirects back to /{integration}/callback
 * 5. We check the state, exchange the code and store the credential
 */

import { Router, type Request } from 'express';
import { createLogger, type AppLogger } from '../utils/observability/index.js';
import { CsrfMismatchError, StateNotFoundError, errorMessage } from '../utils/errors.js';
import { INTEGRATION_LABELS, isIntegration } from '../services/integrations.js';
import type { CredentialRegistry } from '../services/credentials/registry.js';

export interface AuthRouterOptions {
  credentials: CredentialRegistry;
  assistantName: string;
  logger?: AppLogger;
}

function queryParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

export function createAuthRouter(options: AuthRouterOptions): Router {
  const { credentials, assistantName } = options;
  const log = options.logger ?? createLogger({ domain: 'oauth' });
  const router = Router();

  /**
   * GET /:integration/auth
   * Initiates OAuth flow - redirects to Google consent screen.
   */
  router.get('/:integration/auth', (req, res) => {
    const { integration } = req.params;
    if (!isIntegration(integration)) {
      res.status(400).send(errorHtml(`Unknown integration "${integration}".`));
      return;
    }

    const userId = queryParam(req, 'user_id');
    if (!userId) {
      res.status(400).send(errorHtml('Missing user_id parameter.'));
      return;
    }

    const authUrl = credentials.beginAuthorization(userId, integration);
    res.redirect(authUrl);
  });

  /**
   * GET /:integration/callback
   * Handles OAuth callback from Google.
   */
  router.get('/:integration/callback', async (req, res) => {
    const { integration } = req.params;
    if (!isIntegration(integration)) {
      res.status(400).send(errorHtml(`Unknown integration "${integration}".`));
      return;
    }
    const label = INTEGRATION_LABELS[integration];

    // Handle user declining
    const declined = queryParam(req, 'error');
    if (declined) {
      log.info('oauth_declined', { integration, reason: declined });
      res.send(errorHtml(`Authorization was declined. You can ask ${assistantName} to connect ${label} again anytime.`));
      return;
    }

    const code = queryParam(req, 'code');
    const state = queryParam(req, 'state');
    if (!code || !state) {
      res.status(400).send(errorHtml('Missing code or state parameter.'));
      return;
    }

    const userId = queryParam(req, 'user_id') ?? credentials.findUserByState(integration, state);
    if (!userId) {
      log.warn('oauth_callback_unknown_state', { integration });
      res.status(400).send(errorHtml('This link has expired. Please ask for a new one.'));
      return;
    }

    try {
      const credential = await credentials.completeAuthorization(code, state, userId, integration);
      await credentials.saveCredential(userId, integration, credential);
      log.info('oauth_connected', { integration, userId });
      res.send(successHtml(label, assistantName));
    } catch (error) {
      if (error instanceof StateNotFoundError) {
        res.status(400).send(errorHtml('This link has expired. Please ask for a new one.'));
        return;
      }
      if (error instanceof CsrfMismatchError) {
        res.status(400).send(errorHtml('This link is no longer valid. Please ask for a new one and use only the latest link.'));
        return;
      }
      log.error('oauth_callback_failed', { integration, userId, error: errorMessage(error) });
      res.status(500).send(errorHtml(`Failed to connect ${label}. Please try again.`));
    }
  });

  return router;
}

const PAGE_STYLE = `
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      display: flex;
      justify-content: center;
      align-items: center;
      min-height: 100vh;
      margin: 0;
      background: #f5f5f5;
    }
    .card {
      background: white;
      padding: 2rem;
      border-radius: 12px;
      box-shadow: 0 2px 8px rgba(0,0,0,0.1);
      text-align: center;
      max-width: 400px;
    }
    h1 { margin: 0 0 0.5rem; color: #1a1a1a; }
    p { color: #666; margin: 0; }`;

function page(title: string, heading: string, message: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>${PAGE_STYLE}
  </style>
</head>
<body>
  <div class="card">
    <h1>${escapeHtml(heading)}</h1>
    <p>${escapeHtml(message)}</p>
  </div>
</body>
</html>`;
}

function successHtml(label: string, assistantName: string): string {
  return page('Connected', 'All Set!', `${label} is connected. You can close this page and go back to talking with ${assistantName}.`);
}

function errorHtml(message: string): string {
  return page('Error', 'Something Went Wrong', message);
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
