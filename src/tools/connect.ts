/**
 * Connection tools: hand the user an OAuth link for an integration.
 */

import { INTEGRATION_LABELS, type Integration } from '../services/integrations.js';
import type { ToolDefinition, ToolDependencies } from './types.js';

/**
 * Link to the OAuth server's authorization route for a user.
 */
export function connectUrl(baseUrl: string, integration: Integration, userId: string): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}/${integration}/auth`);
  url.searchParams.set('user_id', userId);
  return url.toString();
}

export function connectTool(
  deps: Pick<ToolDependencies, 'credentials' | 'baseUrl'>,
  integration: Integration,
  name: string
): ToolDefinition {
  const label = INTEGRATION_LABELS[integration];

  return {
    tool: {
      name,
      description: `Connect the user's ${label} account. Returns a link the user opens to grant access.`,
      input_schema: {
        type: 'object' as const,
        properties: {},
      },
    },
    handler: async (_input, context) => {
      if (await deps.credentials.isConnected(context.userId, integration)) {
        return `Your ${label} is already connected.`;
      }
      const link = connectUrl(deps.baseUrl, integration, context.userId);
      return `To connect ${label}, open this link and approve access: ${link}`;
    },
  };
}
