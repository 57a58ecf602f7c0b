/**
 * @fileoverview Explicit wiring of the core services.
 *
 * Builds every store, manager, provider and the tool catalog from one
 * config object. Tests pass in-memory stores through the overrides.
 */

import type { AppConfig } from './config.js';
import { createLogger, type AppLogger } from './utils/observability/index.js';
import { INTEGRATIONS, type Integration } from './services/integrations.js';
import {
  CredentialRegistry,
  GoogleCredentialManager,
  createCredentialStore,
  createPendingStateStore,
  type CredentialStore,
  type PendingStateStore,
} from './services/credentials/index.js';
import { MemoryContextManager, createMemoryClient, type MemoryClient } from './services/memory/index.js';
import { GmailProvider } from './services/google/gmail.js';
import { CalendarProvider } from './services/google/calendar.js';
import { createToolCatalog, type ToolCatalog } from './tools/index.js';
import { AssistantSession, type SessionOptions } from './agents/assistant/session.js';

export interface RuntimeOverrides {
  memoryClient?: MemoryClient;
  credentialStore?: CredentialStore;
  stateStore?: PendingStateStore;
  logger?: AppLogger;
  /** Delay between Google API retries */
  retryDelayMs?: number;
}

export interface AssistantRuntime {
  config: AppConfig;
  logger: AppLogger;
  memory: MemoryContextManager;
  credentials: CredentialRegistry;
  managers: Record<Integration, GoogleCredentialManager>;
  gmail: GmailProvider;
  calendar: CalendarProvider;
  tools: ToolCatalog;
  createSession(options: SessionOptions): AssistantSession;
  close(): void;
}

export function createAssistantRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): AssistantRuntime {
  const logger = overrides.logger ?? createLogger();

  const memoryClient = overrides.memoryClient ?? createMemoryClient(config.memory);
  const credentialStore = overrides.credentialStore ?? createCredentialStore(config.credentials);
  const stateStore = overrides.stateStore ?? createPendingStateStore(config.oauthState);

  const memory = new MemoryContextManager({
    client: memoryClient,
    assistantName: config.assistantName,
    retrievalTimeoutMs: config.memory.retrievalTimeoutMs,
    enrichmentTimeoutMs: config.memory.enrichmentTimeoutMs,
    logger: logger.child({ domain: 'memory' }),
  });

  const redirectUris: Record<Integration, string> = {
    email: config.google.emailRedirectUri,
    calendar: config.google.calendarRedirectUri,
  };

  const buildManager = (integration: Integration): GoogleCredentialManager =>
    new GoogleCredentialManager({
      integration,
      clientId: config.google.clientId ?? '',
      clientSecret: config.google.clientSecret ?? '',
      redirectUri: redirectUris[integration],
      store: credentialStore,
      stateStore,
      logger: logger.child({ domain: 'credentials' }),
    });

  const managers: Record<Integration, GoogleCredentialManager> = {
    email: buildManager('email'),
    calendar: buildManager('calendar'),
  };
  const credentials = new CredentialRegistry(managers);

  const gmail = new GmailProvider({
    auth: managers.email,
    logger: logger.child({ domain: 'gmail', integration: 'email' }),
    retryDelayMs: overrides.retryDelayMs,
  });
  const calendar = new CalendarProvider({
    auth: managers.calendar,
    logger: logger.child({ domain: 'calendar', integration: 'calendar' }),
    retryDelayMs: overrides.retryDelayMs,
  });

  const tools = createToolCatalog({
    credentials,
    gmail,
    calendar,
    memory,
    baseUrl: config.baseUrl,
    defaultTimezone: config.defaultTimezone,
    logger: logger.child({ domain: 'tools' }),
  });

  logger.info('runtime_ready', {
    integrations: [...INTEGRATIONS],
    memoryProvider: overrides.memoryClient ? 'override' : config.memory.provider,
    credentialProvider: overrides.credentialStore ? 'override' : config.credentials.provider,
  });

  return {
    config,
    logger,
    memory,
    credentials,
    managers,
    gmail,
    calendar,
    tools,
    createSession: (options) =>
      new AssistantSession(
        { memory, tools, assistantName: config.assistantName, logger },
        options
      ),
    close: () => {
      memoryClient.close?.();
      credentialStore.close?.();
      stateStore.close();
    },
  };
}
