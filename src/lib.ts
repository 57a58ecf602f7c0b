/**
 * @fileoverview Public surface for the conversation engine adapter.
 */

export { loadConfig, validateConfig, type AppConfig } from './config.js';
export { createAssistantRuntime, type AssistantRuntime, type RuntimeOverrides } from './runtime.js';
export { createApp } from './app.js';
export {
  AssistantSession,
  ChatTurnContext,
  type SessionOptions,
} from './agents/assistant/session.js';
export type { ChatMessage, TurnContext, MemoryClient, MemoryRecord } from './services/memory/index.js';
export type { ToolContext } from './tools/index.js';
export { INTEGRATIONS, type Integration } from './services/integrations.js';
export {
  AppError,
  NotConnectedError,
  StateNotFoundError,
  CsrfMismatchError,
  CredentialExpiredError,
  RemoteOperationError,
  ParseError,
  type OperationResult,
  type FailureKind,
} from './utils/errors.js';
