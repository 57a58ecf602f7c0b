/**
 * Global test setup for Vitest.
 *
 * This file runs before all tests. It configures the test environment
 * and sets up mock cleanup between tests.
 */

import { beforeEach, vi } from 'vitest';

// Set test environment variables before any imports
process.env.NODE_ENV = 'test';
process.env.BASE_URL = 'http://localhost:3000';
process.env.ASSISTANT_NAME = 'Juniper';
process.env.DEFAULT_TIMEZONE = 'America/Los_Angeles';
process.env.CREDENTIAL_STORE_PROVIDER = 'memory';
process.env.CREDENTIAL_ENCRYPTION_KEY = '0123456789abcdef0123456789abcdef0123456789abcdef0123456789abcdef';
process.env.OAUTH_STATE_STORE_PROVIDER = 'memory';
process.env.MEMORY_STORE_PROVIDER = 'sqlite';
process.env.MEMORY_SQLITE_PATH = ':memory:';
process.env.MEM0_API_KEY = 'test-mem0-key';
process.env.GOOGLE_CLIENT_ID = 'test-client-id';
process.env.GOOGLE_CLIENT_SECRET = 'test-client-secret';

// Import mocks
import './mocks/googleapis.js';
import { clearMockState } from './mocks/googleapis.js';

// Reset mocks before each test
beforeEach(() => {
  vi.clearAllMocks();
  clearMockState();
});
