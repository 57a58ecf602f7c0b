/**
 * @fileoverview Integration-keyed access to the credential lifecycles.
 */

import type { Integration } from '../integrations.js';
import type { CredentialLifecycle, StoredCredential } from './types.js';

export class CredentialRegistry {
  constructor(private readonly managers: Readonly<Record<Integration, CredentialLifecycle>>) {}

  beginAuthorization(userId: string, integration: Integration): string {
    return this.managers[integration].beginAuthorization(userId);
  }

  completeAuthorization(
    code: string,
    state: string,
    userId: string,
    integration: Integration
  ): Promise<StoredCredential> {
    return this.managers[integration].completeAuthorization(code, state, userId);
  }

  loadCredential(userId: string, integration: Integration): Promise<StoredCredential> {
    return this.managers[integration].loadCredential(userId);
  }

  isConnected(userId: string, integration: Integration): Promise<boolean> {
    return this.managers[integration].isConnected(userId);
  }

  saveCredential(userId: string, integration: Integration, credential: StoredCredential): Promise<void> {
    return this.managers[integration].saveCredential(userId, credential);
  }

  findUserByState(integration: Integration, state: string): string | null {
    return this.managers[integration].findUserByState(state);
  }
}
