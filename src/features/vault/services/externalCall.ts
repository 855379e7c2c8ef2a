// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/vault/services/externalCall`
 * Purpose: Uniform error boundary around every port call made by vault services.
 * Scope: Error classification only. Does not retry.
 * Invariants: Vault domain errors pass through unchanged; anything else becomes ExternalCallFailure with the original as cause.
 * Side-effects: none
 * @internal
 */

import {
  type ExternalCollaborator,
  ExternalCallFailure,
  isVaultDomainError,
} from "@compounder/vault-core";

export async function callExternal<T>(
  collaborator: ExternalCollaborator,
  operation: string,
  call: () => Promise<T>
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (isVaultDomainError(error)) {
      throw error;
    }
    throw new ExternalCallFailure(collaborator, operation, error);
  }
}
