// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@compounder/vault-core/errors`
 * Purpose: Domain error classes for vault accounting and claim execution.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards; every error is raised before or instead of a mutation, never after a partial one.
 * Side-effects: none
 * Links: packages/vault-core/src/index.ts
 * @public
 */

/** Collaborators whose failures are surfaced as ExternalCallFailure */
export type ExternalCollaborator =
  | "reward-pool"
  | "price-oracle"
  | "token"
  | "emission-supply";

export class ConfigurationError extends Error {
  public readonly code = "CONFIGURATION_INVALID" as const;
  constructor(
    message: string,
    /** Offending field, when one can be named */
    public readonly field?: string
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class SlippageError extends Error {
  public readonly code = "SLIPPAGE_EXCEEDED" as const;
  constructor(
    public readonly amountRequired: bigint,
    public readonly maxAssetAmountIn: bigint
  ) {
    super(
      `Compound amount ${amountRequired} exceeds caller ceiling ${maxAssetAmountIn}`
    );
    this.name = "SlippageError";
  }
}

export class PrecisionError extends Error {
  public readonly code = "PRECISION_VIOLATION" as const;
  constructor(message: string) {
    super(message);
    this.name = "PrecisionError";
  }
}

export class AuthorizationError extends Error {
  public readonly code = "UNAUTHORIZED" as const;
  constructor(
    public readonly caller: string,
    public readonly operation: string
  ) {
    super(`${caller} is not authorized to ${operation}`);
    this.name = "AuthorizationError";
  }
}

export class ExternalCallFailure extends Error {
  public readonly code = "EXTERNAL_CALL_FAILED" as const;
  constructor(
    public readonly collaborator: ExternalCollaborator,
    public readonly operation: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${collaborator}.${operation} failed: ${reason}`, { cause });
    this.name = "ExternalCallFailure";
  }
}

export class ReentrancyError extends Error {
  public readonly code = "REENTRANT_CALL" as const;
  constructor(
    public readonly operation: string,
    public readonly activeOperation: string
  ) {
    super(
      `Re-entrant call to ${operation} while ${activeOperation} is in progress`
    );
    this.name = "ReentrancyError";
  }
}

export class InsufficientSharesError extends Error {
  public readonly code = "INSUFFICIENT_SHARES" as const;
  constructor(
    public readonly owner: string,
    public readonly requested: bigint,
    public readonly available: bigint
  ) {
    super(
      `Owner ${owner} holds ${available} shares, ${requested} requested`
    );
    this.name = "InsufficientSharesError";
  }
}

/** Any error raised by the vault domain itself (as opposed to a collaborator) */
export type VaultDomainError =
  | ConfigurationError
  | SlippageError
  | PrecisionError
  | AuthorizationError
  | ExternalCallFailure
  | ReentrancyError
  | InsufficientSharesError;

// Type guards

export function isConfigurationError(
  error: unknown
): error is ConfigurationError {
  return error instanceof Error && error.name === "ConfigurationError";
}

export function isSlippageError(error: unknown): error is SlippageError {
  return error instanceof Error && error.name === "SlippageError";
}

export function isPrecisionError(error: unknown): error is PrecisionError {
  return error instanceof Error && error.name === "PrecisionError";
}

export function isAuthorizationError(
  error: unknown
): error is AuthorizationError {
  return error instanceof Error && error.name === "AuthorizationError";
}

export function isExternalCallFailure(
  error: unknown
): error is ExternalCallFailure {
  return error instanceof Error && error.name === "ExternalCallFailure";
}

export function isReentrancyError(error: unknown): error is ReentrancyError {
  return error instanceof Error && error.name === "ReentrancyError";
}

export function isInsufficientSharesError(
  error: unknown
): error is InsufficientSharesError {
  return error instanceof Error && error.name === "InsufficientSharesError";
}

export function isVaultDomainError(error: unknown): error is VaultDomainError {
  return (
    isConfigurationError(error) ||
    isSlippageError(error) ||
    isPrecisionError(error) ||
    isAuthorizationError(error) ||
    isExternalCallFailure(error) ||
    isReentrancyError(error) ||
    isInsufficientSharesError(error)
  );
}
