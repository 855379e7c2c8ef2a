// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@compounder/vault-core`
 * Purpose: Pure domain logic for the compounding vault: emission curve, incentive split, config validation and share math.
 * Scope: Re-exports model types, rules and errors. Does not contain I/O or infrastructure code.
 * Invariants: No imports from src/. Pure domain logic only; all arithmetic is BigInt within uint256.
 * Side-effects: none
 * @public
 */

// Errors
export {
  AuthorizationError,
  ConfigurationError,
  type ExternalCollaborator,
  ExternalCallFailure,
  InsufficientSharesError,
  isAuthorizationError,
  isConfigurationError,
  isExternalCallFailure,
  isInsufficientSharesError,
  isPrecisionError,
  isReentrancyError,
  isSlippageError,
  isVaultDomainError,
  PrecisionError,
  ReentrancyError,
  SlippageError,
  type VaultDomainError,
} from "./errors";
// Model types
export type {
  EmissionParams,
  IncentiveBounds,
  IncentiveSplit,
  RewardCut,
  RewardQuote,
  VaultConfig,
  VaultConfigInput,
  VaultDeployment,
} from "./model";
// Constants
export {
  INCENTIVE_BASIS,
  MAX_REWARD_STREAMS,
  PRICE_DECIMALS,
  WAD,
} from "./constants";
// Math
export {
  assertUint256,
  checkedSub,
  mulDiv,
  type Rounding,
  UINT256_MAX,
} from "./math";
// Rules
export {
  emissionsMinted,
  mintableSecondary,
  validateEmissionParams,
} from "./emission";
export {
  CALLER_PAYOUT_POLICY,
  COMPOUND_FRACTION_POLICY,
  computeIncentiveSplit,
  type IncentiveSplitInput,
  lockerCutOf,
} from "./incentives";
export {
  initialVaultConfig,
  nextVaultConfig,
  toVaultAddress,
  validateIncentiveBounds,
  validateVaultConfigInput,
  validateVaultDeployment,
} from "./config";
export {
  convertToAssets,
  convertToShares,
  previewDeposit,
  previewMint,
  previewRedeem,
  previewWithdraw,
  type ShareTotals,
} from "./shares";
