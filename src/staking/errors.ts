/**
 * Staking error taxonomy
 *
 * Every rejected operation throws a StakingError whose `code` names the
 * failure kind and whose message is a stable reason string.
 */

export type StakingErrorCode =
  | 'InvalidAmount'
  | 'InsufficientBalance'
  | 'UnauthorizedCaller'
  | 'InvalidAddress'
  | 'ReentrantCall'
  | 'AlreadyClaimed'
  | 'NoActiveStake'
  | 'NoInterestDue'
  | 'TransferFailed';

export const ERROR_REASONS: Record<StakingErrorCode, string> = {
  InvalidAmount: 'Amount must be greater than zero',
  InsufficientBalance: 'Insufficient staked balance',
  UnauthorizedCaller: 'Caller is not the owner',
  InvalidAddress: 'Invalid address',
  ReentrantCall: 'Reentrant call',
  AlreadyClaimed: 'Interest already claimed for this stake',
  NoActiveStake: 'No active stake',
  NoInterestDue: 'No interest due',
  TransferFailed: 'Token transfer failed',
};

export class StakingError extends Error {
  readonly code: StakingErrorCode;

  constructor(code: StakingErrorCode, options?: { cause?: unknown }) {
    super(ERROR_REASONS[code], options);
    this.name = 'StakingError';
    this.code = code;
  }
}

