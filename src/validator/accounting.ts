/**
 * validator/accounting.ts — Gas budget, use count and token allowances.
 *
 * Every function here checks and writes in the same synchronous step. They
 * are meant to run inside `ValidatorStore.transaction`, so a later failure
 * in the same operation rolls the decrements back.
 */
import {
  decodeFunctionData,
  isAddressEqual,
  maxUint128,
  parseAbi,
  size,
  slice,
  toFunctionSelector,
  zeroAddress,
  type Address,
} from 'viem';
import { SessionKeyError, decodeOrThrow } from './errors.js';
import { buildSessionLeaf, isUnlimitedTimes } from './session.js';
import type { ValidatorStore } from './store.js';
import type { OperatorPermission, Session, SpendingLimitInfo, UserOperation, WalletCall } from './types.js';

/** Sentinel for "unlimited" gas and use budgets. Never decremented. */
export const UNLIMITED = maxUint128;

/** Spending limits for the native token are keyed by the zero address. */
export const NATIVE_TOKEN: Address = zeroAddress;

/** Verification gas multiplier when a paymaster is attached (covers postOp). */
export const PAYMASTER_VERIFICATION_MULTIPLIER = 3n;

export const ERC20_SPEND_ABI = parseAbi([
  'function transfer(address to, uint256 amount)',
  'function transferFrom(address from, address to, uint256 amount)',
  'function approve(address spender, uint256 amount)',
  'function increaseAllowance(address spender, uint256 addedValue)',
]);

const ERC20_SPEND_SELECTORS = new Set<string>(ERC20_SPEND_ABI.map((item) => toFunctionSelector(item)));

export interface TokenSpend {
  token: Address;
  amount: bigint;
}

// ─── Gas and use budget ───────────────────────────────────────────────────

export function paymasterOf(op: UserOperation): Address {
  return size(op.paymasterAndData) >= 20 ? slice(op.paymasterAndData, 0, 20) : zeroAddress;
}

/**
 * Worst-case fee the operation can charge:
 * (callGas + verificationGas * multiplier + preVerificationGas) * maxFeePerGas
 */
export function computeMaxFee(op: UserOperation): bigint {
  const multiplier = size(op.paymasterAndData) > 0 ? PAYMASTER_VERIFICATION_MULTIPLIER : 1n;
  return (op.callGasLimit + op.verificationGasLimit * multiplier + op.preVerificationGas) * op.maxFeePerGas;
}

/**
 * Charge one operation to the operator's budget. The fee may use the whole
 * remaining budget (fee == gasRemaining passes).
 */
export function consumeOperatorBudget(
  store: ValidatorStore,
  wallet: Address,
  operator: Address,
  op: UserOperation
): OperatorPermission {
  const permission = store.getPermission(wallet, operator);
  const fee = computeMaxFee(op);

  if (fee > permission.gasRemaining) {
    throw new SessionKeyError(
      'GAS_EXCEEDED',
      `gas fee exceeds remaining gas: fee ${fee}, remaining ${permission.gasRemaining}`
    );
  }
  if (permission.timesRemaining === 0n) {
    throw new SessionKeyError('TIMES_EXHAUSTED', 'operator has no remaining uses');
  }

  return store.updatePermission(wallet, operator, {
    gasRemaining: permission.gasRemaining === UNLIMITED ? UNLIMITED : permission.gasRemaining - fee,
    timesRemaining: permission.timesRemaining === UNLIMITED ? UNLIMITED : permission.timesRemaining - 1n,
  });
}

/** Count one use of a session whose `timesLimit` is bounded. Returns the new count. */
export function consumeSessionUse(
  store: ValidatorStore,
  wallet: Address,
  operator: Address,
  session: Session
): bigint | undefined {
  if (isUnlimitedTimes(session.timesLimit)) return undefined;

  const leaf = buildSessionLeaf(session);
  const used = store.getSessionUsage(wallet, operator, leaf);
  if (used >= session.timesLimit) {
    throw new SessionKeyError('SESSION_TIMES_EXHAUSTED', `session used ${used} of ${session.timesLimit} times`);
  }
  store.setSessionUsage(wallet, operator, leaf, used + 1n);
  return used + 1n;
}

// ─── Token allowances ─────────────────────────────────────────────────────

/**
 * Value a call moves out of the wallet: its native value, plus the amount of
 * an outgoing ERC-20 transfer, transferFrom or approval.
 */
export function extractSpends(wallet: Address, call: WalletCall): TokenSpend[] {
  const spends: TokenSpend[] = [];
  if (call.value > 0n) spends.push({ token: NATIVE_TOKEN, amount: call.value });

  if (size(call.data) < 4 || !ERC20_SPEND_SELECTORS.has(slice(call.data, 0, 4).toLowerCase())) return spends;

  const decoded = decodeOrThrow('token call', () => decodeFunctionData({ abi: ERC20_SPEND_ABI, data: call.data }));
  switch (decoded.functionName) {
    case 'transfer': {
      const [to, amount] = decoded.args;
      if (!isAddressEqual(to, wallet)) spends.push({ token: call.to, amount });
      break;
    }
    case 'transferFrom': {
      const [from, to, amount] = decoded.args;
      if (isAddressEqual(from, wallet) && !isAddressEqual(to, wallet)) spends.push({ token: call.to, amount });
      break;
    }
    case 'approve':
    case 'increaseAllowance': {
      const [spender, amount] = decoded.args;
      if (!isAddressEqual(spender, wallet)) spends.push({ token: call.to, amount });
      break;
    }
  }
  return spends;
}

/**
 * Add `spend` to the operator's spent counter for the token. Tokens without
 * a configured limit are unrestricted; a configured limit caps the total.
 */
export function consumeAllowance(
  store: ValidatorStore,
  wallet: Address,
  operator: Address,
  spend: TokenSpend
): SpendingLimitInfo | undefined {
  const limit = store.getSpendingLimit(wallet, operator, spend.token);
  if (limit === undefined) return undefined;

  const spent = limit.spent + spend.amount;
  if (spent > limit.allowance) {
    throw new SessionKeyError(
      'TOKEN_OVERSPENDING',
      `token overspending: ${spend.token} allowance ${limit.allowance}, spent ${limit.spent}, requested ${spend.amount}`
    );
  }
  const next = { allowance: limit.allowance, spent };
  store.setSpendingLimit(wallet, operator, spend.token, next);
  return next;
}

export function consumeCallAllowances(
  store: ValidatorStore,
  wallet: Address,
  operator: Address,
  call: WalletCall
): void {
  for (const spend of extractSpends(wallet, call)) {
    consumeAllowance(store, wallet, operator, spend);
  }
}
