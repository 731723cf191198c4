/**
 * Shared test fixtures: addresses, an engine with a fresh owner and operator
 * key, transfer sessions and signed user operations.
 */
import { concat, encodeFunctionData, parseAbi, zeroAddress, type Address, type Hash, type Hex } from 'viem';
import { generatePrivateKey, privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts';
import { DEFAULT_ENTRY_POINT, createEngine, type SessionGuardConfig } from '../src/utils/client.js';
import { UNLIMITED } from '../src/validator/accounting.js';
import { encodeBatchExecuteSignature, encodeSingleExecuteSignature, getUserOpHash } from '../src/validator/codec.js';
import { abiArgument, encodeActualArguments, encodeAllowedArguments } from '../src/validator/predicate.js';
import { getOperatorMessageHash } from '../src/validator/signatures.js';
import type {
  OperatorPermission,
  PermitPayload,
  Session,
  UserOperation,
  ValidatorEvent,
} from '../src/validator/types.js';

export const WALLET: Address = '0x1000000000000000000000000000000000000001';
export const VALIDATOR: Address = '0x2000000000000000000000000000000000000002';
export const SUDO_VALIDATOR: Address = '0x3000000000000000000000000000000000000003';
export const TOKEN: Address = '0x4000000000000000000000000000000000000004';
export const OTHER_TOKEN: Address = '0x4000000000000000000000000000000000000044';
export const PAYMASTER: Address = '0x5000000000000000000000000000000000000005';
export const STRANGER: Address = '0x6000000000000000000000000000000000000006';
export const CHAIN_ID = 1;

export const TRANSFER_SELECTOR: Hex = '0xa9059cbb';
export const ERC20_ABI = parseAbi([
  'function transfer(address to, uint256 amount)',
  'function transferFrom(address from, address to, uint256 amount)',
  'function approve(address spender, uint256 amount)',
]);

export const TEST_CONFIG: SessionGuardConfig = {
  walletAddress: WALLET,
  validatorAddress: VALIDATOR,
  chainId: CHAIN_ID,
  entryPointAddress: DEFAULT_ENTRY_POINT,
  ownerAddress: undefined,
  sudoValidatorAddress: SUDO_VALIDATOR,
};

export function setup() {
  const owner = privateKeyToAccount(generatePrivateKey());
  const operator = privateKeyToAccount(generatePrivateKey());
  const events: ValidatorEvent[] = [];
  const engine = createEngine({ ...TEST_CONFIG, ownerAddress: owner.address }, (event) => events.push(event));
  return { ...engine, owner, operator, events };
}

export const u256 = (value: bigint): Hex => abiArgument('uint256', value);

// ─── Sessions and calls ────────────────────────────────────────────────────

/** transfer(recipient, amount) on `token`, no native value. */
export function transferSession(recipient: Address, amount: bigint, overrides: Partial<Session> = {}): Session {
  return {
    to: TOKEN,
    selector: TRANSFER_SELECTOR,
    allowedArguments: encodeAllowedArguments([
      { op: 'EQ', value: u256(0n) },
      { op: 'EQ', value: abiArgument('address', recipient) },
      { op: 'EQ', value: u256(amount) },
    ]),
    paymaster: zeroAddress,
    validUntil: 0,
    validAfter: 0,
    timesLimit: 0n,
    ...overrides,
  };
}

export function transferData(recipient: Address, amount: bigint): Hex {
  return encodeFunctionData({ abi: ERC20_ABI, functionName: 'transfer', args: [recipient, amount] });
}

export function transferArguments(recipient: Address, amount: bigint): Hex {
  return encodeActualArguments([u256(0n), abiArgument('address', recipient), u256(amount)]);
}

export function unlimitedPermission(sessionRoot: Hash, overrides: Partial<OperatorPermission> = {}): OperatorPermission {
  return {
    sessionRoot,
    paymaster: zeroAddress,
    validUntil: 0,
    validAfter: 0,
    gasRemaining: UNLIMITED,
    timesRemaining: UNLIMITED,
    ...overrides,
  };
}

// ─── User operations ───────────────────────────────────────────────────────

export function baseOp(callData: Hex, overrides: Partial<UserOperation> = {}): UserOperation {
  return {
    sender: WALLET,
    nonce: 0n,
    initCode: '0x',
    callData,
    callGasLimit: 100n,
    verificationGasLimit: 100n,
    preVerificationGas: 100n,
    maxFeePerGas: 1n,
    maxPriorityFeePerGas: 1n,
    paymasterAndData: '0x',
    signature: '0x',
    ...overrides,
  };
}

export interface SignOptions {
  operator: PrivateKeyAccount;
  sessions: Session[];
  proofs: Hash[][];
  arguments: Hex[];
  mode?: 'single' | 'batch';
  permit?: PermitPayload;
  /** Key that actually signs; defaults to the operator. */
  signer?: PrivateKeyAccount;
  /** Validator address bound into the operator hash; defaults to VALIDATOR. */
  boundValidator?: Address;
}

/** Attach a session-key signature to `op`. */
export async function signSessionOp(
  op: UserOperation,
  options: SignOptions
): Promise<{ op: UserOperation; hash: Hash }> {
  const hash = getUserOpHash(op, DEFAULT_ENTRY_POINT, CHAIN_ID);
  const signer = options.signer ?? options.operator;
  const operatorSignature = await signer.signMessage({
    message: { raw: getOperatorMessageHash(hash, options.boundValidator ?? VALIDATOR) },
  });
  const encode = options.mode === 'batch' ? encodeBatchExecuteSignature : encodeSingleExecuteSignature;
  const signature = encode({
    validator: VALIDATOR,
    proofs: options.proofs,
    operator: options.operator.address,
    sessions: options.sessions,
    arguments: options.arguments,
    operatorSignature,
    permit: options.permit,
  });
  return { op: { ...op, signature }, hash };
}

/** Owner permit signature routed through `validator` (the sudo ECDSA validator by default). */
export async function signPermit(owner: PrivateKeyAccount, hash: Hash, validator: Address = SUDO_VALIDATOR): Promise<Hex> {
  const signature = await owner.signMessage({ message: { raw: hash } });
  return concat([validator, signature]);
}
