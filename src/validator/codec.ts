/**
 * validator/codec.ts — Wire formats at the validator boundary.
 *
 *   - wallet calldata: normalExecute / batchNormalExecute
 *   - UserOperation.signature: 20-byte validator address + ABI payload
 *   - packed validation data: sigFailed | validUntil << 160 | validAfter << 208
 *   - entry point v0.6 user operation hash
 */
import {
  concat,
  decodeAbiParameters,
  decodeFunctionData,
  encodeAbiParameters,
  encodeFunctionData,
  getAddress,
  keccak256,
  maxUint48,
  parseAbi,
  size,
  slice,
  toFunctionSelector,
  type Address,
  type Hash,
  type Hex,
} from 'viem';
import { SessionKeyError, decodeOrThrow } from './errors.js';
import { SESSION_ABI_PARAMETERS } from './session.js';
import type {
  OperatorPermission,
  PermitPayload,
  Session,
  SessionSignaturePayload,
  SpendingLimit,
  UserOperation,
  ValidationData,
  WalletCall,
} from './types.js';

// ─── Wallet calldata ──────────────────────────────────────────────────────

export const WALLET_EXECUTE_ABI = parseAbi([
  'function normalExecute(address to, uint256 value, bytes data, uint8 operation)',
  'function batchNormalExecute(address[] to, uint256[] value, bytes[] data, uint8[] operation)',
]);

const NORMAL_EXECUTE_SELECTOR = toFunctionSelector(
  'function normalExecute(address to, uint256 value, bytes data, uint8 operation)'
);
const BATCH_NORMAL_EXECUTE_SELECTOR = toFunctionSelector(
  'function batchNormalExecute(address[] to, uint256[] value, bytes[] data, uint8[] operation)'
);

export interface DecodedWalletOperation {
  mode: 'single' | 'batch';
  calls: WalletCall[];
}

/** Only the two normal-execute entry points can be authorised by a session. */
export function decodeWalletOperation(callData: Hex): DecodedWalletOperation {
  const selector = size(callData) >= 4 ? slice(callData, 0, 4).toLowerCase() : '0x';
  if (selector !== NORMAL_EXECUTE_SELECTOR && selector !== BATCH_NORMAL_EXECUTE_SELECTOR) {
    throw new SessionKeyError('INVALID_WALLET_OPERATION', `invalid wallet operation: selector ${selector}`);
  }

  const decoded = decodeOrThrow('wallet calldata', () => decodeFunctionData({ abi: WALLET_EXECUTE_ABI, data: callData }));
  if (decoded.functionName === 'normalExecute') {
    const [to, value, data, operation] = decoded.args;
    return { mode: 'single', calls: [{ to, value, data, operation }] };
  }

  const [to, value, data, operation] = decoded.args;
  if (to.length === 0) {
    throw new SessionKeyError('INVALID_BATCH_LENGTH', 'batch execute needs at least one call');
  }
  if (value.length !== to.length || data.length !== to.length || operation.length !== to.length) {
    throw new SessionKeyError('INVALID_BATCH_LENGTH', 'batch execute arrays differ in length');
  }
  return {
    mode: 'batch',
    calls: to.map((target, i) => ({
      to: target,
      value: value[i] ?? 0n,
      data: data[i] ?? '0x',
      operation: operation[i] ?? 0,
    })),
  };
}

export function encodeNormalExecute(call: WalletCall): Hex {
  return encodeFunctionData({
    abi: WALLET_EXECUTE_ABI,
    functionName: 'normalExecute',
    args: [call.to, call.value, call.data, call.operation],
  });
}

export function encodeBatchNormalExecute(calls: readonly WalletCall[]): Hex {
  return encodeFunctionData({
    abi: WALLET_EXECUTE_ABI,
    functionName: 'batchNormalExecute',
    args: [
      calls.map((call) => call.to),
      calls.map((call) => call.value),
      calls.map((call) => call.data),
      calls.map((call) => call.operation),
    ],
  });
}

// ─── Permission structs ───────────────────────────────────────────────────

export const PERMISSION_ABI_PARAMETER = {
  name: 'permission',
  type: 'tuple',
  components: [
    { name: 'sessionRoot', type: 'bytes32' },
    { name: 'paymaster', type: 'address' },
    { name: 'validUntil', type: 'uint48' },
    { name: 'validAfter', type: 'uint48' },
    { name: 'gasRemaining', type: 'uint128' },
    { name: 'timesRemaining', type: 'uint128' },
  ],
} as const;

export const SPENDING_LIMITS_ABI_PARAMETER = {
  name: 'spendingLimits',
  type: 'tuple[]',
  components: [
    { name: 'token', type: 'address' },
    { name: 'allowance', type: 'uint256' },
  ],
} as const;

export function hashPermission(permission: OperatorPermission): Hash {
  return keccak256(encodeAbiParameters([PERMISSION_ABI_PARAMETER], [permission]));
}

export function hashSpendingLimits(spendingLimits: readonly SpendingLimit[]): Hash {
  return keccak256(encodeAbiParameters([SPENDING_LIMITS_ABI_PARAMETER], [spendingLimits]));
}

// ─── Signature payload ────────────────────────────────────────────────────

const SESSION_TUPLE = { type: 'tuple', components: SESSION_ABI_PARAMETERS } as const;
const SESSION_TUPLE_ARRAY = { type: 'tuple[]', components: SESSION_ABI_PARAMETERS } as const;

const SINGLE_PAYLOAD = [
  { name: 'proof', type: 'bytes32[]' },
  { name: 'operator', type: 'address' },
  { name: 'session', ...SESSION_TUPLE },
  { name: 'arguments', type: 'bytes' },
  { name: 'operatorSignature', type: 'bytes' },
] as const;

const BATCH_PAYLOAD = [
  { name: 'proofs', type: 'bytes32[][]' },
  { name: 'operator', type: 'address' },
  { name: 'sessions', ...SESSION_TUPLE_ARRAY },
  { name: 'arguments', type: 'bytes[]' },
  { name: 'operatorSignature', type: 'bytes' },
] as const;

const PERMIT_SUFFIX = [
  { name: 'permitSignature', type: 'bytes' },
  PERMISSION_ABI_PARAMETER,
  SPENDING_LIMITS_ABI_PARAMETER,
] as const;

const SINGLE_PERMIT_PAYLOAD = [...SINGLE_PAYLOAD, ...PERMIT_SUFFIX] as const;
const BATCH_PERMIT_PAYLOAD = [...BATCH_PAYLOAD, ...PERMIT_SUFFIX] as const;

/** Split `UserOperation.signature` into the validator prefix and its payload. */
export function splitValidatorSignature(signature: Hex): { validator: Address; payload: Hex } {
  if (size(signature) < 20) {
    throw new SessionKeyError('MALFORMED_INPUT', 'signature is shorter than the validator prefix');
  }
  return {
    validator: getAddress(slice(signature, 0, 20)),
    payload: size(signature) > 20 ? slice(signature, 20) : '0x',
  };
}

/**
 * Decode the payload (prefix already stripped). The permit form is the base
 * form with three extra fields; it is recognised by the payload being longer
 * than the canonical encoding of the base form.
 */
export function decodeSessionSignature(mode: 'single' | 'batch', payload: Hex): SessionSignaturePayload {
  return decodeOrThrow('session signature', () =>
    mode === 'single' ? decodeSinglePayload(payload) : decodeBatchPayload(payload)
  );
}

function decodeSinglePayload(payload: Hex): SessionSignaturePayload {
  const base = decodeAbiParameters(SINGLE_PAYLOAD, payload);
  const [proof, operator, session, args, operatorSignature] = base;
  const result: SessionSignaturePayload = {
    mode: 'single',
    proofs: [[...proof]],
    operator,
    sessions: [toSession(session)],
    arguments: [args],
    operatorSignature,
  };
  if (size(encodeAbiParameters(SINGLE_PAYLOAD, base)) === size(payload)) return result;

  const [, , , , , permitSignature, permission, spendingLimits] = decodeAbiParameters(SINGLE_PERMIT_PAYLOAD, payload);
  assertCanonical(
    payload,
    encodeAbiParameters(SINGLE_PERMIT_PAYLOAD, [proof, operator, session, args, operatorSignature, permitSignature, permission, spendingLimits])
  );
  return { ...result, permit: toPermit(permitSignature, permission, spendingLimits) };
}

function decodeBatchPayload(payload: Hex): SessionSignaturePayload {
  const base = decodeAbiParameters(BATCH_PAYLOAD, payload);
  const [proofs, operator, sessions, args, operatorSignature] = base;
  if (sessions.length !== proofs.length || args.length !== proofs.length) {
    throw new SessionKeyError('INVALID_BATCH_LENGTH', 'proofs, sessions and arguments differ in length');
  }
  const result: SessionSignaturePayload = {
    mode: 'batch',
    proofs: proofs.map((proof) => [...proof]),
    operator,
    sessions: sessions.map(toSession),
    arguments: [...args],
    operatorSignature,
  };
  if (size(encodeAbiParameters(BATCH_PAYLOAD, base)) === size(payload)) return result;

  const [, , , , , permitSignature, permission, spendingLimits] = decodeAbiParameters(BATCH_PERMIT_PAYLOAD, payload);
  assertCanonical(
    payload,
    encodeAbiParameters(BATCH_PERMIT_PAYLOAD, [proofs, operator, sessions, args, operatorSignature, permitSignature, permission, spendingLimits])
  );
  return { ...result, permit: toPermit(permitSignature, permission, spendingLimits) };
}

export interface EncodeSessionSignatureOptions {
  validator: Address;
  proofs: readonly (readonly Hash[])[];
  operator: Address;
  sessions: readonly Session[];
  arguments: readonly Hex[];
  operatorSignature: Hex;
  permit?: PermitPayload;
}

/** Full `UserOperation.signature` for a normalExecute operation. */
export function encodeSingleExecuteSignature(options: EncodeSessionSignatureOptions): Hex {
  const [proof] = options.proofs;
  const [session] = options.sessions;
  const [args] = options.arguments;
  if (proof === undefined || session === undefined || args === undefined) {
    throw new SessionKeyError('INVALID_BATCH_LENGTH', 'single execute needs exactly one session');
  }
  const base = [proof, options.operator, session, args, options.operatorSignature] as const;
  const payload = options.permit
    ? encodeAbiParameters(SINGLE_PERMIT_PAYLOAD, [
        ...base,
        options.permit.signature,
        options.permit.permission,
        options.permit.spendingLimits,
      ])
    : encodeAbiParameters(SINGLE_PAYLOAD, base);
  return concat([options.validator, payload]);
}

/** Full `UserOperation.signature` for a batchNormalExecute operation. */
export function encodeBatchExecuteSignature(options: EncodeSessionSignatureOptions): Hex {
  const base = [options.proofs, options.operator, options.sessions, options.arguments, options.operatorSignature] as const;
  const payload = options.permit
    ? encodeAbiParameters(BATCH_PERMIT_PAYLOAD, [
        ...base,
        options.permit.signature,
        options.permit.permission,
        options.permit.spendingLimits,
      ])
    : encodeAbiParameters(BATCH_PAYLOAD, base);
  return concat([options.validator, payload]);
}

// ─── Validation data ──────────────────────────────────────────────────────

export const SIG_VALIDATION_FAILED = 1n;

export const VALIDATION_FAILED: ValidationData = Object.freeze({ failed: true, validUntil: 0, validAfter: 0 });

export function packValidationData(data: ValidationData): bigint {
  return (
    (data.failed ? SIG_VALIDATION_FAILED : 0n) |
    (BigInt(data.validUntil) << 160n) |
    (BigInt(data.validAfter) << 208n)
  );
}

export function unpackValidationData(packed: bigint): ValidationData {
  return {
    failed: (packed & ((1n << 160n) - 1n)) !== 0n,
    validUntil: Number((packed >> 160n) & maxUint48),
    validAfter: Number((packed >> 208n) & maxUint48),
  };
}

export interface ValidityWindow {
  validUntil: number;
  validAfter: number;
}

/**
 * Narrow `a` by `b`: the earliest non-zero `validUntil` and the latest
 * `validAfter`. 0 means unbounded on either side.
 */
export function intersectValidityWindows(a: ValidityWindow, b: ValidityWindow): ValidityWindow {
  const validAfter = Math.max(a.validAfter, b.validAfter);
  let validUntil = Math.min(a.validUntil, b.validUntil);
  if (validUntil === 0) validUntil = Math.max(a.validUntil, b.validUntil);

  if (validUntil !== 0 && validUntil < validAfter) {
    throw new SessionKeyError(
      'INVALID_VALIDATION_DURATION',
      `invalid validation duration: validUntil ${validUntil} < validAfter ${validAfter}`
    );
  }
  return { validUntil, validAfter };
}

// ─── User operation hash ──────────────────────────────────────────────────

/** Entry point v0.6 hash: keccak256(abi.encode(keccak256(pack(op)), entryPoint, chainId)). */
export function getUserOpHash(op: UserOperation, entryPoint: Address, chainId: number | bigint): Hash {
  const packed = encodeAbiParameters(
    [
      { type: 'address' },
      { type: 'uint256' },
      { type: 'bytes32' },
      { type: 'bytes32' },
      { type: 'uint256' },
      { type: 'uint256' },
      { type: 'uint256' },
      { type: 'uint256' },
      { type: 'uint256' },
      { type: 'bytes32' },
    ],
    [
      op.sender,
      op.nonce,
      keccak256(op.initCode),
      keccak256(op.callData),
      op.callGasLimit,
      op.verificationGasLimit,
      op.preVerificationGas,
      op.maxFeePerGas,
      op.maxPriorityFeePerGas,
      keccak256(op.paymasterAndData),
    ]
  );
  return keccak256(
    encodeAbiParameters(
      [{ type: 'bytes32' }, { type: 'address' }, { type: 'uint256' }],
      [keccak256(packed), entryPoint, BigInt(chainId)]
    )
  );
}

// ─── Internal helpers ──────────────────────────────────────────────────────

interface DecodedSessionTuple {
  to: Address;
  selector: Hex;
  allowedArguments: Hex;
  paymaster: Address;
  validUntil: number;
  validAfter: number;
  timesLimit: bigint;
}

function toSession(tuple: DecodedSessionTuple): Session {
  return { ...tuple };
}

function toPermit(
  signature: Hex,
  permission: OperatorPermission,
  spendingLimits: readonly SpendingLimit[]
): PermitPayload {
  return {
    signature,
    permission: { ...permission },
    spendingLimits: spendingLimits.map((limit) => ({ token: limit.token, allowance: limit.allowance })),
  };
}

function assertCanonical(payload: Hex, reencoded: Hex): void {
  if (reencoded.toLowerCase() !== payload.toLowerCase()) {
    throw new SessionKeyError('MALFORMED_INPUT', 'session signature is not canonically encoded');
  }
}
