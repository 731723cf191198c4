/**
 * validator/types.ts — Type definitions for the session-key validator.
 *
 * A wallet delegates narrowly-scoped call rights to an operator key. The
 * rights are a Merkle tree of sessions (target + selector + argument
 * predicates) committed as a single root per (wallet, operator), plus a gas
 * budget, a use count and optional per-token spending limits.
 */
import type { Address, Hash, Hex } from 'viem';

// ─── Sessions ─────────────────────────────────────────────────────────────

/**
 * One permitted call pattern. Immutable once it is hashed into a root:
 * changing it means publishing a new root.
 */
export interface Session {
  /** Contract the operator may call */
  to: Address;
  /** 4-byte selector (0x00000000 for a plain value transfer) */
  selector: Hex;
  /** RLP-encoded predicate forest, one node per argument slot */
  allowedArguments: Hex;
  /** Required paymaster, zero address when unpinned */
  paymaster: Address;
  /** uint48 timestamps, 0 = unbounded */
  validUntil: number;
  validAfter: number;
  /** Maximum number of uses; 0 or 2^128-1 = unlimited */
  timesLimit: bigint;
}

// ─── Operator permission ──────────────────────────────────────────────────

export interface OperatorPermission {
  sessionRoot: Hash;
  paymaster: Address;
  validUntil: number;
  validAfter: number;
  /** Remaining fee budget in wei; 2^128-1 = unlimited */
  gasRemaining: bigint;
  /** Remaining operation count; 2^128-1 = unlimited */
  timesRemaining: bigint;
}

// ─── Spending limits ──────────────────────────────────────────────────────

/** Owner-side configuration for one token (zero address = native token). */
export interface SpendingLimit {
  token: Address;
  allowance: bigint;
}

export interface SpendingLimitInfo {
  allowance: bigint;
  spent: bigint;
}

// ─── Predicates ───────────────────────────────────────────────────────────

export const PREDICATE_TAGS = {
  ANY: 0x00,
  NE: 0x01,
  EQ: 0x02,
  GT: 0x03,
  LT: 0x04,
  AND: 0x05,
  OR: 0x06,
} as const;

export type LeafOperator = 'ANY' | 'NE' | 'EQ' | 'GT' | 'LT';
export type BranchOperator = 'AND' | 'OR';

/**
 * Decoded (or to-be-encoded) predicate tree. Literals are ABI-encoded values,
 * compared byte for byte (EQ/NE) or as uint256 (GT/LT).
 */
export type Predicate =
  | { op: 'ANY' }
  | { op: Exclude<LeafOperator, 'ANY'>; value: Hex }
  | { op: BranchOperator; children: Predicate[] };

/** Nested byte strings, as produced and consumed by RLP. */
export type RlpValue = Hex | readonly RlpValue[];

// ─── User operations ──────────────────────────────────────────────────────

/** ERC-4337 (entry point v0.6) user operation. */
export interface UserOperation {
  sender: Address;
  nonce: bigint;
  initCode: Hex;
  callData: Hex;
  callGasLimit: bigint;
  verificationGasLimit: bigint;
  preVerificationGas: bigint;
  maxFeePerGas: bigint;
  maxPriorityFeePerGas: bigint;
  paymasterAndData: Hex;
  signature: Hex;
}

/** One call decoded from the wallet's execute entry points. */
export interface WalletCall {
  to: Address;
  value: bigint;
  data: Hex;
  operation: number;
}

// ─── Signature payload ────────────────────────────────────────────────────

export interface PermitPayload {
  /** 20-byte validator address followed by that validator's signature */
  signature: Hex;
  permission: OperatorPermission;
  spendingLimits: SpendingLimit[];
}

/**
 * Decoded extension payload carried in `UserOperation.signature` after the
 * 20-byte validator prefix. Single-call payloads are normalised to arrays of
 * length one.
 */
export interface SessionSignaturePayload {
  mode: 'single' | 'batch';
  proofs: Hash[][];
  operator: Address;
  sessions: Session[];
  arguments: Hex[];
  operatorSignature: Hex;
  permit?: PermitPayload;
}

// ─── Validation result ────────────────────────────────────────────────────

export interface ValidationData {
  failed: boolean;
  validUntil: number;
  validAfter: number;
}

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

// ─── Events ───────────────────────────────────────────────────────────────

export type ValidatorEvent =
  | { type: 'SessionRootSet'; wallet: Address; operator: Address; sessionRoot: Hash }
  | { type: 'OperatorRemainingGasSet'; wallet: Address; operator: Address; gasRemaining: bigint }
  | { type: 'OperatorRemainingTimesSet'; wallet: Address; operator: Address; timesRemaining: bigint }
  | { type: 'OperatorPermissionSet'; wallet: Address; operator: Address; permission: OperatorPermission }
  | { type: 'SpendingLimitSet'; wallet: Address; operator: Address; token: Address; allowance: bigint }
  | { type: 'SpendingLimitReset'; wallet: Address; operator: Address; token: Address }
  | { type: 'SpendingLimitDeleted'; wallet: Address; operator: Address; token: Address }
  | { type: 'SignatureRevoked'; wallet: Address; hash: Hash }
  | { type: 'PermitConsumed'; wallet: Address; operator: Address; hash: Hash; nonce: bigint };

export type ValidatorEventListener = (event: ValidatorEvent) => void;
