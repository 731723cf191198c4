/**
 * validator/session.ts — Session leaves, Merkle membership and per-call
 * argument checks.
 *
 * Sessions are never stored: the wallet stores one root per operator and
 * the operator presents the session plus its proof with every operation.
 * Leaves use the OpenZeppelin standard-tree encoding, so a tree built with
 * `StandardMerkleTree` verifies here without any translation.
 */
import { StandardMerkleTree } from '@openzeppelin/merkle-tree';
import {
  concat,
  concatHex,
  encodeAbiParameters,
  hexToBigInt,
  isAddressEqual,
  keccak256,
  maxUint128,
  size,
  slice,
  type Address,
  type Hash,
  type Hex,
} from 'viem';
import { SessionKeyError } from './errors.js';
import { decodeActualArguments, isAllowedCalldata } from './predicate.js';
import type { Session } from './types.js';

export const SESSION_LEAF_ENCODING = ['address', 'bytes4', 'bytes', 'address', 'uint48', 'uint48', 'uint256'];

/** Selector used by sessions that allow a plain value transfer (empty calldata). */
export const FALLBACK_SELECTOR: Hex = '0x00000000';

export const SESSION_ABI_PARAMETERS = [
  { name: 'to', type: 'address' },
  { name: 'selector', type: 'bytes4' },
  { name: 'allowedArguments', type: 'bytes' },
  { name: 'paymaster', type: 'address' },
  { name: 'validUntil', type: 'uint48' },
  { name: 'validAfter', type: 'uint48' },
  { name: 'timesLimit', type: 'uint256' },
] as const;

export type SessionLeafValues = [Address, Hex, Hex, Address, number, number, bigint];

// ─── Leaves and trees ─────────────────────────────────────────────────────

export function sessionToLeafValues(session: Session): SessionLeafValues {
  return [
    session.to,
    session.selector,
    session.allowedArguments,
    session.paymaster,
    session.validUntil,
    session.validAfter,
    session.timesLimit,
  ];
}

/** keccak256(keccak256(abi.encode(session fields))) — field order matters. */
export function buildSessionLeaf(session: Session): Hash {
  const encoded = encodeAbiParameters(SESSION_ABI_PARAMETERS, sessionToLeafValues(session));
  return keccak256(keccak256(encoded));
}

export function buildSessionTree(sessions: readonly Session[]): StandardMerkleTree<SessionLeafValues> {
  return StandardMerkleTree.of(sessions.map(sessionToLeafValues), SESSION_LEAF_ENCODING);
}

export function getSessionProof(tree: StandardMerkleTree<SessionLeafValues>, session: Session): Hash[] {
  let proof: string[];
  try {
    proof = tree.getProof(sessionToLeafValues(session));
  } catch (error: unknown) {
    throw new SessionKeyError('INVALID_SESSION', 'session is not a leaf of this tree', { cause: error });
  }
  return proof.map(parseHash);
}

export function getSessionTreeRoot(tree: StandardMerkleTree<SessionLeafValues>): Hash {
  return parseHash(tree.root);
}

// ─── Membership ───────────────────────────────────────────────────────────

/** Sorted-pair Merkle proof verification. */
export function processProof(proof: readonly Hash[], leaf: Hash): Hash {
  return proof.reduce<Hash>((computed, sibling) => hashPair(computed, sibling), leaf);
}

export function validateSessionRoot(proof: readonly Hash[], root: Hash, session: Session): boolean {
  return hexToBigInt(processProof(proof, buildSessionLeaf(session))) === hexToBigInt(root);
}

export function verifySessionMembership(proof: readonly Hash[], root: Hash, session: Session): void {
  if (!validateSessionRoot(proof, root, session)) {
    throw new SessionKeyError('INVALID_SESSION', 'session is not committed under the operator root');
  }
}

// ─── Session-level checks ─────────────────────────────────────────────────

/** A zero pin accepts any paymaster. */
export function validatePaymaster(pinned: Address, actual: Address): true {
  if (!isZeroAddress(pinned) && !isAddressEqual(pinned, actual)) {
    throw new SessionKeyError('INVALID_PAYMASTER', `invalid paymaster: expected ${pinned}, got ${actual}`);
  }
  return true;
}

export function isUnlimitedTimes(timesLimit: bigint): boolean {
  return timesLimit === 0n || timesLimit === maxUint128;
}

/**
 * Check one wallet call against the session that claims to authorise it.
 *
 * Order: target, selector, consistency of the presented arguments with the
 * real calldata, then the predicate forest.
 */
export function checkArguments(session: Session, to: Address, data: Hex, value: bigint, actualArguments: Hex): true {
  if (!isAddressEqual(session.to, to)) {
    throw new SessionKeyError('INVALID_TO', `invalid to: session allows ${session.to}, call targets ${to}`);
  }

  const dataSize = size(data);
  if (dataSize > 0 && dataSize < 4) {
    throw new SessionKeyError('MALFORMED_INPUT', 'call data shorter than a selector');
  }
  const selector = dataSize === 0 ? FALLBACK_SELECTOR : slice(data, 0, 4);
  if (selector.toLowerCase() !== session.selector.toLowerCase()) {
    throw new SessionKeyError('INVALID_SELECTOR', `invalid selector: session allows ${session.selector}, got ${selector}`);
  }

  const actual = decodeActualArguments(actualArguments);
  const callArguments: Hex = dataSize > 4 ? slice(data, 4) : '0x';
  if (actual.length === 0) {
    if (value !== 0n || callArguments !== '0x') {
      throw new SessionKeyError('CALLDATA_MISMATCH', 'rlp calldata is not equally encoded from execution data');
    }
  } else if (concatHex(actual.slice(1)).toLowerCase() !== callArguments.toLowerCase()) {
    throw new SessionKeyError('CALLDATA_MISMATCH', 'rlp calldata is not equally encoded from execution data');
  }

  if (!isAllowedCalldata(session.allowedArguments, actualArguments, value)) {
    throw new SessionKeyError('ARGUMENTS_NOT_ALLOWED', 'call arguments are not allowed by the session');
  }
  return true;
}

// ─── Internal helpers ──────────────────────────────────────────────────────

function hashPair(a: Hash, b: Hash): Hash {
  return hexToBigInt(a) < hexToBigInt(b) ? keccak256(concat([a, b])) : keccak256(concat([b, a]));
}

function isZeroAddress(address: Address): boolean {
  return hexToBigInt(address) === 0n;
}

export function parseHash(value: string): Hash {
  if (!/^0x[0-9a-fA-F]{64}$/.test(value)) {
    throw new SessionKeyError('MALFORMED_INPUT', `not a 32-byte hash: ${value}`);
  }
  return `0x${value.slice(2)}`;
}
