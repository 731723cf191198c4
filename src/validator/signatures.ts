/**
 * validator/signatures.ts — Message hashes the operator and the owner sign.
 */
import {
  encodeAbiParameters,
  getAddress,
  isAddressEqual,
  keccak256,
  recoverMessageAddress,
  size,
  slice,
  type Address,
  type Hash,
  type Hex,
} from 'viem';
import { hashPermission, hashSpendingLimits } from './codec.js';
import { SessionKeyError } from './errors.js';
import type { OperatorPermission, SpendingLimit } from './types.js';

// ─── Operator signature ───────────────────────────────────────────────────

/**
 * Binds the user operation hash to one validator address, so a signature
 * made for this validator cannot be replayed against another one.
 */
export function getOperatorMessageHash(userOpHash: Hash, validator: Address): Hash {
  return keccak256(encodeAbiParameters([{ type: 'bytes32' }, { type: 'address' }], [userOpHash, validator]));
}

/** EIP-191 personal-sign recovery over the raw 32-byte hash. */
export async function isSignedBy(hash: Hash, signature: Hex, signer: Address): Promise<boolean> {
  if (size(signature) !== 65) return false;
  try {
    const recovered = await recoverMessageAddress({ message: { raw: hash }, signature });
    return isAddressEqual(recovered, signer);
  } catch (error: unknown) {
    // bad s / v values mean the signature does not verify
    if (error instanceof Error) return false;
    throw error;
  }
}

// ─── Owner permit ─────────────────────────────────────────────────────────

export interface PermitMessage {
  wallet: Address;
  operator: Address;
  permission: OperatorPermission;
  spendingLimits: readonly SpendingLimit[];
  chainId: number | bigint;
  nonce: bigint;
}

export function getPermitMessageHash(message: PermitMessage): Hash {
  return keccak256(
    encodeAbiParameters(
      [
        { type: 'address' },
        { type: 'address' },
        { type: 'bytes32' },
        { type: 'bytes32' },
        { type: 'uint256' },
        { type: 'uint256' },
      ],
      [
        message.wallet,
        message.operator,
        hashPermission(message.permission),
        hashSpendingLimits(message.spendingLimits),
        BigInt(message.chainId),
        message.nonce,
      ]
    )
  );
}

/** Permit signatures are `validatorAddress ‖ validatorSignature`. */
export function splitPermitSignature(signature: Hex): { validator: Address; signature: Hex } {
  if (size(signature) <= 20) {
    throw new SessionKeyError('MALFORMED_INPUT', 'permit signature must start with a validator address');
  }
  return { validator: getAddress(slice(signature, 0, 20)), signature: slice(signature, 20) };
}
