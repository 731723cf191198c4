/**
 * wallet/ecdsa.ts — Single-owner ECDSA validator.
 *
 * Used as the wallet's sudo validator: the owner signs user operations
 * directly and signs operator permits through `isValidSignature`.
 */
import type { Address, Hash, Hex } from 'viem';
import { splitValidatorSignature } from '../validator/codec.js';
import { isSignedBy } from '../validator/signatures.js';
import type { UserOperation, ValidationData } from '../validator/types.js';
import type { WalletValidator } from './registry.js';

export class EcdsaValidator implements WalletValidator {
  private readonly owners = new Map<string, Address>();

  constructor(readonly address: Address) {}

  setOwner(wallet: Address, owner: Address): void {
    this.owners.set(wallet.toLowerCase(), owner);
  }

  getOwner(wallet: Address): Address | undefined {
    return this.owners.get(wallet.toLowerCase());
  }

  async validateSignature(op: UserOperation, userOpHash: Hash): Promise<ValidationData> {
    const { payload } = splitValidatorSignature(op.signature);
    const valid = await this.isValidSignature(op.sender, userOpHash, payload);
    return { failed: !valid, validUntil: 0, validAfter: 0 };
  }

  async isValidSignature(wallet: Address, hash: Hash, signature: Hex): Promise<boolean> {
    const owner = this.getOwner(wallet);
    if (owner === undefined) return false;
    return isSignedBy(hash, signature, owner);
  }
}
