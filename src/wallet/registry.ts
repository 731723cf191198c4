/**
 * wallet/registry.ts — Per-wallet validator registry and user-op routing.
 *
 * A wallet enables validators as either `sudo` (may authorise anything,
 * including permits for operators) or `normal`. `validateUserOp` routes an
 * operation to the validator named by the first 20 bytes of its signature
 * and turns any hard failure into the packed failure sentinel, the way the
 * wallet's outer try/catch does.
 */
import type { Address, Hash, Hex } from 'viem';
import {
  SIG_VALIDATION_FAILED,
  packValidationData,
  splitValidatorSignature,
} from '../validator/codec.js';
import type { Result, UserOperation, ValidationData } from '../validator/types.js';

export type ValidatorType = 'sudo' | 'normal' | 'disabled';

export interface ValidateSignatureOptions {
  /** Run every check but discard all state changes. */
  simulate?: boolean;
}

/** What the wallet needs from a validator. */
export interface WalletValidator {
  readonly address: Address;
  validateSignature(op: UserOperation, userOpHash: Hash, options?: ValidateSignatureOptions): Promise<ValidationData>;
  /** EIP-1271 style check of an arbitrary hash on behalf of `wallet`. */
  isValidSignature(wallet: Address, hash: Hash, signature: Hex): Promise<boolean>;
}

export class WalletValidatorRegistry {
  private readonly validators = new Map<string, WalletValidator>();
  private readonly enabled = new Map<string, Exclude<ValidatorType, 'disabled'>>();

  /** Make a validator instance known to the registry (not yet enabled on any wallet). */
  register(validator: WalletValidator): void {
    this.validators.set(validator.address.toLowerCase(), validator);
  }

  getValidator(address: Address): WalletValidator | undefined {
    return this.validators.get(address.toLowerCase());
  }

  enableValidator(wallet: Address, validator: WalletValidator, type: Exclude<ValidatorType, 'disabled'>): void {
    this.register(validator);
    this.enabled.set(enabledKey(wallet, validator.address), type);
  }

  disableValidator(wallet: Address, validator: Address): void {
    this.enabled.delete(enabledKey(wallet, validator));
  }

  getValidatorType(wallet: Address, validator: Address): ValidatorType {
    return this.enabled.get(enabledKey(wallet, validator)) ?? 'disabled';
  }

  // ─── Validation ─────────────────────────────────────────────────────────

  /** Validate and report as a Result; nothing is thrown. */
  async tryValidateUserOp(
    op: UserOperation,
    userOpHash: Hash,
    options?: ValidateSignatureOptions
  ): Promise<Result<ValidationData>> {
    try {
      const { validator: address } = splitValidatorSignature(op.signature);
      const validator = this.getValidator(address);
      if (validator === undefined || this.getValidatorType(op.sender, address) === 'disabled') {
        return { ok: false, error: new Error(`validator ${address} is not enabled on ${op.sender}`) };
      }
      return { ok: true, value: await validator.validateSignature(op, userOpHash, options) };
    } catch (error: unknown) {
      return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }

  /** Packed validation data; any failure becomes SIG_VALIDATION_FAILED. */
  async validateUserOp(op: UserOperation, userOpHash: Hash, options?: ValidateSignatureOptions): Promise<bigint> {
    const result = await this.tryValidateUserOp(op, userOpHash, options);
    return result.ok ? packValidationData(result.value) : SIG_VALIDATION_FAILED;
  }
}

function enabledKey(wallet: Address, validator: Address): string {
  return `${wallet.toLowerCase()}:${validator.toLowerCase()}`;
}
