/**
 * validator/validator.ts — Session-key validator.
 *
 * validateSignature runs in two phases:
 *
 *   1. async   — decode, verify the operator signature and any owner permit
 *   2. sync    — one store transaction: install the permit, check the
 *                paymaster, charge gas/uses, prove and check every call,
 *                charge allowances, intersect validity windows
 *
 * No await sits between a check and the write it guards. Any thrown error
 * rolls phase 2 back; a bad operator signature rolls it back too and
 * returns the failure sentinel instead of throwing.
 */
import { isAddressEqual, type Address, type Hash, type Hex } from 'viem';
import {
  consumeCallAllowances,
  consumeOperatorBudget,
  consumeSessionUse,
  paymasterOf,
} from './accounting.js';
import {
  VALIDATION_FAILED,
  decodeSessionSignature,
  decodeWalletOperation,
  intersectValidityWindows,
  splitValidatorSignature,
  type ValidityWindow,
} from './codec.js';
import { SessionKeyError } from './errors.js';
import { isAllowedCalldata } from './predicate.js';
import {
  buildSessionLeaf,
  checkArguments,
  validatePaymaster,
  validateSessionRoot,
  verifySessionMembership,
} from './session.js';
import {
  getOperatorMessageHash,
  getPermitMessageHash,
  isSignedBy,
  splitPermitSignature,
} from './signatures.js';
import type { ValidatorStore } from './store.js';
import type {
  OperatorPermission,
  PermitPayload,
  Session,
  SessionSignaturePayload,
  SpendingLimit,
  SpendingLimitInfo,
  UserOperation,
  ValidationData,
  ValidatorEvent,
  ValidatorEventListener,
  WalletCall,
} from './types.js';
import type { ValidateSignatureOptions, WalletValidator, WalletValidatorRegistry } from '../wallet/registry.js';

export interface SessionKeyValidatorOptions {
  address: Address;
  chainId: number;
  store: ValidatorStore;
  /** Where permit signers are looked up and their sudo class checked. */
  registry: WalletValidatorRegistry;
  onEvent?: ValidatorEventListener;
}

interface VerifiedPermit {
  payload: PermitPayload;
  hash: Hash;
  nonce: bigint;
}

/** Thrown inside the transaction to roll it back when only the signature is wrong. */
class OperatorSignatureRejected extends Error {}

export class SessionKeyValidator implements WalletValidator {
  readonly address: Address;
  readonly chainId: number;
  private readonly store: ValidatorStore;
  private readonly registry: WalletValidatorRegistry;
  private readonly onEvent: ValidatorEventListener | undefined;

  constructor(options: SessionKeyValidatorOptions) {
    this.address = options.address;
    this.chainId = options.chainId;
    this.store = options.store;
    this.registry = options.registry;
    this.onEvent = options.onEvent;
  }

  // ─── Validation ─────────────────────────────────────────────────────────

  async validateSignature(
    op: UserOperation,
    userOpHash: Hash,
    options: ValidateSignatureOptions = {}
  ): Promise<ValidationData> {
    const wallet = op.sender;
    const { validator, payload: rawPayload } = splitValidatorSignature(op.signature);
    if (!isAddressEqual(validator, this.address)) {
      throw new SessionKeyError('MALFORMED_INPUT', `signature is addressed to ${validator}, not ${this.address}`);
    }

    const { mode, calls } = decodeWalletOperation(op.callData);
    const payload = decodeSessionSignature(mode, rawPayload);
    if (payload.sessions.length !== calls.length) {
      throw new SessionKeyError(
        'INVALID_BATCH_LENGTH',
        `batch length mismatch: ${calls.length} calls, ${payload.sessions.length} sessions`
      );
    }

    const signatureValid = await isSignedBy(
      getOperatorMessageHash(userOpHash, this.address),
      payload.operatorSignature,
      payload.operator
    );
    const permit = payload.permit ? await this.verifyPermit(wallet, payload.operator, payload.permit) : undefined;

    const events: ValidatorEvent[] = [];
    const run = (): ValidationData => {
      const window = this.applyOperation(op, payload, calls, permit, events);
      if (!signatureValid) throw new OperatorSignatureRejected();
      return { failed: false, ...window };
    };

    try {
      const result = options.simulate ? this.store.simulate(run) : this.store.transaction(run);
      if (!options.simulate) events.forEach((event) => this.emit(event));
      return result;
    } catch (error: unknown) {
      if (error instanceof OperatorSignatureRejected) return VALIDATION_FAILED;
      throw error;
    }
  }

  /** This validator never approves arbitrary messages. */
  async isValidSignature(): Promise<boolean> {
    return false;
  }

  private async verifyPermit(wallet: Address, operator: Address, permit: PermitPayload): Promise<VerifiedPermit> {
    const nonce = this.store.getPermitNonce(wallet, operator);
    const hash = this.getPermitMessageHash(wallet, operator, permit.permission, permit.spendingLimits);
    if (this.store.isHashUsed(wallet, hash)) {
      throw new SessionKeyError('PERMIT_REVOKED', `permit ${hash} was already used or revoked`);
    }

    const { validator: signer, signature } = splitPermitSignature(permit.signature);
    const validator = this.registry.getValidator(signer);
    if (validator === undefined || this.registry.getValidatorType(wallet, signer) !== 'sudo') {
      throw new SessionKeyError('PERMIT_NOT_SUDO', `permit signer ${signer} is not a sudo validator of ${wallet}`);
    }
    if (!(await validator.isValidSignature(wallet, hash, signature))) {
      throw new SessionKeyError('INVALID_PERMIT_SIGNATURE', 'permit signature does not verify');
    }
    return { payload: permit, hash, nonce };
  }

  /** Phase 2. Synchronous; must only be called inside a store transaction. */
  private applyOperation(
    op: UserOperation,
    payload: SessionSignaturePayload,
    calls: readonly WalletCall[],
    permit: VerifiedPermit | undefined,
    events: ValidatorEvent[]
  ): ValidityWindow {
    const wallet = op.sender;
    const operator = payload.operator;

    if (permit) {
      if (this.store.getPermitNonce(wallet, operator) !== permit.nonce) {
        throw new SessionKeyError('STALE_PERMIT_NONCE', 'permit nonce advanced while the permit was verified');
      }
      if (this.store.isHashUsed(wallet, permit.hash)) {
        throw new SessionKeyError('PERMIT_REVOKED', `permit ${permit.hash} was already used or revoked`);
      }
      assertValidDuration(permit.payload.permission);
      this.store.markHashUsed(wallet, permit.hash);
      this.store.incrementPermitNonce(wallet, operator);
      this.store.setPermission(wallet, operator, permit.payload.permission);
      for (const limit of permit.payload.spendingLimits) {
        this.store.setSpendingLimit(wallet, operator, limit.token, { allowance: limit.allowance, spent: 0n });
      }
      events.push({ type: 'PermitConsumed', wallet, operator, hash: permit.hash, nonce: permit.nonce });
    }

    const permission = this.store.getPermission(wallet, operator);
    const paymaster = paymasterOf(op);
    validatePaymaster(permission.paymaster, paymaster);
    consumeOperatorBudget(this.store, wallet, operator, op);

    let window: ValidityWindow = { validUntil: permission.validUntil, validAfter: permission.validAfter };
    calls.forEach((call, i) => {
      const session = payload.sessions[i];
      const proof = payload.proofs[i];
      const args = payload.arguments[i];
      if (session === undefined || proof === undefined || args === undefined) {
        throw new SessionKeyError('INVALID_BATCH_LENGTH', `no session presented for call ${i}`);
      }
      if (call.operation !== 0) {
        throw new SessionKeyError('DELEGATECALL_NOT_ALLOWED', `call ${i} is not a plain call`);
      }

      verifySessionMembership(proof, permission.sessionRoot, session);
      validatePaymaster(session.paymaster, paymaster);
      checkArguments(session, call.to, call.data, call.value, args);
      consumeSessionUse(this.store, wallet, operator, session);
      consumeCallAllowances(this.store, wallet, operator, call);
      window = intersectValidityWindows(window, session);
    });
    return window;
  }

  // ─── Management (called by the wallet itself) ───────────────────────────

  setSessionRoot(wallet: Address, operator: Address, sessionRoot: Hash): void {
    this.store.updatePermission(wallet, operator, { sessionRoot });
    this.emit({ type: 'SessionRootSet', wallet, operator, sessionRoot });
  }

  setOperatorRemainingGas(wallet: Address, operator: Address, gasRemaining: bigint): void {
    this.store.updatePermission(wallet, operator, { gasRemaining });
    this.emit({ type: 'OperatorRemainingGasSet', wallet, operator, gasRemaining });
  }

  setOperatorRemainingTimes(wallet: Address, operator: Address, timesRemaining: bigint): void {
    this.store.updatePermission(wallet, operator, { timesRemaining });
    this.emit({ type: 'OperatorRemainingTimesSet', wallet, operator, timesRemaining });
  }

  setOperatorPermission(wallet: Address, operator: Address, permission: OperatorPermission): void {
    assertValidDuration(permission);
    this.store.setPermission(wallet, operator, permission);
    this.emit({ type: 'OperatorPermissionSet', wallet, operator, permission: { ...permission } });
  }

  /** Configures a cap and resets what has been spent against it. */
  setSpendingLimit(wallet: Address, operator: Address, token: Address, allowance: bigint): void {
    this.store.setSpendingLimit(wallet, operator, token, { allowance, spent: 0n });
    this.emit({ type: 'SpendingLimitSet', wallet, operator, token, allowance });
  }

  batchSetSpendingLimit(wallet: Address, operator: Address, limits: readonly SpendingLimit[]): void {
    for (const limit of limits) this.setSpendingLimit(wallet, operator, limit.token, limit.allowance);
  }

  resetSpendingLimit(wallet: Address, operator: Address, token: Address): void {
    const current = this.store.getSpendingLimit(wallet, operator, token);
    if (current === undefined) return;
    this.store.setSpendingLimit(wallet, operator, token, { allowance: current.allowance, spent: 0n });
    this.emit({ type: 'SpendingLimitReset', wallet, operator, token });
  }

  /** The token goes back to unrestricted. */
  deleteSpendingLimit(wallet: Address, operator: Address, token: Address): void {
    if (this.store.deleteSpendingLimit(wallet, operator, token)) {
      this.emit({ type: 'SpendingLimitDeleted', wallet, operator, token });
    }
  }

  revokeSignature(wallet: Address, hash: Hash): void {
    this.store.markHashUsed(wallet, hash);
    this.emit({ type: 'SignatureRevoked', wallet, hash });
  }

  // ─── Queries ────────────────────────────────────────────────────────────

  getSessionRoot(wallet: Address, operator: Address): Hash {
    return this.store.getPermission(wallet, operator).sessionRoot;
  }

  getOperatorPermission(wallet: Address, operator: Address): OperatorPermission {
    return { ...this.store.getPermission(wallet, operator) };
  }

  getOperatorRemainingGas(wallet: Address, operator: Address): bigint {
    return this.store.getPermission(wallet, operator).gasRemaining;
  }

  getOperatorRemainingTimes(wallet: Address, operator: Address): bigint {
    return this.store.getPermission(wallet, operator).timesRemaining;
  }

  /** undefined when no limit is configured (the token is unrestricted). */
  getSpendingLimit(wallet: Address, operator: Address, token: Address): SpendingLimitInfo | undefined {
    const info = this.store.getSpendingLimit(wallet, operator, token);
    return info && { ...info };
  }

  batchGetSpendingLimit(
    wallet: Address,
    operator: Address,
    tokens: readonly Address[]
  ): (SpendingLimitInfo | undefined)[] {
    return tokens.map((token) => this.getSpendingLimit(wallet, operator, token));
  }

  getPermitNonce(wallet: Address, operator: Address): bigint {
    return this.store.getPermitNonce(wallet, operator);
  }

  /** Hash the owner signs to install `permission` at the operator's current nonce. */
  getPermitMessageHash(
    wallet: Address,
    operator: Address,
    permission: OperatorPermission,
    spendingLimits: readonly SpendingLimit[]
  ): Hash {
    return getPermitMessageHash({
      wallet,
      operator,
      permission,
      spendingLimits,
      chainId: this.chainId,
      nonce: this.store.getPermitNonce(wallet, operator),
    });
  }

  isSignatureRevoked(wallet: Address, hash: Hash): boolean {
    return this.store.isHashUsed(wallet, hash);
  }

  validateSessionRoot(proof: readonly Hash[], root: Hash, session: Session): boolean {
    return validateSessionRoot(proof, root, session);
  }

  isAllowedCalldata(allowedArguments: Hex, actualArguments: Hex, value: bigint): boolean {
    return isAllowedCalldata(allowedArguments, actualArguments, value);
  }

  checkArguments(session: Session, to: Address, data: Hex, value: bigint, actualArguments: Hex): true {
    return checkArguments(session, to, data, value, actualArguments);
  }

  getSessionTimesUsed(wallet: Address, operator: Address, session: Session): bigint {
    return this.store.getSessionUsage(wallet, operator, buildSessionLeaf(session));
  }

  // ─── Internal helpers ────────────────────────────────────────────────────

  private emit(event: ValidatorEvent): void {
    this.onEvent?.(event);
  }
}

function assertValidDuration(permission: OperatorPermission): void {
  if (permission.validUntil !== 0 && permission.validUntil < permission.validAfter) {
    throw new SessionKeyError(
      'INVALID_VALIDATION_DURATION',
      `invalid validation duration: validUntil ${permission.validUntil} < validAfter ${permission.validAfter}`
    );
  }
}
