/**
 * validator/store.ts — Validator state, namespaced per wallet.
 *
 * Five tables, all keyed by lower-cased address tuples:
 *
 *   permissions     (wallet, operator)          → OperatorPermission
 *   spendingLimits  (wallet, operator, token)   → { allowance, spent }
 *   permitNonces    (wallet, operator)          → bigint
 *   usedHashes      (wallet, hash)              → revoked / consumed permit hashes
 *   sessionUsage    (wallet, operator, leaf)    → uses of a limited session
 *
 * Records are replaced, never mutated in place, so a snapshot is a shallow
 * copy of the maps. `transaction` restores the snapshot when its callback
 * throws; `simulate` always restores it.
 */
import type { Address, Hash } from 'viem';
import type { OperatorPermission, SpendingLimitInfo } from './types.js';

interface Tables {
  permissions: Map<string, OperatorPermission>;
  spendingLimits: Map<string, SpendingLimitInfo>;
  permitNonces: Map<string, bigint>;
  usedHashes: Set<string>;
  sessionUsage: Map<string, bigint>;
}

export const EMPTY_PERMISSION: OperatorPermission = Object.freeze({
  sessionRoot: '0x0000000000000000000000000000000000000000000000000000000000000000',
  paymaster: '0x0000000000000000000000000000000000000000',
  validUntil: 0,
  validAfter: 0,
  gasRemaining: 0n,
  timesRemaining: 0n,
});

export class ValidatorStore {
  private tables: Tables = emptyTables();

  // ─── Transactions ───────────────────────────────────────────────────────

  /**
   * Run `fn` atomically: every write made inside it is discarded if it
   * throws. `fn` is synchronous, so nothing can interleave with it.
   */
  transaction<T>(fn: () => T): T {
    const snapshot = copyTables(this.tables);
    try {
      return fn();
    } catch (error: unknown) {
      this.tables = snapshot;
      throw error;
    }
  }

  /** Run `fn` and discard its writes whatever the outcome. */
  simulate<T>(fn: () => T): T {
    const snapshot = copyTables(this.tables);
    try {
      return fn();
    } finally {
      this.tables = snapshot;
    }
  }

  // ─── Operator permissions ──────────────────────────────────────────────

  getPermission(wallet: Address, operator: Address): OperatorPermission {
    return this.tables.permissions.get(key(wallet, operator)) ?? EMPTY_PERMISSION;
  }

  setPermission(wallet: Address, operator: Address, permission: OperatorPermission): void {
    this.tables.permissions.set(key(wallet, operator), Object.freeze({ ...permission }));
  }

  updatePermission(wallet: Address, operator: Address, patch: Partial<OperatorPermission>): OperatorPermission {
    const next = { ...this.getPermission(wallet, operator), ...patch };
    this.setPermission(wallet, operator, next);
    return next;
  }

  // ─── Spending limits ──────────────────────────────────────────────────

  getSpendingLimit(wallet: Address, operator: Address, token: Address): SpendingLimitInfo | undefined {
    return this.tables.spendingLimits.get(key(wallet, operator, token));
  }

  setSpendingLimit(wallet: Address, operator: Address, token: Address, info: SpendingLimitInfo): void {
    this.tables.spendingLimits.set(key(wallet, operator, token), Object.freeze({ ...info }));
  }

  deleteSpendingLimit(wallet: Address, operator: Address, token: Address): boolean {
    return this.tables.spendingLimits.delete(key(wallet, operator, token));
  }

  // ─── Permit nonces and used hashes ─────────────────────────────────────

  getPermitNonce(wallet: Address, operator: Address): bigint {
    return this.tables.permitNonces.get(key(wallet, operator)) ?? 0n;
  }

  incrementPermitNonce(wallet: Address, operator: Address): bigint {
    const next = this.getPermitNonce(wallet, operator) + 1n;
    this.tables.permitNonces.set(key(wallet, operator), next);
    return next;
  }

  isHashUsed(wallet: Address, hash: Hash): boolean {
    return this.tables.usedHashes.has(key(wallet, hash));
  }

  markHashUsed(wallet: Address, hash: Hash): void {
    this.tables.usedHashes.add(key(wallet, hash));
  }

  // ─── Session usage ────────────────────────────────────────────────────

  getSessionUsage(wallet: Address, operator: Address, leaf: Hash): bigint {
    return this.tables.sessionUsage.get(key(wallet, operator, leaf)) ?? 0n;
  }

  setSessionUsage(wallet: Address, operator: Address, leaf: Hash, used: bigint): void {
    this.tables.sessionUsage.set(key(wallet, operator, leaf), used);
  }
}

// ─── Internal helpers ──────────────────────────────────────────────────────

function key(...parts: string[]): string {
  return parts.map((part) => part.toLowerCase()).join(':');
}

function emptyTables(): Tables {
  return {
    permissions: new Map(),
    spendingLimits: new Map(),
    permitNonces: new Map(),
    usedHashes: new Set(),
    sessionUsage: new Map(),
  };
}

function copyTables(tables: Tables): Tables {
  return {
    permissions: new Map(tables.permissions),
    spendingLimits: new Map(tables.spendingLimits),
    permitNonces: new Map(tables.permitNonces),
    usedHashes: new Set(tables.usedHashes),
    sessionUsage: new Map(tables.sessionUsage),
  };
}
