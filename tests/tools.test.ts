/**
 * Tests for the MCP tool handlers and their input schemas.
 * Each test gets a fresh in-process engine through a mocked getEngine.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { concat, maxUint128, zeroAddress } from 'viem';
import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts';

// ─── Mock engine accessor ──────────────────────────────────────────────────

vi.mock('../src/utils/client.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/utils/client.js')>();
  return { ...actual, getEngine: vi.fn() };
});

import { createEngine, getEngine, type SessionGuardEngine } from '../src/utils/client.js';
import {
  BuildSessionTreeSchema,
  CheckArgumentsSchema,
  handleBuildSessionTree,
  handleCheckArguments,
} from '../src/tools/sessions.js';
import {
  GetPermitHashSchema,
  SetOperatorPermissionSchema,
  SetSpendingLimitSchema,
  handleGetOperatorPermission,
  handleGetPermitHash,
  handleGetSpendingLimit,
  handleRevokeSignature,
  handleSetOperatorPermission,
  handleSetSessionRoot,
  handleSetSpendingLimit,
} from '../src/tools/permissions.js';
import { handleValidateUserOp } from '../src/tools/validate.js';
import { PredicateSchema, Uint128Schema, UserOperationSchema, AddressSchema } from '../src/tools/schemas.js';
import { encodeNormalExecute } from '../src/validator/codec.js';
import { abiArgument } from '../src/validator/predicate.js';
import { buildSessionLeaf, buildSessionTree, getSessionProof, getSessionTreeRoot } from '../src/validator/session.js';
import {
  STRANGER,
  TEST_CONFIG,
  TOKEN,
  WALLET,
  baseOp,
  signSessionOp,
  transferArguments,
  transferData,
  transferSession,
  u256,
  unlimitedPermission,
} from './fixtures.js';

const ROOT = '0x5555555555555555555555555555555555555555555555555555555555555555';

let engine: SessionGuardEngine;

beforeEach(() => {
  engine = createEngine(TEST_CONFIG);
  vi.mocked(getEngine).mockReturnValue(engine);
});

/** JSON form of transferSession(STRANGER, amount). */
function transferSessionInput(amount: bigint) {
  return {
    to: TOKEN,
    selector: '0xa9059cbb',
    predicates: [
      { op: 'EQ', value: u256(0n) },
      { op: 'EQ', value: abiArgument('address', STRANGER) },
      { op: 'EQ', value: u256(amount) },
    ],
  };
}

function text(result: { content: Array<{ text: string }> }): string {
  return result.content[0]?.text ?? '';
}

// ─── Session tools ─────────────────────────────────────────────────────────

describe('build_session_tree', () => {
  it('returns the root and per-session proofs', async () => {
    const input = BuildSessionTreeSchema.parse({ sessions: [transferSessionInput(100n), transferSessionInput(200n)] });
    const sessions = [transferSession(STRANGER, 100n), transferSession(STRANGER, 200n)];
    const tree = buildSessionTree(sessions);

    const result = await handleBuildSessionTree(input);
    const [headline, rootLine, ...json] = text(result).split('\n\n');
    const leaves: unknown = JSON.parse(json.join('\n\n'));

    expect(result.isError).toBeUndefined();
    expect(headline).toBe('✅ Built session tree with 2 session(s)');
    expect(rootLine).toBe(`  Root: ${getSessionTreeRoot(tree)}`);
    expect(leaves).toEqual(
      sessions.map((session, index) => ({
        index,
        to: TOKEN,
        selector: '0xa9059cbb',
        allowedArguments: session.allowedArguments,
        leaf: buildSessionLeaf(session),
        proof: getSessionProof(tree, session),
      }))
    );
  });

  it('requires at least one session', () => {
    expect(BuildSessionTreeSchema.safeParse({ sessions: [] }).success).toBe(false);
  });
});

describe('check_arguments', () => {
  it('reports an allowed call', async () => {
    const input = CheckArgumentsSchema.parse({
      session: transferSessionInput(100n),
      to: TOKEN,
      data: transferData(STRANGER, 100n),
      actual_arguments: transferArguments(STRANGER, 100n),
    });

    expect(text(await handleCheckArguments(input))).toBe(
      `✅ Call is allowed by the session\n\n  To: ${TOKEN}\n  Selector: 0xa9059cbb\n  Value: 0`
    );
  });

  it('reports the error code of a denied call', async () => {
    const input = CheckArgumentsSchema.parse({
      session: transferSessionInput(100n),
      to: TOKEN,
      data: transferData(STRANGER, 101n),
      actual_arguments: transferArguments(STRANGER, 101n),
    });

    const result = await handleCheckArguments(input);
    expect(result.isError).toBe(true);
    expect(text(result)).toBe(
      '❌ check_arguments failed: call arguments are not allowed by the session [ARGUMENTS_NOT_ALLOWED]'
    );
  });
});

// ─── Permission tools ──────────────────────────────────────────────────────

describe('operator permission tools', () => {
  it('sets and shows a permission with its spending limits', async () => {
    const input = SetOperatorPermissionSchema.parse({
      operator: STRANGER,
      permission: { session_root: ROOT, gas_remaining: 'unlimited', times_remaining: 3 },
      spending_limits: [{ token: TOKEN, allowance: '500' }],
    });

    const set = await handleSetOperatorPermission(input);
    expect(text(set)).toContain('✅ Operator permission set');
    expect(text(set)).toContain('  Spending limits: 1');

    const shown = text(await handleGetOperatorPermission({ operator: STRANGER }));
    expect(shown).toContain(`  Session root: ${ROOT}\n`);
    expect(shown).toContain('  Valid until: Unbounded\n');
    expect(shown).toContain('  Gas remaining: Unlimited\n');
    expect(shown).toContain('  Uses remaining: 3\n');
    expect(shown).toContain('  Permit nonce: 0\n');
    expect(engine.sessionKeys.getSpendingLimit(WALLET, STRANGER, TOKEN)).toEqual({ allowance: 500n, spent: 0n });
  });

  it('refuses an empty validity window', async () => {
    const input = SetOperatorPermissionSchema.parse({
      operator: STRANGER,
      permission: { session_root: ROOT, valid_until: 10, valid_after: 20, gas_remaining: '0', times_remaining: '0' },
    });

    const result = await handleSetOperatorPermission(input);
    expect(result.isError).toBe(true);
    expect(text(result)).toBe(
      '❌ set_operator_permission failed: invalid validation duration: validUntil 10 < validAfter 20 [INVALID_VALIDATION_DURATION]'
    );
  });

  it('replaces only the session root', async () => {
    engine.sessionKeys.setOperatorPermission(WALLET, STRANGER, unlimitedPermission(ROOT, { timesRemaining: 7n }));
    const other = '0x6666666666666666666666666666666666666666666666666666666666666666';

    expect(text(await handleSetSessionRoot({ operator: STRANGER, session_root: other }))).toBe(
      `✅ Session root set\n\n  Operator: ${STRANGER}\n  Root: ${other}`
    );
    expect(engine.sessionKeys.getSessionRoot(WALLET, STRANGER)).toBe(other);
    expect(engine.sessionKeys.getOperatorRemainingTimes(WALLET, STRANGER)).toBe(7n);
  });
});

describe('spending limit tools', () => {
  it('needs an allowance to set a limit', async () => {
    const result = await handleSetSpendingLimit(SetSpendingLimitSchema.parse({ operator: STRANGER }));
    expect(result.isError).toBe(true);
    expect(text(result)).toBe('❌ set_spending_limit failed: allowance is required to set a spending limit');
  });

  it('sets, reports and deletes a native limit', async () => {
    const set = await handleSetSpendingLimit(SetSpendingLimitSchema.parse({ operator: STRANGER, allowance: '1000' }));
    expect(text(set)).toBe(
      `✅ Spending limit set done\n\n  Operator: ${STRANGER}\n  Token: ${zeroAddress}\n  Limit: 0 / 1000 spent (1000 left)`
    );

    const shown = text(await handleGetSpendingLimit({ operator: STRANGER }));
    expect(shown).toContain('  Native: 0 / 1000 spent (1000 left)\n');
    expect(shown).toContain('  Gas remaining: 0\n');

    const deleted = await handleSetSpendingLimit(SetSpendingLimitSchema.parse({ operator: STRANGER, action: 'delete' }));
    expect(text(deleted)).toContain('  Limit: No limit (unrestricted)');
  });

  it('lists tokens by address', async () => {
    engine.sessionKeys.setSpendingLimit(WALLET, STRANGER, TOKEN, 40n);
    const shown = text(await handleGetSpendingLimit({ operator: STRANGER, tokens: [TOKEN] }));
    expect(shown).toContain(`  ${TOKEN}: 0 / 40 spent (40 left)\n`);
  });
});

describe('permit tools', () => {
  it('computes the permit hash at the current nonce', async () => {
    const input = GetPermitHashSchema.parse({
      operator: STRANGER,
      permission: { session_root: ROOT, gas_remaining: '100', times_remaining: '2' },
    });
    const expected = engine.sessionKeys.getPermitMessageHash(WALLET, STRANGER, input.permission, []);

    expect(text(await handleGetPermitHash(input))).toBe(
      `✅ Permit hash computed\n\n  Hash: ${expected}\n  Nonce: 0\n  Chain ID: 1\n  Revoked: no`
    );
  });

  it('revokes a hash once', async () => {
    expect(text(await handleRevokeSignature({ hash: ROOT }))).toBe(`✅ Signature revoked\n\n  Hash: ${ROOT}`);
    expect(text(await handleRevokeSignature({ hash: ROOT }))).toBe(`✅ Signature was already revoked\n\n  Hash: ${ROOT}`);
    expect(engine.sessionKeys.isSignatureRevoked(WALLET, ROOT)).toBe(true);
  });
});

// ─── validate_user_op ──────────────────────────────────────────────────────

describe('validate_user_op', () => {
  async function signedTransfer() {
    const operator = privateKeyToAccount(generatePrivateKey());
    const session = transferSession(operator.address, 100n);
    const tree = buildSessionTree([session]);
    engine.sessionKeys.setOperatorPermission(
      WALLET,
      operator.address,
      unlimitedPermission(getSessionTreeRoot(tree), { timesRemaining: 2n })
    );
    const callData = encodeNormalExecute({ to: TOKEN, value: 0n, data: transferData(operator.address, 100n), operation: 0 });
    const { op } = await signSessionOp(baseOp(callData), {
      operator,
      sessions: [session],
      proofs: [getSessionProof(tree, session)],
      arguments: [transferArguments(operator.address, 100n)],
    });
    return { op, operator };
  }

  it('dry-runs without consuming anything', async () => {
    const { op, operator } = await signedTransfer();
    const result = await handleValidateUserOp({ user_op: op, commit: false });

    expect(result.isError).toBe(false);
    expect(text(result)).toContain('✅ User operation authorized');
    expect(text(result)).toContain('  Mode: dry run');
    expect(text(result)).toContain('  Validation data: 0x0');
    expect(engine.sessionKeys.getOperatorRemainingTimes(WALLET, operator.address)).toBe(2n);
  });

  it('consumes budgets when committed', async () => {
    const { op, operator } = await signedTransfer();
    const result = await handleValidateUserOp({ user_op: op, commit: true });

    expect(text(result)).toContain('  Mode: committed');
    expect(engine.sessionKeys.getOperatorRemainingTimes(WALLET, operator.address)).toBe(1n);
  });

  it('flags a bad operator signature', async () => {
    const { op } = await signedTransfer();
    const result = await handleValidateUserOp({ user_op: { ...op, nonce: 9n }, commit: false });

    expect(result.isError).toBe(true);
    expect(text(result).startsWith('❌ User operation rejected (bad signature)\n')).toBe(true);
    expect(text(result)).toContain('  Result: Signature failed');
    expect(text(result)).toContain('  Validation data: 0x1');
  });

  it('reports operations routed to an unknown validator', async () => {
    const op = baseOp('0x', { signature: concat([STRANGER, '0x00']) });
    const result = await handleValidateUserOp({ user_op: op, commit: false });

    expect(result.isError).toBe(true);
    expect(text(result)).toBe(
      `❌ validate_user_op failed: validator ${STRANGER} is not enabled on ${WALLET}\n\n  Mode: dry run\n  Validation data: 1`
    );
  });
});

// ─── Schemas ───────────────────────────────────────────────────────────────

describe('input schemas', () => {
  it('parses decimal strings into bigints and fills defaults', () => {
    const op = UserOperationSchema.parse({
      sender: WALLET.toLowerCase(),
      nonce: '7',
      callData: '0x',
      callGasLimit: 1,
      verificationGasLimit: '2',
      preVerificationGas: '3',
      maxFeePerGas: '4',
      maxPriorityFeePerGas: '5',
      signature: '0x',
    });
    expect(op).toEqual({
      sender: WALLET,
      nonce: 7n,
      initCode: '0x',
      callData: '0x',
      callGasLimit: 1n,
      verificationGasLimit: 2n,
      preVerificationGas: 3n,
      maxFeePerGas: 4n,
      maxPriorityFeePerGas: 5n,
      paymasterAndData: '0x',
      signature: '0x',
    });
  });

  it('accepts "unlimited" and rejects values past uint128', () => {
    expect(Uint128Schema.parse('unlimited')).toBe(maxUint128);
    expect(Uint128Schema.safeParse((maxUint128 + 1n).toString()).success).toBe(false);
  });

  it('rejects malformed addresses and predicates', () => {
    expect(AddressSchema.safeParse('0x1234').success).toBe(false);
    expect(PredicateSchema.safeParse({ op: 'AND', children: [{ op: 'ANY' }] }).success).toBe(false);
    expect(PredicateSchema.safeParse({ op: 'XOR', value: '0x00' }).success).toBe(false);
  });

  it('prefers raw allowed arguments over a predicate list', () => {
    const raw = transferSession(STRANGER, 1n).allowedArguments;
    const parsed = CheckArgumentsSchema.shape.session.parse({ to: TOKEN, selector: '0xa9059cbb', allowed_arguments: raw, predicates: [] });
    expect(parsed.allowedArguments).toBe(raw);
  });
});
