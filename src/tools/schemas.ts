/**
 * schemas.ts — zod building blocks shared by the tool input schemas.
 */
import { z } from 'zod';
import { getAddress, isAddress, maxUint128, zeroAddress, type Address, type Hash, type Hex } from 'viem';
import { encodeAllowedArguments } from '../validator/predicate.js';
import type { OperatorPermission, Predicate, Session, UserOperation } from '../validator/types.js';

// ─── Primitives ────────────────────────────────────────────────────────────

export const AddressSchema = z
  .custom<Address>((value) => typeof value === 'string' && isAddress(value, { strict: false }), {
    message: 'expected a 0x-prefixed 20-byte address',
  })
  .transform((value) => getAddress(value));

export const HexSchema = z.custom<Hex>(
  (value) => typeof value === 'string' && /^0x([0-9a-fA-F]{2})*$/.test(value),
  { message: 'expected 0x-prefixed hex bytes' }
);

export const HashSchema = z.custom<Hash>(
  (value) => typeof value === 'string' && /^0x[0-9a-fA-F]{64}$/.test(value),
  { message: 'expected a 0x-prefixed 32-byte hash' }
);

export const SelectorSchema = z.custom<Hex>(
  (value) => typeof value === 'string' && /^0x[0-9a-fA-F]{8}$/.test(value),
  { message: 'expected a 0x-prefixed 4-byte selector' }
);

/** Decimal string or safe integer. */
export const UintSchema = z
  .union([z.string().regex(/^\d+$/, 'expected a decimal integer string'), z.number().int().nonnegative()])
  .transform((value) => BigInt(value));

/** Like UintSchema, plus "unlimited" for 2^128-1. */
export const Uint128Schema = z
  .union([z.literal('unlimited'), z.string().regex(/^\d+$/, 'expected a decimal integer string'), z.number().int().nonnegative()])
  .transform((value) => (value === 'unlimited' ? maxUint128 : BigInt(value)))
  .refine((value) => value <= maxUint128, 'value does not fit in uint128');

export const TimestampSchema = z.number().int().nonnegative().max(2 ** 48 - 1);

// ─── Predicates and sessions ───────────────────────────────────────────────

export const PredicateSchema: z.ZodType<Predicate> = z.lazy(() =>
  z.union([
    z.object({ op: z.literal('ANY') }),
    z.object({ op: z.enum(['NE', 'EQ', 'GT', 'LT']), value: HexSchema }),
    z.object({ op: z.enum(['AND', 'OR']), children: z.array(PredicateSchema).min(2) }),
  ])
);

export const SessionSchema = z
  .object({
    to: AddressSchema.describe('Contract the operator may call'),
    selector: SelectorSchema.describe('4-byte selector, 0x00000000 for a plain value transfer'),
    allowed_arguments: HexSchema.optional().describe('RLP-encoded predicate forest'),
    predicates: z
      .array(PredicateSchema)
      .optional()
      .describe('Predicate forest as JSON, slot 0 constrains the native value'),
    paymaster: AddressSchema.optional().describe('Pinned paymaster (omit for any)'),
    valid_until: TimestampSchema.optional(),
    valid_after: TimestampSchema.optional(),
    times_limit: Uint128Schema.optional().describe('Maximum uses, 0 or "unlimited" for no limit'),
  })
  .transform(
    (input): Session => ({
      to: input.to,
      selector: input.selector,
      allowedArguments: input.allowed_arguments ?? encodeAllowedArguments(input.predicates ?? []),
      paymaster: input.paymaster ?? zeroAddress,
      validUntil: input.valid_until ?? 0,
      validAfter: input.valid_after ?? 0,
      timesLimit: input.times_limit ?? 0n,
    })
  );

export const PermissionSchema = z
  .object({
    session_root: HashSchema,
    paymaster: AddressSchema.optional(),
    valid_until: TimestampSchema.optional(),
    valid_after: TimestampSchema.optional(),
    gas_remaining: Uint128Schema,
    times_remaining: Uint128Schema,
  })
  .transform(
    (input): OperatorPermission => ({
      sessionRoot: input.session_root,
      paymaster: input.paymaster ?? zeroAddress,
      validUntil: input.valid_until ?? 0,
      validAfter: input.valid_after ?? 0,
      gasRemaining: input.gas_remaining,
      timesRemaining: input.times_remaining,
    })
  );

export const SpendingLimitSchema = z
  .object({ token: AddressSchema, allowance: UintSchema })
  .transform((input) => ({ token: input.token, allowance: input.allowance }));

export const UserOperationSchema = z
  .object({
    sender: AddressSchema,
    nonce: UintSchema,
    initCode: HexSchema.default('0x'),
    callData: HexSchema,
    callGasLimit: UintSchema,
    verificationGasLimit: UintSchema,
    preVerificationGas: UintSchema,
    maxFeePerGas: UintSchema,
    maxPriorityFeePerGas: UintSchema,
    paymasterAndData: HexSchema.default('0x'),
    signature: HexSchema,
  })
  .transform((input): UserOperation => ({ ...input }));

// ─── JSON schema fragments for tool descriptors ───────────────────────────

export const SESSION_JSON_SCHEMA = {
  type: 'object',
  properties: {
    to: { type: 'string', description: 'Contract the operator may call' },
    selector: { type: 'string', description: '4-byte selector, 0x00000000 for a plain value transfer' },
    allowed_arguments: { type: 'string', description: 'RLP-encoded predicate forest (hex)' },
    predicates: {
      type: 'array',
      description:
        'Predicate forest as JSON instead of allowed_arguments. Nodes: {op:"ANY"}, ' +
        '{op:"EQ"|"NE"|"GT"|"LT", value:"0x<abi-encoded>"}, {op:"AND"|"OR", children:[...]}',
      items: { type: 'object' },
    },
    paymaster: { type: 'string', description: 'Pinned paymaster (omit for any)' },
    valid_until: { type: 'number', description: 'Unix seconds, 0 = unbounded' },
    valid_after: { type: 'number', description: 'Unix seconds, 0 = unbounded' },
    times_limit: { type: 'string', description: 'Maximum uses, "0" or "unlimited" for no limit' },
  },
  required: ['to', 'selector'],
} as const;
