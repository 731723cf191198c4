/**
 * permissions.ts — Owner-side management tools for the configured wallet:
 * set_session_root, set_operator_permission, get_operator_permission,
 * set_spending_limit, get_spending_limit, revoke_signature, get_permit_hash.
 */
import { z } from 'zod';
import { getEngine } from '../utils/client.js';
import {
  errorResult,
  formatBudget,
  formatPermission,
  formatSpendingLimit,
  formatSuccess,
  textContent,
  type ToolResult,
} from '../utils/format.js';
import { NATIVE_TOKEN } from '../validator/accounting.js';
import { AddressSchema, HashSchema, PermissionSchema, SpendingLimitSchema, UintSchema } from './schemas.js';

const PERMISSION_JSON_SCHEMA = {
  type: 'object',
  properties: {
    session_root: { type: 'string', description: 'Merkle root from build_session_tree' },
    paymaster: { type: 'string', description: 'Pinned paymaster (omit for any)' },
    valid_until: { type: 'number', description: 'Unix seconds, 0 = unbounded' },
    valid_after: { type: 'number', description: 'Unix seconds, 0 = unbounded' },
    gas_remaining: { type: 'string', description: 'Fee budget in wei, or "unlimited"' },
    times_remaining: { type: 'string', description: 'Remaining operations, or "unlimited"' },
  },
  required: ['session_root', 'gas_remaining', 'times_remaining'],
} as const;

const SPENDING_LIMITS_JSON_SCHEMA = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      token: { type: 'string', description: 'Token address, zero address for the native token' },
      allowance: { type: 'string', description: 'Cap in base units' },
    },
    required: ['token', 'allowance'],
  },
} as const;

// ─── set_session_root ──────────────────────────────────────────────────────

export const SetSessionRootSchema = z.object({
  operator: AddressSchema.describe('Operator key address'),
  session_root: HashSchema.describe('New Merkle root; sessions outside it stop validating'),
});

export type SetSessionRootInput = z.infer<typeof SetSessionRootSchema>;

export const setSessionRootTool = {
  name: 'set_session_root',
  description:
    "Replace an operator's session root. Every session not committed under the new root " +
    'is revoked; budgets and spending limits are kept.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      operator: { type: 'string', description: 'Operator key address' },
      session_root: { type: 'string', description: 'New 32-byte Merkle root' },
    },
    required: ['operator', 'session_root'],
  },
};

export async function handleSetSessionRoot(input: SetSessionRootInput): Promise<ToolResult> {
  try {
    const { config, sessionKeys } = getEngine();
    sessionKeys.setSessionRoot(config.walletAddress, input.operator, input.session_root);
    return {
      content: [
        textContent(formatSuccess('Session root set', { Operator: input.operator, Root: input.session_root })),
      ],
    };
  } catch (error: unknown) {
    return errorResult(error, 'set_session_root');
  }
}

// ─── set_operator_permission ───────────────────────────────────────────────

export const SetOperatorPermissionSchema = z.object({
  operator: AddressSchema,
  permission: PermissionSchema,
  spending_limits: z.array(SpendingLimitSchema).optional(),
});

export type SetOperatorPermissionInput = z.infer<typeof SetOperatorPermissionSchema>;

export const setOperatorPermissionTool = {
  name: 'set_operator_permission',
  description:
    "Overwrite an operator's whole permission: session root, paymaster pin, validity window, " +
    'gas budget and use count. Optional spending_limits are set (and their spent counters reset).',
  inputSchema: {
    type: 'object' as const,
    properties: {
      operator: { type: 'string', description: 'Operator key address' },
      permission: PERMISSION_JSON_SCHEMA,
      spending_limits: SPENDING_LIMITS_JSON_SCHEMA,
    },
    required: ['operator', 'permission'],
  },
};

export async function handleSetOperatorPermission(input: SetOperatorPermissionInput): Promise<ToolResult> {
  try {
    const { config, sessionKeys } = getEngine();
    sessionKeys.setOperatorPermission(config.walletAddress, input.operator, input.permission);
    if (input.spending_limits) {
      sessionKeys.batchSetSpendingLimit(config.walletAddress, input.operator, input.spending_limits);
    }
    return {
      content: [
        textContent(
          formatSuccess('Operator permission set', {
            Operator: input.operator,
            ...formatPermission(input.permission),
            'Spending limits': String(input.spending_limits?.length ?? 0),
          })
        ),
      ],
    };
  } catch (error: unknown) {
    return errorResult(error, 'set_operator_permission');
  }
}

// ─── get_operator_permission ───────────────────────────────────────────────

export const GetOperatorPermissionSchema = z.object({
  operator: AddressSchema,
});

export type GetOperatorPermissionInput = z.infer<typeof GetOperatorPermissionSchema>;

export const getOperatorPermissionTool = {
  name: 'get_operator_permission',
  description: "Show an operator's session root, paymaster pin, validity window, remaining gas, uses and permit nonce.",
  inputSchema: {
    type: 'object' as const,
    properties: {
      operator: { type: 'string', description: 'Operator key address' },
    },
    required: ['operator'],
  },
};

export async function handleGetOperatorPermission(input: GetOperatorPermissionInput): Promise<ToolResult> {
  try {
    const { config, sessionKeys } = getEngine();
    const permission = sessionKeys.getOperatorPermission(config.walletAddress, input.operator);
    const nonce = sessionKeys.getPermitNonce(config.walletAddress, input.operator);

    let out = `🔑 **Operator Permission**\n\n`;
    out += `📍 Wallet:   ${config.walletAddress}\n`;
    out += `👤 Operator: ${input.operator}\n\n`;
    for (const [key, value] of Object.entries(formatPermission(permission))) {
      out += `  ${key}: ${value}\n`;
    }
    out += `  Permit nonce: ${nonce.toString()}\n`;
    return { content: [textContent(out)] };
  } catch (error: unknown) {
    return errorResult(error, 'get_operator_permission');
  }
}

// ─── set_spending_limit ────────────────────────────────────────────────────

export const SetSpendingLimitSchema = z.object({
  operator: AddressSchema,
  token: AddressSchema.optional().describe('Token address (omit for the native token)'),
  allowance: UintSchema.optional().describe('Cap in base units, required for "set"'),
  action: z.enum(['set', 'reset', 'delete']).default('set'),
});

export type SetSpendingLimitInput = z.infer<typeof SetSpendingLimitSchema>;

export const setSpendingLimitTool = {
  name: 'set_spending_limit',
  description:
    'Manage a per-token spending limit for an operator. "set" caps cumulative spend at allowance ' +
    '(and resets spent), "reset" zeroes spent, "delete" removes the cap (token unrestricted).',
  inputSchema: {
    type: 'object' as const,
    properties: {
      operator: { type: 'string', description: 'Operator key address' },
      token: { type: 'string', description: 'Token address (omit for the native token)' },
      allowance: { type: 'string', description: 'Cap in base units (required for "set")' },
      action: { type: 'string', enum: ['set', 'reset', 'delete'], description: 'Default "set"' },
    },
    required: ['operator'],
  },
};

export async function handleSetSpendingLimit(input: SetSpendingLimitInput): Promise<ToolResult> {
  try {
    const { config, sessionKeys } = getEngine();
    const token = input.token ?? NATIVE_TOKEN;

    switch (input.action) {
      case 'set':
        if (input.allowance === undefined) throw new Error('allowance is required to set a spending limit');
        sessionKeys.setSpendingLimit(config.walletAddress, input.operator, token, input.allowance);
        break;
      case 'reset':
        sessionKeys.resetSpendingLimit(config.walletAddress, input.operator, token);
        break;
      case 'delete':
        sessionKeys.deleteSpendingLimit(config.walletAddress, input.operator, token);
        break;
    }

    const info = sessionKeys.getSpendingLimit(config.walletAddress, input.operator, token);
    return {
      content: [
        textContent(
          formatSuccess(`Spending limit ${input.action} done`, {
            Operator: input.operator,
            Token: token,
            Limit: formatSpendingLimit(info),
          })
        ),
      ],
    };
  } catch (error: unknown) {
    return errorResult(error, 'set_spending_limit');
  }
}

// ─── get_spending_limit ────────────────────────────────────────────────────

export const GetSpendingLimitSchema = z.object({
  operator: AddressSchema,
  tokens: z.array(AddressSchema).optional().describe('Tokens to query (default: native token)'),
});

export type GetSpendingLimitInput = z.infer<typeof GetSpendingLimitSchema>;

export const getSpendingLimitTool = {
  name: 'get_spending_limit',
  description: "Show an operator's allowance and spent amount for one or more tokens, plus its remaining gas budget.",
  inputSchema: {
    type: 'object' as const,
    properties: {
      operator: { type: 'string', description: 'Operator key address' },
      tokens: { type: 'array', items: { type: 'string' }, description: 'Token addresses' },
    },
    required: ['operator'],
  },
};

export async function handleGetSpendingLimit(input: GetSpendingLimitInput): Promise<ToolResult> {
  try {
    const { config, sessionKeys } = getEngine();
    const tokens = input.tokens && input.tokens.length > 0 ? input.tokens : [NATIVE_TOKEN];
    const limits = sessionKeys.batchGetSpendingLimit(config.walletAddress, input.operator, tokens);

    let out = `💸 **Spending Limits** (${input.operator})\n\n`;
    tokens.forEach((token, i) => {
      const label = token === NATIVE_TOKEN ? 'Native' : token;
      out += `  ${label}: ${formatSpendingLimit(limits[i])}\n`;
    });
    out += `\n  Gas remaining: ${formatBudget(sessionKeys.getOperatorRemainingGas(config.walletAddress, input.operator))}\n`;
    return { content: [textContent(out)] };
  } catch (error: unknown) {
    return errorResult(error, 'get_spending_limit');
  }
}

// ─── revoke_signature ──────────────────────────────────────────────────────

export const RevokeSignatureSchema = z.object({
  hash: HashSchema.describe('Permit message hash to revoke'),
});

export type RevokeSignatureInput = z.infer<typeof RevokeSignatureSchema>;

export const revokeSignatureTool = {
  name: 'revoke_signature',
  description: 'Revoke a signed permit by its message hash. A revoked permit can never be consumed.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      hash: { type: 'string', description: 'Permit message hash (from get_permit_hash)' },
    },
    required: ['hash'],
  },
};

export async function handleRevokeSignature(input: RevokeSignatureInput): Promise<ToolResult> {
  try {
    const { config, sessionKeys } = getEngine();
    const alreadyRevoked = sessionKeys.isSignatureRevoked(config.walletAddress, input.hash);
    sessionKeys.revokeSignature(config.walletAddress, input.hash);
    return {
      content: [
        textContent(
          formatSuccess(alreadyRevoked ? 'Signature was already revoked' : 'Signature revoked', { Hash: input.hash })
        ),
      ],
    };
  } catch (error: unknown) {
    return errorResult(error, 'revoke_signature');
  }
}

// ─── get_permit_hash ───────────────────────────────────────────────────────

export const GetPermitHashSchema = z.object({
  operator: AddressSchema,
  permission: PermissionSchema,
  spending_limits: z.array(SpendingLimitSchema).default([]),
});

export type GetPermitHashInput = z.infer<typeof GetPermitHashSchema>;

export const getPermitHashTool = {
  name: 'get_permit_hash',
  description:
    'Compute the message hash the wallet owner signs to install a permission for an operator ' +
    "at the operator's current permit nonce. The permit is consumed by the operator's first operation.",
  inputSchema: {
    type: 'object' as const,
    properties: {
      operator: { type: 'string', description: 'Operator key address' },
      permission: PERMISSION_JSON_SCHEMA,
      spending_limits: SPENDING_LIMITS_JSON_SCHEMA,
    },
    required: ['operator', 'permission'],
  },
};

export async function handleGetPermitHash(input: GetPermitHashInput): Promise<ToolResult> {
  try {
    const { config, sessionKeys } = getEngine();
    const hash = sessionKeys.getPermitMessageHash(
      config.walletAddress,
      input.operator,
      input.permission,
      input.spending_limits
    );
    return {
      content: [
        textContent(
          formatSuccess('Permit hash computed', {
            Hash: hash,
            Nonce: sessionKeys.getPermitNonce(config.walletAddress, input.operator).toString(),
            'Chain ID': String(config.chainId),
            Revoked: sessionKeys.isSignatureRevoked(config.walletAddress, hash) ? 'yes' : 'no',
          })
        ),
      ],
    };
  } catch (error: unknown) {
    return errorResult(error, 'get_permit_hash');
  }
}
