/**
 * validate.ts — validate_user_op tool.
 *
 * Routes a user operation through the wallet's validator registry exactly as
 * the wallet would. Dry run by default: budgets, allowances, session counters
 * and permits are only consumed with commit: true.
 */
import { z } from 'zod';
import { getEngine } from '../utils/client.js';
import { describeError, errorResult, formatFailure, formatSuccess, formatValidationData, textContent, type ToolResult } from '../utils/format.js';
import { getUserOpHash, packValidationData } from '../validator/codec.js';
import { UserOperationSchema } from './schemas.js';

export const ValidateUserOpSchema = z.object({
  user_op: UserOperationSchema,
  commit: z.boolean().default(false).describe('Apply state changes (default: dry run)'),
});

export type ValidateUserOpInput = z.infer<typeof ValidateUserOpSchema>;

const UINT_FIELD = { type: 'string', description: 'Decimal integer' } as const;
const HEX_FIELD = { type: 'string', description: '0x-prefixed hex' } as const;

export const validateUserOpTool = {
  name: 'validate_user_op',
  description:
    'Validate an ERC-4337 (entry point v0.6) user operation against the wallet. The signature ' +
    'starts with the 20-byte validator address. Returns the packed validation data and window. ' +
    'Dry run unless commit is true.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      user_op: {
        type: 'object',
        properties: {
          sender: { type: 'string', description: 'Wallet address' },
          nonce: UINT_FIELD,
          initCode: HEX_FIELD,
          callData: HEX_FIELD,
          callGasLimit: UINT_FIELD,
          verificationGasLimit: UINT_FIELD,
          preVerificationGas: UINT_FIELD,
          maxFeePerGas: UINT_FIELD,
          maxPriorityFeePerGas: UINT_FIELD,
          paymasterAndData: HEX_FIELD,
          signature: HEX_FIELD,
        },
        required: [
          'sender',
          'nonce',
          'callData',
          'callGasLimit',
          'verificationGasLimit',
          'preVerificationGas',
          'maxFeePerGas',
          'maxPriorityFeePerGas',
          'signature',
        ],
      },
      commit: { type: 'boolean', description: 'Apply state changes (default false)' },
    },
    required: ['user_op'],
  },
};

export async function handleValidateUserOp(input: ValidateUserOpInput): Promise<ToolResult> {
  try {
    const { config, registry } = getEngine();
    const op = input.user_op;
    const userOpHash = getUserOpHash(op, config.entryPointAddress, config.chainId);
    const result = await registry.tryValidateUserOp(op, userOpHash, { simulate: !input.commit });
    const mode = input.commit ? 'committed' : 'dry run';

    if (!result.ok) {
      return {
        content: [textContent(`${describeError(result.error, 'validate_user_op')}\n\n  Mode: ${mode}\n  Validation data: 1`)],
        isError: true,
      };
    }

    const details = {
      'User op hash': userOpHash,
      Mode: mode,
      ...formatValidationData(result.value),
      'Validation data': `0x${packValidationData(result.value).toString(16)}`,
    };
    if (result.value.failed) {
      return { content: [textContent(formatFailure('User operation rejected (bad signature)', details))], isError: true };
    }
    return { content: [textContent(formatSuccess('User operation authorized', details))], isError: false };
  } catch (error: unknown) {
    return errorResult(error, 'validate_user_op');
  }
}
