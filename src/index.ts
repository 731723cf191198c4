#!/usr/bin/env node
/**
 * SessionGuard MCP Server — Entry Point
 *
 * Exposes a session-key validator for an ERC-4337 modular wallet via the
 * Model Context Protocol (MCP): build session trees, manage operator
 * permissions and spending limits, compute permit hashes, and validate
 * user operations (dry run or committed).
 *
 * Transport: stdio (standard MCP transport)
 * Config:    WALLET_ADDRESS + VALIDATOR_ADDRESS env vars required
 */
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolRequest,
} from '@modelcontextprotocol/sdk/types.js';
import { getEngine, setEventListener } from './utils/client.js';
import type { ValidatorEvent } from './validator/types.js';

// ─── Tool imports ──────────────────────────────────────────────────────────

import {
  buildSessionTreeTool,
  handleBuildSessionTree,
  BuildSessionTreeSchema,
  checkArgumentsTool,
  handleCheckArguments,
  CheckArgumentsSchema,
} from './tools/sessions.js';
import {
  setSessionRootTool,
  handleSetSessionRoot,
  SetSessionRootSchema,
  setOperatorPermissionTool,
  handleSetOperatorPermission,
  SetOperatorPermissionSchema,
  getOperatorPermissionTool,
  handleGetOperatorPermission,
  GetOperatorPermissionSchema,
  setSpendingLimitTool,
  handleSetSpendingLimit,
  SetSpendingLimitSchema,
  getSpendingLimitTool,
  handleGetSpendingLimit,
  GetSpendingLimitSchema,
  revokeSignatureTool,
  handleRevokeSignature,
  RevokeSignatureSchema,
  getPermitHashTool,
  handleGetPermitHash,
  GetPermitHashSchema,
} from './tools/permissions.js';
import { validateUserOpTool, handleValidateUserOp, ValidateUserOpSchema } from './tools/validate.js';

// ─── Server configuration ──────────────────────────────────────────────────

const SERVER_INFO = {
  name: 'sessionguard-mcp',
  version: '0.1.0',
};

const SERVER_CAPABILITIES = {
  tools: {},
};

// ─── Tool registry ─────────────────────────────────────────────────────────

const ALL_TOOLS = [
  // sessions
  buildSessionTreeTool,
  checkArgumentsTool,
  // permissions
  setSessionRootTool,
  setOperatorPermissionTool,
  getOperatorPermissionTool,
  setSpendingLimitTool,
  getSpendingLimitTool,
  revokeSignatureTool,
  getPermitHashTool,
  // validation
  validateUserOpTool,
];

// ─── Event log ─────────────────────────────────────────────────────────────

// stdout is reserved for the MCP protocol
function logEvent(event: ValidatorEvent): void {
  const fields = Object.entries(event)
    .filter(([key]) => key !== 'type')
    .map(([key, value]) => `${key}=${formatField(value)}`)
    .join(' ');
  process.stderr.write(`[sessionguard] ${event.type} ${fields}\n`);
}

function formatField(value: unknown): string {
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value, (_key, inner: unknown) => (typeof inner === 'bigint' ? inner.toString() : inner));
  }
  return String(value);
}

// ─── Server initialization ─────────────────────────────────────────────────

const server = new Server(SERVER_INFO, {
  capabilities: SERVER_CAPABILITIES,
});

// ─── List tools handler ────────────────────────────────────────────────────

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: ALL_TOOLS,
  };
});

// ─── Call tool handler ─────────────────────────────────────────────────────

server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      // ── sessions ─────────────────────────────────────────────────────

      case 'build_session_tree': {
        const input = BuildSessionTreeSchema.parse(args);
        return handleBuildSessionTree(input);
      }

      case 'check_arguments': {
        const input = CheckArgumentsSchema.parse(args);
        return handleCheckArguments(input);
      }

      // ── permissions ──────────────────────────────────────────────────

      case 'set_session_root': {
        const input = SetSessionRootSchema.parse(args);
        return handleSetSessionRoot(input);
      }

      case 'set_operator_permission': {
        const input = SetOperatorPermissionSchema.parse(args);
        return handleSetOperatorPermission(input);
      }

      case 'get_operator_permission': {
        const input = GetOperatorPermissionSchema.parse(args);
        return handleGetOperatorPermission(input);
      }

      case 'set_spending_limit': {
        const input = SetSpendingLimitSchema.parse(args);
        return handleSetSpendingLimit(input);
      }

      case 'get_spending_limit': {
        const input = GetSpendingLimitSchema.parse(args);
        return handleGetSpendingLimit(input);
      }

      case 'revoke_signature': {
        const input = RevokeSignatureSchema.parse(args);
        return handleRevokeSignature(input);
      }

      case 'get_permit_hash': {
        const input = GetPermitHashSchema.parse(args);
        return handleGetPermitHash(input);
      }

      // ── validation ───────────────────────────────────────────────────

      case 'validate_user_op': {
        const input = ValidateUserOpSchema.parse(args);
        return handleValidateUserOp(input);
      }

      default:
        return {
          content: [
            {
              type: 'text' as const,
              text: `❌ Unknown tool: "${name}". Available tools: ${ALL_TOOLS.map(t => t.name).join(', ')}`,
            },
          ],
          isError: true,
        };
    }
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      content: [
        {
          type: 'text' as const,
          text: `❌ Tool "${name}" failed: ${message}`,
        },
      ],
      isError: true,
    };
  }
});

// ─── Start server ──────────────────────────────────────────────────────────

async function main(): Promise<void> {
  setEventListener(logEvent);
  const { config, owner } = getEngine();
  const transport = new StdioServerTransport();

  const shutdown = (): void => {
    server
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        const msg = error instanceof Error ? error.message : String(error);
        process.stderr.write(`Error during shutdown: ${msg}\n`);
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await server.connect(transport);

  process.stderr.write(
    `SessionGuard MCP v0.1.0 started. ` +
    `Wallet: ${config.walletAddress} | ` +
    `Validator: ${config.validatorAddress} | ` +
    `Chain: ${config.chainId} | ` +
    `Owner: ${owner ? config.ownerAddress : '(none, permits disabled)'}\n`
  );
}

main().catch((error: unknown) => {
  const msg = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Fatal error starting SessionGuard MCP: ${msg}\n`);
  process.exit(1);
});
