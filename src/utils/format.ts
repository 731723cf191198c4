/**
 * Response formatters for SessionGuard MCP tools.
 * Converts bigint / timestamp / validation values to readable MCP content.
 */
import { maxUint128 } from 'viem';
import { isSessionKeyError } from '../validator/errors.js';
import type { OperatorPermission, SpendingLimitInfo, ValidationData } from '../validator/types.js';

// ─── Amount formatting ─────────────────────────────────────────────────────

/**
 * Format a uint128 budget. 2^128-1 is the unlimited sentinel.
 */
export function formatBudget(value: bigint): string {
  if (value === maxUint128) return 'Unlimited';
  return value.toString();
}

/**
 * Format a spending limit. No configured limit means the token is unrestricted.
 */
export function formatSpendingLimit(info: SpendingLimitInfo | undefined): string {
  if (!info) return 'No limit (unrestricted)';
  return `${info.spent.toString()} / ${info.allowance.toString()} spent (${(info.allowance - info.spent).toString()} left)`;
}

// ─── Time formatting ───────────────────────────────────────────────────────

/**
 * Format a Unix timestamp as ISO string. 0 is an open bound.
 */
export function formatTimestamp(ts: number): string {
  if (ts === 0) return 'Unbounded';
  return new Date(ts * 1000).toISOString();
}

// ─── Records ───────────────────────────────────────────────────────────────

export function formatPermission(permission: OperatorPermission): Record<string, string> {
  return {
    'Session root': permission.sessionRoot,
    Paymaster: permission.paymaster,
    'Valid after': formatTimestamp(permission.validAfter),
    'Valid until': formatTimestamp(permission.validUntil),
    'Gas remaining': formatBudget(permission.gasRemaining),
    'Uses remaining': formatBudget(permission.timesRemaining),
  };
}

export function formatValidationData(data: ValidationData): Record<string, string> {
  return {
    Result: data.failed ? 'Signature failed' : 'Authorized',
    'Valid after': formatTimestamp(data.validAfter),
    'Valid until': formatTimestamp(data.validUntil),
  };
}

// ─── MCP content helpers ───────────────────────────────────────────────────

export type ToolResult = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

/**
 * Create a standard MCP text content block.
 */
export function textContent(text: string): { type: 'text'; text: string } {
  return { type: 'text' as const, text };
}

/**
 * Format an error into a human-readable MCP error response text.
 */
export function formatError(error: unknown, context: string): string {
  const msg = error instanceof Error ? error.message : String(error);
  return `❌ ${context} failed: ${msg}`;
}

/**
 * Format a success message with optional details.
 */
export function formatSuccess(message: string, details?: Record<string, string>): string {
  return withDetails(`✅ ${message}`, details);
}

/** Like formatSuccess, for a result that completed but was refused. */
export function formatFailure(message: string, details?: Record<string, string>): string {
  return withDetails(`❌ ${message}`, details);
}

function withDetails(headline: string, details?: Record<string, string>): string {
  let out = headline;
  if (details && Object.keys(details).length > 0) {
    out += '\n';
    for (const [key, value] of Object.entries(details)) {
      out += `\n  ${key}: ${value}`;
    }
  }
  return out;
}

/** formatError plus the error code in brackets, when the error carries one. */
export function describeError(error: unknown, context: string): string {
  const code = isSessionKeyError(error) ? ` [${error.code}]` : '';
  return formatError(error, context) + code;
}

export function errorResult(error: unknown, context: string): ToolResult {
  return { content: [textContent(describeError(error, context))], isError: true };
}
