/**
 * sessions.ts — build_session_tree and check_arguments tools.
 *
 * Off-chain helpers for operators: commit a set of sessions to a Merkle root
 * and dry-run one call against a session before signing anything.
 */
import { z } from 'zod';
import { getEngine } from '../utils/client.js';
import { errorResult, formatSuccess, textContent, type ToolResult } from '../utils/format.js';
import { buildSessionLeaf, buildSessionTree, getSessionProof, getSessionTreeRoot } from '../validator/session.js';
import { AddressSchema, HexSchema, SESSION_JSON_SCHEMA, SessionSchema, UintSchema } from './schemas.js';

// ─── build_session_tree ────────────────────────────────────────────────────

export const BuildSessionTreeSchema = z.object({
  sessions: z.array(SessionSchema).min(1).describe('Sessions to commit under one root'),
});

export type BuildSessionTreeInput = z.infer<typeof BuildSessionTreeSchema>;

export const buildSessionTreeTool = {
  name: 'build_session_tree',
  description:
    'Commit a list of sessions (target + selector + argument predicates) to a Merkle root. ' +
    'Returns the root to install with set_session_root, and for each session its encoded ' +
    'allowed arguments, leaf hash and Merkle proof to present when validating.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      sessions: { type: 'array', items: SESSION_JSON_SCHEMA },
    },
    required: ['sessions'],
  },
};

export async function handleBuildSessionTree(input: BuildSessionTreeInput): Promise<ToolResult> {
  try {
    const tree = buildSessionTree(input.sessions);
    const root = getSessionTreeRoot(tree);
    const leaves = input.sessions.map((session, i) => ({
      index: i,
      to: session.to,
      selector: session.selector,
      allowedArguments: session.allowedArguments,
      leaf: buildSessionLeaf(session),
      proof: getSessionProof(tree, session),
    }));

    let out = formatSuccess(`Built session tree with ${input.sessions.length} session(s)`, { Root: root });
    out += `\n\n${JSON.stringify(leaves, null, 2)}`;
    return { content: [textContent(out)] };
  } catch (error: unknown) {
    return errorResult(error, 'build_session_tree');
  }
}

// ─── check_arguments ───────────────────────────────────────────────────────

export const CheckArgumentsSchema = z.object({
  session: SessionSchema,
  to: AddressSchema.describe('Call target'),
  data: HexSchema.describe('Call data (selector + ABI arguments), 0x for a value transfer'),
  value: UintSchema.default(0).describe('Native value in wei'),
  actual_arguments: HexSchema.describe('RLP list of ABI-encoded actual arguments, native value first'),
});

export type CheckArgumentsInput = z.infer<typeof CheckArgumentsSchema>;

export const checkArgumentsTool = {
  name: 'check_arguments',
  description:
    'Check one call (to, data, value) and its RLP actual arguments against a session. ' +
    'Verifies target, selector, that the actual arguments match the calldata byte for byte, ' +
    'and evaluates the predicate forest. Read-only.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      session: SESSION_JSON_SCHEMA,
      to: { type: 'string', description: 'Call target' },
      data: { type: 'string', description: 'Call data, 0x for a value transfer' },
      value: { type: 'string', description: 'Native value in wei (default "0")' },
      actual_arguments: { type: 'string', description: 'RLP list of ABI-encoded actual arguments' },
    },
    required: ['session', 'to', 'data', 'actual_arguments'],
  },
};

export async function handleCheckArguments(input: CheckArgumentsInput): Promise<ToolResult> {
  try {
    const { sessionKeys } = getEngine();
    sessionKeys.checkArguments(input.session, input.to, input.data, input.value, input.actual_arguments);
    return {
      content: [
        textContent(
          formatSuccess('Call is allowed by the session', {
            To: input.to,
            Selector: input.session.selector,
            Value: input.value.toString(),
          })
        ),
      ],
    };
  } catch (error: unknown) {
    return errorResult(error, 'check_arguments');
  }
}
