/**
 * validator/predicate.ts — Argument predicate trees.
 *
 * A session constrains each argument slot of a call with a predicate node:
 *
 *   leaf:   RLP [tag, abiEncodedLiteral]          ANY | NE | EQ | GT | LT
 *   branch: RLP [tag, [node, node, ...]]          AND | OR
 *
 * The forest (one node per slot) is matched against the RLP list of the
 * call's actual ABI-encoded arguments. Slot 0 is reserved for the native
 * value sent with the call.
 */
import {
  encodeAbiParameters,
  fromRlp,
  hexToBigInt,
  hexToNumber,
  size,
  slice,
  toHex,
  toRlp,
  type AbiParameter,
  type Hex,
} from 'viem';
import { SessionKeyError, decodeOrThrow } from './errors.js';
import { PREDICATE_TAGS, type Predicate, type RlpValue } from './types.js';

const OPERATORS: readonly Predicate['op'][] = ['ANY', 'NE', 'EQ', 'GT', 'LT', 'AND', 'OR'];

const TAG_TO_OPERATOR = new Map<number, Predicate['op']>(
  OPERATORS.map((op) => [PREDICATE_TAGS[op], op] as const)
);

// ─── Evaluation ────────────────────────────────────────────────────────────

/**
 * Check a call's actual arguments against a session's allowed arguments.
 *
 * Throws INVALID_ARGUMENTS_LENGTH when the lists differ in length and
 * VALUE_MISMATCH when slot 0 does not decode to `value`. Returns false when
 * a predicate does not hold.
 */
export function isAllowedCalldata(allowedArguments: Hex, actualArguments: Hex, value: bigint): boolean {
  const allowed = decodeAllowedArguments(allowedArguments);
  const actual = decodeActualArguments(actualArguments);

  if (allowed.length !== actual.length) {
    throw new SessionKeyError(
      'INVALID_ARGUMENTS_LENGTH',
      `invalid arguments length: ${allowed.length} allowed, ${actual.length} actual`
    );
  }
  if (actual.length === 0) return true;

  const [valueSlot] = actual;
  if (valueSlot === undefined || size(valueSlot) !== 32) {
    throw new SessionKeyError('MALFORMED_INPUT', 'value slot must be a single 32-byte word');
  }
  if (hexToBigInt(valueSlot) !== value) {
    throw new SessionKeyError('VALUE_MISMATCH', 'msg.value not corresponding to parsed value');
  }

  // Every slot is evaluated, no short-circuit past a failing one.
  const results = allowed.map((predicate, i) => evaluatePredicate(predicate, actual[i] ?? '0x'));
  return results.every(Boolean);
}

/** Evaluate one decoded predicate against one ABI-encoded actual value. */
export function evaluatePredicate(predicate: Predicate, actual: Hex): boolean {
  switch (predicate.op) {
    case 'ANY':
      return true;
    case 'EQ':
      return sameBytes(predicate.value, actual);
    case 'NE':
      return !sameBytes(predicate.value, actual);
    case 'GT':
      return toUint256(actual) > toUint256(predicate.value);
    case 'LT':
      return toUint256(actual) < toUint256(predicate.value);
    case 'AND': {
      const results = predicate.children.map((child) => evaluatePredicate(child, actual));
      return results.every(Boolean);
    }
    case 'OR': {
      const results = predicate.children.map((child) => evaluatePredicate(child, actual));
      return results.some(Boolean);
    }
  }
}

// ─── Decoding ──────────────────────────────────────────────────────────────

export function decodeAllowedArguments(allowedArguments: Hex): Predicate[] {
  return decodeRlpList('allowed arguments', allowedArguments).map(parsePredicate);
}

export function decodeActualArguments(actualArguments: Hex): Hex[] {
  return decodeRlpList('actual arguments', actualArguments).map((item) => {
    if (typeof item !== 'string') {
      throw new SessionKeyError('MALFORMED_INPUT', 'actual argument must be a byte string, not a list');
    }
    return item;
  });
}

/** Turn one RLP node into a typed predicate, validating its shape. */
export function parsePredicate(node: RlpValue): Predicate {
  if (typeof node === 'string' || node.length !== 2) {
    throw new SessionKeyError('MALFORMED_INPUT', 'predicate node must be a [tag, payload] list');
  }
  const [tagItem, payload] = node;
  if (typeof tagItem !== 'string' || size(tagItem) !== 1) {
    throw new SessionKeyError('MALFORMED_INPUT', 'predicate tag must be a single byte');
  }

  const op = TAG_TO_OPERATOR.get(hexToNumber(tagItem));
  if (op === undefined) {
    throw new SessionKeyError('INVALID_CALLDATA_PREFIX', `invalid calldata prefix: ${tagItem}`);
  }

  if (op === 'AND' || op === 'OR') {
    if (payload === undefined || typeof payload === 'string' || payload.length === 0) {
      throw new SessionKeyError('MALFORMED_INPUT', `${op} node needs a non-empty list of children`);
    }
    if (payload.length < 2) {
      throw new SessionKeyError('MALFORMED_INPUT', `${op} needs at least two children`);
    }
    return { op, children: payload.map(parsePredicate) };
  }

  if (typeof payload !== 'string') {
    throw new SessionKeyError('MALFORMED_INPUT', `${op} node payload must be a byte string`);
  }
  if (op === 'ANY') return { op };
  return { op, value: payload };
}

function decodeRlpList(what: string, data: Hex): readonly RlpValue[] {
  const decoded: RlpValue = decodeOrThrow(what, () => fromRlp(data, 'hex'));
  if (typeof decoded === 'string') {
    throw new SessionKeyError('MALFORMED_INPUT', `${what} must be an RLP list`);
  }
  return decoded;
}

// ─── Encoding (off-chain side) ─────────────────────────────────────────────

export function encodePredicate(predicate: Predicate): RlpValue {
  const tag = toHex(PREDICATE_TAGS[predicate.op], { size: 1 });
  switch (predicate.op) {
    case 'ANY':
      return [tag, '0x'];
    case 'AND':
    case 'OR':
      if (predicate.children.length < 2) {
        throw new SessionKeyError('MALFORMED_INPUT', `${predicate.op} needs at least two children`);
      }
      return [tag, predicate.children.map(encodePredicate)];
    default:
      return [tag, predicate.value];
  }
}

/** RLP forest for `Session.allowedArguments`. Slot 0 constrains the native value. */
export function encodeAllowedArguments(predicates: readonly Predicate[]): Hex {
  return toRlp(predicates.map(encodePredicate));
}

/** RLP list of ABI-encoded actual arguments, native value first. */
export function encodeActualArguments(values: readonly Hex[]): Hex {
  return toRlp(values);
}

/** ABI-encode one value as a standalone argument, e.g. abiArgument('uint256', 100n). */
export function abiArgument(type: string, value: unknown): Hex {
  const params: readonly AbiParameter[] = [{ type }];
  return encodeAbiParameters(params, [value]);
}

// ─── Internal helpers ──────────────────────────────────────────────────────

function sameBytes(a: Hex, b: Hex): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function toUint256(word: Hex): bigint {
  if (size(word) < 32) {
    throw new SessionKeyError('MALFORMED_INPUT', 'numeric comparison needs a 32-byte word');
  }
  return hexToBigInt(slice(word, 0, 32));
}
