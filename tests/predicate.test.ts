/**
 * Tests for the argument predicate evaluator and its RLP codec.
 */
import { describe, it, expect } from 'vitest';
import { toRlp } from 'viem';
import {
  decodeAllowedArguments,
  encodeActualArguments,
  encodeAllowedArguments,
  encodePredicate,
  evaluatePredicate,
  isAllowedCalldata,
} from '../src/validator/predicate.js';
import type { Predicate } from '../src/validator/types.js';
import { u256 } from './fixtures.js';

const eq = (n: bigint): Predicate => ({ op: 'EQ', value: u256(n) });
const gt = (n: bigint): Predicate => ({ op: 'GT', value: u256(n) });
const lt = (n: bigint): Predicate => ({ op: 'LT', value: u256(n) });

// ─── evaluatePredicate ─────────────────────────────────────────────────────

describe('evaluatePredicate', () => {
  it('ANY accepts every value', () => {
    expect(evaluatePredicate({ op: 'ANY' }, u256(123n))).toBe(true);
    expect(evaluatePredicate({ op: 'ANY' }, '0x')).toBe(true);
  });

  it('EQ compares bytes and NE is its complement', () => {
    expect(evaluatePredicate(eq(7n), u256(7n))).toBe(true);
    expect(evaluatePredicate(eq(7n), u256(8n))).toBe(false);
    expect(evaluatePredicate({ op: 'NE', value: u256(7n) }, u256(7n))).toBe(false);
    expect(evaluatePredicate({ op: 'NE', value: u256(7n) }, u256(8n))).toBe(true);
  });

  it('GT and LT are strict', () => {
    expect(evaluatePredicate(gt(100n), u256(101n))).toBe(true);
    expect(evaluatePredicate(gt(100n), u256(100n))).toBe(false);
    expect(evaluatePredicate(lt(100n), u256(99n))).toBe(true);
    expect(evaluatePredicate(lt(100n), u256(100n))).toBe(false);
  });

  it('GT and LT are anti-symmetric', () => {
    expect(evaluatePredicate(gt(5n), u256(9n))).toBe(true);
    expect(evaluatePredicate(gt(9n), u256(5n))).toBe(false);
  });

  it('evaluates AND and OR like propositional logic', () => {
    const range: Predicate = { op: 'AND', children: [gt(10n), lt(20n)] };
    expect(evaluatePredicate(range, u256(15n))).toBe(true);
    expect(evaluatePredicate(range, u256(25n))).toBe(false);

    const either: Predicate = { op: 'OR', children: [eq(1n), eq(2n)] };
    expect(evaluatePredicate(either, u256(2n))).toBe(true);
    expect(evaluatePredicate(either, u256(3n))).toBe(false);

    const nested: Predicate = { op: 'OR', children: [range, eq(100n)] };
    expect(evaluatePredicate(nested, u256(100n))).toBe(true);
    expect(evaluatePredicate(nested, u256(12n))).toBe(true);
    expect(evaluatePredicate(nested, u256(50n))).toBe(false);
  });

  it('rejects numeric comparison against a short literal', () => {
    expect(() => evaluatePredicate({ op: 'GT', value: '0x01' }, u256(1n))).toThrow(
      expect.objectContaining({ code: 'MALFORMED_INPUT' })
    );
  });
});

// ─── isAllowedCalldata ─────────────────────────────────────────────────────

describe('isAllowedCalldata', () => {
  it('allows empty argument lists', () => {
    expect(isAllowedCalldata(encodeAllowedArguments([]), encodeActualArguments([]), 0n)).toBe(true);
  });

  it('returns true when every slot holds', () => {
    const allowed = encodeAllowedArguments([eq(5n), { op: 'ANY' }, { op: 'AND', children: [gt(10n), lt(20n)] }]);
    const actual = encodeActualArguments([u256(5n), u256(999n), u256(11n)]);
    expect(isAllowedCalldata(allowed, actual, 5n)).toBe(true);
  });

  it('returns false when one slot fails', () => {
    const allowed = encodeAllowedArguments([{ op: 'ANY' }, eq(100n)]);
    const actual = encodeActualArguments([u256(0n), u256(101n)]);
    expect(isAllowedCalldata(allowed, actual, 0n)).toBe(false);
  });

  it('throws on a length mismatch', () => {
    const allowed = encodeAllowedArguments([{ op: 'ANY' }, { op: 'ANY' }]);
    const actual = encodeActualArguments([u256(0n)]);
    expect(() => isAllowedCalldata(allowed, actual, 0n)).toThrow('invalid arguments length: 2 allowed, 1 actual');
  });

  it('throws when the value slot does not match the native value', () => {
    const allowed = encodeAllowedArguments([{ op: 'ANY' }, { op: 'ANY' }]);
    const actual = encodeActualArguments([u256(1n), u256(2n)]);
    expect(() => isAllowedCalldata(allowed, actual, 2n)).toThrow('msg.value not corresponding to parsed value');
  });

  it('also evaluates the value slot with its own predicate', () => {
    const allowed = encodeAllowedArguments([lt(10n)]);
    expect(isAllowedCalldata(allowed, encodeActualArguments([u256(50n)]), 50n)).toBe(false);
    expect(isAllowedCalldata(allowed, encodeActualArguments([u256(5n)]), 5n)).toBe(true);
  });

  it('rejects an unknown tag byte', () => {
    const allowed = toRlp([['0x07', u256(1n)]]);
    expect(() => isAllowedCalldata(allowed, encodeActualArguments([u256(0n)]), 0n)).toThrow(
      'invalid calldata prefix: 0x07'
    );
  });

  it('rejects input that is not an RLP list', () => {
    expect(() => isAllowedCalldata('0x05', encodeActualArguments([]), 0n)).toThrow(
      expect.objectContaining({ code: 'MALFORMED_INPUT' })
    );
  });
});

// ─── RLP shape ─────────────────────────────────────────────────────────────

describe('predicate encoding', () => {
  it('decodes what it encodes', () => {
    const forest: Predicate[] = [
      { op: 'ANY' },
      { op: 'OR', children: [eq(1n), { op: 'AND', children: [gt(2n), lt(9n)] }] },
    ];
    expect(decodeAllowedArguments(encodeAllowedArguments(forest))).toEqual(forest);
  });

  it('encodes a leaf as [tag, literal]', () => {
    expect(encodePredicate(eq(1n))).toEqual(['0x02', u256(1n)]);
    expect(encodePredicate({ op: 'ANY' })).toEqual(['0x00', '0x']);
  });

  it('refuses AND/OR with fewer than two children', () => {
    expect(() => encodePredicate({ op: 'AND', children: [eq(1n)] })).toThrow('AND needs at least two children');
  });

  it('rejects a node that is not a [tag, payload] list', () => {
    expect(() => decodeAllowedArguments(toRlp([u256(1n)]))).toThrow(
      'predicate node must be a [tag, payload] list'
    );
  });

  it('rejects an AND node without children', () => {
    expect(() => decodeAllowedArguments(toRlp([['0x05', []]]))).toThrow('AND node needs a non-empty list of children');
  });

  it('rejects an OR node with a single child', () => {
    expect(() => decodeAllowedArguments(toRlp([['0x06', [['0x00', '0x']]]]))).toThrow(
      'OR needs at least two children'
    );
  });

  it('rejects a leaf whose payload is a list', () => {
    expect(() => decodeAllowedArguments(toRlp([['0x02', [u256(1n)]]]))).toThrow('EQ node payload must be a byte string');
  });
});
