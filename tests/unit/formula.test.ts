/**
 * Formula Evaluator Tests
 */

import { describe, it, expect } from 'vitest';
import {
  evaluate,
  evaluateExpression,
  isArithmeticOnly,
  placeholders,
  substitute,
  toPlainNumber,
} from '../../src/estimation/formula.js';
import { FormulaError } from '../../src/core/errors.js';

describe('placeholders', () => {
  it('should list unique names in order of appearance', () => {
    expect(placeholders('{vol} * ({p_core} + {p_mod} + {vol})')).toEqual(['vol', 'p_core', 'p_mod']);
    expect(placeholders('42')).toEqual([]);
  });
});

describe('toPlainNumber', () => {
  it('should leave ordinary numbers alone', () => {
    expect(toPlainNumber(12000)).toBe('12000');
    expect(toPlainNumber(0.25)).toBe('0.25');
    expect(toPlainNumber(-3.5)).toBe('-3.5');
  });

  it('should expand exponent notation', () => {
    expect(toPlainNumber(1e21)).toBe('1000000000000000000000');
    expect(toPlainNumber(1.5e21)).toBe('1500000000000000000000');
    expect(toPlainNumber(1e-7)).toBe('0.0000001');
    expect(toPlainNumber(-2.5e-7)).toBe('-0.00000025');
  });
});

describe('substitute', () => {
  it('should replace every placeholder with its value', () => {
    expect(substitute('{a} * ({b} + {a})', { a: 2, b: 0.5 })).toBe('2 * (0.5 + 2)');
  });

  it('should report every unbound placeholder', () => {
    expect(() => substitute('{a} * {b} * {c}', { a: 1 })).toThrow('Missing formula inputs: b, c');
  });

  it('should substitute text values as-is', () => {
    expect(substitute('{a} * 2', { a: '5000' })).toBe('5000 * 2');
  });
});

describe('isArithmeticOnly', () => {
  it('should accept digits, dots, whitespace, operators and parentheses', () => {
    expect(isArithmeticOnly('(1.5 + 2) * 3 / -4')).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isArithmeticOnly('process.exit()')).toBe(false);
    expect(isArithmeticOnly('1e5')).toBe(false);
    expect(isArithmeticOnly('')).toBe(false);
  });
});

describe('evaluateExpression', () => {
  it('should respect operator precedence and parentheses', () => {
    expect(evaluateExpression('2 + 3 * 4')).toBe(14);
    expect(evaluateExpression('(2 + 3) * 4')).toBe(20);
    expect(evaluateExpression('10 / 4')).toBe(2.5);
    expect(evaluateExpression('10 - 4 - 3')).toBe(3);
    expect(evaluateExpression('16 / 4 / 2')).toBe(2);
  });

  it('should support unary signs', () => {
    expect(evaluateExpression('-3 + 5')).toBe(2);
    expect(evaluateExpression('2 * -3')).toBe(-6);
    expect(evaluateExpression('3 - -5')).toBe(8);
  });

  it('should reject syntax errors', () => {
    expect(() => evaluateExpression('(1 + 2')).toThrow('Unbalanced parentheses');
    expect(() => evaluateExpression('1 + 2)')).toThrow('Unexpected token at position 3');
    expect(() => evaluateExpression('1 +')).toThrow('Unexpected end of formula');
    expect(() => evaluateExpression('   ')).toThrow('Empty formula');
    expect(() => evaluateExpression('2 ** 3')).toThrow(FormulaError);
  });

  it('should reject division by zero', () => {
    expect(() => evaluateExpression('5 / (2 - 2)')).toThrow('Division by zero');
  });
});

describe('evaluate', () => {
  it('should substitute and compute a template', () => {
    expect(evaluate('{vol} * ({p_core} + {p_mod} + {p_serv})', { vol: 100, p_core: 10, p_mod: 5, p_serv: 2.5 })).toBe(1750);
    expect(evaluate('{rev_sum} * (1 + {frag_idx})', { rev_sum: 1000, frag_idx: 0.5 })).toBe(1500);
  });

  it('should accept numeric strings', () => {
    expect(evaluate('{users} * {price}', { users: '5000', price: 2 })).toBe(10000);
  });

  it('should reject values that are not arithmetic', () => {
    expect(() => evaluate('{users} * {price}', { users: 100, price: 'cheap' })).toThrow(
      'Formula contains non-arithmetic characters'
    );
    expect(() => evaluate('{users} * {price}', { users: 100, price: [1, 2] })).toThrow(FormulaError);
  });

  it('should reject non-finite inputs', () => {
    expect(() => evaluate('{a} * 2', { a: Number.POSITIVE_INFINITY })).toThrow('Non-finite input Infinity');
  });

  it('should carry the template on the error', () => {
    try {
      evaluate('{a} / {b}', { a: 1, b: 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FormulaError);
      if (error instanceof FormulaError) {
        expect(error.formula).toBe('{a} / {b}');
        expect(error.code).toBe('FORMULA_ERROR');
      }
    }
  });
});
