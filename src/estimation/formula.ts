/**
 * Formula Evaluator
 *
 * Templates are arithmetic over `{variable}` placeholders. Values are
 * substituted as text, the text must consist only of digits, decimal
 * points, whitespace and + - * / ( ), and is then evaluated by a small
 * recursive-descent parser:
 *
 *   expr   := term (('+' | '-') term)*
 *   term   := factor (('*' | '/') factor)*
 *   factor := ('+' | '-') factor | number | '(' expr ')'
 */

import type { FactValue } from '../facts/types.js';
import { FormulaError } from '../core/errors.js';

const PLACEHOLDER = /\{(\w+)\}/g;
const ARITHMETIC_ONLY = /^[\d.\s+\-*/()]+$/;

export function placeholders(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    if (!names.includes(match[1])) {
      names.push(match[1]);
    }
  }
  return names;
}

/**
 * Positional notation for a finite number; never exponent form, which the
 * arithmetic whitelist would reject.
 */
export function toPlainNumber(value: number): string {
  const text = String(value);
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;

  const [, sign, whole, fraction = '', exponent] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);

  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

function toLiteral(value: FactValue, template: string): string {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new FormulaError(`Non-finite input ${value}`, template);
    }
    return toPlainNumber(value);
  }
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value);
}

export function substitute(template: string, inputs: Readonly<Record<string, FactValue>>): string {
  const missing = placeholders(template).filter(name => !(name in inputs));
  if (missing.length > 0) {
    throw new FormulaError(`Missing formula inputs: ${missing.join(', ')}`, template, { missing });
  }
  return template.replace(PLACEHOLDER, (_, name: string) => toLiteral(inputs[name], template));
}

export function isArithmeticOnly(text: string): boolean {
  return ARITHMETIC_ONLY.test(text);
}

type Token =
  | { kind: 'number'; value: number }
  | { kind: 'op'; value: '+' | '-' | '*' | '/' }
  | { kind: 'paren'; value: '(' | ')' };

function tokenize(text: string, template: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < text.length) {
    const ch = text[pos];

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }
    if (ch === '+' || ch === '-' || ch === '*' || ch === '/') {
      tokens.push({ kind: 'op', value: ch });
      pos++;
      continue;
    }
    if (ch === '(' || ch === ')') {
      tokens.push({ kind: 'paren', value: ch });
      pos++;
      continue;
    }

    const number = /^(\d+(\.\d*)?|\.\d+)/.exec(text.slice(pos));
    if (!number) {
      throw new FormulaError(`Unexpected character '${ch}' at position ${pos}`, template);
    }
    tokens.push({ kind: 'number', value: Number(number[0]) });
    pos += number[0].length;
  }

  return tokens;
}

class Parser {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly template: string
  ) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw new FormulaError('Empty formula', this.template);
    }
    const value = this.expr();
    if (this.pos < this.tokens.length) {
      throw new FormulaError(`Unexpected token at position ${this.pos}`, this.template);
    }
    return value;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private expr(): number {
    let value = this.term();
    while (true) {
      const token = this.peek();
      if (token?.kind !== 'op' || (token.value !== '+' && token.value !== '-')) break;
      this.pos++;
      const rhs = this.term();
      value = token.value === '+' ? value + rhs : value - rhs;
    }
    return value;
  }

  private term(): number {
    let value = this.factor();
    while (true) {
      const token = this.peek();
      if (token?.kind !== 'op' || (token.value !== '*' && token.value !== '/')) break;
      this.pos++;
      const rhs = this.factor();
      if (token.value === '*') {
        value = value * rhs;
      } else {
        if (rhs === 0) {
          throw new FormulaError('Division by zero', this.template);
        }
        value = value / rhs;
      }
    }
    return value;
  }

  private factor(): number {
    const token = this.peek();
    if (!token) {
      throw new FormulaError('Unexpected end of formula', this.template);
    }

    if (token.kind === 'op' && (token.value === '+' || token.value === '-')) {
      this.pos++;
      const operand = this.factor();
      return token.value === '-' ? -operand : operand;
    }

    if (token.kind === 'number') {
      this.pos++;
      return token.value;
    }

    if (token.kind === 'paren' && token.value === '(') {
      this.pos++;
      const value = this.expr();
      const closing = this.peek();
      if (closing?.kind !== 'paren' || closing.value !== ')') {
        throw new FormulaError('Unbalanced parentheses', this.template);
      }
      this.pos++;
      return value;
    }

    throw new FormulaError(`Unexpected '${token.value}' at position ${this.pos}`, this.template);
  }
}

/**
 * Evaluate an already-substituted arithmetic expression.
 */
export function evaluateExpression(text: string, template: string = text): number {
  if (!isArithmeticOnly(text)) {
    throw new FormulaError('Formula contains non-arithmetic characters', template, { substituted: text });
  }
  const value = new Parser(tokenize(text, template), template).parse();
  if (!Number.isFinite(value)) {
    throw new FormulaError('Formula produced a non-finite result', template);
  }
  return value;
}

export function evaluate(template: string, inputs: Readonly<Record<string, FactValue>>): number {
  return evaluateExpression(substitute(template, inputs), template);
}
