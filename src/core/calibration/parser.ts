/**
 * Calibration expression parser
 *
 * Grammar:
 *   expr    := term (('+' | '-') term)*
 *   term    := unary (('*' | '/') unary)*
 *   unary   := ('+' | '-') unary | primary
 *   primary := number | 'v' | '(' expr ')'
 *
 * Numbers: `12`, `1.5`, `.5`, `2e-3`. Whitespace is ignored.
 */

import { CalibrationParseError } from '$types/errors';
import type { CompiledFormula, Expr, Token } from './types';

const NUMBER_PATTERN = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;

type BinaryOperator = Extract<Expr, { kind: 'binary' }>['op'];

const BINARY_OPERATORS: Readonly<Record<BinaryOperator, (left: number, right: number) => number>> = {
  '+': (left, right) => left + right,
  '-': (left, right) => left - right,
  '*': (left, right) => left * right,
  '/': (left, right) => left / right,
};

/**
 * Split an expression into tokens
 * @param source - Expression text
 * @returns Tokens, terminated by an 'end' token
 * @throws {CalibrationParseError} On a character outside the grammar
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const numberMatch = NUMBER_PATTERN.exec(source.slice(i));
    if (numberMatch) {
      tokens.push({ kind: 'number', text: numberMatch[0], position: i });
      i += numberMatch[0].length;
      continue;
    }

    if (ch === 'v') {
      tokens.push({ kind: 'variable', text: ch, position: i });
    } else if (ch === '+' || ch === '-' || ch === '*' || ch === '/') {
      tokens.push({ kind: 'operator', text: ch, position: i });
    } else if (ch === '(') {
      tokens.push({ kind: 'lparen', text: ch, position: i });
    } else if (ch === ')') {
      tokens.push({ kind: 'rparen', text: ch, position: i });
    } else {
      throw new CalibrationParseError('Unexpected character "' + ch + '"', i);
    }
    i++;
  }

  tokens.push({ kind: 'end', text: '', position: source.length });
  return tokens;
}

/**
 * Parse an expression into a tree
 * @param source - Expression text
 * @returns Expression tree
 * @throws {CalibrationParseError} When the text is not a valid expression
 */
export function parseExpression(source: string): Expr {
  const tokens = tokenize(source);
  let index = 0;

  function peek(): Token {
    return tokens[index];
  }

  function next(): Token {
    const token = tokens[index];
    if (token.kind !== 'end') index++;
    return token;
  }

  function parseExpr(): Expr {
    let left = parseTerm();
    for (;;) {
      const token = peek();
      const op = token.text;
      if (token.kind === 'operator' && (op === '+' || op === '-')) {
        next();
        left = { kind: 'binary', op, left, right: parseTerm() };
      } else {
        return left;
      }
    }
  }

  function parseTerm(): Expr {
    let left = parseUnary();
    for (;;) {
      const token = peek();
      const op = token.text;
      if (token.kind === 'operator' && (op === '*' || op === '/')) {
        next();
        left = { kind: 'binary', op, left, right: parseUnary() };
      } else {
        return left;
      }
    }
  }

  function parseUnary(): Expr {
    const token = peek();
    const op = token.text;
    if (token.kind === 'operator' && (op === '+' || op === '-')) {
      next();
      return { kind: 'unary', op, operand: parseUnary() };
    }
    return parsePrimary();
  }

  function parsePrimary(): Expr {
    const token = next();
    switch (token.kind) {
      case 'number':
        return { kind: 'number', value: Number(token.text) };
      case 'variable':
        return { kind: 'variable' };
      case 'lparen': {
        const inner = parseExpr();
        const closing = next();
        if (closing.kind !== 'rparen') {
          throw new CalibrationParseError('Expected ")"', closing.position);
        }
        return inner;
      }
      case 'end':
        throw new CalibrationParseError('Unexpected end of expression', token.position);
      default:
        throw new CalibrationParseError('Unexpected "' + token.text + '"', token.position);
    }
  }

  const tree = parseExpr();
  const trailing = peek();
  if (trailing.kind !== 'end') {
    throw new CalibrationParseError('Unexpected "' + trailing.text + '"', trailing.position);
  }
  return tree;
}

/**
 * Evaluate an expression tree for a given voltage differential
 * @param expr - Expression tree
 * @param v - Value of the variable `v`
 * @returns Result (may be NaN or ±Infinity, e.g. on division by zero)
 */
export function evaluate(expr: Expr, v: number): number {
  switch (expr.kind) {
    case 'number':
      return expr.value;
    case 'variable':
      return v;
    case 'unary': {
      const operand = evaluate(expr.operand, v);
      return expr.op === '-' ? -operand : operand;
    }
    case 'binary':
      return BINARY_OPERATORS[expr.op](evaluate(expr.left, v), evaluate(expr.right, v));
  }
}

/**
 * Parse once, evaluate many times
 * @param source - Expression text
 * @returns Compiled formula
 * @throws {CalibrationParseError} When the text is not a valid expression
 *
 * @example
 * compileFormula('(2 * v) + 1').evaluate(3); // 7
 */
export function compileFormula(source: string): CompiledFormula {
  const tree = parseExpression(source);
  return {
    source: source.trim(),
    evaluate: (v) => evaluate(tree, v),
  };
}
