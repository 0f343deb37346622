/**
 * Calibration type definitions
 */

/**
 * Parsed calibration expression
 *
 * Closed set of node kinds: the only variable is the voltage
 * differential `v`, so evaluation never reaches outside the tree.
 */
export type Expr =
  | { kind: 'number'; value: number }
  | { kind: 'variable' }
  | { kind: 'unary'; op: '+' | '-'; operand: Expr }
  | { kind: 'binary'; op: '+' | '-' | '*' | '/'; left: Expr; right: Expr };

export type TokenKind = 'number' | 'variable' | 'operator' | 'lparen' | 'rparen' | 'end';

export interface Token {
  kind: TokenKind;
  /** Source text of the token ('' for end) */
  text: string;
  /** Zero-based offset into the expression */
  position: number;
}

/**
 * Formula compiled from source text
 */
export interface CompiledFormula {
  source: string;
  evaluate(v: number): number;
}

/**
 * Why the active formula is the built-in default
 * - 'missing-file': no calibration file could be read
 * - 'no-formula': the file has no `p = ...` line
 * - 'parse-error': the override did not parse
 * - 'evaluation': the override produced a non-finite result
 */
export type FallbackReason = 'missing-file' | 'no-formula' | 'parse-error' | 'evaluation';

export interface CalibrationOptions {
  /** Override formula from the calibration file, null for none */
  formula: string | null;
  /** Built-in formula, used whenever the override is absent or fails */
  defaultFormula: string;
  /** Called once each time the default formula takes over */
  onFallback?: (reason: FallbackReason, detail: string) => void;
}

export interface Calibration {
  /** Pressure for a voltage differential; never throws */
  pressure(v: number): number;
  /** Source text of the formula currently in effect */
  getFormula(): string;
  isUsingDefault(): boolean;
}
