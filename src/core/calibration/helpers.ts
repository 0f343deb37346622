/**
 * Calibration helper functions
 */

const FORMULA_LINE = /^\s*p\s*=\s*(.*)$/;

/**
 * Find the override formula in calibration file contents
 *
 * The last line of the form `p = <expression>` wins; earlier ones are
 * ignored. Lines that merely mention `p` are not formula lines.
 *
 * @param text - Full file contents
 * @returns Expression text, or null when no line matches or the expression is empty
 *
 * @example
 * extractFormula('# bench 3\np = (2 * v) + 1\n'); // '(2 * v) + 1'
 */
export function extractFormula(text: string): string | null {
  let formula: string | null = null;
  for (const line of text.split(/\r?\n/)) {
    const match = FORMULA_LINE.exec(line);
    if (match) {
      formula = match[1].trim();
    }
  }
  return formula === null || formula === '' ? null : formula;
}
