/**
 * Forward scans over the text lines of one statement page.
 */

export interface LineMatch {
  line: string;
  /** Index relative to the line the scan started from */
  relativeIndex: number;
}

const ACCOUNT_NUMBER_PATTERN = /\d{4}\/\d{4}/;

/**
 * A signed amount line contains a "+" or "-" (or is exactly "0.00") and is
 * all digits once sign, spaces and separators are removed.
 */
export function isAmountLine(line: string): boolean {
  if (!line.includes('-') && !line.includes('+') && line !== '0.00') {
    return false;
  }
  const digits = line.replace(/[+\-\s.,]/g, '');
  return /^\d+$/.test(digits);
}

export function findAmountLine(lines: readonly string[], fromIndex: number): LineMatch | null {
  for (let i = Math.max(fromIndex, 0); i < lines.length; i++) {
    const line = lines[i];
    if (line !== undefined && isAmountLine(line)) {
      return { line, relativeIndex: i - fromIndex };
    }
  }
  return null;
}

/**
 * Find the first line carrying an account number with a bank code
 * ("123456789/0800"). The returned line is trimmed.
 */
export function findAccountNumberLine(lines: readonly string[], fromIndex: number): LineMatch | null {
  for (let i = Math.max(fromIndex, 0); i < lines.length; i++) {
    const line = lines[i];
    if (line !== undefined && ACCOUNT_NUMBER_PATTERN.test(line)) {
      return { line: line.trim(), relativeIndex: i - fromIndex };
    }
  }
  return null;
}
