/**
 * Fatal parse errors. Either one aborts extraction of the current statement
 * file; the batch processor records it and moves on to the next file.
 */

/**
 * A numeric or date field could not be read from its expected textual form.
 */
export class FormatError extends Error {
  readonly field: string;
  readonly text: string;

  constructor(field: string, text: string, detail?: string) {
    const suffix = detail !== undefined ? ` (${detail})` : '';
    super(`Unable to parse ${field}: "${text}"${suffix}`);
    this.name = 'FormatError';
    this.field = field;
    this.text = text;
  }
}

/**
 * A fixed positional offset (or a forward scan) went past the lines of the
 * page, i.e. the assumed layout did not hold for this document.
 */
export class OffsetOutOfRangeError extends Error {
  readonly index: number;
  readonly lineCount: number;

  constructor(what: string, index: number, lineCount: number) {
    super(`Line ${index} for ${what} is outside the page (${lineCount} lines)`);
    this.name = 'OffsetOutOfRangeError';
    this.index = index;
    this.lineCount = lineCount;
  }
}

export function isStatementParseError(error: unknown): error is FormatError | OffsetOutOfRangeError {
  return error instanceof FormatError || error instanceof OffsetOutOfRangeError;
}
