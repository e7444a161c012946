export {
  PARSER_VERSION,
  DEFAULT_CURRENCY,
  UNKNOWN_CARD_OWNER,
  BANK_NAME_MARKERS,
  SECTION_END_LINES,
  REVOLUT_CURRENCIES,
  REVOLUT_COMPLETED_STATE,
  REVOLUT_FEE_SERVICE_TYPE,
} from './constants.js';
export {
  extractEmbeddedDate,
  normalizeBookingDate,
  convertRevolutTimestamp,
  bookingDateSortKey,
  compareBookingDates,
  bookingDateToIso,
  isValidBookingDate,
} from './date.js';
export { parseAmount, parseDotDecimalAmount, roundToTwoDecimals, formatDecimalComma, sumAmounts } from './money.js';
export { isAmountLine, findAmountLine, findAccountNumberLine, type LineMatch } from './lines.js';
export { FormatError, OffsetOutOfRangeError, isStatementParseError } from './errors.js';
