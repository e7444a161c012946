export const PARSER_VERSION = '1.0.0';

export const DEFAULT_CURRENCY = 'CZK';

export const UNKNOWN_CARD_OWNER = 'Unknown card';

/**
 * Text fragments identifying the issuing bank, checked in order.
 */
export const BANK_NAME_MARKERS = [
  { text: 'Československá obchodní banka, a. s.,', bank: 'csob' },
  { text: 'Česká spořitelna, a.s.,', bank: 'cs' },
  { text: 'Plus účet České spořitelny', bank: 'cs' },
  { text: 'Revolut', bank: 'revolut' },
] as const;

/**
 * Lines that close the currently open transaction: balance footer, page
 * continuation and page header lines of both Czech banks.
 */
export const SECTION_END_LINES: readonly string[] = [
  // cs
  'Konečný zůstatek:',
  'Pokračování na další straně',
  'Výpis z účtu',
  // csob
  'Datum',
  'Strana:',
  'Prosíme Vás o včasné překontrolování uvedených údajů. V případě nesouhlasu kontaktujte prosím svoje obchodní místo nebo volejte na telefon',
  'Vážená klientko, vážený kliente,',
];

export const REVOLUT_CURRENCIES = ['CZK', 'USD', 'EUR'] as const;

export const REVOLUT_COMPLETED_STATE = 'completed';

export const REVOLUT_FEE_SERVICE_TYPE = 'transaction fee';
