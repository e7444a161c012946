import { describe, it, expect } from 'vitest';
import { buildLinesFromItems } from '@ledgerline/pdf-extract';

describe('buildLinesFromItems', () => {
  it('should break lines at end-of-line items', () => {
    const items = [
      { str: 'Platba ', hasEOL: false },
      { str: 'kartou', hasEOL: true },
      { str: '-250,00', hasEOL: true },
    ];

    expect(buildLinesFromItems(items)).toEqual(['Platba kartou', '-250,00']);
  });

  it('should skip marked-content entries', () => {
    const items = [{ type: 'beginMarkedContent' }, { str: 'Inkaso', hasEOL: true }, { type: 'endMarkedContent' }];

    expect(buildLinesFromItems(items)).toEqual(['Inkaso']);
  });

  it('should keep trailing text without an end of line', () => {
    expect(buildLinesFromItems([{ str: 'Konečný zůstatek:', hasEOL: true }, { str: '9 750,00', hasEOL: false }])).toEqual([
      'Konečný zůstatek:',
      '9 750,00',
    ]);
  });

  it('should keep empty lines', () => {
    expect(buildLinesFromItems([{ str: '', hasEOL: true }, { str: 'x', hasEOL: true }])).toEqual(['', 'x']);
  });
});
