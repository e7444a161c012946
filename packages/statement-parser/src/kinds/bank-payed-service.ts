import { CS_SERVICE_TYPES, CSOB_SERVICE_TYPES } from './layouts.js';
import { lineAt, pdfBase, scanAmount } from './fields.js';
import type { ExtractionContext, KindDefinition, TransactionInitOf } from './types.js';

type ServiceTypeTable = ReadonlyArray<{ name: string; subtypes: readonly string[] }>;

/**
 * Match the service name on one line and its subtype on another, giving
 * "name" or "name - subtype". Empty when no known service is named.
 */
export function resolveServiceType(
  table: ServiceTypeTable,
  nameLine: string,
  subtypeLine: () => string
): string {
  for (const { name, subtypes } of table) {
    if (!nameLine.includes(name)) continue;
    if (subtypes.length === 0) return name;

    const line = subtypeLine();
    const subtype = subtypes.find((candidate) => line.includes(candidate));
    return subtype !== undefined ? `${name} - ${subtype}` : name;
  }
  return '';
}

function extractService(serviceType: (ctx: ExtractionContext) => string) {
  return (ctx: ExtractionContext): TransactionInitOf<'BankPayedService'> => {
    const base = pdfBase(ctx);
    const amount = scanAmount(ctx);
    return {
      ...base,
      kind: 'BankPayedService',
      accountFrom: ctx.statementAccount,
      amount,
      serviceType: serviceType(ctx),
    };
  };
}

export const bankPayedService: KindDefinition<'BankPayedService'> = {
  kind: 'BankPayedService',
  banks: {
    cs: {
      markers: ['Ceny za služby'],
      extract: extractService((ctx) =>
        resolveServiceType(CS_SERVICE_TYPES, lineAt(ctx, 1, 'service type'), () =>
          lineAt(ctx, 2, 'service subtype')
        )
      ),
    },
    csob: {
      markers: ['Poplatek-platební karta'],
      extract: extractService((ctx) => {
        const marker = lineAt(ctx, 0, 'service type');
        return resolveServiceType(CSOB_SERVICE_TYPES, marker, () => marker);
      }),
    },
  },
};
