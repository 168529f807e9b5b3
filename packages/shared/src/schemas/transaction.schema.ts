import { z } from 'zod';

/**
 * Transaction type schema
 */
export const TransactionTypeSchema = z.enum(['deposit', 'withdrawal', 'dispute', 'resolve', 'chargeback']);

export type TransactionType = z.infer<typeof TransactionTypeSchema>;

/** Largest client id (16-bit unsigned) */
export const MAX_CLIENT_ID = 0xffff;

/** Largest transaction id (32-bit unsigned) */
export const MAX_TX_ID = 0xffffffff;

/** Most digits an amount may carry, in total and after the point */
export const MAX_AMOUNT_DIGITS = 28;

const DECIMAL_PATTERN = /^(\d+(\.\d*)?|\.\d+)$/;

function amountDigits(amount: string): { significant: number; scale: number } {
  const [whole, fraction = ''] = amount.split('.');
  return {
    significant: `${whole}${fraction}`.replace(/^0+/, '').length,
    scale: fraction.length,
  };
}

const typeField = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value) => (value === 'withdraw' ? 'withdrawal' : value))
  .pipe(TransactionTypeSchema);

function unsignedField(max: number) {
  return z
    .string()
    .trim()
    .regex(/^\d+$/, 'expected an unsigned integer')
    .transform(Number)
    .pipe(z.number().int().max(max));
}

/**
 * A transaction row after validation
 */
export type TransactionRow =
  | { type: 'deposit' | 'withdrawal'; client: number; tx: number; amount: string }
  | { type: 'dispute' | 'resolve' | 'chargeback'; client: number; tx: number };

/**
 * Zod schema for one CSV row, keyed by canonical column name.
 * Amounts stay strings so no binary float ever touches them.
 */
export const TransactionRowSchema = z
  .object({
    type: typeField,
    client: unsignedField(MAX_CLIENT_ID),
    tx: unsignedField(MAX_TX_ID),
    amount: z.string().trim().optional(),
  })
  .transform((row, ctx): TransactionRow => {
    switch (row.type) {
      case 'deposit':
      case 'withdrawal': {
        if (row.amount === undefined || row.amount === '') {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['amount'], message: `amount is required for ${row.type}` });
          return z.NEVER;
        }
        if (!DECIMAL_PATTERN.test(row.amount)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['amount'], message: 'amount must be a non-negative decimal' });
          return z.NEVER;
        }
        const digits = amountDigits(row.amount);
        if (digits.significant > MAX_AMOUNT_DIGITS || digits.scale > MAX_AMOUNT_DIGITS) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['amount'],
            message: `amount exceeds ${MAX_AMOUNT_DIGITS} digits of precision`,
          });
          return z.NEVER;
        }
        return { type: row.type, client: row.client, tx: row.tx, amount: row.amount };
      }
      default:
        // amount is ignored for dispute, resolve and chargeback
        return { type: row.type, client: row.client, tx: row.tx };
    }
  });

export type TransactionRowInput = z.input<typeof TransactionRowSchema>;
