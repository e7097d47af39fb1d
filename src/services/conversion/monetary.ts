import { Decimal } from 'decimal.js';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode } from '../../domain/errors.js';
import type { CellValue, Currency } from '../../domain/types.js';
import type { MonetaryValue, NonNumericValue } from './types.js';

export const CENT_PLACES = 2;

// Quotients such as x / 1.95583 do not terminate; 40 significant digits keep
// every bounded input far from a false midpoint before the cent rounding.
export const MoneyDecimal = Decimal.clone({
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
});

const DECIMAL_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d{1,3})?$/;

/** Largest absolute amount read as money; anything above is treated as non-numeric. */
export const MAX_AMOUNT = new MoneyDecimal('1e15');
const INNER_SPACES = /\s/g;

function nonNumeric(raw: unknown): NonNumericValue {
  return {
    ...createAppError(ErrorCode.NON_NUMERIC_VALUE, 'Cell value is not a number', false, String(raw)),
    code: ErrorCode.NON_NUMERIC_VALUE,
  };
}

function withinRange(
  amount: Decimal,
  currency: Currency,
  raw: CellValue,
): Result<MonetaryValue, NonNumericValue> {
  if (amount.abs().gt(MAX_AMOUNT)) return err(nonNumeric(raw));
  return ok({ amount, currency });
}

export function isEmptyCell(raw: CellValue | undefined): boolean {
  return raw === null || raw === undefined || (typeof raw === 'string' && raw.trim() === '');
}

export function toMonetary(
  raw: CellValue | undefined,
  currency: Currency,
): Result<MonetaryValue, NonNumericValue> {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) return err(nonNumeric(raw));
    return withinRange(new MoneyDecimal(raw), currency, raw);
  }

  if (typeof raw !== 'string') return err(nonNumeric(raw));

  const cleaned = raw.replace(INNER_SPACES, '').replace(',', '.');
  if (!DECIMAL_LITERAL.test(cleaned)) return err(nonNumeric(raw));

  return withinRange(new MoneyDecimal(cleaned), currency, raw);
}

export function roundToCents(value: MonetaryValue): MonetaryValue {
  const rounded = value.amount.toDecimalPlaces(CENT_PLACES, Decimal.ROUND_HALF_UP);
  // -0.004 rounds to -0; report it as 0.00
  return {
    amount: rounded.isZero() ? new MoneyDecimal(0) : rounded,
    currency: value.currency,
  };
}

export function formatAmount(value: MonetaryValue): string {
  return value.amount.toFixed(CENT_PLACES, Decimal.ROUND_HALF_UP);
}

export function formatRaw(value: MonetaryValue): string {
  return value.amount.toFixed();
}
