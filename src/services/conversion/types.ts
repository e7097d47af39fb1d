import type { Decimal } from 'decimal.js';
import type { AppError } from '../../domain/errors.js';
import type { Currency } from '../../domain/types.js';

export interface MonetaryValue {
  readonly amount: Decimal;
  readonly currency: Currency;
}

export interface NonNumericValue extends AppError {
  code: 'NON_NUMERIC_VALUE';
}

/** Units of `quote` currency per one unit of `base`. */
export interface ExchangeRate {
  readonly base: 'EUR';
  readonly quote: 'BGN';
  readonly quotePerBase: Decimal;
}

export interface RateConverter {
  readonly rate: ExchangeRate;
  convertBgnToEur(value: MonetaryValue): MonetaryValue;
}
