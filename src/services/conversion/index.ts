import { MoneyDecimal, roundToCents } from './monetary.js';
import type { ExchangeRate, MonetaryValue, RateConverter } from './types.js';

export type { ExchangeRate, MonetaryValue, NonNumericValue, RateConverter } from './types.js';
export {
  CENT_PLACES,
  MoneyDecimal,
  formatAmount,
  formatRaw,
  isEmptyCell,
  roundToCents,
  toMonetary,
} from './monetary.js';

/** Legal conversion rate: 1 EUR = 1.95583 BGN. */
export const BGN_PER_EUR: ExchangeRate = createExchangeRate('1.95583');

export function createRateConverter(rate: ExchangeRate = BGN_PER_EUR): RateConverter {
  if (!rate.quotePerBase.isFinite() || rate.quotePerBase.lte(0)) {
    throw new Error(`Exchange rate must be a positive number, got ${rate.quotePerBase.toString()}`);
  }

  const divisor = new MoneyDecimal(rate.quotePerBase);

  return {
    rate,
    convertBgnToEur(value: MonetaryValue): MonetaryValue {
      const eur = new MoneyDecimal(value.amount).div(divisor);
      return roundToCents({ amount: eur, currency: 'EUR' });
    },
  };
}

export function createExchangeRate(quotePerBase: string): ExchangeRate {
  return Object.freeze({ base: 'EUR' as const, quote: 'BGN' as const, quotePerBase: new MoneyDecimal(quotePerBase) });
}
