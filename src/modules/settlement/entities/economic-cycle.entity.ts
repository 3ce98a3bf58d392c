import {
  IsoDate,
  compareIsoDates,
  cycleDatesFor,
  isIsoDate,
  isWithinWindow,
  periodKeyOf,
} from '../../../utils/calendar-date';
import {
  InvalidConversionRateException,
  InvalidEconomicCycleException,
  InvalidFuelPriceException,
} from '../exceptions/settlement.exceptions';
import { isPositiveNumber } from './settlement.enums';

export const MIN_CYCLE_YEAR = 2020;
export const MAX_CYCLE_YEAR = 2100;

export interface EconomicCycleProps {
  ufValue: number;
  fuelPrice: number;
  isClosed?: boolean;
  startDate: IsoDate;
  endDate: IsoDate;
}

/**
 * Economic snapshot of one billing period: the UF value used for CLP
 * conversion and the period's fuel price.
 */
export class EconomicCycle {
  readonly ufValue: number;
  readonly fuelPrice: number;
  readonly isClosed: boolean;
  readonly startDate: IsoDate;
  readonly endDate: IsoDate;

  private constructor(props: Required<EconomicCycleProps>) {
    this.ufValue = props.ufValue;
    this.fuelPrice = props.fuelPrice;
    this.isClosed = props.isClosed;
    this.startDate = props.startDate;
    this.endDate = props.endDate;
    Object.freeze(this);
  }

  static create(props: EconomicCycleProps): EconomicCycle {
    const { ufValue, fuelPrice, startDate, endDate } = props;

    if (!isPositiveNumber(ufValue)) {
      throw new InvalidConversionRateException(ufValue);
    }
    if (!isPositiveNumber(fuelPrice)) {
      throw new InvalidFuelPriceException(
        `Economic cycle fuel price must be positive, received ${fuelPrice}`,
        { fuel_price: fuelPrice },
      );
    }
    if (!isIsoDate(startDate) || !isIsoDate(endDate)) {
      throw new InvalidEconomicCycleException(
        `Economic cycle dates must be YYYY-MM-DD, received ${startDate} → ${endDate}`,
        { start_date: startDate, end_date: endDate },
      );
    }
    if (compareIsoDates(endDate, startDate) < 0) {
      throw new InvalidEconomicCycleException(
        `Economic cycle ends before it starts (${startDate} → ${endDate})`,
        { start_date: startDate, end_date: endDate },
      );
    }

    return new EconomicCycle({
      ufValue,
      fuelPrice,
      isClosed: props.isClosed ?? false,
      startDate,
      endDate,
    });
  }

  /**
   * Cycle closing on the 18th of `month`, opened on the 19th of the month before.
   */
  static forPeriod(
    year: number,
    month: number,
    indicators: Omit<EconomicCycleProps, 'startDate' | 'endDate'>,
  ): EconomicCycle {
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw new InvalidEconomicCycleException(`Cycle month must be 1-12, received ${month}`, {
        year,
        month,
      });
    }
    if (!Number.isInteger(year) || year < MIN_CYCLE_YEAR || year > MAX_CYCLE_YEAR) {
      throw new InvalidEconomicCycleException(
        `Cycle year must be between ${MIN_CYCLE_YEAR} and ${MAX_CYCLE_YEAR}, received ${year}`,
        { year, month },
      );
    }

    return EconomicCycle.create({ ...indicators, ...cycleDatesFor(year, month) });
  }

  /**
   * Billing cycles close on the 18th; the period is named after the month it closes in.
   */
  get periodKey(): string {
    return periodKeyOf(this.endDate);
  }

  contains(date: IsoDate): boolean {
    return isWithinWindow(date, this.startDate, this.endDate);
  }
}
