import { IsoDate, compareIsoDates, isIsoDate, isWithinWindow } from '../../../utils/calendar-date';
import { InvalidTariffException } from '../exceptions/settlement.exceptions';
import { isNonNegativeNumber, isPositiveNumber } from './settlement.enums';

export interface DisposalSiteTariffProps {
  siteId: number;
  /** UF per ton received */
  ratePerTon: number;
  minWeightTons?: number;
  validFrom: IsoDate;
  /** null or omitted: open-ended */
  validTo?: IsoDate | null;
}

/**
 * What a disposal site charges the operator per ton it receives.
 */
export class DisposalSiteTariff {
  readonly siteId: number;
  readonly ratePerTon: number;
  readonly minWeightTons: number;
  readonly validFrom: IsoDate;
  readonly validTo: IsoDate | null;

  private constructor(props: Required<DisposalSiteTariffProps>) {
    this.siteId = props.siteId;
    this.ratePerTon = props.ratePerTon;
    this.minWeightTons = props.minWeightTons;
    this.validFrom = props.validFrom;
    this.validTo = props.validTo;
    Object.freeze(this);
  }

  static create(props: DisposalSiteTariffProps): DisposalSiteTariff {
    const { siteId, ratePerTon, validFrom } = props;
    const minWeightTons = props.minWeightTons ?? 0;
    const validTo = props.validTo ?? null;
    const context = { site_id: siteId };

    if (!Number.isInteger(siteId)) {
      throw new InvalidTariffException(`Disposal site id must be an integer, received ${siteId}`, context);
    }
    if (!isPositiveNumber(ratePerTon)) {
      throw new InvalidTariffException(
        `Disposal site ${siteId} rate must be positive, received ${ratePerTon}`,
        { ...context, rate_per_ton: ratePerTon },
      );
    }
    if (!isNonNegativeNumber(minWeightTons)) {
      throw new InvalidTariffException(
        `Disposal site ${siteId} minimum weight must be zero or positive, received ${minWeightTons}`,
        { ...context, min_weight_tons: minWeightTons },
      );
    }
    if (!isIsoDate(validFrom)) {
      throw new InvalidTariffException(`Invalid valid_from date '${validFrom}'`, {
        ...context,
        valid_from: validFrom,
      });
    }
    if (validTo !== null && (!isIsoDate(validTo) || compareIsoDates(validTo, validFrom) < 0)) {
      throw new InvalidTariffException(
        `Disposal site ${siteId} validity window is invalid (${validFrom} → ${validTo})`,
        { ...context, valid_from: validFrom, valid_to: validTo },
      );
    }

    return new DisposalSiteTariff({ siteId, ratePerTon, minWeightTons, validFrom, validTo });
  }

  isValidOn(date: IsoDate): boolean {
    return isWithinWindow(date, this.validFrom, this.validTo);
  }

  billableWeight(actualWeightTons: number): number {
    return Math.max(actualWeightTons, this.minWeightTons);
  }
}
