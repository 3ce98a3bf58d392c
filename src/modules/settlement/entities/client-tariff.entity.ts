import { IsoDate, compareIsoDates, isIsoDate, isWithinWindow } from '../../../utils/calendar-date';
import { InvalidTariffException } from '../exceptions/settlement.exceptions';
import {
  BILLING_CONCEPTS,
  BillingConcept,
  isBillingConcept,
  isNonNegativeNumber,
  isPositiveNumber,
} from './settlement.enums';

export interface ClientTariffProps {
  clientId: number;
  concept: string;
  /** UF per ton */
  ratePerTon: number;
  minWeightTons?: number;
  validFrom: IsoDate;
  /** null or omitted: open-ended */
  validTo?: IsoDate | null;
}

/**
 * A client's price for one billing concept over a validity window.
 */
export class ClientTariff {
  readonly clientId: number;
  readonly concept: BillingConcept;
  readonly ratePerTon: number;
  readonly minWeightTons: number;
  readonly validFrom: IsoDate;
  readonly validTo: IsoDate | null;

  private constructor(props: {
    clientId: number;
    concept: BillingConcept;
    ratePerTon: number;
    minWeightTons: number;
    validFrom: IsoDate;
    validTo: IsoDate | null;
  }) {
    this.clientId = props.clientId;
    this.concept = props.concept;
    this.ratePerTon = props.ratePerTon;
    this.minWeightTons = props.minWeightTons;
    this.validFrom = props.validFrom;
    this.validTo = props.validTo;
    Object.freeze(this);
  }

  static create(props: ClientTariffProps): ClientTariff {
    const { clientId, concept, ratePerTon, validFrom } = props;
    const minWeightTons = props.minWeightTons ?? 0;
    const validTo = props.validTo ?? null;
    const context = { client_id: clientId, concept };

    if (!isBillingConcept(concept)) {
      throw new InvalidTariffException(
        `Unknown billing concept '${concept}'; expected one of ${BILLING_CONCEPTS.join(', ')}`,
        context,
      );
    }
    if (!isPositiveNumber(ratePerTon)) {
      throw new InvalidTariffException(
        `Client ${clientId} ${concept} rate must be positive, received ${ratePerTon}`,
        { ...context, rate_per_ton: ratePerTon },
      );
    }
    if (!isNonNegativeNumber(minWeightTons)) {
      throw new InvalidTariffException(
        `Client ${clientId} ${concept} minimum weight must be zero or positive, received ${minWeightTons}`,
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
        `Client ${clientId} ${concept} validity window is invalid (${validFrom} → ${validTo})`,
        { ...context, valid_from: validFrom, valid_to: validTo },
      );
    }

    return new ClientTariff({
      clientId,
      concept,
      ratePerTon,
      minWeightTons,
      validFrom,
      validTo,
    });
  }

  isValidOn(date: IsoDate): boolean {
    return isWithinWindow(date, this.validFrom, this.validTo);
  }

  billableWeight(actualWeightTons: number): number {
    return Math.max(actualWeightTons, this.minWeightTons);
  }
}
