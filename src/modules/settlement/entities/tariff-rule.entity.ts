import { IsoDate, isIsoDate, isWithinWindow, compareIsoDates } from '../../../utils/calendar-date';
import {
  InvalidFuelPriceException,
  InvalidTariffException,
} from '../exceptions/settlement.exceptions';
import {
  VEHICLE_TYPES,
  VehicleType,
  isNonNegativeNumber,
  isPositiveNumber,
  isVehicleType,
} from './settlement.enums';

export interface TariffRuleProps {
  /** UF per ton-kilometre */
  baseRatePerTonKm: number;
  /** Guaranteed minimum billable weight */
  minWeightTons?: number;
  vehicleType: string;
  /** Contractual reference fuel price for the adjustment polynomial */
  baseFuelPrice: number;
  contractorId?: number | null;
  validFrom?: IsoDate | null;
  validTo?: IsoDate | null;
}

/**
 * A contractor's pricing rule for one vehicle configuration.
 */
export class TariffRule {
  readonly baseRatePerTonKm: number;
  readonly minWeightTons: number;
  readonly vehicleType: VehicleType;
  readonly baseFuelPrice: number;
  readonly contractorId: number | null;
  readonly validFrom: IsoDate | null;
  readonly validTo: IsoDate | null;

  private constructor(props: {
    baseRatePerTonKm: number;
    minWeightTons: number;
    vehicleType: VehicleType;
    baseFuelPrice: number;
    contractorId: number | null;
    validFrom: IsoDate | null;
    validTo: IsoDate | null;
  }) {
    this.baseRatePerTonKm = props.baseRatePerTonKm;
    this.minWeightTons = props.minWeightTons;
    this.vehicleType = props.vehicleType;
    this.baseFuelPrice = props.baseFuelPrice;
    this.contractorId = props.contractorId;
    this.validFrom = props.validFrom;
    this.validTo = props.validTo;
    Object.freeze(this);
  }

  static create(props: TariffRuleProps): TariffRule {
    const { baseRatePerTonKm, vehicleType, baseFuelPrice } = props;
    const minWeightTons = props.minWeightTons ?? 0;
    const validFrom = props.validFrom ?? null;
    const validTo = props.validTo ?? null;

    if (!isPositiveNumber(baseRatePerTonKm)) {
      throw new InvalidTariffException(
        `Tariff rule base rate must be positive, received ${baseRatePerTonKm}`,
        { base_rate_per_ton_km: baseRatePerTonKm, vehicle_type: vehicleType },
      );
    }
    if (!isNonNegativeNumber(minWeightTons)) {
      throw new InvalidTariffException(
        `Tariff rule minimum weight must be zero or positive, received ${minWeightTons}`,
        { min_weight_tons: minWeightTons, vehicle_type: vehicleType },
      );
    }
    if (!isVehicleType(vehicleType)) {
      throw new InvalidTariffException(
        `Unknown vehicle type '${vehicleType}'; expected one of ${VEHICLE_TYPES.join(', ')}`,
        { vehicle_type: vehicleType },
      );
    }
    if (!isPositiveNumber(baseFuelPrice)) {
      throw new InvalidFuelPriceException(
        `Tariff rule base fuel price must be positive, received ${baseFuelPrice}`,
        { base_fuel_price: baseFuelPrice, vehicle_type: vehicleType },
      );
    }
    if (validFrom !== null && !isIsoDate(validFrom)) {
      throw new InvalidTariffException(`Invalid valid_from date '${validFrom}'`, { valid_from: validFrom });
    }
    if (validTo !== null) {
      if (!isIsoDate(validTo)) {
        throw new InvalidTariffException(`Invalid valid_to date '${validTo}'`, { valid_to: validTo });
      }
      if (validFrom === null || compareIsoDates(validTo, validFrom) < 0) {
        throw new InvalidTariffException(
          `Tariff rule validity window is inverted or unbounded below (${validFrom} → ${validTo})`,
          { valid_from: validFrom, valid_to: validTo },
        );
      }
    }

    return new TariffRule({
      baseRatePerTonKm,
      minWeightTons,
      vehicleType,
      baseFuelPrice,
      contractorId: props.contractorId ?? null,
      validFrom,
      validTo,
    });
  }

  /**
   * A rule imported without a validity window applies on every date.
   */
  isValidOn(date: IsoDate): boolean {
    if (this.validFrom === null) {
      return true;
    }
    return isWithinWindow(date, this.validFrom, this.validTo);
  }

  billableWeight(actualWeightTons: number): number {
    return Math.max(actualWeightTons, this.minWeightTons);
  }
}
