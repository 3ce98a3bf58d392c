import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  Matches,
} from 'class-validator';
import { ISO_DATE_PATTERN } from '../../../utils/calendar-date';
import {
  BILLING_CONCEPTS,
  BillingConcept,
  VEHICLE_TYPES,
  VehicleType,
} from '../entities/settlement.enums';

const ISO_DATE_MESSAGE = '$property must be a YYYY-MM-DD date';

/**
 * Value ranges (positive rates, ordered windows, …) are enforced by the
 * entities; these DTOs only check shape and types.
 */
export class TariffRuleDto {
  @IsNumber()
  base_rate_per_ton_km!: number;

  @IsNumber()
  @IsOptional()
  min_weight_tons?: number;

  @IsIn(VEHICLE_TYPES)
  vehicle_type!: VehicleType;

  @IsNumber()
  base_fuel_price!: number;

  @IsInt()
  @IsOptional()
  contractor_id?: number | null;

  @Matches(ISO_DATE_PATTERN, { message: ISO_DATE_MESSAGE })
  @IsOptional()
  valid_from?: string | null;

  @Matches(ISO_DATE_PATTERN, { message: ISO_DATE_MESSAGE })
  @IsOptional()
  valid_to?: string | null;
}

export class EconomicCycleDto {
  @IsNumber()
  uf_value!: number;

  @IsNumber()
  fuel_price!: number;

  @IsBoolean()
  @IsOptional()
  is_closed?: boolean;

  @Matches(ISO_DATE_PATTERN, { message: ISO_DATE_MESSAGE })
  start_date!: string;

  @Matches(ISO_DATE_PATTERN, { message: ISO_DATE_MESSAGE })
  end_date!: string;
}

export class DistanceRouteDto {
  @IsInt()
  origin_id!: number;

  @IsInt()
  destination_id!: number;

  @IsNumber()
  distance_km!: number;

  @IsBoolean()
  @IsOptional()
  is_segment_link?: boolean;
}

export class ClientTariffDto {
  @IsInt()
  client_id!: number;

  @IsIn(BILLING_CONCEPTS)
  concept!: BillingConcept;

  @IsNumber()
  rate_per_ton!: number;

  @IsNumber()
  @IsOptional()
  min_weight_tons?: number;

  @Matches(ISO_DATE_PATTERN, { message: ISO_DATE_MESSAGE })
  valid_from!: string;

  @Matches(ISO_DATE_PATTERN, { message: ISO_DATE_MESSAGE })
  @IsOptional()
  valid_to?: string | null;
}

export class LoadDto {
  @IsNumber()
  net_weight_tons!: number;

  @IsInt()
  origin_id!: number;

  @IsInt()
  destination_id!: number;

  @IsBoolean()
  goes_to_treatment!: boolean;

  @IsInt()
  @IsOptional()
  client_id?: number | null;

  @IsInt()
  @IsOptional()
  disposal_site_id?: number | null;
}

export class DisposalSiteTariffDto {
  @IsInt()
  site_id!: number;

  @IsNumber()
  rate_per_ton!: number;

  @IsNumber()
  @IsOptional()
  min_weight_tons?: number;

  @Matches(ISO_DATE_PATTERN, { message: ISO_DATE_MESSAGE })
  valid_from!: string;

  @Matches(ISO_DATE_PATTERN, { message: ISO_DATE_MESSAGE })
  @IsOptional()
  valid_to?: string | null;
}
