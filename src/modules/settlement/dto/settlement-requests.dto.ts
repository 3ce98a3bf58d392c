import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsDefined,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  Matches,
  Max,
  Min,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { ISO_DATE_PATTERN } from '../../../utils/calendar-date';
import { VEHICLE_TYPES, VehicleType } from '../entities/settlement.enums';
import {
  ClientTariffDto,
  DisposalSiteTariffDto,
  DistanceRouteDto,
  EconomicCycleDto,
  LoadDto,
  TariffRuleDto,
} from './settlement-inputs.dto';

/**
 * POST /api/settlement/fuel-factor
 */
export class FuelFactorRequestDto {
  @IsNumber()
  current_fuel_price!: number;

  @IsNumber()
  base_fuel_price!: number;
}

/**
 * POST /api/settlement/trip-cost
 *
 * Either `tariff` is given directly, or `tariff_rules` plus `vehicle_type`
 * let the engine pick the rule in force on `trip_date` (default: cycle end),
 * restricted to `contractor_id` when present.
 */
export class TripCostRequestDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LoadDto)
  loads!: LoadDto[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => DistanceRouteDto)
  routes!: DistanceRouteDto[];

  @ValidateNested()
  @Type(() => TariffRuleDto)
  @IsOptional()
  tariff?: TariffRuleDto;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TariffRuleDto)
  @IsOptional()
  tariff_rules?: TariffRuleDto[];

  @ValidateIf((dto: TripCostRequestDto) => dto.tariff_rules !== undefined)
  @IsIn(VEHICLE_TYPES)
  vehicle_type?: VehicleType;

  @IsInt()
  @IsOptional()
  contractor_id?: number;

  @Matches(ISO_DATE_PATTERN, { message: '$property must be a YYYY-MM-DD date' })
  @IsOptional()
  trip_date?: string;

  @IsDefined()
  @ValidateNested()
  @Type(() => EconomicCycleDto)
  cycle!: EconomicCycleDto;
}

/**
 * POST /api/settlement/load-revenue
 */
export class LoadRevenueRequestDto {
  @IsDefined()
  @ValidateNested()
  @Type(() => LoadDto)
  load!: LoadDto;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ClientTariffDto)
  tariffs!: ClientTariffDto[];

  @IsNumber()
  uf_value!: number;

  @Matches(ISO_DATE_PATTERN, { message: '$property must be a YYYY-MM-DD date' })
  @IsOptional()
  calculation_date?: string;
}

/**
 * POST /api/settlement/trip
 */
export class TripSettlementRequestDto extends TripCostRequestDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ClientTariffDto)
  client_tariffs!: ClientTariffDto[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => DisposalSiteTariffDto)
  @IsOptional()
  disposal_tariffs?: DisposalSiteTariffDto[];

  @Matches(ISO_DATE_PATTERN, { message: '$property must be a YYYY-MM-DD date' })
  @IsOptional()
  calculation_date?: string;
}

/**
 * One trip of a monthly settlement; the contractor rule is given directly.
 */
export class MonthlyTripDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LoadDto)
  loads!: LoadDto[];

  @IsDefined()
  @ValidateNested()
  @Type(() => TariffRuleDto)
  tariff!: TariffRuleDto;

  @Matches(ISO_DATE_PATTERN, { message: '$property must be a YYYY-MM-DD date' })
  @IsOptional()
  trip_date?: string;
}

/**
 * POST /api/settlement/monthly
 *
 * Cycle bounds are derived from `year` and `month` (19th → 18th).
 */
export class MonthlySettlementRequestDto {
  @IsInt()
  @Min(2020)
  @Max(2100)
  year!: number;

  @IsInt()
  @Min(1)
  @Max(12)
  month!: number;

  @IsNumber()
  uf_value!: number;

  @IsNumber()
  fuel_price!: number;

  @IsBoolean()
  @IsOptional()
  is_closed?: boolean;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => MonthlyTripDto)
  trips!: MonthlyTripDto[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => DistanceRouteDto)
  routes!: DistanceRouteDto[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ClientTariffDto)
  client_tariffs!: ClientTariffDto[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => DisposalSiteTariffDto)
  @IsOptional()
  disposal_tariffs?: DisposalSiteTariffDto[];
}
