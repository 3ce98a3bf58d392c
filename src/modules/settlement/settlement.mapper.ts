import { roundClp, roundTo, roundUf } from '../../utils/round';
import {
  ClientTariffDto,
  DisposalSiteTariffDto,
  DistanceRouteDto,
  EconomicCycleDto,
  LoadDto,
  TariffRuleDto,
} from './dto/settlement-inputs.dto';
import { ClientTariff } from './entities/client-tariff.entity';
import { DisposalSiteTariff } from './entities/disposal-site-tariff.entity';
import { DistanceRoute } from './entities/distance-route.entity';
import { EconomicCycle } from './entities/economic-cycle.entity';
import { RevenueResult } from './entities/revenue-result.entity';
import { BillingConcept } from './entities/settlement.enums';
import { TariffRule } from './entities/tariff-rule.entity';
import { TripCostResult } from './entities/trip-cost-result.entity';
import { DisposalCost } from './interfaces/disposal-cost.interface';
import { MonthlySettlement } from './interfaces/monthly-settlement.interface';
import { SettlementLoad } from './interfaces/settlement-load.interface';
import { TripSettlement } from './interfaces/trip-settlement.interface';

export function toTariffRule(dto: TariffRuleDto): TariffRule {
  return TariffRule.create({
    baseRatePerTonKm: dto.base_rate_per_ton_km,
    minWeightTons: dto.min_weight_tons,
    vehicleType: dto.vehicle_type,
    baseFuelPrice: dto.base_fuel_price,
    contractorId: dto.contractor_id,
    validFrom: dto.valid_from,
    validTo: dto.valid_to,
  });
}

export function toEconomicCycle(dto: EconomicCycleDto): EconomicCycle {
  return EconomicCycle.create({
    ufValue: dto.uf_value,
    fuelPrice: dto.fuel_price,
    isClosed: dto.is_closed,
    startDate: dto.start_date,
    endDate: dto.end_date,
  });
}

export function toDistanceRoute(dto: DistanceRouteDto): DistanceRoute {
  return DistanceRoute.create({
    originId: dto.origin_id,
    destinationId: dto.destination_id,
    distanceKm: dto.distance_km,
    isSegmentLink: dto.is_segment_link,
  });
}

export function toClientTariff(dto: ClientTariffDto): ClientTariff {
  return ClientTariff.create({
    clientId: dto.client_id,
    concept: dto.concept,
    ratePerTon: dto.rate_per_ton,
    minWeightTons: dto.min_weight_tons,
    validFrom: dto.valid_from,
    validTo: dto.valid_to,
  });
}

export function toDisposalSiteTariff(dto: DisposalSiteTariffDto): DisposalSiteTariff {
  return DisposalSiteTariff.create({
    siteId: dto.site_id,
    ratePerTon: dto.rate_per_ton,
    minWeightTons: dto.min_weight_tons,
    validFrom: dto.valid_from,
    validTo: dto.valid_to,
  });
}

export function toSettlementLoad(dto: LoadDto): SettlementLoad {
  return {
    netWeightTons: dto.net_weight_tons,
    originId: dto.origin_id,
    destinationId: dto.destination_id,
    goesToTreatment: dto.goes_to_treatment,
    clientId: dto.client_id ?? null,
    disposalSiteId: dto.disposal_site_id ?? null,
  };
}

export interface TripCostView {
  total_cost_uf: number;
  total_cost_clp: number;
  adjustment_factor: number;
  applied_weight_tons: number;
  legs: Array<{ label: string; amount_uf: number; distance_km: number; weight_tons: number }>;
  total_distance_km: number | null;
  consolidated_weight_tons: number | null;
}

export interface RevenueView {
  calculation_date: string;
  total_uf: number;
  total_clp: number;
  concept_breakdown: Record<BillingConcept, number>;
  billable_weights: Record<BillingConcept, number>;
}

export interface DisposalCostView {
  site_id: number;
  billable_weight_tons: number;
  rate_per_ton: number;
  amount_uf: number;
}

export interface TripSettlementView {
  period_key: string;
  uf_value: number;
  cost: TripCostView;
  disposal_costs: DisposalCostView[];
  total_disposal_cost_uf: number;
  total_cost_uf: number;
  total_cost_clp: number;
  revenues: RevenueView[];
  total_revenue_uf: number;
  total_revenue_clp: number;
  margin_uf: number;
  margin_clp: number;
}

/**
 * Presentation rounding: UF to 4 decimals, CLP to whole pesos.
 */
export function toTripCostView(result: TripCostResult, ufValue: number): TripCostView {
  return {
    total_cost_uf: roundUf(result.totalCostUf),
    total_cost_clp: roundClp(result.toCurrency(ufValue)),
    adjustment_factor: result.adjustmentFactor,
    applied_weight_tons: result.appliedWeightTons,
    legs: result.legs.map(leg => ({
      label: leg.label,
      amount_uf: roundUf(leg.amountUf),
      distance_km: leg.distanceKm,
      weight_tons: leg.weightTons,
    })),
    total_distance_km: result.metadata('total_distance_km') ?? null,
    consolidated_weight_tons: result.metadata('consolidated_weight_tons') ?? null,
  };
}

export function toRevenueView(result: RevenueResult): RevenueView {
  const { TRANSPORTE, DISPOSICION, TRATAMIENTO } = result.conceptBreakdown;
  return {
    calculation_date: result.calculationDate,
    total_uf: roundUf(result.totalUf),
    total_clp: roundClp(result.totalClp),
    concept_breakdown: {
      TRANSPORTE: roundUf(TRANSPORTE),
      DISPOSICION: roundUf(DISPOSICION),
      TRATAMIENTO: roundUf(TRATAMIENTO),
    },
    billable_weights: { ...result.billableWeights },
  };
}

export function toDisposalCostView(disposal: DisposalCost): DisposalCostView {
  return {
    site_id: disposal.siteId,
    billable_weight_tons: disposal.billableWeightTons,
    rate_per_ton: disposal.ratePerTon,
    amount_uf: roundUf(disposal.amountUf),
  };
}

export function toTripSettlementView(settlement: TripSettlement): TripSettlementView {
  return {
    period_key: settlement.periodKey,
    uf_value: settlement.ufValue,
    cost: toTripCostView(settlement.cost, settlement.ufValue),
    disposal_costs: settlement.disposalCosts.map(toDisposalCostView),
    total_disposal_cost_uf: roundUf(settlement.totalDisposalCostUf),
    total_cost_uf: roundUf(settlement.totalCostUf),
    total_cost_clp: roundClp(settlement.totalCostClp),
    revenues: settlement.revenues.map(toRevenueView),
    total_revenue_uf: roundUf(settlement.totalRevenueUf),
    total_revenue_clp: roundClp(settlement.totalRevenueClp),
    margin_uf: roundUf(settlement.marginUf),
    margin_clp: roundClp(settlement.marginClp),
  };
}

export interface MonthlySettlementView {
  period_key: string;
  start_date: string;
  end_date: string;
  is_closed: boolean;
  uf_value: number;
  fuel_price: number;
  trip_count: number;
  load_count: number;
  total_weight_tons: number;
  transport_cost_uf: number;
  disposal_cost_uf: number;
  total_cost_uf: number;
  total_cost_clp: number;
  total_revenue_uf: number;
  total_revenue_clp: number;
  margin_uf: number;
  margin_clp: number;
  margin_percent: number | null;
  trips: TripSettlementView[];
}

export function toMonthlySettlementView(settlement: MonthlySettlement): MonthlySettlementView {
  return {
    period_key: settlement.periodKey,
    start_date: settlement.startDate,
    end_date: settlement.endDate,
    is_closed: settlement.isClosed,
    uf_value: settlement.ufValue,
    fuel_price: settlement.fuelPrice,
    trip_count: settlement.tripCount,
    load_count: settlement.loadCount,
    total_weight_tons: settlement.totalWeightTons,
    transport_cost_uf: roundUf(settlement.transportCostUf),
    disposal_cost_uf: roundUf(settlement.disposalCostUf),
    total_cost_uf: roundUf(settlement.totalCostUf),
    total_cost_clp: roundClp(settlement.totalCostClp),
    total_revenue_uf: roundUf(settlement.totalRevenueUf),
    total_revenue_clp: roundClp(settlement.totalRevenueClp),
    margin_uf: roundUf(settlement.marginUf),
    margin_clp: roundClp(settlement.marginClp),
    margin_percent: settlement.marginPercent === null ? null : roundTo(settlement.marginPercent, 2),
    trips: settlement.trips.map(toTripSettlementView),
  };
}
