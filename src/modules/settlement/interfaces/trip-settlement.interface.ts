import { IsoDate } from '../../../utils/calendar-date';
import { ClientTariff } from '../entities/client-tariff.entity';
import { DisposalSiteTariff } from '../entities/disposal-site-tariff.entity';
import { EconomicCycle } from '../entities/economic-cycle.entity';
import { RevenueResult } from '../entities/revenue-result.entity';
import { TariffRule } from '../entities/tariff-rule.entity';
import { TripCostResult } from '../entities/trip-cost-result.entity';
import { RouteSource } from '../entities/route-map';
import { DisposalCost } from './disposal-cost.interface';
import { SettlementLoad } from './settlement-load.interface';

export interface TripSettlementInput {
  loads: ReadonlyArray<SettlementLoad>;
  routes: RouteSource;
  tariff: TariffRule | null | undefined;
  cycle: EconomicCycle;
  clientTariffs: ReadonlyArray<ClientTariff>;
  /** Required only when some load names a disposal site */
  disposalTariffs?: ReadonlyArray<DisposalSiteTariff>;
  /** Defaults to the cycle's end date */
  calculationDate?: IsoDate;
}

export interface TripSettlement {
  cost: TripCostResult;
  costClp: number;
  /** One entry per load delivered to a charging site, in trip order */
  disposalCosts: DisposalCost[];
  totalDisposalCostUf: number;
  /** Transport plus disposal */
  totalCostUf: number;
  totalCostClp: number;
  /** One entry per load, in trip order */
  revenues: RevenueResult[];
  totalRevenueUf: number;
  totalRevenueClp: number;
  marginUf: number;
  marginClp: number;
  ufValue: number;
  periodKey: string;
}
