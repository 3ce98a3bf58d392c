import { IsoDate } from '../../../utils/calendar-date';
import { ClientTariff } from '../entities/client-tariff.entity';
import { DisposalSiteTariff } from '../entities/disposal-site-tariff.entity';
import { RouteSource } from '../entities/route-map';
import { TariffRule } from '../entities/tariff-rule.entity';
import { SettlementLoad } from './settlement-load.interface';
import { TripSettlement } from './trip-settlement.interface';

export interface MonthlyTrip {
  loads: ReadonlyArray<SettlementLoad>;
  tariff: TariffRule | null | undefined;
  /** Defaults to the cycle's end date; must fall inside the cycle */
  tripDate?: IsoDate;
}

export interface MonthlySettlementInput {
  year: number;
  /** Month the cycle closes in */
  month: number;
  ufValue: number;
  fuelPrice: number;
  isClosed?: boolean;
  trips: ReadonlyArray<MonthlyTrip>;
  routes: RouteSource;
  clientTariffs: ReadonlyArray<ClientTariff>;
  disposalTariffs?: ReadonlyArray<DisposalSiteTariff>;
}

export interface MonthlySettlement {
  periodKey: string;
  startDate: IsoDate;
  endDate: IsoDate;
  isClosed: boolean;
  ufValue: number;
  fuelPrice: number;
  tripCount: number;
  loadCount: number;
  totalWeightTons: number;
  transportCostUf: number;
  disposalCostUf: number;
  totalCostUf: number;
  totalCostClp: number;
  totalRevenueUf: number;
  totalRevenueClp: number;
  marginUf: number;
  marginClp: number;
  /** null when nothing was billed */
  marginPercent: number | null;
  trips: TripSettlement[];
}
