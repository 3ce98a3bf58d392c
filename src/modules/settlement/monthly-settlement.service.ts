import { Injectable, Logger } from '@nestjs/common';
import { TripSettlementService } from './trip-settlement.service';
import { EconomicCycle } from './entities/economic-cycle.entity';
import { RouteMap } from './entities/route-map';
import { InvalidEconomicCycleException } from './exceptions/settlement.exceptions';
import {
  MonthlySettlement,
  MonthlySettlementInput,
} from './interfaces/monthly-settlement.interface';
import { TripSettlement } from './interfaces/trip-settlement.interface';

/**
 * Monthly closure: settles every trip of the billing cycle that closes on
 * the 18th of the given month and totals cost, revenue and margin.
 */
@Injectable()
export class MonthlySettlementService {
  private readonly logger = new Logger(MonthlySettlementService.name);

  constructor(private readonly tripSettlementService: TripSettlementService) {}

  settleMonth(input: MonthlySettlementInput): MonthlySettlement {
    const cycle = EconomicCycle.forPeriod(input.year, input.month, {
      ufValue: input.ufValue,
      fuelPrice: input.fuelPrice,
      isClosed: input.isClosed,
    });
    const routes = input.routes instanceof RouteMap ? input.routes : RouteMap.from(input.routes);

    const trips: TripSettlement[] = input.trips.map((trip, index) => {
      const tripDate = trip.tripDate ?? cycle.endDate;
      if (!cycle.contains(tripDate)) {
        throw new InvalidEconomicCycleException(
          `Trip ${index + 1} dated ${tripDate} falls outside cycle ${cycle.periodKey} ` +
            `(${cycle.startDate} → ${cycle.endDate})`,
          { trip_index: index, trip_date: tripDate, period_key: cycle.periodKey },
        );
      }

      return this.tripSettlementService.settleTrip({
        loads: trip.loads,
        routes,
        tariff: trip.tariff,
        cycle,
        clientTariffs: input.clientTariffs,
        disposalTariffs: input.disposalTariffs,
        calculationDate: tripDate,
      });
    });

    const transportCostUf = sum(trips, trip => trip.cost.totalCostUf);
    const disposalCostUf = sum(trips, trip => trip.totalDisposalCostUf);
    const totalCostUf = transportCostUf + disposalCostUf;
    const totalRevenueUf = sum(trips, trip => trip.totalRevenueUf);
    const marginUf = totalRevenueUf - totalCostUf;

    this.logger.log({
      event: 'monthly_settlement',
      period_key: cycle.periodKey,
      trips: trips.length,
      total_cost_uf: totalCostUf,
      total_revenue_uf: totalRevenueUf,
      margin_uf: marginUf,
    });

    return {
      periodKey: cycle.periodKey,
      startDate: cycle.startDate,
      endDate: cycle.endDate,
      isClosed: cycle.isClosed,
      ufValue: cycle.ufValue,
      fuelPrice: cycle.fuelPrice,
      tripCount: trips.length,
      loadCount: sum(input.trips, trip => trip.loads.length),
      totalWeightTons: sum(input.trips, trip => sum(trip.loads, load => load.netWeightTons)),
      transportCostUf,
      disposalCostUf,
      totalCostUf,
      totalCostClp: totalCostUf * cycle.ufValue,
      totalRevenueUf,
      totalRevenueClp: totalRevenueUf * cycle.ufValue,
      marginUf,
      marginClp: marginUf * cycle.ufValue,
      marginPercent: totalRevenueUf > 0 ? (marginUf / totalRevenueUf) * 100 : null,
      trips,
    };
  }
}

function sum<T>(items: ReadonlyArray<T>, value: (item: T) => number): number {
  return items.reduce((total, item) => total + value(item), 0);
}
