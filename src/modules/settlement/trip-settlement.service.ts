import { Injectable, Logger } from '@nestjs/common';
import { ClientRevenueService } from './client-revenue.service';
import { DisposalCostService } from './disposal-cost.service';
import { TransportCostService } from './transport-cost.service';
import { ClientTariff } from './entities/client-tariff.entity';
import { DisposalCost } from './interfaces/disposal-cost.interface';
import { SettlementLoad } from './interfaces/settlement-load.interface';
import { TripSettlement, TripSettlementInput } from './interfaces/trip-settlement.interface';

/**
 * Settles one trip end to end: contractor cost plus disposal fees against the
 * revenue billed for every load it carried, converted with the cycle's UF value.
 */
@Injectable()
export class TripSettlementService {
  private readonly logger = new Logger(TripSettlementService.name);

  constructor(
    private readonly transportCostService: TransportCostService,
    private readonly clientRevenueService: ClientRevenueService,
    private readonly disposalCostService: DisposalCostService,
  ) {}

  settleTrip(input: TripSettlementInput): TripSettlement {
    const { loads, routes, tariff, cycle, clientTariffs } = input;
    const disposalTariffs = input.disposalTariffs ?? [];
    const calculationDate = input.calculationDate ?? cycle.endDate;

    const cost = this.transportCostService.calculateTripCost(loads, routes, tariff, cycle);
    const revenues = loads.map(load =>
      this.clientRevenueService.calculateLoadRevenue(
        load,
        this.tariffsForLoad(load, clientTariffs),
        cycle.ufValue,
        calculationDate,
      ),
    );

    const disposalCosts = loads
      .map(load =>
        this.disposalCostService.calculateLoadDisposalCost(load, disposalTariffs, calculationDate),
      )
      .filter((disposal): disposal is DisposalCost => disposal !== null);

    const totalRevenueUf = revenues.reduce((sum, revenue) => sum + revenue.totalUf, 0);
    const totalDisposalCostUf = disposalCosts.reduce((sum, disposal) => sum + disposal.amountUf, 0);
    const totalCostUf = cost.totalCostUf + totalDisposalCostUf;
    const marginUf = totalRevenueUf - totalCostUf;

    const settlement: TripSettlement = {
      cost,
      costClp: cost.toCurrency(cycle.ufValue),
      disposalCosts,
      totalDisposalCostUf,
      totalCostUf,
      totalCostClp: totalCostUf * cycle.ufValue,
      revenues,
      totalRevenueUf,
      totalRevenueClp: totalRevenueUf * cycle.ufValue,
      marginUf,
      marginClp: marginUf * cycle.ufValue,
      ufValue: cycle.ufValue,
      periodKey: cycle.periodKey,
    };

    if (!cycle.contains(calculationDate)) {
      this.logger.warn(
        `Trip settled on ${calculationDate}, outside cycle ${cycle.periodKey} (${cycle.startDate} → ${cycle.endDate})`,
      );
    }

    this.logger.debug(
      `Trip settlement ${cycle.periodKey}: cost ${totalCostUf} UF ` +
        `(disposal ${totalDisposalCostUf} UF), ` +
        `revenue ${totalRevenueUf} UF, margin ${marginUf} UF`,
    );

    return settlement;
  }

  /**
   * Loads carrying a client id are billed with that client's tariffs only.
   */
  private tariffsForLoad(
    load: SettlementLoad,
    clientTariffs: ReadonlyArray<ClientTariff>,
  ): ReadonlyArray<ClientTariff> {
    const clientId = load.clientId;
    if (clientId === undefined || clientId === null) {
      return clientTariffs;
    }
    return clientTariffs.filter(tariff => tariff.clientId === clientId);
  }
}
