import { Injectable, Logger } from '@nestjs/common';
import { IsoDate, compareIsoDates } from '../../utils/calendar-date';
import { DisposalSiteTariff } from './entities/disposal-site-tariff.entity';
import { isNonNegativeNumber } from './entities/settlement.enums';
import { InvalidWeightException, MissingTariffException } from './exceptions/settlement.exceptions';
import { DisposalCost } from './interfaces/disposal-cost.interface';
import { SettlementLoad } from './interfaces/settlement-load.interface';

/**
 * Reception fees disposal sites charge the operator, per load delivered.
 */
@Injectable()
export class DisposalCostService {
  private readonly logger = new Logger(DisposalCostService.name);

  /**
   * Returns null for loads that were not delivered to a charging site.
   */
  calculateLoadDisposalCost(
    load: SettlementLoad,
    tariffs: ReadonlyArray<DisposalSiteTariff>,
    date: IsoDate,
  ): DisposalCost | null {
    const siteId = load.disposalSiteId;
    if (siteId === undefined || siteId === null) {
      return null;
    }
    if (!isNonNegativeNumber(load.netWeightTons)) {
      throw new InvalidWeightException(
        `Net weight must be zero or positive, received ${load.netWeightTons}`,
        { net_weight_tons: load.netWeightTons, site_id: siteId },
      );
    }

    const tariff = this.resolveSiteTariff(tariffs, siteId, date);
    const billableWeightTons = tariff.billableWeight(load.netWeightTons);
    const amountUf = billableWeightTons * tariff.ratePerTon;

    this.logger.debug(
      `Disposal at site ${siteId}: ${billableWeightTons}t × ${tariff.ratePerTon} = ${amountUf} UF`,
    );

    return { siteId, billableWeightTons, ratePerTon: tariff.ratePerTon, amountUf };
  }

  /**
   * Latest validFrom wins when windows overlap.
   */
  resolveSiteTariff(
    tariffs: ReadonlyArray<DisposalSiteTariff>,
    siteId: number,
    date: IsoDate,
  ): DisposalSiteTariff {
    let selected: DisposalSiteTariff | undefined;

    for (const tariff of tariffs) {
      if (tariff.siteId !== siteId || !tariff.isValidOn(date)) {
        continue;
      }
      if (!selected || compareIsoDates(tariff.validFrom, selected.validFrom) > 0) {
        selected = tariff;
      }
    }

    if (!selected) {
      throw new MissingTariffException(`No disposal tariff for site ${siteId} valid on ${date}`, {
        site_id: siteId,
        date,
      });
    }

    return selected;
  }
}
