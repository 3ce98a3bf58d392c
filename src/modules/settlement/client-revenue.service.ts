import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IsoDate, isIsoDate, todayIn } from '../../utils/calendar-date';
import { DEFAULT_SETTLEMENT_TIME_ZONE } from '../../config/settlement.config';
import { ClientTariff } from './entities/client-tariff.entity';
import { RevenueResult } from './entities/revenue-result.entity';
import { BILLING_CONCEPTS, BillingConcept, isPositiveNumber } from './entities/settlement.enums';
import {
  InvalidConversionRateException,
  InvalidWeightException,
  MissingTariffException,
  SettlementException,
} from './exceptions/settlement.exceptions';
import { SettlementLoad } from './interfaces/settlement-load.interface';

/**
 * Computes what is billed to the client that generated a load.
 *
 * TRANSPORTE and DISPOSICION are always charged; TRATAMIENTO only when the
 * load goes through a treatment plant. Each concept applies its own minimum
 * weight and is computed independently (no cross-concept discount or cap).
 */
@Injectable()
export class ClientRevenueService {
  private readonly logger = new Logger(ClientRevenueService.name);
  private readonly timeZone: string;

  constructor(private readonly configService: ConfigService) {
    this.timeZone = this.configService.get<string>(
      'settlement.timeZone',
      DEFAULT_SETTLEMENT_TIME_ZONE,
    );
  }

  calculateLoadRevenue(
    load: SettlementLoad,
    tariffs: ReadonlyArray<ClientTariff>,
    ufValue: number,
    calculationDate?: IsoDate,
  ): RevenueResult {
    try {
      if (!isPositiveNumber(load.netWeightTons)) {
        throw new InvalidWeightException(
          `Load net weight must be positive to compute revenue, received ${load.netWeightTons}`,
          { net_weight_tons: load.netWeightTons, client_id: load.clientId ?? null },
        );
      }
      if (!isPositiveNumber(ufValue)) {
        throw new InvalidConversionRateException(ufValue);
      }

      const date = calculationDate ?? todayIn(this.timeZone);
      if (!isIsoDate(date)) {
        throw new BadRequestException(`Calculation date must be YYYY-MM-DD, received '${date}'`);
      }

      const activeByConcept = this.indexActiveTariffs(tariffs, date);
      const conceptBreakdown: Record<BillingConcept, number> = {
        TRANSPORTE: 0,
        DISPOSICION: 0,
        TRATAMIENTO: 0,
      };
      const billableWeights: Record<BillingConcept, number> = { ...conceptBreakdown };

      for (const concept of BILLING_CONCEPTS) {
        if (concept === 'TRATAMIENTO' && !load.goesToTreatment) {
          continue;
        }

        const tariff = activeByConcept.get(concept);
        if (!tariff) {
          throw this.missingTariff(concept, date, load);
        }

        billableWeights[concept] = tariff.billableWeight(load.netWeightTons);
        conceptBreakdown[concept] = tariff.ratePerTon * billableWeights[concept];
      }

      const totalUf = BILLING_CONCEPTS.reduce((sum, concept) => sum + conceptBreakdown[concept], 0);
      const totalClp = totalUf * ufValue;

      this.logger.debug(
        `Load revenue ${totalUf} UF / ${totalClp} CLP on ${date} ` +
          `(${load.netWeightTons}t, treatment: ${load.goesToTreatment})`,
      );

      return new RevenueResult({
        totalUf,
        totalClp,
        conceptBreakdown,
        billableWeights,
        calculationDate: date,
      });
    } catch (error) {
      if (error instanceof SettlementException) {
        this.logger.warn(`Load revenue rejected [${error.code}]: ${error.message}`);
      }
      throw error;
    }
  }

  /**
   * Tariffs in force on the date, keyed by concept. The first match wins.
   */
  private indexActiveTariffs(
    tariffs: ReadonlyArray<ClientTariff>,
    date: IsoDate,
  ): Map<BillingConcept, ClientTariff> {
    const index = new Map<BillingConcept, ClientTariff>();
    for (const tariff of tariffs) {
      if (tariff.isValidOn(date) && !index.has(tariff.concept)) {
        index.set(tariff.concept, tariff);
      }
    }
    return index;
  }

  private missingTariff(
    concept: BillingConcept,
    date: IsoDate,
    load: SettlementLoad,
  ): MissingTariffException {
    const clientId = load.clientId ?? null;
    const forClient = clientId === null ? '' : ` for client ${clientId}`;
    const message =
      concept === 'TRATAMIENTO'
        ? `Load goes to treatment but no TRATAMIENTO tariff is valid on ${date}${forClient}`
        : `No ${concept} tariff valid on ${date}${forClient}`;

    return new MissingTariffException(message, { concept, date, client_id: clientId });
  }
}
