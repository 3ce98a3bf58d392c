import { Injectable, Logger } from '@nestjs/common';
import { IsoDate, compareIsoDates } from '../../utils/calendar-date';
import { FuelAdjustmentService } from './fuel-adjustment.service';
import { DistanceRoute } from './entities/distance-route.entity';
import { EconomicCycle } from './entities/economic-cycle.entity';
import { RouteMap, RouteSource } from './entities/route-map';
import { VehicleType, isNonNegativeNumber } from './entities/settlement.enums';
import { TariffRule } from './entities/tariff-rule.entity';
import { LegBreakdownEntry, TripCostResult } from './entities/trip-cost-result.entity';
import {
  EmptyLoadListException,
  InvalidWeightException,
  MissingTariffException,
  SettlementException,
  UnsupportedTripShapeException,
} from './exceptions/settlement.exceptions';
import { SettlementLoad } from './interfaces/settlement-load.interface';

/**
 * Computes what is owed to the transport contractor for one trip.
 *
 * A trip is a single vehicle movement:
 * - one load: origin → destination over the direct route
 * - two loads (linked trip): the truck carries the first load to the second
 *   load's origin over a segment link (pickup leg), then hauls both loads to
 *   the final destination over the direct route (main haul)
 *
 * Each leg bills max(weight on board, tariff minimum) at
 * rate × km × tons × fuel factor, with one fuel factor for the whole trip.
 */
@Injectable()
export class TransportCostService {
  private readonly logger = new Logger(TransportCostService.name);

  constructor(private readonly fuelAdjustmentService: FuelAdjustmentService) {}

  calculateTripCost(
    loads: ReadonlyArray<SettlementLoad>,
    routes: RouteSource,
    tariff: TariffRule | null | undefined,
    cycle: EconomicCycle,
  ): TripCostResult {
    try {
      if (loads.length === 0) {
        throw new EmptyLoadListException();
      }
      if (!tariff) {
        throw new MissingTariffException(
          `A contractor tariff rule is required to cost a trip of ${loads.length} load(s)`,
          { load_count: loads.length },
        );
      }
      if (loads.length > 2) {
        throw new UnsupportedTripShapeException(loads.length);
      }
      loads.forEach((load, index) => {
        if (!isNonNegativeNumber(load.netWeightTons)) {
          throw new InvalidWeightException(
            `Load ${index + 1} of the trip must weigh zero tons or more, received ${load.netWeightTons}`,
            { load_index: index, net_weight_tons: load.netWeightTons },
          );
        }
      });

      const routeMap = routes instanceof RouteMap ? routes : RouteMap.from(routes);
      const fuelFactor = this.fuelAdjustmentService.calculateFuelFactor(
        cycle.fuelPrice,
        tariff.baseFuelPrice,
      );

      const result =
        loads.length === 1
          ? this.calculateSingleTrip(loads[0], routeMap, tariff, fuelFactor)
          : this.calculateLinkedTrip(loads[0], loads[1], routeMap, tariff, fuelFactor);

      this.logger.debug(
        `Trip cost ${result.totalCostUf} UF for ${loads.length} load(s) ` +
          `(${tariff.vehicleType}, factor ${fuelFactor}, weight ${result.appliedWeightTons}t)`,
      );

      return result;
    } catch (error) {
      if (error instanceof SettlementException) {
        this.logger.warn(`Trip cost rejected [${error.code}]: ${error.message}`);
      }
      throw error;
    }
  }

  /**
   * Picks the contractor rule for a vehicle type in force on a date. When a
   * contractor is given, only that contractor's rules qualify. When several
   * windows overlap, the most recently started one wins.
   */
  resolveTariffRule(
    rules: ReadonlyArray<TariffRule>,
    vehicleType: VehicleType,
    date: IsoDate,
    contractorId?: number | null,
  ): TariffRule {
    const forContractor = contractorId ?? null;
    let selected: TariffRule | undefined;

    for (const rule of rules) {
      if (rule.vehicleType !== vehicleType || !rule.isValidOn(date)) {
        continue;
      }
      if (forContractor !== null && rule.contractorId !== forContractor) {
        continue;
      }
      if (!selected || this.startsLater(rule, selected)) {
        selected = rule;
      }
    }

    if (!selected) {
      const ofContractor = forContractor === null ? '' : ` of contractor ${forContractor}`;
      throw new MissingTariffException(
        `No contractor tariff${ofContractor} for vehicle type ${vehicleType} valid on ${date}`,
        { vehicle_type: vehicleType, date, contractor_id: forContractor },
      );
    }

    return selected;
  }

  private calculateSingleTrip(
    load: SettlementLoad,
    routeMap: RouteMap,
    tariff: TariffRule,
    fuelFactor: number,
  ): TripCostResult {
    const route = routeMap.require(load.originId, load.destinationId, false);
    const weight = tariff.billableWeight(load.netWeightTons);
    const leg = this.costLeg(
      `Direct haul (${load.originId}→${load.destinationId})`,
      route,
      weight,
      tariff,
      fuelFactor,
    );

    return new TripCostResult({
      totalCostUf: leg.amountUf,
      adjustmentFactor: fuelFactor,
      appliedWeightTons: weight,
      segmentBreakdown: [
        leg,
        { kind: 'metadata', label: 'total_distance_km', value: route.distanceKm },
        { kind: 'metadata', label: 'consolidated_weight_tons', value: weight },
      ],
    });
  }

  private calculateLinkedTrip(
    first: SettlementLoad,
    second: SettlementLoad,
    routeMap: RouteMap,
    tariff: TariffRule,
    fuelFactor: number,
  ): TripCostResult {
    // Only the first load is on board during the pickup leg
    const pickupRoute = routeMap.require(first.originId, second.originId, true);
    const pickupWeight = tariff.billableWeight(first.netWeightTons);
    const pickup = this.costLeg(
      `Pickup leg (${first.originId}→${second.originId})`,
      pickupRoute,
      pickupWeight,
      tariff,
      fuelFactor,
    );

    const mainRoute = routeMap.require(second.originId, second.destinationId, false);
    const mainWeight = tariff.billableWeight(first.netWeightTons + second.netWeightTons);
    const mainHaul = this.costLeg(
      `Main haul (${second.originId}→${second.destinationId})`,
      mainRoute,
      mainWeight,
      tariff,
      fuelFactor,
    );

    return new TripCostResult({
      totalCostUf: pickup.amountUf + mainHaul.amountUf,
      adjustmentFactor: fuelFactor,
      appliedWeightTons: mainWeight,
      segmentBreakdown: [
        pickup,
        mainHaul,
        {
          kind: 'metadata',
          label: 'total_distance_km',
          value: pickupRoute.distanceKm + mainRoute.distanceKm,
        },
        { kind: 'metadata', label: 'consolidated_weight_tons', value: mainWeight },
      ],
    });
  }

  private costLeg(
    label: string,
    route: DistanceRoute,
    weightTons: number,
    tariff: TariffRule,
    fuelFactor: number,
  ): LegBreakdownEntry {
    return {
      kind: 'leg',
      label,
      amountUf: tariff.baseRatePerTonKm * route.distanceKm * weightTons * fuelFactor,
      distanceKm: route.distanceKm,
      weightTons,
    };
  }

  private startsLater(candidate: TariffRule, current: TariffRule): boolean {
    if (candidate.validFrom === null) return false;
    if (current.validFrom === null) return true;
    return compareIsoDates(candidate.validFrom, current.validFrom) > 0;
  }
}
