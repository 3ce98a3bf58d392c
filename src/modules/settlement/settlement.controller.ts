import { Body, Controller, HttpCode, HttpStatus, Post, UseFilters } from '@nestjs/common';
import { FuelAdjustmentService } from './fuel-adjustment.service';
import { TransportCostService } from './transport-cost.service';
import { ClientRevenueService } from './client-revenue.service';
import { TripSettlementService } from './trip-settlement.service';
import { MonthlySettlementService } from './monthly-settlement.service';
import { SettlementExceptionFilter } from './settlement-exception.filter';
import {
  FuelFactorRequestDto,
  LoadRevenueRequestDto,
  MonthlySettlementRequestDto,
  TripCostRequestDto,
  TripSettlementRequestDto,
} from './dto/settlement-requests.dto';
import { EconomicCycle } from './entities/economic-cycle.entity';
import { TariffRule } from './entities/tariff-rule.entity';
import {
  MonthlySettlementView,
  RevenueView,
  TripCostView,
  TripSettlementView,
  toClientTariff,
  toDisposalSiteTariff,
  toDistanceRoute,
  toEconomicCycle,
  toMonthlySettlementView,
  toRevenueView,
  toSettlementLoad,
  toTariffRule,
  toTripCostView,
  toTripSettlementView,
} from './settlement.mapper';

interface Envelope<T> {
  success: true;
  data: T;
}

/**
 * SettlementController - stateless calculation endpoints
 *
 * Every endpoint is a pure computation over the request body; nothing is
 * read from or written to storage.
 */
@Controller('settlement')
@UseFilters(SettlementExceptionFilter)
export class SettlementController {
  constructor(
    private readonly fuelAdjustmentService: FuelAdjustmentService,
    private readonly transportCostService: TransportCostService,
    private readonly clientRevenueService: ClientRevenueService,
    private readonly tripSettlementService: TripSettlementService,
    private readonly monthlySettlementService: MonthlySettlementService,
  ) {}

  /**
   * POST /api/settlement/fuel-factor
   */
  @Post('fuel-factor')
  @HttpCode(HttpStatus.OK)
  fuelFactor(@Body() dto: FuelFactorRequestDto): Envelope<{ factor: number }> {
    const factor = this.fuelAdjustmentService.calculateFuelFactor(
      dto.current_fuel_price,
      dto.base_fuel_price,
    );
    return { success: true, data: { factor } };
  }

  /**
   * POST /api/settlement/trip-cost
   */
  @Post('trip-cost')
  @HttpCode(HttpStatus.OK)
  tripCost(@Body() dto: TripCostRequestDto): Envelope<TripCostView> {
    const cycle = toEconomicCycle(dto.cycle);
    const result = this.transportCostService.calculateTripCost(
      dto.loads.map(toSettlementLoad),
      dto.routes.map(toDistanceRoute),
      this.resolveTariff(dto, cycle),
      cycle,
    );
    return { success: true, data: toTripCostView(result, cycle.ufValue) };
  }

  /**
   * POST /api/settlement/load-revenue
   */
  @Post('load-revenue')
  @HttpCode(HttpStatus.OK)
  loadRevenue(@Body() dto: LoadRevenueRequestDto): Envelope<RevenueView> {
    const result = this.clientRevenueService.calculateLoadRevenue(
      toSettlementLoad(dto.load),
      dto.tariffs.map(toClientTariff),
      dto.uf_value,
      dto.calculation_date,
    );
    return { success: true, data: toRevenueView(result) };
  }

  /**
   * POST /api/settlement/trip
   */
  @Post('trip')
  @HttpCode(HttpStatus.OK)
  settleTrip(@Body() dto: TripSettlementRequestDto): Envelope<TripSettlementView> {
    const cycle = toEconomicCycle(dto.cycle);
    const settlement = this.tripSettlementService.settleTrip({
      loads: dto.loads.map(toSettlementLoad),
      routes: dto.routes.map(toDistanceRoute),
      tariff: this.resolveTariff(dto, cycle),
      cycle,
      clientTariffs: dto.client_tariffs.map(toClientTariff),
      disposalTariffs: dto.disposal_tariffs?.map(toDisposalSiteTariff),
      calculationDate: dto.calculation_date,
    });
    return { success: true, data: toTripSettlementView(settlement) };
  }

  /**
   * POST /api/settlement/monthly
   */
  @Post('monthly')
  @HttpCode(HttpStatus.OK)
  settleMonth(@Body() dto: MonthlySettlementRequestDto): Envelope<MonthlySettlementView> {
    const settlement = this.monthlySettlementService.settleMonth({
      year: dto.year,
      month: dto.month,
      ufValue: dto.uf_value,
      fuelPrice: dto.fuel_price,
      isClosed: dto.is_closed,
      trips: dto.trips.map(trip => ({
        loads: trip.loads.map(toSettlementLoad),
        tariff: toTariffRule(trip.tariff),
        tripDate: trip.trip_date,
      })),
      routes: dto.routes.map(toDistanceRoute),
      clientTariffs: dto.client_tariffs.map(toClientTariff),
      disposalTariffs: dto.disposal_tariffs?.map(toDisposalSiteTariff),
    });
    return { success: true, data: toMonthlySettlementView(settlement) };
  }

  private resolveTariff(dto: TripCostRequestDto, cycle: EconomicCycle): TariffRule | null {
    if (dto.tariff) {
      return toTariffRule(dto.tariff);
    }
    if (dto.tariff_rules && dto.vehicle_type) {
      return this.transportCostService.resolveTariffRule(
        dto.tariff_rules.map(toTariffRule),
        dto.vehicle_type,
        dto.trip_date ?? cycle.endDate,
        dto.contractor_id,
      );
    }
    return null;
  }
}
