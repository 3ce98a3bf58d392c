import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { FuelAdjustmentService } from './fuel-adjustment.service';
import { TransportCostService } from './transport-cost.service';
import { ClientRevenueService } from './client-revenue.service';
import { TripSettlementService } from './trip-settlement.service';
import { DisposalCostService } from './disposal-cost.service';
import { MonthlySettlementService } from './monthly-settlement.service';
import { SettlementController } from './settlement.controller';

/**
 * SettlementModule
 *
 * Pure calculation providers; the surrounding logistics and billing modules
 * inject these services and own persistence of the results.
 */
@Module({
  imports: [ConfigModule],
  controllers: [SettlementController],
  providers: [
    FuelAdjustmentService,
    TransportCostService,
    ClientRevenueService,
    DisposalCostService,
    TripSettlementService,
    MonthlySettlementService,
  ],
  exports: [
    FuelAdjustmentService,
    TransportCostService,
    ClientRevenueService,
    DisposalCostService,
    TripSettlementService,
    MonthlySettlementService,
  ],
})
export class SettlementModule {}
