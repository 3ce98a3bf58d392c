import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { MonthlySettlementService } from './monthly-settlement.service';
import { TripSettlementService } from './trip-settlement.service';
import { TransportCostService } from './transport-cost.service';
import { ClientRevenueService } from './client-revenue.service';
import { DisposalCostService } from './disposal-cost.service';
import { FuelAdjustmentService } from './fuel-adjustment.service';
import { DisposalSiteTariff } from './entities/disposal-site-tariff.entity';
import { RouteMap } from './entities/route-map';
import { InvalidEconomicCycleException } from './exceptions/settlement.exceptions';
import { MonthlySettlementInput } from './interfaces/monthly-settlement.interface';
import {
  createBateaTariff,
  createClientTariff,
  createLoad,
  createTestConfigService,
  direct,
  link,
} from '../../../test/utils/test-helpers';

describe('MonthlySettlementService', () => {
  let service: MonthlySettlementService;

  const tariff = createBateaTariff();

  // 3 UF/ton billed per load
  const clientTariffs = [
    createClientTariff({ concept: 'TRANSPORTE', ratePerTon: 2 }),
    createClientTariff({ concept: 'DISPOSICION', ratePerTon: 1 }),
  ];

  const november: MonthlySettlementInput = {
    year: 2025,
    month: 11,
    ufValue: 37000,
    fuelPrice: 1200,
    isClosed: true,
    trips: [
      {
        loads: [createLoad({ netWeightTons: 20 })],
        tariff,
        tripDate: '2025-10-25',
      },
      {
        loads: [
          createLoad({ netWeightTons: 10, originId: 1, destinationId: 20 }),
          createLoad({ netWeightTons: 8, originId: 2, destinationId: 20, disposalSiteId: 5 }),
        ],
        tariff,
        tripDate: '2025-11-10',
      },
    ],
    routes: [direct(1, 10, 50), link(1, 2, 30), direct(2, 20, 40)],
    clientTariffs,
    disposalTariffs: [DisposalSiteTariff.create({ siteId: 5, ratePerTon: 0.4, validFrom: '2025-01-01' })],
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MonthlySettlementService,
        TripSettlementService,
        TransportCostService,
        ClientRevenueService,
        DisposalCostService,
        FuelAdjustmentService,
        { provide: ConfigService, useValue: createTestConfigService() },
      ],
    }).compile();

    service = module.get<MonthlySettlementService>(MonthlySettlementService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('settleMonth', () => {
    it('should settle the cycle closing on the 18th of the month', () => {
      const settlement = service.settleMonth(november);

      expect(settlement.periodKey).toBe('2025-11');
      expect(settlement.startDate).toBe('2025-10-19');
      expect(settlement.endDate).toBe('2025-11-18');
      expect(settlement.isClosed).toBe(true);
      expect(settlement.ufValue).toBe(37000);
      expect(settlement.fuelPrice).toBe(1200);
    });

    it('should total every trip of the cycle', () => {
      const settlement = service.settleMonth(november);

      // transport 32.4 + 37.908; disposal 8t × 0.4; revenue 38t × 3
      expect(settlement.tripCount).toBe(2);
      expect(settlement.loadCount).toBe(3);
      expect(settlement.totalWeightTons).toBe(38);
      expect(settlement.transportCostUf).toBeCloseTo(70.308, 9);
      expect(settlement.disposalCostUf).toBeCloseTo(3.2, 9);
      expect(settlement.totalCostUf).toBeCloseTo(73.508, 9);
      expect(settlement.totalCostClp).toBeCloseTo(2719796, 5);
      expect(settlement.totalRevenueUf).toBeCloseTo(114, 9);
      expect(settlement.totalRevenueClp).toBeCloseTo(4218000, 5);
      expect(settlement.marginUf).toBeCloseTo(40.492, 9);
      expect(settlement.marginClp).toBeCloseTo(1498204, 5);
      expect(settlement.marginPercent).toBeCloseTo(35.5193, 4);
    });

    it('should bill each trip on its own date', () => {
      const settlement = service.settleMonth(november);

      expect(settlement.trips.map(trip => trip.revenues[0].calculationDate)).toEqual([
        '2025-10-25',
        '2025-11-10',
      ]);
      expect(settlement.trips[1].disposalCosts).toHaveLength(1);
    });

    it('should default undated trips to the cycle end', () => {
      const settlement = service.settleMonth({
        ...november,
        trips: [{ loads: [createLoad()], tariff }],
      });

      expect(settlement.trips[0].revenues[0].calculationDate).toBe('2025-11-18');
    });

    it('should report no margin percentage for an empty month', () => {
      const settlement = service.settleMonth({ ...november, month: 1, year: 2026, trips: [] });

      expect(settlement.periodKey).toBe('2026-01');
      expect(settlement.startDate).toBe('2025-12-19');
      expect(settlement.tripCount).toBe(0);
      expect(settlement.totalCostUf).toBe(0);
      expect(settlement.marginUf).toBe(0);
      expect(settlement.marginPercent).toBeNull();
    });

    it('should refuse a trip dated after the cut-off', () => {
      const late = { ...november.trips[1], tripDate: '2025-11-19' };

      expect(() =>
        service.settleMonth({ ...november, trips: [november.trips[0], late] }),
      ).toThrow('Trip 2 dated 2025-11-19 falls outside cycle 2025-11 (2025-10-19 → 2025-11-18)');
    });

    it('should reject an impossible month', () => {
      expect(() => service.settleMonth({ ...november, month: 13 })).toThrow(
        InvalidEconomicCycleException,
      );
    });

    it('should index the distance matrix once for the whole month', () => {
      const fromSpy = jest.spyOn(RouteMap, 'from');

      service.settleMonth(november);

      expect(fromSpy).toHaveBeenCalledTimes(1);
    });

    it('should log the closure as a structured event', () => {
      const logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);

      service.settleMonth(november);

      expect(logSpy).toHaveBeenCalledWith(
        expect.objectContaining({ event: 'monthly_settlement', period_key: '2025-11', trips: 2 }),
      );
    });
  });
});
