import { Test, TestingModule } from '@nestjs/testing';
import { TransportCostService } from './transport-cost.service';
import { FuelAdjustmentService } from './fuel-adjustment.service';
import { RouteMap } from './entities/route-map';
import { TariffRule } from './entities/tariff-rule.entity';
import {
  EmptyLoadListException,
  InvalidRouteException,
  InvalidWeightException,
  MissingTariffException,
  UnsupportedTripShapeException,
} from './exceptions/settlement.exceptions';
import {
  createBateaTariff,
  createLoad,
  createTestCycle,
  direct,
  link,
} from '../../../test/utils/test-helpers';

describe('TransportCostService', () => {
  let service: TransportCostService;

  const tariff = createBateaTariff();
  const cycle = createTestCycle();

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [TransportCostService, FuelAdjustmentService],
    }).compile();

    service = module.get<TransportCostService>(TransportCostService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('single-load trips', () => {
    const routes = [direct(1, 10, 50)];

    it('should bill the actual weight above the minimum (0.027 × 50 × 20 × 1.2 = 32.4 UF)', () => {
      const result = service.calculateTripCost([createLoad({ netWeightTons: 20 })], routes, tariff, cycle);

      expect(result.totalCostUf).toBeCloseTo(32.4, 9);
      expect(result.adjustmentFactor).toBe(1.2);
      expect(result.appliedWeightTons).toBe(20);
    });

    it('should clamp a light load to the guaranteed minimum (10t → 15t, 24.3 UF)', () => {
      const result = service.calculateTripCost([createLoad({ netWeightTons: 10 })], routes, tariff, cycle);

      expect(result.totalCostUf).toBeCloseTo(24.3, 9);
      expect(result.appliedWeightTons).toBe(15);
    });

    it('should record a single direct leg plus metadata', () => {
      const result = service.calculateTripCost([createLoad({ netWeightTons: 20 })], routes, tariff, cycle);

      expect(result.legs).toHaveLength(1);
      expect(result.legs[0].label).toBe('Direct haul (1→10)');
      expect(result.legs[0].distanceKm).toBe(50);
      expect(result.legs[0].weightTons).toBe(20);
      expect(result.legs[0].amountUf).toBe(result.totalCostUf);
      expect(result.metadata('total_distance_km')).toBe(50);
      expect(result.metadata('consolidated_weight_tons')).toBe(20);
    });

    it('should ignore a segment link between the same endpoints', () => {
      expect(() =>
        service.calculateTripCost([createLoad()], [link(1, 10, 50)], tariff, cycle),
      ).toThrow('No direct route from 1 to 10 in the distance matrix');
    });

    it('should fail with InvalidRoute naming the missing pair', () => {
      const load = createLoad({ originId: 1, destinationId: 99 });

      expect(() => service.calculateTripCost([load], routes, tariff, cycle)).toThrow(
        InvalidRouteException,
      );
      expect(() => service.calculateTripCost([load], routes, tariff, cycle)).toThrow(
        'No direct route from 1 to 99 in the distance matrix',
      );
    });

    it('should apply factor 1 when fuel matches the reference price', () => {
      const flatCycle = createTestCycle({ fuelPrice: 1000 });
      const result = service.calculateTripCost([createLoad()], routes, tariff, flatCycle);

      expect(result.adjustmentFactor).toBe(1);
      expect(result.totalCostUf).toBeCloseTo(27, 9);
    });

    it('should accept a prebuilt route map', () => {
      const routeMap = RouteMap.from(routes);
      const result = service.calculateTripCost([createLoad()], routeMap, tariff, cycle);

      expect(result.totalCostUf).toBeCloseTo(32.4, 9);
    });
  });

  describe('linked trips (two loads)', () => {
    const routes = [link(1, 2, 30), direct(2, 20, 40)];
    const first = createLoad({ netWeightTons: 10, originId: 1, destinationId: 20 });
    const second = createLoad({ netWeightTons: 8, originId: 2, destinationId: 20 });

    it('should price pickup and main haul separately (14.58 + 23.328 = 37.908 UF)', () => {
      const result = service.calculateTripCost([first, second], routes, tariff, cycle);
      const legs = result.legAmountsUf();

      expect(result.totalCostUf).toBeCloseTo(37.908, 9);
      expect(legs.get('Pickup leg (1→2)')).toBeCloseTo(14.58, 9);
      expect(legs.get('Main haul (2→20)')).toBeCloseTo(23.328, 9);
      expect([...legs.keys()]).toEqual(['Pickup leg (1→2)', 'Main haul (2→20)']);
    });

    it('should report the main-haul weight and trip metadata', () => {
      const result = service.calculateTripCost([first, second], routes, tariff, cycle);

      expect(result.appliedWeightTons).toBe(18);
      expect(result.legs[0].weightTons).toBe(15);
      expect(result.legs[1].weightTons).toBe(18);
      expect(result.metadata('total_distance_km')).toBe(70);
      expect(result.metadata('consolidated_weight_tons')).toBe(18);
    });

    it('should make the total exactly the sum of both legs', () => {
      const heavyFirst = createLoad({ netWeightTons: 16.4, originId: 1, destinationId: 20 });
      const heavySecond = createLoad({ netWeightTons: 12.35, originId: 2, destinationId: 20 });
      const result = service.calculateTripCost([heavyFirst, heavySecond], routes, tariff, cycle);
      const [pickup, mainHaul] = result.legs;

      expect(result.totalCostUf).toBe(pickup.amountUf + mainHaul.amountUf);
      expect(pickup.amountUf).toBe(0.027 * 30 * 16.4 * 1.2);
      expect(mainHaul.amountUf).toBe(0.027 * 40 * (16.4 + 12.35) * 1.2);
    });

    it('should clamp the consolidated weight to the minimum as well', () => {
      const light = [
        createLoad({ netWeightTons: 4, originId: 1, destinationId: 20 }),
        createLoad({ netWeightTons: 5, originId: 2, destinationId: 20 }),
      ];
      const result = service.calculateTripCost(light, routes, tariff, cycle);

      expect(result.legs.map(leg => leg.weightTons)).toEqual([15, 15]);
      expect(result.appliedWeightTons).toBe(15);
    });

    it('should require the pickup leg to be a segment link', () => {
      const directOnly = [direct(1, 2, 30), direct(2, 20, 40)];

      expect(() => service.calculateTripCost([first, second], directOnly, tariff, cycle)).toThrow(
        'No segment link route from 1 to 2 in the distance matrix',
      );
    });

    it('should fail when the main haul is missing', () => {
      expect(() =>
        service.calculateTripCost([first, second], [link(1, 2, 30)], tariff, cycle),
      ).toThrow('No direct route from 2 to 20 in the distance matrix');
    });

    it('should reject trips with more than two loads', () => {
      const third = createLoad({ netWeightTons: 5, originId: 3, destinationId: 20 });

      expect(() => service.calculateTripCost([first, second, third], routes, tariff, cycle)).toThrow(
        UnsupportedTripShapeException,
      );
    });
  });

  describe('minimum-weight floor', () => {
    it.each([0, 0.5, 7, 14.99, 15, 15.01, 42])(
      'should never bill less than the minimum for a %pt load',
      weight => {
        const single = service.calculateTripCost(
          [createLoad({ netWeightTons: weight })],
          [direct(1, 10, 50)],
          tariff,
          cycle,
        );
        const linked = service.calculateTripCost(
          [
            createLoad({ netWeightTons: weight, originId: 1, destinationId: 20 }),
            createLoad({ netWeightTons: weight, originId: 2, destinationId: 20 }),
          ],
          [link(1, 2, 30), direct(2, 20, 40)],
          tariff,
          cycle,
        );

        for (const leg of [...single.legs, ...linked.legs]) {
          expect(leg.weightTons).toBeGreaterThanOrEqual(tariff.minWeightTons);
        }
        expect(single.appliedWeightTons).toBe(Math.max(weight, 15));
        expect(linked.appliedWeightTons).toBe(Math.max(weight * 2, 15));
      },
    );
  });

  describe('preconditions', () => {
    it('should reject an empty load list', () => {
      expect(() => service.calculateTripCost([], [direct(1, 10, 50)], tariff, cycle)).toThrow(
        EmptyLoadListException,
      );
    });

    it('should reject a missing tariff', () => {
      expect(() =>
        service.calculateTripCost([createLoad()], [direct(1, 10, 50)], null, cycle),
      ).toThrow(MissingTariffException);
    });

    it.each([NaN, Infinity, -0.5])('should reject a single load weighing %p', weight => {
      expect(() =>
        service.calculateTripCost(
          [createLoad({ netWeightTons: weight })],
          [direct(1, 10, 50)],
          tariff,
          cycle,
        ),
      ).toThrow(InvalidWeightException);
    });

    it('should name the load with the impossible weight', () => {
      expect(() =>
        service.calculateTripCost(
          [createLoad({ netWeightTons: NaN })],
          [direct(1, 10, 50)],
          tariff,
          cycle,
        ),
      ).toThrow('Load 1 of the trip must weigh zero tons or more, received NaN');
    });

    it('should not let a negative second load shrink the main haul', () => {
      const loads = [
        createLoad({ netWeightTons: 20, originId: 1, destinationId: 20 }),
        createLoad({ netWeightTons: -10, originId: 2, destinationId: 20 }),
      ];

      expect(() =>
        service.calculateTripCost(loads, [link(1, 2, 30), direct(2, 20, 40)], tariff, cycle),
      ).toThrow('Load 2 of the trip must weigh zero tons or more, received -10');
    });

    it('should reject a distance matrix with duplicate keys', () => {
      expect(() =>
        service.calculateTripCost(
          [createLoad()],
          [direct(1, 10, 50), direct(1, 10, 55)],
          tariff,
          cycle,
        ),
      ).toThrow(InvalidRouteException);
    });

    it('should not mutate the loads it receives', () => {
      const loads = [createLoad({ netWeightTons: 10 })];
      const snapshot = JSON.stringify(loads);

      service.calculateTripCost(loads, [direct(1, 10, 50)], tariff, cycle);

      expect(JSON.stringify(loads)).toBe(snapshot);
    });
  });

  describe('toCurrency', () => {
    it('should convert the total with the given UF value', () => {
      const result = service.calculateTripCost([createLoad()], [direct(1, 10, 50)], tariff, cycle);

      expect(result.toCurrency(37000)).toBeCloseTo(1198800, 6);
    });
  });

  describe('resolveTariffRule', () => {
    const rules: TariffRule[] = [
      createBateaTariff({ baseRatePerTonKm: 0.025, validFrom: '2024-01-01', validTo: '2024-12-31' }),
      createBateaTariff({ baseRatePerTonKm: 0.027, validFrom: '2025-01-01', validTo: null }),
      createBateaTariff({ baseRatePerTonKm: 0.03, validFrom: '2025-07-01', validTo: null }),
      createBateaTariff({ vehicleType: 'AMPLIROLL_SIMPLE', baseRatePerTonKm: 0.04, validFrom: '2025-01-01' }),
    ];

    it('should pick the most recently started rule in force', () => {
      expect(service.resolveTariffRule(rules, 'BATEA', '2025-11-01').baseRatePerTonKm).toBe(0.03);
      expect(service.resolveTariffRule(rules, 'BATEA', '2025-03-15').baseRatePerTonKm).toBe(0.027);
      expect(service.resolveTariffRule(rules, 'BATEA', '2024-06-01').baseRatePerTonKm).toBe(0.025);
    });

    it('should match on vehicle type', () => {
      expect(
        service.resolveTariffRule(rules, 'AMPLIROLL_SIMPLE', '2025-11-01').baseRatePerTonKm,
      ).toBe(0.04);
    });

    it('should treat a rule without a window as always valid', () => {
      const undated = createBateaTariff({ vehicleType: 'AMPLIROLL_CARRO', baseRatePerTonKm: 0.05 });

      expect(service.resolveTariffRule([undated], 'AMPLIROLL_CARRO', '1999-01-01')).toBe(undated);
    });

    describe('per contractor', () => {
      const shared = [
        createBateaTariff({ contractorId: 7, baseRatePerTonKm: 0.027, validFrom: '2025-01-01' }),
        createBateaTariff({ contractorId: 9, baseRatePerTonKm: 0.05, validFrom: '2025-06-01' }),
      ];

      it('should only consider the requested contractor', () => {
        const seven = service.resolveTariffRule(shared, 'BATEA', '2025-11-01', 7);
        const nine = service.resolveTariffRule(shared, 'BATEA', '2025-11-01', 9);

        expect(seven.contractorId).toBe(7);
        expect(seven.baseRatePerTonKm).toBe(0.027);
        expect(nine.contractorId).toBe(9);
        expect(nine.baseRatePerTonKm).toBe(0.05);
      });

      it('should fall back to every contractor when none is named', () => {
        expect(service.resolveTariffRule(shared, 'BATEA', '2025-11-01').contractorId).toBe(9);
        expect(service.resolveTariffRule(shared, 'BATEA', '2025-11-01', null).contractorId).toBe(9);
      });

      it('should not borrow another contractor\'s rule', () => {
        expect(() => service.resolveTariffRule(shared, 'BATEA', '2025-03-01', 9)).toThrow(
          'No contractor tariff of contractor 9 for vehicle type BATEA valid on 2025-03-01',
        );
        expect(() => service.resolveTariffRule(shared, 'BATEA', '2025-11-01', 12)).toThrow(
          MissingTariffException,
        );
      });
    });

    it('should fail with MissingTariff when nothing applies', () => {
      expect(() => service.resolveTariffRule(rules, 'AMPLIROLL_CARRO', '2025-11-01')).toThrow(
        'No contractor tariff for vehicle type AMPLIROLL_CARRO valid on 2025-11-01',
      );
      expect(() => service.resolveTariffRule(rules, 'BATEA', '2023-12-31')).toThrow(
        MissingTariffException,
      );
    });
  });
});
