import { Injectable, Logger } from '@nestjs/common';
import { InvalidFuelPriceException } from './exceptions/settlement.exceptions';
import { isPositiveNumber } from './entities/settlement.enums';

/**
 * Contractual fuel adjustment polynomial:
 *
 *   factor = 1 + (current - base) / base
 *
 * A 20% rise over the reference price yields 1.2, a 20% drop yields 0.8.
 * Plausibility of the current price is the caller's concern; only the base
 * price is guarded because it is the divisor.
 */
@Injectable()
export class FuelAdjustmentService {
  private readonly logger = new Logger(FuelAdjustmentService.name);

  calculateFuelFactor(currentFuelPrice: number, baseFuelPrice: number): number {
    if (!isPositiveNumber(baseFuelPrice)) {
      throw new InvalidFuelPriceException(
        `Base fuel price must be positive to compute the adjustment factor, received ${baseFuelPrice}`,
        { base_fuel_price: baseFuelPrice, current_fuel_price: currentFuelPrice },
      );
    }
    if (!Number.isFinite(currentFuelPrice)) {
      throw new InvalidFuelPriceException(
        `Current fuel price must be a finite number, received ${currentFuelPrice}`,
        { base_fuel_price: baseFuelPrice, current_fuel_price: currentFuelPrice },
      );
    }

    const deltaPrice = currentFuelPrice - baseFuelPrice;
    const factor = 1 + deltaPrice / baseFuelPrice;

    this.logger.debug(
      `Fuel factor ${factor} (current ${currentFuelPrice}, base ${baseFuelPrice})`,
    );

    return factor;
  }
}
