import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Stable error codes returned by the settlement engine.
 */
export type SettlementErrorCode =
  | 'INVALID_FUEL_PRICE'
  | 'EMPTY_LOAD_LIST'
  | 'MISSING_TARIFF'
  | 'INVALID_ROUTE'
  | 'INVALID_WEIGHT'
  | 'INVALID_CONVERSION_RATE'
  | 'INVALID_TARIFF'
  | 'INVALID_ECONOMIC_CYCLE'
  | 'UNSUPPORTED_TRIP_SHAPE';

export interface SettlementErrorBody {
  success: false;
  error: {
    code: SettlementErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Base class for every input-validation or missing-configuration failure.
 * None of them is transient: retrying with the same input fails again.
 */
export abstract class SettlementException extends HttpException {
  constructor(
    public readonly code: SettlementErrorCode,
    message: string,
    status: HttpStatus,
    public readonly details?: Record<string, unknown>,
  ) {
    super(
      {
        success: false,
        error: {
          code,
          message,
          ...(details !== undefined ? { details } : {}),
        },
      } satisfies SettlementErrorBody,
      status,
    );
    // HttpException derives its message from the class name for object bodies
    this.message = message;
    this.name = new.target.name;
  }
}

export class InvalidFuelPriceException extends SettlementException {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_FUEL_PRICE', message, HttpStatus.UNPROCESSABLE_ENTITY, details);
  }
}

export class EmptyLoadListException extends SettlementException {
  constructor() {
    super(
      'EMPTY_LOAD_LIST',
      'Trip cost requires at least one load; received an empty load list',
      HttpStatus.BAD_REQUEST,
    );
  }
}

export class MissingTariffException extends SettlementException {
  constructor(message: string, details?: Record<string, unknown>) {
    super('MISSING_TARIFF', message, HttpStatus.NOT_FOUND, details);
  }
}

export class InvalidRouteException extends SettlementException {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_ROUTE', message, HttpStatus.NOT_FOUND, details);
  }
}

export class InvalidWeightException extends SettlementException {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_WEIGHT', message, HttpStatus.UNPROCESSABLE_ENTITY, details);
  }
}

export class InvalidConversionRateException extends SettlementException {
  constructor(ufValue: number) {
    super(
      'INVALID_CONVERSION_RATE',
      `UF value must be positive, received ${ufValue}`,
      HttpStatus.UNPROCESSABLE_ENTITY,
      { uf_value: ufValue },
    );
  }
}

export class InvalidTariffException extends SettlementException {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_TARIFF', message, HttpStatus.UNPROCESSABLE_ENTITY, details);
  }
}

export class InvalidEconomicCycleException extends SettlementException {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_ECONOMIC_CYCLE', message, HttpStatus.UNPROCESSABLE_ENTITY, details);
  }
}

export class UnsupportedTripShapeException extends SettlementException {
  constructor(loadCount: number) {
    super(
      'UNSUPPORTED_TRIP_SHAPE',
      `Consolidated trips support exactly 2 loads (pickup leg + main haul); received ${loadCount}`,
      HttpStatus.UNPROCESSABLE_ENTITY,
      { load_count: loadCount },
    );
  }
}
