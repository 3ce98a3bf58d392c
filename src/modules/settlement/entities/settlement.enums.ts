/**
 * Vehicle configurations a contractor tariff can be defined for.
 */
export const VEHICLE_TYPES = ['BATEA', 'AMPLIROLL_SIMPLE', 'AMPLIROLL_CARRO'] as const;
export type VehicleType = (typeof VEHICLE_TYPES)[number];

/**
 * Client billing concepts. TRATAMIENTO is only charged for loads routed
 * through a treatment plant.
 */
export const BILLING_CONCEPTS = ['TRANSPORTE', 'DISPOSICION', 'TRATAMIENTO'] as const;
export type BillingConcept = (typeof BILLING_CONCEPTS)[number];

export function isVehicleType(value: unknown): value is VehicleType {
  return VEHICLE_TYPES.some(type => type === value);
}

export function isBillingConcept(value: unknown): value is BillingConcept {
  return BILLING_CONCEPTS.some(concept => concept === value);
}

export function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

export function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}
