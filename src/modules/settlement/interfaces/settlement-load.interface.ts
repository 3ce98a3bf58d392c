/**
 * Read-only projection of a logistics load. The engine never writes to it.
 */
export interface SettlementLoad {
  netWeightTons: number;
  /** Pickup facility */
  originId: number;
  /** Disposal site or treatment plant, same id space as the distance matrix */
  destinationId: number;
  goesToTreatment: boolean;
  /** Billed client; used to pick client tariffs when settling a whole trip */
  clientId?: number | null;
  /** Site charging the operator a reception fee; null when none does */
  disposalSiteId?: number | null;
}
