import { InvalidConversionRateException } from '../exceptions/settlement.exceptions';
import { isPositiveNumber } from './settlement.enums';

export type TripMetadataLabel = 'total_distance_km' | 'consolidated_weight_tons';

export interface LegBreakdownEntry {
  kind: 'leg';
  label: string;
  amountUf: number;
  distanceKm: number;
  weightTons: number;
}

export interface MetadataBreakdownEntry {
  kind: 'metadata';
  label: TripMetadataLabel;
  value: number;
}

export type SegmentBreakdownEntry = LegBreakdownEntry | MetadataBreakdownEntry;

export interface TripCostResultProps {
  totalCostUf: number;
  adjustmentFactor: number;
  appliedWeightTons: number;
  segmentBreakdown: SegmentBreakdownEntry[];
}

/**
 * Amount owed to the contractor for one trip. Built by TransportCostService.
 */
export class TripCostResult {
  readonly totalCostUf: number;
  readonly adjustmentFactor: number;
  /** Heaviest billed leg weight (the main haul on consolidated trips) */
  readonly appliedWeightTons: number;
  readonly segmentBreakdown: ReadonlyArray<Readonly<SegmentBreakdownEntry>>;

  constructor(props: TripCostResultProps) {
    this.totalCostUf = props.totalCostUf;
    this.adjustmentFactor = props.adjustmentFactor;
    this.appliedWeightTons = props.appliedWeightTons;
    this.segmentBreakdown = Object.freeze(props.segmentBreakdown.map(entry => Object.freeze({ ...entry })));
    Object.freeze(this);
  }

  get legs(): ReadonlyArray<Readonly<LegBreakdownEntry>> {
    return this.segmentBreakdown.filter(
      (entry): entry is Readonly<LegBreakdownEntry> => entry.kind === 'leg',
    );
  }

  /**
   * Ordered leg label → UF amount.
   */
  legAmountsUf(): Map<string, number> {
    return new Map(this.legs.map(leg => [leg.label, leg.amountUf]));
  }

  metadata(label: TripMetadataLabel): number | undefined {
    for (const entry of this.segmentBreakdown) {
      if (entry.kind === 'metadata' && entry.label === label) {
        return entry.value;
      }
    }
    return undefined;
  }

  toCurrency(ufValue: number): number {
    if (!isPositiveNumber(ufValue)) {
      throw new InvalidConversionRateException(ufValue);
    }
    return this.totalCostUf * ufValue;
  }
}
