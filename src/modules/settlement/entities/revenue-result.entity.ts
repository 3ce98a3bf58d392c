import { IsoDate } from '../../../utils/calendar-date';
import { BillingConcept } from './settlement.enums';

export type ConceptAmounts = Readonly<Record<BillingConcept, number>>;

export interface RevenueResultProps {
  totalUf: number;
  totalClp: number;
  conceptBreakdown: Record<BillingConcept, number>;
  billableWeights: Record<BillingConcept, number>;
  calculationDate: IsoDate;
}

/**
 * Amount billed to the client for one load. Every concept is present in the
 * breakdown; concepts that were not charged carry 0.
 */
export class RevenueResult {
  readonly totalUf: number;
  readonly totalClp: number;
  readonly conceptBreakdown: ConceptAmounts;
  readonly billableWeights: ConceptAmounts;
  readonly calculationDate: IsoDate;

  constructor(props: RevenueResultProps) {
    this.totalUf = props.totalUf;
    this.totalClp = props.totalClp;
    this.conceptBreakdown = Object.freeze({ ...props.conceptBreakdown });
    this.billableWeights = Object.freeze({ ...props.billableWeights });
    this.calculationDate = props.calculationDate;
    Object.freeze(this);
  }
}
