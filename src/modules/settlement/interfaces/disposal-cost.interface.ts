export interface DisposalCost {
  siteId: number;
  billableWeightTons: number;
  ratePerTon: number;
  amountUf: number;
}
