import type { FarePolicyName } from './fare.policy';

export interface FareQuote {
  category: FarePolicyName;
  ratePerMile: number;
  fare: number;
}
