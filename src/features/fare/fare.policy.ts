export type FarePolicyName = 'Economy' | 'Luxury' | 'Pool';

export interface FarePolicy {
  readonly name: FarePolicyName;
  readonly ratePerMile: number;
  calculateFare(distance: number): number;
}

abstract class PerMileFarePolicy implements FarePolicy {
  abstract readonly name: FarePolicyName;
  abstract readonly ratePerMile: number;

  // No rounding, minimum fare or surcharge.
  calculateFare(distance: number): number {
    return distance * this.ratePerMile;
  }
}

export class EconomyFarePolicy extends PerMileFarePolicy {
  readonly name = 'Economy';
  readonly ratePerMile = 5;
}

export class LuxuryFarePolicy extends PerMileFarePolicy {
  readonly name = 'Luxury';
  readonly ratePerMile = 10;
}

export class PoolFarePolicy extends PerMileFarePolicy {
  readonly name = 'Pool';
  readonly ratePerMile = 3;
}
