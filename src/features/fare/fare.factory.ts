import { RideCategory, isRideCategory } from '../../constants/general';
import { InvalidRideCategoryError } from '../../utils/responses';
import {
  EconomyFarePolicy,
  LuxuryFarePolicy,
  PoolFarePolicy,
} from './fare.policy';
import type { FarePolicy } from './fare.policy';
import type { FareQuote } from './fare.type';

const farePolicies: Record<RideCategory, FarePolicy> = {
  [RideCategory.ECONOMY]: new EconomyFarePolicy(),
  [RideCategory.LUXURY]: new LuxuryFarePolicy(),
  [RideCategory.POOL]: new PoolFarePolicy(),
};

class FarePolicyFactory {
  /**
   * Resolves a ride category name (any casing) to its fare policy.
   * Every call for the same category returns the same policy instance.
   */
  static create(category: string): FarePolicy {
    const normalized = category.toLowerCase();

    if (!isRideCategory(normalized)) {
      throw new InvalidRideCategoryError(category);
    }

    return farePolicies[normalized];
  }

  static quote(distance: number, category: string): FareQuote {
    const policy = FarePolicyFactory.create(category);
    return {
      category: policy.name,
      ratePerMile: policy.ratePerMile,
      fare: policy.calculateFare(distance),
    };
  }
}

export default FarePolicyFactory;
