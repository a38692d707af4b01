import { BookingStatus } from '../../constants/general';
import type { InvalidRideCategoryError } from '../../utils/responses';
import type Customer from '../customer/customer.model';
import type Driver from '../driver/driver.model';
import type { FarePolicy, FarePolicyName } from '../fare/fare.policy';
import type Ride from './ride.model';

export interface CreateRideInput {
  customer: Customer;
  farePolicy: FarePolicy;
  pickupLocation: string;
  dropoffLocation: string;
  distance: number;
}

export interface BookRideInput {
  customer: Customer;
  pickupLocation: string;
  dropoffLocation: string;
  distance: number;
  category: string;
}

/**
 * Input of the bookRide mutation; the customer is referenced by id.
 */
export interface BookRideRequest {
  customerId: string;
  pickupLocation: string;
  dropoffLocation: string;
  distance: number;
  category: string;
}

export type BookingResult =
  | { status: typeof BookingStatus.CONFIRMED; ride: Ride; driver: Driver }
  | {
      status: typeof BookingStatus.NO_DRIVER_AVAILABLE;
      category: FarePolicyName;
      fare: number;
    }
  | {
      status: typeof BookingStatus.INVALID_CATEGORY;
      error: InvalidRideCategoryError;
    };
