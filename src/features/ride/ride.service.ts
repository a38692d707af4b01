import { BookingStatus } from '../../constants/general';
import { InvalidRideCategoryError } from '../../utils/responses';
import type Customer from '../customer/customer.model';
import type DriverRegistry from '../driver/driver.registry';
import FarePolicyFactory from '../fare/fare.factory';
import type { FarePolicy } from '../fare/fare.policy';
import Ride from './ride.model';
import type { BookRideInput, BookingResult } from './ride.type';

class RideBookingService {
  constructor(private readonly driverRegistry: DriverRegistry) {}

  /**
   * Prices the ride and binds it to the first available driver.
   *
   * A ride that finds no driver is dropped: it never reaches the
   * customer's history and only its price is reported back.
   */
  requestRide(input: BookRideInput): BookingResult {
    let farePolicy: FarePolicy;
    try {
      farePolicy = FarePolicyFactory.create(input.category);
    } catch (error) {
      if (error instanceof InvalidRideCategoryError) {
        console.log(`Error booking ride: ${error.message}`);
        return { status: BookingStatus.INVALID_CATEGORY, error };
      }
      throw error;
    }

    const ride = new Ride({
      customer: input.customer,
      farePolicy,
      pickupLocation: input.pickupLocation,
      dropoffLocation: input.dropoffLocation,
      distance: input.distance,
    });

    const driver = this.driverRegistry.getAvailableDriver();
    if (!driver) {
      return {
        status: BookingStatus.NO_DRIVER_AVAILABLE,
        category: farePolicy.name,
        fare: ride.fare,
      };
    }

    ride.assignDriver(driver);
    input.customer.recordRide(ride);

    return { status: BookingStatus.CONFIRMED, ride, driver };
  }

  bookRide(
    customer: Customer,
    pickupLocation: string,
    dropoffLocation: string,
    distance: number,
    category: string
  ): Ride | null {
    const result = this.requestRide({
      customer,
      pickupLocation,
      dropoffLocation,
      distance,
      category,
    });

    return result.status === BookingStatus.CONFIRMED ? result.ride : null;
  }
}

export default RideBookingService;
