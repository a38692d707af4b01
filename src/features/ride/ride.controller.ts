import { BookingStatus } from '../../constants/general';
import type { ContextType } from '../../types';
import {
  NO_DRIVERS_MESSAGE,
  rideConfirmationMessage,
} from '../../utils/general';
import type Ride from './ride.model';
import type { BookRideRequest } from './ride.type';

class RideController {
  static bookRide(
    _: unknown,
    { input }: { input: BookRideRequest },
    { system }: ContextType
  ) {
    const customer = system.getCustomerById(input.customerId);
    const result = system.requestRide({
      customer,
      pickupLocation: input.pickupLocation,
      dropoffLocation: input.dropoffLocation,
      distance: input.distance,
      category: input.category,
    });

    switch (result.status) {
      case BookingStatus.CONFIRMED:
        return {
          status: result.status,
          ride: result.ride,
          fare: result.ride.fare,
          message: rideConfirmationMessage(
            result.ride.fare,
            result.driver.name
          ),
        };
      case BookingStatus.NO_DRIVER_AVAILABLE:
        return {
          status: result.status,
          ride: null,
          fare: result.fare,
          message: NO_DRIVERS_MESSAGE,
        };
      case BookingStatus.INVALID_CATEGORY:
        return {
          status: result.status,
          ride: null,
          fare: null,
          message: result.error.message,
        };
    }
  }

  static category(ride: Ride) {
    return ride.farePolicy.name;
  }
}

export default RideController;
