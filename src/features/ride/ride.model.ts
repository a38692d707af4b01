import { v4 as uuidv4 } from 'uuid';
import type Customer from '../customer/customer.model';
import type Driver from '../driver/driver.model';
import type { FarePolicy } from '../fare/fare.policy';
import type { CreateRideInput } from './ride.type';

class Ride {
  readonly id: string = uuidv4();
  readonly customer: Customer;
  readonly farePolicy: FarePolicy;
  readonly pickupLocation: string;
  readonly dropoffLocation: string;
  readonly distance: number;
  readonly fare: number;
  driver: Driver | null = null;
  isConfirmed = false;

  constructor(input: CreateRideInput) {
    this.customer = input.customer;
    this.farePolicy = input.farePolicy;
    this.pickupLocation = input.pickupLocation;
    this.dropoffLocation = input.dropoffLocation;
    this.distance = input.distance;
    this.fare = input.farePolicy.calculateFare(input.distance);
  }

  /**
   * Binds the driver to this ride and confirms it. The driver is asked
   * first, so a driver that is already occupied leaves the ride unconfirmed.
   */
  assignDriver(driver: Driver): void {
    driver.assignRide(this);
    this.driver = driver;
    this.isConfirmed = true;
  }
}

export default Ride;
