import { v4 as uuidv4 } from 'uuid';
import type Ride from '../ride/ride.model';

class Customer {
  readonly id: string = uuidv4();
  readonly name: string;
  private readonly rideHistory: Ride[] = [];

  constructor(name: string) {
    this.name = name;
  }

  recordRide(ride: Ride): void {
    this.rideHistory.push(ride);
  }

  // Booking order, oldest first.
  getRideHistory(): Ride[] {
    return [...this.rideHistory];
  }
}

export default Customer;
