import { v4 as uuidv4 } from 'uuid';
import { DriverStatus } from '../../constants/general';
import { DriverNotAvailableError } from '../../utils/responses';
import type Ride from '../ride/ride.model';

class Driver {
  readonly id: string = uuidv4();
  readonly name: string;
  status: DriverStatus = DriverStatus.AVAILABLE;
  currentRide: Ride | null = null;

  constructor(name: string) {
    this.name = name;
  }

  isAvailable(): boolean {
    return this.status === DriverStatus.AVAILABLE;
  }

  /**
   * Puts the driver on a ride. An occupied driver keeps its current ride
   * and the call throws.
   */
  assignRide(ride: Ride): void {
    if (!this.isAvailable()) {
      throw new DriverNotAvailableError(this.name);
    }

    this.status = DriverStatus.OCCUPIED;
    this.currentRide = ride;
  }

  // Safe to call on an idle driver.
  completeRide(): void {
    this.status = DriverStatus.AVAILABLE;
    this.currentRide = null;
  }
}

export default Driver;
