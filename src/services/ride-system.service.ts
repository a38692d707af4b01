import { BookingStatus } from '../constants/general';
import Customer from '../features/customer/customer.model';
import Driver from '../features/driver/driver.model';
import DriverRegistry from '../features/driver/driver.registry';
import RideBookingService from '../features/ride/ride.service';
import type { BookRideInput, BookingResult } from '../features/ride/ride.type';
import {
  NO_DRIVERS_MESSAGE,
  rideConfirmationMessage,
} from '../utils/general';
import { ErrorResponse } from '../utils/responses';

/**
 * Entry point over one set of drivers and customers. Each instance is an
 * independent booking context.
 */
export class RideSystem {
  readonly driverRegistry = new DriverRegistry();
  readonly bookingService = new RideBookingService(this.driverRegistry);
  private readonly customers: Customer[] = [];

  addDriver(name: string): Driver {
    const driver = new Driver(name);
    this.driverRegistry.addDriver(driver);
    return driver;
  }

  addCustomer(name: string): Customer {
    const customer = new Customer(name);
    this.customers.push(customer);
    return customer;
  }

  listDrivers(): Driver[] {
    return this.driverRegistry.getAllDrivers();
  }

  listCustomers(): Customer[] {
    return [...this.customers];
  }

  getDriverById(id: string): Driver {
    const driver = this.driverRegistry.getDriverById(id);
    if (!driver) {
      throw new ErrorResponse(404, 'Driver not found', id);
    }
    return driver;
  }

  getCustomerById(id: string): Customer {
    const customer = this.customers.find((entry) => entry.id === id);
    if (!customer) {
      throw new ErrorResponse(404, 'Customer not found', id);
    }
    return customer;
  }

  requestRide(input: BookRideInput): BookingResult {
    return this.bookingService.requestRide(input);
  }

  /**
   * Books a ride and prints the outcome. An invalid category is reported
   * by the booking service and then printed like a missed booking.
   */
  bookRide(
    customer: Customer,
    pickupLocation: string,
    dropoffLocation: string,
    distance: number,
    category: string
  ): void {
    const result = this.bookingService.requestRide({
      customer,
      pickupLocation,
      dropoffLocation,
      distance,
      category,
    });

    if (result.status === BookingStatus.CONFIRMED) {
      console.log(rideConfirmationMessage(result.ride.fare, result.driver.name));
    } else {
      console.log(NO_DRIVERS_MESSAGE);
    }
  }

  // The ride keeps its confirmed state; only the driver is released.
  completeDriverRide(driverId: string): Driver {
    const driver = this.getDriverById(driverId);
    driver.completeRide();
    return driver;
  }
}
