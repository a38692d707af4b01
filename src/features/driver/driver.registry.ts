import Driver from './driver.model';

class DriverRegistry {
  private readonly drivers: Driver[] = [];

  // No identity check: two drivers may share a name.
  addDriver(driver: Driver): void {
    this.drivers.push(driver);
  }

  /**
   * First available driver in registration order, or null once every
   * registered driver is occupied.
   */
  getAvailableDriver(): Driver | null {
    return this.drivers.find((driver) => driver.isAvailable()) ?? null;
  }

  getDriverById(id: string): Driver | null {
    return this.drivers.find((driver) => driver.id === id) ?? null;
  }

  getAllDrivers(): Driver[] {
    return [...this.drivers];
  }
}

export default DriverRegistry;
