import type { ContextType } from '../../types';

class DriverController {
  static listDrivers(_: unknown, __: unknown, { system }: ContextType) {
    return system.listDrivers();
  }

  static availableDriver(_: unknown, __: unknown, { system }: ContextType) {
    return system.driverRegistry.getAvailableDriver();
  }

  static addDriver(
    _: unknown,
    { name }: { name: string },
    { system }: ContextType
  ) {
    return system.addDriver(name);
  }

  static completeDriverRide(
    _: unknown,
    { driverId }: { driverId: string },
    { system }: ContextType
  ) {
    return system.completeDriverRide(driverId);
  }
}

export default DriverController;
