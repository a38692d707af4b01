import DriverController from './driver.controller';

const driverResolvers = {
  Query: {
    drivers: DriverController.listDrivers,
    availableDriver: DriverController.availableDriver,
  },
  Mutation: {
    addDriver: DriverController.addDriver,
    completeDriverRide: DriverController.completeDriverRide,
  },
};

export default driverResolvers;
