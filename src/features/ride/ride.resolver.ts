import RideController from './ride.controller';

const rideResolvers = {
  Mutation: {
    bookRide: RideController.bookRide,
  },
  Ride: {
    category: RideController.category,
  },
};

export default rideResolvers;
