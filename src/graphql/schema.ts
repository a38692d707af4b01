import path from 'path';
import { makeExecutableSchema } from '@graphql-tools/schema';
import { loadFilesSync } from '@graphql-tools/load-files';
import driverResolvers from '../features/driver/driver.resolver';
import customerResolvers from '../features/customer/customer.resolver';
import rideResolvers from '../features/ride/ride.resolver';
import fareResolvers from '../features/fare/fare.resolver';

// Type definitions stay in src/, whether running from src/ or dist/.
const typesArray = loadFilesSync(
  path.join(__dirname, '..', '..', 'src', '**/*.gql')
);

const schema = makeExecutableSchema({
  typeDefs: typesArray,
  resolvers: [driverResolvers, customerResolvers, rideResolvers, fareResolvers],
});

export default schema;
