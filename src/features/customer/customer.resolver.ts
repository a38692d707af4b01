import CustomerController from './customer.controller';

const customerResolvers = {
  Query: {
    customers: CustomerController.listCustomers,
    customer: CustomerController.getCustomer,
  },
  Mutation: {
    addCustomer: CustomerController.addCustomer,
  },
  Customer: {
    rides: CustomerController.rides,
  },
};

export default customerResolvers;
