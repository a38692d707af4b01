import type { ContextType } from '../../types';
import type Customer from './customer.model';

class CustomerController {
  static listCustomers(_: unknown, __: unknown, { system }: ContextType) {
    return system.listCustomers();
  }

  static getCustomer(
    _: unknown,
    { id }: { id: string },
    { system }: ContextType
  ) {
    return system.getCustomerById(id);
  }

  static addCustomer(
    _: unknown,
    { name }: { name: string },
    { system }: ContextType
  ) {
    return system.addCustomer(name);
  }

  static rides(customer: Customer) {
    return customer.getRideHistory();
  }
}

export default CustomerController;
