import { RideSystem } from '../services/ride-system.service';

/**
 * Scripted run: two drivers, three customers, three bookings. The third
 * booking finds every driver occupied.
 */
export function runDemo(system: RideSystem = new RideSystem()): RideSystem {
  system.addDriver('Alice');
  system.addDriver('Bob');

  const john = system.addCustomer('John');
  const rebecca = system.addCustomer('Rebecca');
  const mike = system.addCustomer('Mike');

  console.log('=== SwiftRide System Test ===\n');

  console.log('Task 6:');
  system.bookRide(john, 'Airport', 'Downtown', 15, 'Economy');

  console.log('\nTask 7:');
  system.bookRide(rebecca, 'College', 'Downtown', 10, 'Luxury');

  console.log('\nTask 8:');
  system.bookRide(mike, 'Downtown', 'Shopping Mall', 5, 'Pool');

  return system;
}
