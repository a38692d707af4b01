import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { executeOperation } from '../executor';
import { RideSystem } from '../../services/ride-system.service';

const BOOK_RIDE = `
  mutation BookRide($input: BookRideInput!) {
    bookRide(input: $input) {
      status
      fare
      message
      ride {
        category
        fare
        isConfirmed
        pickupLocation
        dropoffLocation
        customer { name }
        driver { name status }
      }
    }
  }
`;

describe('executeOperation', () => {
  let system: RideSystem;

  beforeEach(() => {
    system = new RideSystem();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('registers drivers and customers', async () => {
    const result = await executeOperation(
      system,
      `mutation {
        addDriver(name: "Alice") { name status currentRide { id } }
        addCustomer(name: "John") { name rides { id } }
      }`
    );

    expect(result.errors).toBeUndefined();
    expect(result.data).toEqual({
      addDriver: { name: 'Alice', status: 'AVAILABLE', currentRide: null },
      addCustomer: { name: 'John', rides: [] },
    });
    expect(system.listDrivers().map((driver) => driver.name)).toEqual([
      'Alice',
    ]);
  });

  it('books a ride with the first available driver', async () => {
    system.addDriver('Alice');
    const john = system.addCustomer('John');

    const result = await executeOperation(system, BOOK_RIDE, {
      input: {
        customerId: john.id,
        pickupLocation: 'Airport',
        dropoffLocation: 'Downtown',
        distance: 15,
        category: 'Economy',
      },
    });

    expect(result.data).toEqual({
      bookRide: {
        status: 'CONFIRMED',
        fare: 75,
        message: 'Ride Fare: $75, Driver: Alice',
        ride: {
          category: 'Economy',
          fare: 75,
          isConfirmed: true,
          pickupLocation: 'Airport',
          dropoffLocation: 'Downtown',
          customer: { name: 'John' },
          driver: { name: 'Alice', status: 'OCCUPIED' },
        },
      },
    });
  });

  it('reports a booking without a free driver', async () => {
    const mike = system.addCustomer('Mike');

    const result = await executeOperation(system, BOOK_RIDE, {
      input: {
        customerId: mike.id,
        pickupLocation: 'Downtown',
        dropoffLocation: 'Shopping Mall',
        distance: 5,
        category: 'pool',
      },
    });

    expect(result.data).toEqual({
      bookRide: {
        status: 'NO_DRIVER_AVAILABLE',
        fare: 15,
        message: 'No drivers available.',
        ride: null,
      },
    });
    expect(mike.getRideHistory()).toEqual([]);
  });

  it('reports an invalid category', async () => {
    system.addDriver('Alice');
    const john = system.addCustomer('John');

    const result = await executeOperation(system, BOOK_RIDE, {
      input: {
        customerId: john.id,
        pickupLocation: 'Airport',
        dropoffLocation: 'Downtown',
        distance: 15,
        category: 'Jet',
      },
    });

    expect(result.data).toEqual({
      bookRide: {
        status: 'INVALID_CATEGORY',
        fare: null,
        message: 'Invalid ride type: Jet',
        ride: null,
      },
    });
    expect(console.log).toHaveBeenCalledWith(
      'Error booking ride: Invalid ride type: Jet'
    );
  });

  it('lists a customer ride history and releases drivers', async () => {
    const alice = system.addDriver('Alice');
    const john = system.addCustomer('John');
    system.bookRide(john, 'College', 'Downtown', 10, 'Luxury');

    const history = await executeOperation(
      system,
      `query Customer($id: ID!) {
        customer(id: $id) { name rides { category fare driver { name } } }
        availableDriver { name }
      }`,
      { id: john.id }
    );

    expect(history.data).toEqual({
      customer: {
        name: 'John',
        rides: [{ category: 'Luxury', fare: 100, driver: { name: 'Alice' } }],
      },
      availableDriver: null,
    });

    const released = await executeOperation(
      system,
      `mutation Complete($driverId: ID!) {
        completeDriverRide(driverId: $driverId) { name status currentRide { id } }
      }`,
      { driverId: alice.id }
    );

    expect(released.data).toEqual({
      completeDriverRide: {
        name: 'Alice',
        status: 'AVAILABLE',
        currentRide: null,
      },
    });
  });

  it('quotes a fare', async () => {
    const result = await executeOperation(
      system,
      `{ fareQuote(distance: 10, category: "POOL") { category ratePerMile fare } }`
    );

    expect(result.data).toEqual({
      fareQuote: { category: 'Pool', ratePerMile: 3, fare: 30 },
    });
  });

  it('returns the error code of a rejected quote', async () => {
    const result = await executeOperation(
      system,
      `{ fareQuote(distance: 10, category: "Hovercraft") { fare } }`
    );

    expect(result.data).toBeNull();
    expect(result.errors).toHaveLength(1);
    expect(result.errors?.[0]?.message).toBe('Invalid ride type: Hovercraft');
    expect(result.errors?.[0]?.extensions).toEqual({ code: 400 });
  });

  it('returns a 404 for an unknown customer', async () => {
    const result = await executeOperation(
      system,
      `{ customer(id: "missing") { name } }`
    );

    expect(result.data).toBeNull();
    expect(result.errors?.[0]?.message).toBe('Customer not found');
    expect(result.errors?.[0]?.extensions).toEqual({
      code: 404,
      details: 'missing',
    });
  });
});
