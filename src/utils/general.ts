import { ENV } from '../config/env';

// Halves go to the nearest even whole number: 12.5 -> 12, 7.5 -> 8.
export const roundHalfToEven = (value: number): number =>
  Math.abs(value % 1) === 0.5 ? 2 * Math.round(value / 2) : Math.round(value);

/**
 * Formats a fare as a whole currency amount, e.g. 75 -> "$75".
 */
export const formatFare = (fare: number): string =>
  `${ENV.CURRENCY_SYMBOL}${roundHalfToEven(fare)}`;

export const rideConfirmationMessage = (
  fare: number,
  driverName: string
): string => `Ride Fare: ${formatFare(fare)}, Driver: ${driverName}`;

export const NO_DRIVERS_MESSAGE = 'No drivers available.';
