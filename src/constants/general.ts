export const DriverStatusAVAILABLE = 'AVAILABLE';
export const DriverStatusOCCUPIED = 'OCCUPIED';

export const RideCategoryECONOMY = 'economy';
export const RideCategoryLUXURY = 'luxury';
export const RideCategoryPOOL = 'pool';

export const BookingStatusCONFIRMED = 'CONFIRMED';
export const BookingStatusNO_DRIVER_AVAILABLE = 'NO_DRIVER_AVAILABLE';
export const BookingStatusINVALID_CATEGORY = 'INVALID_CATEGORY';

export const DriverStatus = {
  AVAILABLE: DriverStatusAVAILABLE,
  OCCUPIED: DriverStatusOCCUPIED,
} as const;

export type DriverStatus = (typeof DriverStatus)[keyof typeof DriverStatus];

export const RideCategory = {
  ECONOMY: RideCategoryECONOMY,
  LUXURY: RideCategoryLUXURY,
  POOL: RideCategoryPOOL,
} as const;

export type RideCategory = (typeof RideCategory)[keyof typeof RideCategory];

export const BookingStatus = {
  CONFIRMED: BookingStatusCONFIRMED,
  NO_DRIVER_AVAILABLE: BookingStatusNO_DRIVER_AVAILABLE,
  INVALID_CATEGORY: BookingStatusINVALID_CATEGORY,
} as const;

export type BookingStatus = (typeof BookingStatus)[keyof typeof BookingStatus];

export const RideCategoryEnum: string[] = Object.values(RideCategory);

export const isRideCategory = (value: string): value is RideCategory =>
  RideCategoryEnum.includes(value);
